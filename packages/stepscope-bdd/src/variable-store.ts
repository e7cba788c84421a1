// ============================================================================
// Scenario variable store.
// One store per scenario execution; handlers read and write it through the
// step context. Nothing is shared between scenarios or batch workers.
// ============================================================================

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g;

export class VariableStore {
	private readonly values = new Map<string, string>();
	private readonly lists = new Map<string, string[]>();

	set(key: string, value: string): void {
		this.values.set(key, value);
	}

	get(key: string): string | undefined {
		return this.values.get(key);
	}

	has(key: string): boolean {
		return this.values.has(key);
	}

	setList(key: string, items: readonly string[]): void {
		this.lists.set(key, [...items]);
	}

	getList(key: string): readonly string[] | undefined {
		return this.lists.get(key);
	}

	/** Drop every stored value and list. */
	clear(): void {
		this.values.clear();
		this.lists.clear();
	}

	/** Replace `{{key}}` with stored values. Unknown keys are left in place. */
	interpolate(text: string): string {
		return text.replace(PLACEHOLDER, (whole, key: string) => this.values.get(key) ?? whole);
	}

	snapshot(): { values: Record<string, string>; lists: Record<string, string[]> } {
		return {
			values: Object.fromEntries(this.values),
			lists: Object.fromEntries([...this.lists].map(([k, v]) => [k, [...v]])),
		};
	}
}
