// ============================================================================
// Webhook Notifications
//
// Named endpoints subscribe to run events and receive one JSON POST per
// event. `type` picks the body: a generic run payload, or a Slack, Discord
// or Teams message card. Failed deliveries are retried with a linear
// backoff and reported back, never thrown; a webhook never changes a run's
// outcome.
//
// ```ts
// const hooks = WebhookManager.fromFile('webhooks.yaml');
// const deliveries = await hooks.notifyCompletion(result);
// ```
// ============================================================================

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage, silentLogger } from 'stepscope-bdd';
import type { ExecutionResult, Logger } from 'stepscope-bdd';

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const webhookEvents = ['start', 'completion', 'failure', 'success'] as const;

const webhookConfigSchema = z.object({
	name: z.string().min(1).default('default'),
	url: z.string().url(),
	type: z.enum(['generic', 'slack', 'discord', 'teams']).default('generic'),
	events: z.array(z.enum(webhookEvents)).default(['completion', 'failure']),
	headers: z.record(z.string()).default({}),
	enabled: z.boolean().default(true),
	retry_count: z.number().int().min(1).default(3),
	timeout_seconds: z.number().positive().default(30),
});

export type WebhookEvent = (typeof webhookEvents)[number];
export type WebhookType = z.infer<typeof webhookConfigSchema>['type'];
export type WebhookConfig = z.infer<typeof webhookConfigSchema>;
/** Config as written in a file: everything but `url` may be omitted. */
export type WebhookConfigInput = z.input<typeof webhookConfigSchema>;

export function parseWebhookConfigs(text: string, source: string): WebhookConfig[] {
	let raw: unknown;
	try {
		raw = extname(source).toLowerCase() === '.json' ? JSON.parse(text) : yaml.parse(text);
	} catch (err) {
		throw new ConfigError(`Invalid webhook config '${source}': ${errorMessage(err)}`, undefined, err);
	}

	const parsed = z.array(webhookConfigSchema).safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
		throw new ConfigError(
			`Invalid webhook config '${source}'${where}: ${issue?.message ?? 'invalid document'}`,
			'Expected a list of { name, url, type, events, headers, enabled, retry_count, timeout_seconds }',
		);
	}
	return parsed.data;
}

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

export interface WebhookPayload {
	event: WebhookEvent;
	timestamp: string;
	feature: string;
	status: string;
	summary: {
		total_scenarios: number;
		passed_scenarios: number;
		failed_scenarios: number;
		total_steps: number;
		duration_ms: number;
	};
}

type SlackColor = 'good' | 'danger' | 'warning';

export interface SlackPayload {
	text: string;
	username: string;
	icon_emoji: string;
	attachments: Array<{
		color: SlackColor;
		title: string;
		text: string;
		fields: Array<{ title: string; value: string; short: boolean }>;
		footer: string;
		ts: number;
	}>;
}

export interface DiscordPayload {
	username: string;
	embeds: Array<{
		title: string;
		description: string;
		color: number;
		fields: Array<{ name: string; value: string; inline: boolean }>;
		footer: { text: string };
		timestamp: string;
	}>;
}

export interface TeamsPayload {
	'@type': 'MessageCard';
	'@context': 'http://schema.org/extensions';
	themeColor: string;
	summary: string;
	sections: Array<{
		activityTitle: string;
		activitySubtitle: string;
		facts: Array<{ name: string; value: string }>;
		markdown: boolean;
	}>;
}

function statusText(result: ExecutionResult): string {
	return result.status === 'passed' ? 'All tests passed' : 'Some tests failed';
}

function pick<T>(result: ExecutionResult, colors: { passed: T; failed: T; other: T }): T {
	if (result.status === 'passed') return colors.passed;
	if (result.status === 'failed') return colors.failed;
	return colors.other;
}

export function genericPayload(result: ExecutionResult, event: WebhookEvent, now = new Date()): WebhookPayload {
	const { summary } = result;
	return {
		event,
		timestamp: now.toISOString(),
		feature: result.feature.name,
		status: result.status,
		summary: {
			total_scenarios: summary.total_scenarios,
			passed_scenarios: summary.passed_scenarios,
			failed_scenarios: summary.failed_scenarios,
			total_steps: summary.total_steps,
			duration_ms: result.duration_ms,
		},
	};
}

export function slackPayload(result: ExecutionResult, now = new Date()): SlackPayload {
	const { summary } = result;
	return {
		text: `Test execution completed: ${result.feature.name} - ${statusText(result)}`,
		username: 'stepscope-bot',
		icon_emoji: ':rocket:',
		attachments: [
			{
				color: pick<SlackColor>(result, { passed: 'good', failed: 'danger', other: 'warning' }),
				title: `Test Execution: ${result.feature.name}`,
				text: `Status: *${result.status}*\nScenarios: ${summary.passed_scenarios} passed, ${summary.failed_scenarios} failed`,
				fields: [
					{ title: 'Duration', value: `${result.duration_ms}ms`, short: true },
					{ title: 'Scenarios', value: `${summary.passed_scenarios}/${summary.total_scenarios}`, short: true },
				],
				footer: 'stepscope',
				ts: Math.floor(now.getTime() / 1000),
			},
		],
	};
}

export function discordPayload(result: ExecutionResult, now = new Date()): DiscordPayload {
	const { summary } = result;
	const description =
		result.status === 'passed' ? ':white_check_mark: All tests passed' : ':x: Some tests failed';
	return {
		username: 'stepscope',
		embeds: [
			{
				title: `Test Execution: ${result.feature.name}`,
				description: `**Status:** ${description}`,
				color: pick(result, { passed: 0x00ff00, failed: 0xff0000, other: 0xffff00 }),
				fields: [
					{ name: 'Duration', value: `${result.duration_ms}ms`, inline: true },
					{
						name: 'Scenarios',
						value: `${summary.passed_scenarios}/${summary.total_scenarios} passed`,
						inline: true,
					},
					{ name: 'Failed', value: String(summary.failed_scenarios), inline: true },
				],
				footer: { text: 'stepscope' },
				timestamp: now.toISOString(),
			},
		],
	};
}

export function teamsPayload(result: ExecutionResult): TeamsPayload {
	const { summary } = result;
	return {
		'@type': 'MessageCard',
		'@context': 'http://schema.org/extensions',
		themeColor: pick(result, { passed: '0076D7', failed: 'D13438', other: 'FFB900' }),
		summary: `Test Execution: ${result.feature.name} - ${statusText(result)}`,
		sections: [
			{
				activityTitle: `Test Execution: ${result.feature.name}`,
				activitySubtitle: statusText(result),
				facts: [
					{ name: 'Duration', value: `${result.duration_ms}ms` },
					{ name: 'Scenarios', value: `${summary.passed_scenarios}/${summary.total_scenarios}` },
					{ name: 'Passed', value: String(summary.passed_scenarios) },
					{ name: 'Failed', value: String(summary.failed_scenarios) },
				],
				markdown: true,
			},
		],
	};
}

/** The request body a webhook of this type receives for an event. */
export function buildPayload(
	type: WebhookType,
	result: ExecutionResult,
	event: WebhookEvent,
	now = new Date(),
): WebhookPayload | SlackPayload | DiscordPayload | TeamsPayload {
	switch (type) {
		case 'slack':
			return slackPayload(result, now);
		case 'discord':
			return discordPayload(result, now);
		case 'teams':
			return teamsPayload(result);
		case 'generic':
			return genericPayload(result, event, now);
	}
}

// ---------------------------------------------------------------------------
// WebhookManager
// ---------------------------------------------------------------------------

export type WebhookDelivery =
	| { name: string; ok: true; attempts: number }
	| { name: string; ok: false; attempts: number; error: string };

export interface WebhookManagerOptions {
	fetch?: typeof fetch;
	logger?: Logger;
	/** Waits between attempts; the default is a timer */
	sleep?: (ms: number) => Promise<void>;
	now?: () => Date;
}

/** Wait before retry `attempt` (1-based). */
export const RETRY_BACKOFF_MS = 500;

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export class WebhookManager {
	private readonly configs: WebhookConfig[];
	private readonly fetchFn: typeof fetch;
	private readonly logger: Logger;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly now: () => Date;

	constructor(configs: WebhookConfigInput[] = [], options: WebhookManagerOptions = {}) {
		this.configs = configs.map((c) => webhookConfigSchema.parse(c));
		this.fetchFn = options.fetch ?? globalThis.fetch;
		this.logger = options.logger ?? silentLogger;
		this.sleep = options.sleep ?? delay;
		this.now = options.now ?? (() => new Date());
	}

	/** Load a YAML or JSON list of webhooks. Throws ConfigError when unreadable or invalid. */
	static fromFile(path: string, options: WebhookManagerOptions = {}): WebhookManager {
		let text: string;
		try {
			text = readFileSync(path, 'utf-8');
		} catch (err) {
			throw new ConfigError(`Cannot read webhook config '${path}': ${errorMessage(err)}`, undefined, err);
		}
		return new WebhookManager(parseWebhookConfigs(text, path), options);
	}

	addConfig(config: WebhookConfigInput): void {
		this.configs.push(webhookConfigSchema.parse(config));
	}

	getConfigs(): readonly WebhookConfig[] {
		return this.configs;
	}

	notifyStart(result: ExecutionResult): Promise<WebhookDelivery[]> {
		return this.notify('start', result);
	}

	notifyCompletion(result: ExecutionResult): Promise<WebhookDelivery[]> {
		return this.notify('completion', result);
	}

	notifyFailure(result: ExecutionResult): Promise<WebhookDelivery[]> {
		return this.notify('failure', result);
	}

	notifySuccess(result: ExecutionResult): Promise<WebhookDelivery[]> {
		return this.notify('success', result);
	}

	/** One delivery per enabled webhook subscribed to `event`, in config order. */
	async notify(event: WebhookEvent, result: ExecutionResult): Promise<WebhookDelivery[]> {
		const targets = this.configs.filter((c) => c.enabled && c.events.includes(event));
		const now = this.now();
		return Promise.all(targets.map((config) => this.deliver(config, buildPayload(config.type, result, event, now))));
	}

	private async deliver(config: WebhookConfig, payload: object): Promise<WebhookDelivery> {
		const body = JSON.stringify(payload);
		let error = '';

		for (let attempt = 1; attempt <= config.retry_count; attempt++) {
			if (attempt > 1) await this.sleep(RETRY_BACKOFF_MS * (attempt - 1));
			const controller = new AbortController();
			const timer = setTimeout(() => controller.abort(), config.timeout_seconds * 1000);
			try {
				const res = await this.fetchFn(config.url, {
					method: 'POST',
					headers: { 'Content-Type': 'application/json', ...config.headers },
					body,
					signal: controller.signal,
				});
				if (res.ok) {
					this.logger.debug(`Webhook '${config.name}' delivered on attempt ${attempt}`);
					return { name: config.name, ok: true, attempts: attempt };
				}
				error = `HTTP ${res.status}: ${await res.text()}`;
			} catch (err) {
				error = `Request failed: ${errorMessage(err)}`;
			} finally {
				clearTimeout(timer);
			}
			this.logger.debug(`Webhook '${config.name}' attempt ${attempt} failed: ${error}`);
		}

		this.logger.warn(`Webhook '${config.name}' failed after ${config.retry_count} attempts: ${error}`);
		return { name: config.name, ok: false, attempts: config.retry_count, error };
	}
}
