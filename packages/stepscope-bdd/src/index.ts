// ============================================================================
// stepscope-bdd - Public API
// Step matching, the result model, feature reading and scenario execution.
// ============================================================================

// Errors
export {
	StepscopeError,
	PatternCompileError,
	RegistrySealedError,
	UnmatchedStepError,
	StepExecutionError,
	UnknownStepHandlerError,
	BatchFeatureError,
	ReportParseError,
	ConfigError,
	DiscoveryError,
	FeatureParseError,
	toError,
	errorMessage,
} from './errors.js';
export type { ErrorCode } from './errors.js';

export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Step matching
export {
	StepRegistry,
	createDefaultRegistry,
	getBuiltInPatterns,
	escapeRegex,
	levenshtein,
} from './step-registry.js';
export type {
	PatternEntry,
	StepMatch,
	DuplicatePatternWarning,
	RegistryValidation,
} from './step-registry.js';

export { StepCatalog, loadStepCatalog, checkCatalogConsistency } from './step-catalog.js';
export type {
	StepDefinition,
	StepParameter,
	CatalogSchema,
	CatalogConsistency,
} from './step-catalog.js';

export {
	validateStep,
	validateFeature,
	validateFeatureSource,
	findSimilarSteps,
} from './validation.js';
export type {
	ValidationIssue,
	ValidationWarning,
	ValidationResult,
	ValidationErrorCode,
	ValidationWarningCode,
} from './validation.js';

// Execution
export { StepHandlerTable, registerVariableSteps } from './handlers.js';
export type { StepBackend, StepHandler, StepContext } from './handlers.js';

export { VariableStore } from './variable-store.js';

export { parseFeature, allSteps } from './feature-reader.js';
export type {
	FeatureDocument,
	FeatureScenario,
	FeatureStep,
	StepKeyword,
} from './feature-reader.js';

export { ScenarioExecutor } from './scenario-executor.js';
export type { ScenarioExecutorOptions } from './scenario-executor.js';

// Result model
export {
	ExecutionResultBuilder,
	ScenarioResultBuilder,
	stepResult,
	summarize,
	deriveScenarioStatus,
	deriveRunStatus,
	fromReport,
} from './result.js';
export type {
	StepStatus,
	ScenarioStatus,
	RunStatus,
	ErrorInfo,
	StepResult,
	ScenarioResult,
	FeatureInfo,
	ExecutionSummary,
	ExecutionResult,
	StepResultOptions,
	ReportLike,
} from './result.js';

// Output
export {
	reportSchema,
	parseReport,
	loadReport,
	serializeReport,
	writeReport,
	formatFromPath,
} from './report.js';
export type { ReportFormat, ReportDocument } from './report.js';

export { toTap, parseTap } from './tap.js';
export type { TapSummary } from './tap.js';
