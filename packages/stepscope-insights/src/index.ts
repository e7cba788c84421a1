// ============================================================================
// stepscope-insights - Public API
// Baseline comparison, performance alerts, execution profiling and webhooks.
// ============================================================================

export { compare, overallStatus, percentChange } from './comparison.js';
export type {
	ChangeType,
	ComparisonResult,
	ComparisonStatus,
	ComparisonSummary,
	ImpactUnit,
	ImprovementItem,
	MetricsDifference,
	RegressionItem,
	RegressionSeverity,
	ScenarioChange,
	StepPerformanceChange,
} from './comparison.js';

export { formatComparison } from './comparison-format.js';
export type { ComparisonOutputFormat } from './comparison-format.js';

export {
	AlertManager,
	PerformanceMonitor,
	compareMetric,
	defaultAlertConfig,
	formatAlerts,
	metricName,
	parseAlertConfigs,
} from './alerts.js';
export type {
	AlertConfig,
	AlertMetric,
	AlertOperator,
	AlertOutputFormat,
	AlertSeverity,
	AlertThreshold,
	PerformanceAlert,
	PerformanceMonitorOptions,
	PerformanceSummary,
} from './alerts.js';

export { analyzeExecution, formatProfile } from './profiling.js';
export type {
	BottleneckAnalysis,
	ProfilingMetrics,
	ScenarioMetrics,
	StepMetrics,
	StepTiming,
} from './profiling.js';

export {
	RETRY_BACKOFF_MS,
	WebhookManager,
	buildPayload,
	discordPayload,
	genericPayload,
	parseWebhookConfigs,
	slackPayload,
	teamsPayload,
} from './webhooks.js';
export type {
	DiscordPayload,
	SlackPayload,
	TeamsPayload,
	WebhookConfig,
	WebhookConfigInput,
	WebhookDelivery,
	WebhookEvent,
	WebhookManagerOptions,
	WebhookPayload,
	WebhookType,
} from './webhooks.js';
