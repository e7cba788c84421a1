// ============================================================================
// stepscope-runner - Public API
// Feature discovery, parallel batch execution and batch reporting.
// ============================================================================

export { BatchExecutor, BatchProgress, DEFAULT_BATCH_CONFIG, aggregate, featureName, sortByPath } from './batch-executor.js';
export type { BatchExecuteOptions } from './batch-executor.js';

export type {
	BatchConfig,
	BatchError,
	BatchProgressSnapshot,
	BatchResult,
	FeatureOutcome,
	FeatureResult,
	FeatureRunContext,
	FeatureRunner,
} from './types.js';

export { EventBus } from './event-bus.js';
export type { BatchEvents, BatchEventName, EventListener } from './event-bus.js';

export { WorkerPool } from './worker-pool.js';
export type {
	Worker,
	WorkerInfo,
	WorkerState,
	WorkerPoolConfig,
	TaskExecutor,
	TaskOutcome,
	PoolRun,
} from './worker-pool.js';

export { discoverFeatures } from './discovery.js';
export type { DiscoveryOptions } from './discovery.js';

export { formatBatchResult, formatDuration, toDocument } from './batch-format.js';
export type { BatchOutputFormat } from './batch-format.js';
