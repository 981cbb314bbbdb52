// Main entry point
export { ScrapePipeline } from './ScrapePipeline.js';
export type { ScrapePipelineOptions, ScrapePipelineDeps, WaitForJobOptions } from './ScrapePipeline.js';

// Configuration
export { PipelineConfigSchema, CONFIG_ENV_VARS, parsePipelineConfig, loadPipelineConfig } from './config/PipelineConfig.js';
export type { PipelineConfig, PipelineConfigInput } from './config/PipelineConfig.js';

// Domain model
export type { Job, JobFailure, JobProgress, JobListFilter, JobTransitionPatch } from './domain/model/Job.js';
export { isValidJobId } from './domain/model/Job.js';
export type { Batch, BatchCompletion, BatchFailure, BatchCounts } from './domain/model/Batch.js';
export type { ClaimBatchResult, ClaimBatchFailureReason, ClaimBatchOptions } from './domain/model/BatchClaim.js';
export type { Target, ExtractedRecord } from './domain/model/Target.js';
export { JobStatus, canTransition, isTerminalStatus } from './domain/model/JobStatus.js';
export { BatchStatus } from './domain/model/BatchStatus.js';
export { createBatch, batchIdFor } from './domain/model/Batch.js';

// Errors
export {
  PipelineError,
  PipelineErrorCode,
  ValidationError,
  TransientError,
  PermanentError,
  IntegrityError,
  JobNotFoundError,
  InvalidJobStateError,
  isPermanentFailure,
  toErrorMessage,
} from './domain/errors/PipelineErrors.js';

// Domain services (shared by state store implementations)
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export type { TargetGroup } from './domain/services/BatchSplitter.js';
export { RetryPolicy } from './domain/services/RetryPolicy.js';
export type { RetryPolicyOptions } from './domain/services/RetryPolicy.js';
export {
  attemptLimit,
  claimRejection,
  applyClaim,
  isHeldBy,
  applyCompletion,
  applyFailure,
  isStaleClaim,
  applyReclaim,
  countBatches,
} from './domain/services/BatchLifecycle.js';

// Use case result types
export type { SubmitJobOptions, SubmitJobResult, BatchDescriptor } from './application/usecases/SubmitJob.js';
export type { ResumeResult } from './application/usecases/ResumeJob.js';
export type { RerunResult } from './application/usecases/RerunJob.js';
export type { JobStatusResult } from './application/usecases/GetJobStatus.js';
export type { BatchTaskOutcome } from './application/usecases/ProcessBatchTask.js';

// Application internals
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { StateStore } from './domain/ports/StateStore.js';
export type { FragmentStore, OutputFragment, ArtifactWriteResult } from './domain/ports/FragmentStore.js';
export type { TaskQueue, BatchTask, EnqueueOptions } from './domain/ports/TaskQueue.js';
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { TargetParser } from './domain/ports/TargetParser.js';
export type { ExtractionService, ExtractionContext } from './domain/ports/ExtractionService.js';
export type { Logger, LogContext } from './domain/ports/Logger.js';
export type { JobNotifier } from './domain/ports/JobNotifier.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobSubmittedEvent,
  JobStartedEvent,
  JobProgressEvent,
  JobCompletedEvent,
  JobFailedEvent,
  JobCancelledEvent,
  BatchClaimedEvent,
  BatchCompletedEvent,
  BatchRetryingEvent,
  BatchFailedEvent,
  BatchSkippedEvent,
  MergeFragmentSkippedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { LineParser } from './infrastructure/parsers/LineParser.js';
export type { LineParserOptions } from './infrastructure/parsers/LineParser.js';
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { InMemoryStateStore } from './infrastructure/state/InMemoryStateStore.js';
export { FileStateStore } from './infrastructure/state/FileStateStore.js';
export type { FileStateStoreOptions } from './infrastructure/state/FileStateStore.js';
export { InMemoryFragmentStore } from './infrastructure/fragments/InMemoryFragmentStore.js';
export { FileFragmentStore } from './infrastructure/fragments/FileFragmentStore.js';
export type { FileFragmentStoreOptions } from './infrastructure/fragments/FileFragmentStore.js';
export { InMemoryTaskQueue } from './infrastructure/queue/InMemoryTaskQueue.js';
export { HttpExtractionService, parseRetryAfter } from './infrastructure/extraction/HttpExtractionService.js';
export type { HttpExtractionServiceOptions } from './infrastructure/extraction/HttpExtractionService.js';
export { WebhookNotifier } from './infrastructure/notifications/WebhookNotifier.js';
export type { WebhookNotifierOptions, WebhookPayload } from './infrastructure/notifications/WebhookNotifier.js';
export { ConsoleLogger, LogLevel } from './infrastructure/logging/ConsoleLogger.js';
export type { ConsoleLoggerOptions, LogFormat } from './infrastructure/logging/ConsoleLogger.js';
