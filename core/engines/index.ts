/**
 * Punto de entrada del motor: reexporta registro, selector, motor de transferencia,
 * clasificador, coordinador, orquestador y tipos compartidos.
 *
 * @module engines
 */

export { EventBus } from './EventBus';
export type { TaskProgressPayload, EventBusOptions } from './EventBus';
export { SpeedTracker } from './SpeedTracker';
export type { SpeedUpdateResult } from './SpeedTracker';
export { TaskStatus, Availability } from './types';
export type {
  TaskStatusValue,
  AvailabilityState,
  MirrorSite,
  AvailabilityRecord,
  TransferTask,
  TransferErrorKind,
  TransferOutcome,
  CompletedTransfer,
  PartialTransfer,
  FailedTransfer,
  TransferProgress,
  ProgressObserver,
  ErrorCategory,
  FailureDecision,
  AttemptContext,
  TaskResult,
  CompletedTaskResult,
  PausedTaskResult,
  FailedTaskResult,
  BatchSummary,
  BatchResult,
  CatalogEntry,
  CatalogProvider,
} from './types';
export { TransferError, errorCategory, toFilesystemError } from './TransferError';
export {
  isTransientNetworkError,
  classifyTransientError,
  parseRetryAfter,
  calculateAdaptiveRetryDelay,
} from './RetryPolicy';
export type { ParseRetryAfterOptions, RetryDelayOptions } from './RetryPolicy';
export { canTransition, isTerminalStatus, transitionTask, InvalidTransitionError } from './TaskStateMachine';
export { MirrorStore } from './MirrorStore';
export { MirrorRegistry, UnknownMirrorError } from './MirrorRegistry';
export type { MirrorRegistryOptions, MirrorSettings, RefreshResult } from './MirrorRegistry';
export { MirrorSelector, weightedPick } from './MirrorSelector';
export type { MirrorSelectorOptions, RandomSource, WeightedCandidate } from './MirrorSelector';
export { TransferEngine, parseContentRange } from './TransferEngine';
export type { TransferRequest, TransferEngineOptions } from './TransferEngine';
export { FailureClassifier, exhaustedDecision } from './FailureClassifier';
export type { FailureClassifierOptions, FatalDecision } from './FailureClassifier';
export { ConcurrencyController } from './ConcurrencyController';
export { ConcurrencyCoordinator, dispatchOrder } from './ConcurrencyCoordinator';
export type { TaskWorker, CoordinatorRunOptions, CoordinatorRunStats } from './ConcurrencyCoordinator';
export { MirrorHealthChecker } from './MirrorHealthChecker';
export type { MirrorCheckResult, MirrorHealthCheckerOptions } from './MirrorHealthChecker';
export { MirrorDownloader, abortableDelay, summarizeBatch } from './MirrorDownloader';
export type { MirrorDownloaderOptions, BatchOptions, PausedTaskInfo } from './MirrorDownloader';
