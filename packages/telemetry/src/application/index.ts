/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  ConnectionLifecycle,
  type ConnectionLifecycleDeps,
} from './connection-lifecycle.js';

export {
  BroadcastRouter,
  type BroadcastRouterDeps,
  type FlushResult,
} from './broadcast-router.js';

export {
  CommandDispatcher,
  createLogSubscriptionHandler,
  type CommandHandler,
} from './command-dispatcher.js';

export {
  StreamingWorker,
  type StreamingWorkerConfig,
  type StreamingWorkerDeps,
  type WorkerState,
  type CycleOutcome,
} from './streaming-worker.js';
