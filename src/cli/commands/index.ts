/**
 * CLI commands
 *
 * @module kv-function-runtime/cli/commands
 */

export { startCommand, buildStartEnvironment, type StartOptions } from './start.js';
export {
  seedCommand,
  seedKey,
  loadSeedPayload,
  MOCK_METRICS_PAYLOAD,
  type SeedOptions,
} from './seed.js';
export {
  inspectCommand,
  readSnapshot,
  pollSnapshot,
  checkConnection,
  watchSnapshots,
  resolveRefreshInterval,
  DEFAULT_REFRESH_MS,
  type Snapshot,
  type ConnectionStatus,
  type InspectOptions,
  type WatchOptions,
} from './inspect.js';
