/**
 * Session Forge
 *
 * Main module export. For CLI usage, run the `sf` command.
 */

export { Orchestrator } from './orchestrator.js';
export type {
  AttachOutcome,
  BootstrapCheck,
  BootstrapHostReport,
  ComposeRequest,
  OrchestratorOptions,
  TeardownReport,
  TeardownTargetResult,
  UpRequest,
  UpResult,
} from './orchestrator.js';
export { ForgeServer } from './server.js';

export * from './errors.js';
export * from './layout.js';
export * from './config/schema.js';
export { StateStore, parseWith } from './config/store.js';
export { STATE_DIR_ENV, resolveStateRoot, statePaths } from './config/paths.js';
export { StateModel, assertReferences } from './state/model.js';
export type { AttachMode, AttachOptions, AttachResult } from './state/model.js';

export { LockManager } from './lock/manager.js';
export type { LockHandle, LockManagerOptions, AcquireOptions } from './lock/manager.js';
export { ShellExecutor, buildScript, checkResult, isLocalAddress } from './remote/executor.js';
export type { CommandResult, ExecuteOptions, RemoteExecutor } from './remote/executor.js';
export { withReachabilityRetry, DEFAULT_REACHABILITY } from './remote/reachability.js';

export { SyncEngine } from './sync/engine.js';
export type { SyncOptions, SyncReport, TargetFailure, TargetResult, TargetSuccess } from './sync/engine.js';
export type { SyncAction } from './git/remote-git.js';
export { SessionManager, resolveTarget } from './session-manager.js';
export type { SessionDescriptor, StartRequest, StartResult, TargetRequest } from './session-manager.js';
export { PromptBuilder } from './prompt/builder.js';
export type { DeliveryResult, PromptRequest } from './prompt/builder.js';
export { ComposeManager, computePortOffset } from './compose/manager.js';
export { DEFAULT_LLM_COMMANDS, resolveLlmCommand } from './llm.js';
export { logger, configureLogDirectory } from './utils/logger.js';
