// Config
export { getConfig, configure, resetConfig, loadConfigFile, defaults } from "./config.js";
export type { TaskwaveConfig } from "./config.js";

// Errors
export {
  TaskwaveError,
  ConfigError,
  GraphError,
  GraphValidationError,
  LockTimeoutError,
  ExternalProcessError,
  VerificationAmbiguousError,
  ValidationError,
  StoreError,
} from "./errors.js";
export type { ErrorCode, GraphErrorKind } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  formatIssues,
  WorkflowFileSchema,
  SessionDocumentSchema,
  ExecutionStateSchema,
  ExecutorProfilesFileSchema,
} from "./schemas.js";

// Planner
export {
  buildGraph,
  computeWaves,
  findCycles,
  findSinks,
  topologicalSort,
  validateDag,
  waveIndex,
} from "./planner/task-graph.js";
export {
  flatPlan,
  parseDeclaration,
  parseWorkflowDocument,
  parseWorkflowFile,
  resolveWorkflow,
  taskIdFromPath,
} from "./planner/workflow.js";
export type { ParsedWorkflow, ParseOptions } from "./planner/workflow.js";
export type { DependencyGraph, Task, Wave, WorkflowPlan, WorkflowSettings } from "./planner/types.js";

// Persistence
export { StatusStore, newSessionId, summarize, isTerminalAgentStatus } from "./persistence/status-store.js";
export type {
  AgentRecord,
  AgentStatus,
  AgentUpdate,
  SessionDocument,
  SessionStatus,
  SessionSummary,
} from "./persistence/status-store.js";
export { acquireLock, withLock, isLocked } from "./persistence/lock.js";
export type { LockGuard, LockOptions, ReleaseFn } from "./persistence/lock.js";

// Executors
export { ExecutorRegistry } from "./agents/registry.js";
export { buildInvocation, builtinProfiles } from "./agents/profile.js";
export type { ExecutorProfile, InputMode, Invocation } from "./agents/profile.js";
export { ExecutionController } from "./executor/controller.js";
export type { DetachedOptions, ExecutionControllerOptions } from "./executor/controller.js";
export { ExecutionStateStore } from "./executor/state-store.js";
export { NodeProcessLauncher, isProcessAlive } from "./executor/process.js";
export type { LaunchOptions, ProcessLauncher } from "./executor/process.js";
export { buildRetryPrompt, extractNextSteps, lastMarker, readMarker } from "./executor/verification.js";
export type { MarkerReading } from "./executor/verification.js";
export type {
  ExecutionResult,
  ExecutionState,
  ExecutionStatus,
  LoopOutcome,
  RunOptions,
  VerificationMode,
} from "./executor/types.js";

// Coordinator
export { SessionCoordinator } from "./coordinator.js";
export type { CoordinatorOptions, ReconciledAgent, SessionRun, SessionRunOptions, TaskReport } from "./coordinator.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { LogLevel, Logger } from "./utils/logger.js";
export { withRetry, retryOnContention } from "./utils/retry.js";
