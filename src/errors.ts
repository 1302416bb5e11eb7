export type ErrorCode =
  | "CONFIG_INVALID"
  | "GRAPH_INVALID"
  | "LOCK_TIMEOUT"
  | "LOCK_COMPROMISED"
  | "PROCESS_FAILED"
  | "VERIFICATION_AMBIGUOUS"
  | "DUPLICATE_REGISTRATION"
  | "UNKNOWN_EXECUTOR"
  | "SESSION_NOT_FOUND"
  | "AGENT_NOT_FOUND"
  | "STORE_CORRUPT"
  | "STORE_IO";

/** Base class for every error raised by taskwave. */
export class TaskwaveError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "TaskwaveError";
    this.code = code;
  }
}

/** Schema violations. Always carries every issue found, never just the first. */
export class ConfigError extends TaskwaveError {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    const summary = issues.length === 1 ? issues[0] : `${issues.length} configuration errors:\n  - ${issues.join("\n  - ")}`;
    super("CONFIG_INVALID", summary, options);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type GraphErrorKind = "cycle" | "no_sink" | "multiple_sinks" | "unreachable" | "dangling" | "unresolved";

export class GraphError extends TaskwaveError {
  readonly kind: GraphErrorKind;
  /** Task ids involved, in a stable order. */
  readonly nodes: string[];

  constructor(kind: GraphErrorKind, nodes: string[], message: string) {
    super("GRAPH_INVALID", message);
    this.name = "GraphError";
    this.kind = kind;
    this.nodes = nodes;
  }
}

/** Every structural problem found in one validation pass over a graph. */
export class GraphValidationError extends TaskwaveError {
  readonly workflowId: string;
  readonly errors: GraphError[];

  constructor(workflowId: string, errors: GraphError[]) {
    super("GRAPH_INVALID", `Workflow "${workflowId}" is not a valid DAG: ${errors.map((e) => e.message).join("; ")}`);
    this.name = "GraphValidationError";
    this.workflowId = workflowId;
    this.errors = errors;
  }
}

/** Lock contention outlasted the timeout. The store is untouched; callers may retry. */
export class LockTimeoutError extends TaskwaveError {
  readonly lockPath: string;
  readonly timeoutMs: number;
  readonly recoverable = true;

  constructor(lockPath: string, timeoutMs: number, options?: { cause?: unknown }) {
    super("LOCK_TIMEOUT", `Could not acquire lock on ${lockPath} within ${timeoutMs}ms`, options);
    this.name = "LockTimeoutError";
    this.lockPath = lockPath;
    this.timeoutMs = timeoutMs;
  }
}

export class ExternalProcessError extends TaskwaveError {
  readonly exitCode: number;

  constructor(exitCode: number, message: string, options?: { cause?: unknown }) {
    super("PROCESS_FAILED", message, options);
    this.name = "ExternalProcessError";
    this.exitCode = exitCode;
  }
}

/** A verification marker outside the known vocabulary; needs a human to judge. */
export class VerificationAmbiguousError extends TaskwaveError {
  readonly marker: string;

  constructor(marker: string) {
    super("VERIFICATION_AMBIGUOUS", `Unrecognized verification marker: ${marker}`);
    this.name = "VerificationAmbiguousError";
    this.marker = marker;
  }
}

export class ValidationError extends TaskwaveError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class StoreError extends TaskwaveError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "StoreError";
  }
}
