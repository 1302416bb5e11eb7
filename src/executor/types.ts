import type { z } from "zod";
import type { ExecutionStateSchema, ExecutionStatusSchema, IterationRecordSchema } from "../schemas.js";

export type ExecutionStatus = z.infer<typeof ExecutionStatusSchema>;
export type IterationRecord = z.infer<typeof IterationRecordSchema>;
export type ExecutionState = z.infer<typeof ExecutionStateSchema>;

/** Single gate, or compliance then quality. */
export type VerificationMode = "single" | "two-stage";

export type RunOptions = {
  logPath: string;
  /** Run the verification loop. Off by default: one successful exit is success. */
  loop?: boolean;
  maxIterations?: number;
  mode?: VerificationMode;
  onSpawn?: (pid: number) => void;
};

/** How a run ended. Only `complete` is success. */
export type LoopOutcome =
  | { kind: "complete" }
  | { kind: "process_error"; exitCode: number; message: string }
  | { kind: "no_marker" }
  | { kind: "unknown_marker"; marker: string }
  | { kind: "exhausted"; lastReason?: string };

export type RunOnceResult = {
  exitCode: number;
  logPath: string;
  /** Byte range this invocation appended to the log, header included. */
  logStart: number;
  logEnd: number;
};

export type ExecutionResult = {
  taskId: string;
  outcome: LoopOutcome;
  iterations: number;
  logPath: string;
  /** The iteration count the run started from; non-zero when resumed. */
  resumedFrom: number;
  state: ExecutionState;
};
