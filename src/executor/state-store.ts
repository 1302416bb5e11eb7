import { join, resolve } from "node:path";
import { getConfig } from "../config.js";
import { atomicWriteJson, safeReadFile } from "../persistence/atomic.js";
import { ExecutionStateSchema, formatIssues } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { ExecutionState, ExecutionStatus } from "./types.js";

const log = createLogger("executor");

const UNFINISHED: ReadonlySet<ExecutionStatus> = new Set(["created", "running"]);

export function isUnfinished(status: ExecutionStatus): boolean {
  return UNFINISHED.has(status);
}

/** Per-task loop state under `<cwd>/<stateDir>/state/<task-id>.json`. */
export class ExecutionStateStore {
  readonly dir: string;

  constructor(cwd: string) {
    this.dir = join(resolve(cwd), getConfig().paths.stateDir, "state");
  }

  path(taskId: string): string {
    return join(this.dir, `${taskId}.json`);
  }

  /** The persisted state, or undefined when absent or unreadable. */
  async load(taskId: string): Promise<ExecutionState | undefined> {
    const text = await safeReadFile(this.path(taskId));
    if (text === null) return undefined;
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      log.warn(`Discarding unreadable state for "${taskId}"`, { error: String(err) });
      return undefined;
    }
    const result = ExecutionStateSchema.safeParse(raw);
    if (!result.success) {
      log.warn(`Discarding malformed state for "${taskId}"`, { issues: formatIssues(result.error) });
      return undefined;
    }
    return result.data;
  }

  /** Stamp `last_updated_at` and write atomically. */
  async save(state: ExecutionState): Promise<void> {
    state.last_updated_at = new Date().toISOString();
    await atomicWriteJson(this.path(state.prompt_id), state);
  }
}

export function createState(init: {
  taskId: string;
  model: string;
  maxIterations: number;
  logPath: string;
  cwd: string;
  stages: string[];
}): ExecutionState {
  const now = new Date().toISOString();
  return {
    prompt_id: init.taskId,
    model: init.model,
    status: "created",
    iteration: 0,
    max_iterations: init.maxIterations,
    log_path: init.logPath,
    cwd: init.cwd,
    started_at: now,
    last_updated_at: now,
    stages: init.stages,
    stage_index: 0,
    history: [],
    suggested_next_steps: [],
  };
}
