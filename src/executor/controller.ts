import { appendFile, mkdir, readFile, stat } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { buildInvocation, describeInvocation } from "../agents/profile.js";
import type { ExecutorRegistry } from "../agents/registry.js";
import { getConfig } from "../config.js";
import { ExternalProcessError } from "../errors.js";
import type { StatusStore } from "../persistence/status-store.js";
import type { Task } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import { retryOnContention } from "../utils/retry.js";
import { NodeProcessLauncher, type ProcessLauncher } from "./process.js";
import { ExecutionStateStore, createState, isUnfinished } from "./state-store.js";
import type {
  ExecutionResult,
  ExecutionState,
  ExecutionStatus,
  IterationRecord,
  LoopOutcome,
  RunOnceResult,
  RunOptions,
  VerificationMode,
} from "./types.js";
import { buildRetryPrompt, buildStagePrompt, extractNextSteps, readMarker } from "./verification.js";

const log = createLogger("executor");

export type ExecutionControllerOptions = {
  registry: ExecutorRegistry;
  /** Working directory of the external processes and root of persisted state. */
  cwd: string;
  launcher?: ProcessLauncher;
  states?: ExecutionStateStore;
};

export type DetachedOptions = {
  logPath: string;
  /** Record the pid as the agent starts. */
  status?: { store: StatusStore; sessionId: string };
};

type Gate = { name: string; marker: string };

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
    throw err;
  }
}

async function readRange(path: string, start: number, end: number): Promise<string> {
  const buf = await readFile(path);
  return buf.subarray(start, end).toString("utf8");
}

/**
 * Runs one task through its external executor. In loop mode the task is
 * re-invoked until its transcript carries a decisive verification marker or
 * the iteration cap is reached; loop state is persisted after every
 * iteration so an interrupted run resumes where it stopped.
 */
export class ExecutionController {
  readonly cwd: string;
  private registry: ExecutorRegistry;
  private launcher: ProcessLauncher;
  private states: ExecutionStateStore;

  constructor(opts: ExecutionControllerOptions) {
    this.cwd = resolve(opts.cwd);
    this.registry = opts.registry;
    this.launcher = opts.launcher ?? new NodeProcessLauncher();
    this.states = opts.states ?? new ExecutionStateStore(this.cwd);
  }

  /** Invoke the task's executor once and block until it exits. Output is appended to the log. */
  async runOnce(
    task: Task,
    prompt: string,
    opts: { logPath: string; iteration?: number; onSpawn?: (pid: number) => void },
  ): Promise<RunOnceResult> {
    const profile = this.registry.resolve(task.model);
    const inv = buildInvocation(profile, prompt);

    await mkdir(dirname(opts.logPath), { recursive: true });
    const logStart = await fileSize(opts.logPath);
    const iteration = opts.iteration !== undefined ? ` | iteration=${opts.iteration}` : "";
    await appendFile(opts.logPath, `\n--- Execution at ${new Date().toISOString()} | model=${profile.name}${iteration} ---\n`);

    log.debug(`Invoking ${profile.name} for "${task.id}"`, { iteration: opts.iteration, invocation: describeInvocation(inv) });
    const exitCode = await this.launcher.run(inv, { cwd: this.cwd, logPath: opts.logPath, onSpawn: opts.onSpawn });
    const logEnd = await fileSize(opts.logPath);
    return { exitCode, logPath: opts.logPath, logStart, logEnd };
  }

  /** Start the executor detached and return its pid. No verification happens. */
  async runDetached(task: Task, prompt: string, opts: DetachedOptions): Promise<number> {
    const profile = this.registry.resolve(task.model);
    const inv = buildInvocation(profile, prompt);

    await mkdir(dirname(opts.logPath), { recursive: true });
    await appendFile(opts.logPath, `\n--- Background execution at ${new Date().toISOString()} | model=${profile.name} ---\n`);

    const pid = this.launcher.spawnDetached(inv, { cwd: this.cwd, logPath: opts.logPath });
    log.info(`Started "${task.id}" in the background`, { pid, model: profile.name });
    if (opts.status) {
      const { store, sessionId } = opts.status;
      await retryOnContention(() => store.startAgent(sessionId, task.id, pid), { baseDelayMs: 100 });
    }
    return pid;
  }

  /**
   * Run a task to a decision. Resumes from persisted state when an earlier
   * run of the same task and executor did not finish; the iteration that was
   * in flight when it stopped is repeated.
   */
  async run(task: Task, prompt: string, opts: RunOptions): Promise<ExecutionResult> {
    const cfg = getConfig();
    const loop = opts.loop ?? false;
    const mode: VerificationMode = opts.mode ?? "single";
    const gates: Gate[] =
      mode === "two-stage" ? cfg.verification.stages : [{ name: "completion", marker: cfg.verification.completionMarker }];
    const markers = gates.map((g) => g.marker);
    const maxIterations = loop ? (opts.maxIterations ?? cfg.loop.maxIterations) : 1;

    const previous = await this.states.load(task.id);
    let state: ExecutionState;
    if (
      previous &&
      isUnfinished(previous.status) &&
      previous.model === task.model &&
      previous.log_path === opts.logPath &&
      previous.stages.join("\u0000") === markers.join("\u0000")
    ) {
      state = previous;
      state.max_iterations = Math.max(maxIterations, state.iteration);
      log.info(`Resuming "${task.id}" after iteration ${state.iteration}`, { max: state.max_iterations });
    } else {
      state = createState({
        taskId: task.id,
        model: task.model,
        maxIterations,
        logPath: opts.logPath,
        cwd: this.cwd,
        stages: markers,
      });
    }
    const resumedFrom = state.iteration;
    state.status = "running";
    await this.states.save(state);

    type Entry = Omit<IterationRecord, "iteration" | "ended_at" | "stage">;
    // The deciding iteration and the final status are saved together.
    const finish = async (status: ExecutionStatus, outcome: LoopOutcome, entry?: Entry): Promise<ExecutionResult> => {
      state.status = status;
      if (entry) {
        this.append(state, entry);
      }
      await this.states.save(state);
      log.info(`"${task.id}" finished: ${outcome.kind}`, { iterations: state.iteration });
      return { taskId: task.id, outcome, iterations: state.iteration, logPath: state.log_path, resumedFrom, state };
    };

    let current = await this.nextPrompt(state, prompt, gates, mode);
    let lastReason: string | undefined;

    while (state.iteration < state.max_iterations) {
      const gate = gates[state.stage_index];

      let run: RunOnceResult;
      try {
        run = await this.runOnce(task, current, {
          logPath: state.log_path,
          iteration: state.iteration + 1,
          onSpawn: opts.onSpawn,
        });
      } catch (err) {
        if (!(err instanceof ExternalProcessError)) throw err;
        const end = await fileSize(state.log_path);
        return finish(
          "process_error",
          { kind: "process_error", exitCode: err.exitCode, message: err.message },
          { exit_code: err.exitCode, marker_found: false, log_start: end, log_end: end },
        );
      }

      const transcript = await readRange(state.log_path, run.logStart, run.logEnd);
      const steps = extractNextSteps(transcript, cfg.limits.maxNextSteps);
      if (steps.length > 0) state.suggested_next_steps = steps;

      const span = { log_start: run.logStart, log_end: run.logEnd };

      if (run.exitCode !== 0) {
        return finish(
          "process_error",
          { kind: "process_error", exitCode: run.exitCode, message: `${task.model} exited with code ${run.exitCode}` },
          { exit_code: run.exitCode, marker_found: false, ...span },
        );
      }

      const reading = readMarker(transcript, gate.marker, cfg.verification.retryPrefix);
      const marker = reading.kind === "none" ? undefined : reading.marker;

      if (!loop) {
        return finish("complete", { kind: "complete" }, { exit_code: 0, marker_found: marker !== undefined, marker, ...span });
      }

      switch (reading.kind) {
        case "complete": {
          const entry = { exit_code: 0, marker_found: true, marker, ...span };
          if (state.stage_index + 1 >= gates.length) {
            return finish("complete", { kind: "complete" }, entry);
          }
          this.append(state, entry);
          state.stage_index += 1;
          await this.states.save(state);
          log.info(`"${task.id}" passed ${gate.name}`, { next: gates[state.stage_index].name });
          current = buildStagePrompt(prompt, transcript, gate.name, gates[state.stage_index], cfg.verification.retryPrefix);
          break;
        }
        case "retry": {
          lastReason = reading.reason;
          this.append(state, { exit_code: 0, marker_found: true, marker, retry_reason: reading.reason, ...span });
          await this.states.save(state);
          log.info(`"${task.id}" asked for a retry`, { iteration: state.iteration, reason: reading.reason });
          // Single-gate retries carry the whole log; two-stage retries only the previous attempt.
          const history = mode === "single" ? await readRange(state.log_path, 0, run.logEnd) : transcript;
          current = buildRetryPrompt(prompt, history, reading.reason);
          break;
        }
        case "unknown":
          return finish(
            "unknown_marker",
            { kind: "unknown_marker", marker: reading.marker },
            { exit_code: 0, marker_found: true, marker, ...span },
          );
        case "none":
          return finish("no_marker", { kind: "no_marker" }, { exit_code: 0, marker_found: false, ...span });
      }
    }

    if (lastReason === undefined) {
      lastReason = state.history.at(-1)?.retry_reason;
    }
    return finish("exhausted", { kind: "exhausted", lastReason });
  }

  /** Append one iteration to the history. The caller saves. */
  private append(state: ExecutionState, entry: Omit<IterationRecord, "iteration" | "ended_at" | "stage">): void {
    state.iteration += 1;
    state.history.push({
      iteration: state.iteration,
      ended_at: new Date().toISOString(),
      stage: state.stage_index,
      ...entry,
    });
  }

  /** Rebuild the prompt the next iteration needs from the recorded history. */
  private async nextPrompt(state: ExecutionState, original: string, gates: Gate[], mode: VerificationMode): Promise<string> {
    const last = state.history.at(-1);
    if (!last) return original;

    const retryPrefix = getConfig().verification.retryPrefix;
    if (last.retry_reason !== undefined) {
      const history = await readRange(state.log_path, mode === "single" ? 0 : last.log_start, last.log_end);
      return buildRetryPrompt(original, history, last.retry_reason);
    }
    if (state.stage_index > last.stage) {
      const transcript = await readRange(state.log_path, last.log_start, last.log_end);
      return buildStagePrompt(original, transcript, gates[last.stage].name, gates[state.stage_index], retryPrefix);
    }
    return original;
  }
}
