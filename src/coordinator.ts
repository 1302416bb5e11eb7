import { access, readFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { resolve } from "node:path";
import { ExecutorRegistry } from "./agents/registry.js";
import { getConfig } from "./config.js";
import { ConfigError, StoreError, VerificationAmbiguousError } from "./errors.js";
import { ExecutionController } from "./executor/controller.js";
import { NodeProcessLauncher, isProcessAlive, type ProcessLauncher } from "./executor/process.js";
import type { LoopOutcome, VerificationMode } from "./executor/types.js";
import { readMarker } from "./executor/verification.js";
import { safeReadFile } from "./persistence/atomic.js";
import {
  StatusStore,
  isTerminalAgentStatus,
  type AgentStatus,
  type SessionDocument,
} from "./persistence/status-store.js";
import type { Task, WorkflowPlan } from "./planner/types.js";
import { flatPlan, parseWorkflowFile, resolveWorkflow } from "./planner/workflow.js";
import { createLogger } from "./utils/logger.js";
import { retryOnContention } from "./utils/retry.js";

const log = createLogger("coordinator");

export type CoordinatorOptions = {
  /** Project directory: processes run here and state lives under it. */
  cwd: string;
  registry?: ExecutorRegistry;
  launcher?: ProcessLauncher;
  store?: StatusStore;
  controller?: ExecutionController;
  /** Liveness probe for detached processes. */
  isAlive?: (pid: number) => boolean;
};

export type SessionRunOptions = {
  maxConcurrency?: number;
  /** Run each task through the verification loop. */
  loop?: boolean;
  mode?: VerificationMode;
  maxIterations?: number;
  /** Start tasks in the background and follow them by polling. */
  detached?: boolean;
};

export type TaskReport = {
  taskId: string;
  ok: boolean;
  outcome?: LoopOutcome;
  pid?: number;
  error?: string;
};

export type SessionRun = {
  sessionId: string;
  document: SessionDocument;
  reports: TaskReport[];
};

export type ReconciledAgent = {
  id: string;
  status: AgentStatus;
  reason?: string;
};

const WAVE_FAILED = "not started: an earlier wave failed";

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Failure text recorded on the agent for a loop outcome other than complete. */
function failureMessage(outcome: Exclude<LoopOutcome, { kind: "complete" }>, iterations: number): string {
  switch (outcome.kind) {
    case "process_error":
      return outcome.message;
    case "no_marker":
      return "no verification marker found";
    case "unknown_marker":
      return new VerificationAmbiguousError(outcome.marker).message;
    case "exhausted":
      return outcome.lastReason
        ? `exhausted after ${iterations} iteration(s): ${outcome.lastReason}`
        : `exhausted after ${iterations} iteration(s)`;
  }
}

/**
 * Runs a workflow plan wave by wave against one status session. A wave
 * starts only when every agent of the previous wave is terminal; a failure
 * lets the rest of its wave finish and then stops the session.
 */
export class SessionCoordinator {
  readonly cwd: string;
  readonly registry: ExecutorRegistry;
  readonly store: StatusStore;
  readonly controller: ExecutionController;
  private isAlive: (pid: number) => boolean;

  constructor(opts: CoordinatorOptions) {
    this.cwd = resolve(opts.cwd);
    this.registry = opts.registry ?? ExecutorRegistry.withBuiltins();
    this.store = opts.store ?? new StatusStore({ cwd: this.cwd });
    this.controller =
      opts.controller ??
      new ExecutionController({
        registry: this.registry,
        cwd: this.cwd,
        launcher: opts.launcher ?? new NodeProcessLauncher(),
      });
    this.isAlive = opts.isAlive ?? isProcessAlive;
  }

  /** Parse, validate and check a workflow file. Nothing runs if any check fails. */
  async planWorkflow(file: string, workflowId?: string): Promise<WorkflowPlan> {
    const path = resolve(this.cwd, file);
    const plan = resolveWorkflow(parseWorkflowFile(path), workflowId, path);
    await this.check(plan);
    return plan;
  }

  /** A flat plan of independent prompt files. */
  async planBatch(paths: string[], model: string): Promise<WorkflowPlan> {
    const plan = flatPlan(paths, model, this.cwd);
    await this.check(plan);
    return plan;
  }

  /** Every model must be registered and every prompt file readable. */
  async check(plan: WorkflowPlan): Promise<void> {
    const issues: string[] = [];
    for (const task of plan.tasks) {
      if (!this.registry.has(task.model)) {
        issues.push(`${task.id}: unknown executor "${task.model}" (supported: ${this.registry.names().join(", ")})`);
      }
      try {
        await access(task.path);
      } catch {
        issues.push(`${task.id}: prompt file not found: ${task.path}`);
      }
    }
    if (issues.length > 0) throw new ConfigError(issues);
  }

  async run(plan: WorkflowPlan, opts: SessionRunOptions = {}): Promise<SessionRun> {
    const maxConcurrency = opts.maxConcurrency ?? getConfig().limits.maxConcurrency;
    const byId = new Map(plan.tasks.map((t) => [t.id, t]));
    const session = await this.store.createSession({
      source: plan.source,
      sourceFile: plan.sourceFile,
      tasks: plan.tasks,
      waves: plan.waves,
    });
    const sessionId = session.session_id;
    const reports: TaskReport[] = [];

    log.info(`Running ${plan.id}`, { sessionId, tasks: plan.tasks.length, waves: plan.waves.length });

    waves: for (const [index, wave] of plan.waves.entries()) {
      log.info(`Wave ${index + 1}/${plan.waves.length}`, { tasks: wave });
      const unrecorded: TaskReport[] = [];

      for (let i = 0; i < wave.length; i += maxConcurrency) {
        if ((await this.store.load(sessionId)).status === "cancelled") {
          log.info(`Session ${sessionId} was cancelled; stopping`);
          break waves;
        }

        const batch = wave.slice(i, i + maxConcurrency).flatMap((id) => {
          const task = byId.get(id);
          return task ? [task] : [];
        });
        const settled = await Promise.allSettled(
          batch.map((task) => (opts.detached ? this.startDetached(sessionId, task) : this.runTask(sessionId, task, opts))),
        );
        settled.forEach((result, j) => {
          if (result.status === "fulfilled") {
            reports.push(result.value);
          } else {
            log.error(`Could not record the result of "${batch[j].id}"`, { error: describeError(result.reason) });
            const report = { taskId: batch[j].id, ok: false, error: describeError(result.reason) };
            reports.push(report);
            unrecorded.push(report);
          }
        });
      }

      const lost = await this.settleUnrecorded(sessionId, unrecorded);
      if (lost.length > 0) {
        await this.abandonQueued(sessionId).then(undefined, (err: unknown) =>
          log.error("Could not cancel the remaining agents", { sessionId, error: describeError(err) }),
        );
        throw new StoreError(
          "STORE_IO",
          `Could not record the result of ${lost.join(", ")}; session ${sessionId} is left running`,
        );
      }

      if (opts.detached) await this.awaitWave(sessionId, wave);

      const doc = await this.store.load(sessionId);
      const pending = doc.agents.filter((a) => wave.includes(a.id) && !isTerminalAgentStatus(a.status)).map((a) => a.id);
      if (pending.length > 0) {
        throw new StoreError("STORE_IO", `Wave ${index + 1} did not settle: ${pending.join(", ")} not terminal`);
      }
      const failed = doc.agents.filter((a) => wave.includes(a.id) && a.status === "failed").map((a) => a.id);
      if (failed.length > 0 && index < plan.waves.length - 1) {
        log.warn(`Wave ${index + 1} failed; later waves will not start`, { failed });
        await this.abandonQueued(sessionId);
        break;
      }
    }

    const document = await this.store.load(sessionId);
    log.info(`Session ${sessionId} ${document.status}`, { summary: document.summary });
    return { sessionId, document, reports };
  }

  /** Run one task in the foreground and record the result. Never throws for task failures. */
  private async runTask(sessionId: string, task: Task, opts: SessionRunOptions): Promise<TaskReport> {
    let prompt: string;
    try {
      prompt = await readFile(task.path, "utf8");
    } catch (err) {
      const error = `cannot read prompt file: ${describeError(err)}`;
      await this.record(() => this.store.failAgent(sessionId, task.id, error, null));
      return { taskId: task.id, ok: false, error };
    }

    await this.record(() => this.store.startAgent(sessionId, task.id));

    // Pid writes are chained and settled before the terminal record.
    let pidWrites: Promise<unknown> = Promise.resolve();
    const recordPid = (pid: number) => {
      pidWrites = pidWrites
        .then(() => this.record(() => this.store.updateAgent(sessionId, task.id, { pid })))
        .then(undefined, (err: unknown) =>
          log.warn(`Could not record pid for "${task.id}"`, { pid, error: describeError(err) }),
        );
    };

    try {
      const result = await this.controller.run(task, prompt, {
        logPath: this.store.logPath(sessionId, task.id),
        loop: opts.loop,
        mode: opts.mode,
        maxIterations: opts.maxIterations,
        onSpawn: recordPid,
      });
      await pidWrites;

      const { outcome } = result;
      if (outcome.kind === "complete") {
        await this.record(() => this.store.completeAgent(sessionId, task.id, 0));
        return { taskId: task.id, ok: true, outcome };
      }
      const error = failureMessage(outcome, result.iterations);
      const exitCode = outcome.kind === "process_error" ? outcome.exitCode : 0;
      await this.record(() => this.store.failAgent(sessionId, task.id, error, exitCode));
      return { taskId: task.id, ok: false, outcome, error };
    } catch (err) {
      await pidWrites;
      const error = describeError(err);
      log.error(`"${task.id}" failed`, { error });
      await this.record(() => this.store.failAgent(sessionId, task.id, error, null));
      return { taskId: task.id, ok: false, error };
    }
  }

  private async startDetached(sessionId: string, task: Task): Promise<TaskReport> {
    try {
      const prompt = await readFile(task.path, "utf8");
      const pid = await this.controller.runDetached(task, prompt, {
        logPath: this.store.logPath(sessionId, task.id),
        status: { store: this.store, sessionId },
      });
      return { taskId: task.id, ok: true, pid };
    } catch (err) {
      const error = describeError(err);
      log.error(`Could not start "${task.id}"`, { error });
      await this.record(() => this.store.failAgent(sessionId, task.id, error, null));
      return { taskId: task.id, ok: false, error };
    }
  }

  /**
   * Make one more attempt to fail agents whose result could not be recorded,
   * so the wave barrier only ever sees terminal agents. Returns the ids that
   * are still not terminal.
   */
  private async settleUnrecorded(sessionId: string, unrecorded: TaskReport[]): Promise<string[]> {
    if (unrecorded.length === 0) return [];
    const doc = await this.store.load(sessionId);
    const lost: string[] = [];
    for (const report of unrecorded) {
      const agent = doc.agents.find((a) => a.id === report.taskId);
      if (!agent || isTerminalAgentStatus(agent.status)) continue;
      try {
        await this.record(() =>
          this.store.failAgent(sessionId, report.taskId, `result not recorded: ${report.error ?? "unknown error"}`, null),
        );
      } catch (err) {
        log.error(`Giving up on recording "${report.taskId}"`, { error: describeError(err) });
        lost.push(report.taskId);
      }
    }
    return lost;
  }

  /** Poll until every agent of the wave is terminal or the session closes. */
  private async awaitWave(sessionId: string, wave: readonly string[]): Promise<void> {
    const interval = getConfig().monitor.pollIntervalMs;
    for (;;) {
      await this.reconcile(sessionId);
      const doc = await this.store.load(sessionId);
      if (doc.status !== "running") return;
      if (doc.agents.filter((a) => wave.includes(a.id)).every((a) => isTerminalAgentStatus(a.status))) return;
      await sleep(interval);
    }
  }

  /**
   * Settle running agents whose process has exited. The outcome is read from
   * the last verification marker in the agent's log; the exit code of a
   * detached process is not observable and is recorded as null.
   */
  async reconcile(sessionId?: string): Promise<ReconciledAgent[]> {
    const id = await this.store.resolveSessionId(sessionId);
    const { completionMarker, retryPrefix } = getConfig().verification;
    const settled: ReconciledAgent[] = [];

    for (const agent of await this.store.runningAgents(id)) {
      if (agent.pid === null || this.isAlive(agent.pid)) continue;

      const reading = readMarker((await safeReadFile(agent.log_file)) ?? "", completionMarker, retryPrefix);
      if (reading.kind === "complete") {
        await this.record(() => this.store.updateAgent(id, agent.id, { status: "complete", exit_code: null }));
        settled.push({ id: agent.id, status: "complete" });
        continue;
      }

      const reason =
        reading.kind === "none"
          ? "process exited without a verification marker"
          : reading.kind === "retry"
            ? `process exited asking for a retry: ${reading.reason}`
            : new VerificationAmbiguousError(reading.marker).message;
      await this.record(() => this.store.updateAgent(id, agent.id, { status: "failed", exit_code: null, error: reason }));
      settled.push({ id: agent.id, status: "failed", reason });
    }

    if (settled.length > 0) log.info(`Reconciled ${settled.length} agent(s)`, { sessionId: id, settled });
    return settled;
  }

  /** Bookkeeping only: running processes keep running. */
  async cancel(sessionId?: string): Promise<SessionDocument> {
    const id = await this.store.resolveSessionId(sessionId);
    return this.store.cancelSession(id);
  }

  /** Record every still-queued agent as cancelled because an earlier wave failed. */
  private async abandonQueued(sessionId: string): Promise<void> {
    for (const agent of await this.store.queuedAgents(sessionId)) {
      await this.record(() => this.store.updateAgent(sessionId, agent.id, { status: "cancelled", error: WAVE_FAILED }));
    }
  }

  private record<T>(fn: () => Promise<T>): Promise<T> {
    return retryOnContention(fn, {
      baseDelayMs: 100,
      onRetry: (err, attempt) => log.warn(`Status lock busy, retrying (attempt ${attempt})`, { error: describeError(err) }),
    });
  }
}
