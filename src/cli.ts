#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { join, resolve } from "node:path";
import { readFile } from "node:fs/promises";
import { ExecutorRegistry } from "./agents/registry.js";
import { getConfig, loadConfigFile } from "./config.js";
import { SessionCoordinator, type SessionRunOptions } from "./coordinator.js";
import { ConfigError, GraphValidationError } from "./errors.js";
import { ExecutionController } from "./executor/controller.js";
import type { VerificationMode } from "./executor/types.js";
import type { SessionDocument } from "./persistence/status-store.js";
import type { Task, WorkflowPlan } from "./planner/types.js";
import { parseWorkflowFile, taskIdFromPath } from "./planner/workflow.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
  process.exitCode = 1;
});

type GlobalOptions = {
  cwd?: string;
  config?: string;
  profiles?: string;
  debug?: boolean;
};

type LoopFlags = {
  loop?: boolean;
  twoStage?: boolean;
  maxIterations?: number;
};

type SessionFlags = LoopFlags & {
  concurrency?: number;
  detached?: boolean;
};

const program = new Command();

program
  .name("taskwave")
  .description("Run dependency-ordered prompt workflows through external executors")
  .version("0.1.0")
  .option("--cwd <dir>", "Project directory (state lives under it)")
  .option("--config <file>", "JSON config file")
  .option("--profiles <file>", "JSON file with extra executor profiles")
  .option("--debug", "Enable debug logging");

program.hook("preAction", () => {
  const opts = program.opts<GlobalOptions>();
  if (opts.debug) setLogLevel("debug");
  if (opts.config) loadConfigFile(resolve(opts.config));
});

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Not a positive integer.");
  return n;
}

function nonNegative(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError("Not a non-negative number.");
  return n;
}

function projectDir(): string {
  return resolve(program.opts<GlobalOptions>().cwd ?? process.cwd());
}

function buildRegistry(): ExecutorRegistry {
  const registry = ExecutorRegistry.withBuiltins();
  const profiles = program.opts<GlobalOptions>().profiles;
  if (profiles) registry.loadFile(resolve(profiles));
  return registry;
}

function buildCoordinator(): SessionCoordinator {
  return new SessionCoordinator({ cwd: projectDir(), registry: buildRegistry() });
}

function modeOf(flags: LoopFlags): VerificationMode {
  return flags.twoStage ? "two-stage" : "single";
}

function sessionOptions(flags: SessionFlags): SessionRunOptions {
  return {
    maxConcurrency: flags.concurrency,
    loop: Boolean(flags.loop || flags.twoStage),
    mode: modeOf(flags),
    maxIterations: flags.maxIterations,
    detached: flags.detached,
  };
}

function printError(err: unknown): void {
  if (err instanceof ConfigError) {
    console.error(err.issues.length === 1 ? "Configuration error:" : `${err.issues.length} configuration errors:`);
    for (const issue of err.issues) console.error(`  - ${issue}`);
  } else if (err instanceof GraphValidationError) {
    console.error(`Workflow "${err.workflowId}" is not a valid DAG:`);
    for (const e of err.errors) console.error(`  - [${e.kind}] ${e.message}`);
  } else {
    console.error("Error:", err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
}

function printSession(doc: SessionDocument): void {
  const s = doc.summary;
  console.log(`Session ${doc.session_id} (${doc.source}: ${doc.source_file})`);
  console.log(`Status:  ${doc.status}`);
  console.log(
    `Agents:  ${s.total} total, ${s.complete} complete, ${s.failed} failed, ${s.running} running, ${s.queued} queued, ${s.cancelled} cancelled`,
  );
  for (const wave of doc.waves) {
    console.log(`\n  Wave ${wave.wave + 1}:`);
    for (const id of wave.tasks) {
      const agent = doc.agents.find((a) => a.id === id);
      if (!agent) continue;
      const duration = agent.duration_seconds !== null ? ` ${agent.duration_seconds.toFixed(1)}s` : "";
      const pid = agent.pid !== null ? ` pid=${agent.pid}` : "";
      const error = agent.error ? ` (${agent.error})` : "";
      console.log(`    [${agent.status}] ${agent.id} ${agent.name}${duration}${pid}${error}`);
    }
  }
}

async function runPlan(coordinator: SessionCoordinator, plan: WorkflowPlan, flags: SessionFlags): Promise<void> {
  const result = await coordinator.run(plan, sessionOptions(flags));
  printSession(result.document);
  if (result.document.status === "failed") process.exitCode = 1;
}

function addLoopFlags(cmd: Command): Command {
  return cmd
    .option("--loop", "Re-run each task until it reports a verification marker")
    .option("--two-stage", "Verify compliance, then quality (implies --loop)")
    .option("--max-iterations <n>", "Iteration cap in loop mode", positiveInt);
}

// --- validate ---
program
  .command("validate")
  .description("Validate a workflow file and report every problem found")
  .argument("<workflow>", "Workflow YAML file")
  .option("-w, --workflow <id>", "Only this workflow")
  .action(async (file: string, opts: { workflow?: string }) => {
    const coordinator = buildCoordinator();
    const path = resolve(projectDir(), file);
    const ids = opts.workflow ? [opts.workflow] : parseWorkflowFile(path).map((w) => w.id);
    for (const id of ids) {
      try {
        const plan = await coordinator.planWorkflow(path, id);
        console.log(`[+] ${plan.id}: ${plan.tasks.length} task(s) in ${plan.waves.length} wave(s)`);
      } catch (err) {
        console.error(`[x] ${id}`);
        printError(err);
      }
    }
  });

// --- waves ---
program
  .command("waves")
  .description("Print the execution waves of a workflow as JSON")
  .argument("<workflow>", "Workflow YAML file")
  .option("-w, --workflow <id>", "Workflow id when the file declares several")
  .action(async (file: string, opts: { workflow?: string }) => {
    const plan = await buildCoordinator().planWorkflow(file, opts.workflow);
    console.log(JSON.stringify({ workflow: plan.id, waves: plan.waves }, null, 2));
  });

// --- run ---
addLoopFlags(
  program
    .command("run")
    .description("Run a workflow wave by wave")
    .argument("<workflow>", "Workflow YAML file")
    .option("-w, --workflow <id>", "Workflow id when the file declares several")
    .option("-c, --concurrency <n>", "Max parallel tasks per wave", positiveInt)
    .option("--detached", "Start tasks in the background and follow them by pid"),
).action(async (file: string, opts: SessionFlags & { workflow?: string }) => {
  const coordinator = buildCoordinator();
  const plan = await coordinator.planWorkflow(file, opts.workflow);
  await runPlan(coordinator, plan, opts);
});

// --- batch ---
addLoopFlags(
  program
    .command("batch")
    .description("Run independent prompt files as one flat wave")
    .argument("<prompts...>", "Prompt files")
    .requiredOption("-m, --model <name>", "Executor for every prompt")
    .option("-c, --concurrency <n>", "Max parallel tasks", positiveInt)
    .option("--detached", "Start tasks in the background and follow them by pid"),
).action(async (prompts: string[], opts: SessionFlags & { model: string }) => {
  const coordinator = buildCoordinator();
  const plan = await coordinator.planBatch(prompts, opts.model);
  await runPlan(coordinator, plan, opts);
});

// --- exec ---
addLoopFlags(
  program
    .command("exec")
    .description("Run a single prompt file without a session")
    .argument("<prompt>", "Prompt file")
    .requiredOption("-m, --model <name>", "Executor")
    .option("--log <path>", "Log file (default: <state dir>/logs/<task>.log)")
    .option("--background", "Start detached and print the pid"),
).action(async (file: string, opts: LoopFlags & { model: string; log?: string; background?: boolean }) => {
  const cwd = projectDir();
  const controller = new ExecutionController({ registry: buildRegistry(), cwd });
  const path = resolve(cwd, file);
  const task: Task = { id: taskIdFromPath(path), path, dependsOn: [], model: opts.model };
  const logPath = opts.log ? resolve(cwd, opts.log) : join(cwd, getConfig().paths.stateDir, "logs", `${task.id}.log`);
  const prompt = await readFile(path, "utf8");

  if (opts.background) {
    const pid = await controller.runDetached(task, prompt, { logPath });
    console.log(JSON.stringify({ taskId: task.id, pid, logPath }, null, 2));
    return;
  }

  const result = await controller.run(task, prompt, {
    logPath,
    loop: Boolean(opts.loop || opts.twoStage),
    mode: modeOf(opts),
    maxIterations: opts.maxIterations,
  });
  console.log(
    JSON.stringify(
      {
        taskId: result.taskId,
        outcome: result.outcome,
        iterations: result.iterations,
        resumedFrom: result.resumedFrom,
        logPath: result.logPath,
        suggestedNextSteps: result.state.suggested_next_steps,
      },
      null,
      2,
    ),
  );
  if (result.outcome.kind !== "complete") process.exitCode = 1;
});

// --- status ---
program
  .command("status")
  .description("Show a session (default: the active one)")
  .argument("[session]", "Session id")
  .option("--json", "Print the raw status document")
  .action(async (session: string | undefined, opts: { json?: boolean }) => {
    const { store } = buildCoordinator();
    const doc = await store.load(await store.resolveSessionId(session));
    if (opts.json) {
      console.log(JSON.stringify(doc, null, 2));
    } else {
      printSession(doc);
    }
  });

// --- cancel ---
program
  .command("cancel")
  .description("Mark every unfinished agent cancelled (running processes are not signalled)")
  .argument("[session]", "Session id")
  .action(async (session: string | undefined) => {
    const doc = await buildCoordinator().cancel(session);
    console.log(`Session ${doc.session_id}: ${doc.status}`);
  });

// --- reconcile ---
program
  .command("reconcile")
  .description("Settle agents whose detached process has exited")
  .argument("[session]", "Session id")
  .action(async (session: string | undefined) => {
    const settled = await buildCoordinator().reconcile(session);
    if (settled.length === 0) {
      console.log("Nothing to reconcile.");
      return;
    }
    for (const a of settled) console.log(`[${a.status}] ${a.id}${a.reason ? ` (${a.reason})` : ""}`);
  });

// --- cleanup ---
program
  .command("cleanup")
  .description("Remove old sessions")
  .option("--keep-days <n>", "Retention window in days", nonNegative)
  .action(async (opts: { keepDays?: number }) => {
    const removed = await buildCoordinator().store.cleanup(opts.keepDays);
    console.log(`Removed ${removed} session(s).`);
  });

program.parseAsync().catch(printError);
