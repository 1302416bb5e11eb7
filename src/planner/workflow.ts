import { readFileSync } from "node:fs";
import { basename, dirname, extname, resolve } from "node:path";
import { parseDocument } from "yaml";
import { getConfig } from "../config.js";
import { ConfigError, GraphValidationError } from "../errors.js";
import { WorkflowFileSchema, formatIssues, type WorkflowDeclaration } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { buildGraph, computeWaves, validateDag } from "./task-graph.js";
import type { DependencyGraph, Task, WorkflowPlan, WorkflowSettings } from "./types.js";

const log = createLogger("graph");

export type ParsedWorkflow = {
  id: string;
  tasks: Task[];
  graph: DependencyGraph;
  settings: WorkflowSettings;
};

export type ParseOptions = {
  /** Directory relative prompt paths resolve against. */
  baseDir: string;
  /** Label used in error messages, usually the file path. */
  source?: string;
  defaultModel?: string;
};

/**
 * Validate a workflow declaration and build each workflow's dependency graph.
 * Every schema violation and every reference to an undeclared task is
 * collected before a single ConfigError is raised.
 */
export function parseDeclaration(raw: unknown, opts: ParseOptions): ParsedWorkflow[] {
  const result = WorkflowFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error, opts.source));
  }

  const issues: string[] = [];
  const workflows: ParsedWorkflow[] = [];
  const defaultModel = opts.defaultModel ?? getConfig().executors.defaultModel;

  for (const [workflowId, decl] of Object.entries(result.data.workflows)) {
    const declared = new Set(Object.keys(decl.prompts));
    const tasks: Task[] = [];

    for (const [taskId, prompt] of Object.entries(decl.prompts)) {
      const after = [...new Set(prompt.after ?? [])];
      for (const dep of after) {
        if (!declared.has(dep)) {
          const where = [opts.source, `workflows.${workflowId}.prompts.${taskId}.after`].filter(Boolean).join(": ");
          issues.push(`${where}: unknown task "${dep}"`);
        }
      }
      tasks.push({
        id: taskId,
        path: resolve(opts.baseDir, prompt.path),
        dependsOn: after,
        model: prompt.model ?? defaultModel,
      });
    }

    workflows.push({ id: workflowId, tasks, graph: buildGraph(tasks), settings: toSettings(decl) });
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return workflows;
}

function toSettings(decl: WorkflowDeclaration): WorkflowSettings {
  return {
    base: decl.base,
    branch: decl.branch,
    onComplete: decl.on_complete && {
      createPr: decl.on_complete.create_pr ?? false,
      mergeTo: decl.on_complete.merge_to,
      deleteWorktree: decl.on_complete.delete_worktree ?? false,
    },
  };
}

/** Parse YAML text holding a `workflows:` declaration. */
export function parseWorkflowDocument(text: string, opts: ParseOptions): ParsedWorkflow[] {
  const doc = parseDocument(text);
  if (doc.errors.length > 0) {
    throw new ConfigError(doc.errors.map((e) => (opts.source ? `${opts.source}: ${e.message}` : e.message)));
  }
  return parseDeclaration(doc.toJS(), opts);
}

export function parseWorkflowFile(path: string, defaultModel?: string): ParsedWorkflow[] {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`], { cause: err });
  }
  return parseWorkflowDocument(text, { baseDir: dirname(resolve(path)), source: path, defaultModel });
}

/**
 * Pick one workflow, check it is a valid DAG and compute its waves.
 * A workflow where no task declares a dependency is flat and exempt from the
 * single-sink rule.
 */
export function resolveWorkflow(workflows: ParsedWorkflow[], workflowId: string | undefined, sourceFile: string): WorkflowPlan {
  let selected: ParsedWorkflow | undefined;
  if (workflowId === undefined) {
    if (workflows.length !== 1) {
      throw new ConfigError([
        `${sourceFile}: ${workflows.length} workflows declared (${workflows.map((w) => w.id).join(", ")}); choose one`,
      ]);
    }
    selected = workflows[0];
  } else {
    selected = workflows.find((w) => w.id === workflowId);
    if (!selected) {
      throw new ConfigError([`${sourceFile}: no workflow named "${workflowId}"`]);
    }
  }

  const flat = selected.tasks.every((t) => t.dependsOn.length === 0);
  if (!flat) {
    const errors = validateDag(selected.graph);
    if (errors.length > 0) {
      for (const e of errors) log.debug("graph violation", { workflow: selected.id, kind: e.kind, nodes: e.nodes });
      throw new GraphValidationError(selected.id, errors);
    }
  }

  const waves = computeWaves(selected.graph);
  log.debug("computed waves", { workflow: selected.id, waves });

  return {
    id: selected.id,
    source: "workflow",
    sourceFile,
    tasks: selected.tasks,
    graph: selected.graph,
    waves,
    settings: selected.settings,
    flat,
  };
}

/**
 * Derive a task id from a prompt file name: a `gh-<n>` prefix, then an
 * `NNN-NN` prefix, otherwise the whole stem.
 */
export function taskIdFromPath(path: string): string {
  const stem = basename(path, extname(path));
  const gh = /^(gh-\d+)/.exec(stem);
  if (gh) return gh[1];
  const numbered = /^(\d{3}-\d{2})/.exec(stem);
  if (numbered) return numbered[1];
  return stem;
}

/** A dependency-free plan from prompt files; everything runs in one wave. */
export function flatPlan(paths: string[], model: string, cwd: string): WorkflowPlan {
  const tasks: Task[] = [];
  const issues: string[] = [];
  for (const p of paths) {
    const id = taskIdFromPath(p);
    if (tasks.some((t) => t.id === id)) {
      issues.push(`${p}: task id "${id}" is already used by another prompt file`);
      continue;
    }
    tasks.push({ id, path: resolve(cwd, p), dependsOn: [], model });
  }
  if (tasks.length === 0 && issues.length === 0) issues.push("no prompt files given");
  if (issues.length > 0) throw new ConfigError(issues);

  const graph = buildGraph(tasks);
  return {
    id: "batch",
    source: "batch",
    sourceFile: paths.join(","),
    tasks,
    graph,
    waves: computeWaves(graph),
    settings: {},
    flat: true,
  };
}
