import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, GraphValidationError } from "../src/errors.js";
import {
  flatPlan,
  parseDeclaration,
  parseWorkflowDocument,
  parseWorkflowFile,
  resolveWorkflow,
  taskIdFromPath,
} from "../src/planner/workflow.js";

const DIAMOND = `
workflows:
  release:
    base: main
    branch: feature/release
    on_complete:
      create_pr: true
      delete_worktree: true
    prompts:
      A:
        path: prompts/a.md
      B:
        path: prompts/b.md
        after: [A]
        model: gemini
      C:
        path: prompts/c.md
        after: [A]
      D:
        path: prompts/d.md
        after: [B, C]
`;

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("parseWorkflowDocument", () => {
  it("builds tasks with resolved paths and default models", () => {
    const [wf] = parseWorkflowDocument(DIAMOND, { baseDir: "/project", defaultModel: "codex" });
    expect(wf.id).toBe("release");
    expect(wf.tasks.map((t) => [t.id, t.path, t.model, t.dependsOn])).toEqual([
      ["A", "/project/prompts/a.md", "codex", []],
      ["B", "/project/prompts/b.md", "gemini", ["A"]],
      ["C", "/project/prompts/c.md", "codex", ["A"]],
      ["D", "/project/prompts/d.md", "codex", ["B", "C"]],
    ]);
    expect(wf.settings).toEqual({
      base: "main",
      branch: "feature/release",
      onComplete: { createPr: true, mergeTo: undefined, deleteWorktree: true },
    });
  });

  it("reports YAML syntax errors as a ConfigError", () => {
    const err = caught(() => parseWorkflowDocument("workflows: [unclosed", { baseDir: "/", source: "wf.yaml" }));
    expect(err).toBeInstanceOf(ConfigError);
  });
});

describe("parseDeclaration", () => {
  it("aggregates every schema violation before failing", () => {
    const err = caught(() =>
      parseDeclaration(
        {
          workflows: {
            w: {
              colour: "blue",
              prompts: {
                a: { after: "b" },
                b: { path: "b.md", model: 7 },
              },
            },
          },
        },
        { baseDir: "/" },
      ),
    );
    expect(err).toBeInstanceOf(ConfigError);
    const issues = err instanceof ConfigError ? err.issues : [];
    expect(issues).toHaveLength(4);
    expect(issues.some((i) => i.startsWith("workflows.w:") && i.includes("colour"))).toBe(true);
    expect(issues.some((i) => i.startsWith("workflows.w.prompts.a.path:"))).toBe(true);
    expect(issues.some((i) => i.startsWith("workflows.w.prompts.a.after:"))).toBe(true);
    expect(issues.some((i) => i.startsWith("workflows.w.prompts.b.model:"))).toBe(true);
  });

  it("reports every dependency on an undeclared task", () => {
    const err = caught(() =>
      parseDeclaration(
        { workflows: { w: { prompts: { a: { path: "a.md", after: ["x"] }, b: { path: "b.md", after: ["y", "a"] } } } } },
        { baseDir: "/", source: "wf.yaml" },
      ),
    );
    expect(err instanceof ConfigError ? err.issues : []).toEqual([
      'wf.yaml: workflows.w.prompts.a.after: unknown task "x"',
      'wf.yaml: workflows.w.prompts.b.after: unknown task "y"',
    ]);
  });

  it("rejects create_pr together with merge_to", () => {
    const err = caught(() =>
      parseDeclaration(
        { workflows: { w: { on_complete: { create_pr: true, merge_to: "main" }, prompts: { a: { path: "a.md" } } } } },
        { baseDir: "/" },
      ),
    );
    expect(err instanceof ConfigError ? err.issues : []).toEqual([
      "workflows.w.on_complete: create_pr and merge_to are mutually exclusive",
    ]);
  });

  it("rejects task ids that cannot name a log file", () => {
    const err = caught(() => parseDeclaration({ workflows: { w: { prompts: { "../a": { path: "a.md" } } } } }, { baseDir: "/" }));
    expect(err).toBeInstanceOf(ConfigError);
  });
});

describe("resolveWorkflow", () => {
  it("computes the waves of a valid workflow", () => {
    const plan = resolveWorkflow(parseWorkflowDocument(DIAMOND, { baseDir: "/p" }), undefined, "/p/wf.yaml");
    expect(plan.waves).toEqual([["A"], ["B", "C"], ["D"]]);
    expect(plan.flat).toBe(false);
    expect(plan.source).toBe("workflow");
  });

  it("raises every graph error at once", () => {
    const workflows = parseDeclaration(
      { workflows: { w: { prompts: { a: { path: "a.md" }, b: { path: "b.md", after: ["a"] }, c: { path: "c.md", after: ["a"] } } } } },
      { baseDir: "/" },
    );
    const err = caught(() => resolveWorkflow(workflows, "w", "wf.yaml"));
    expect(err).toBeInstanceOf(GraphValidationError);
    expect(err instanceof GraphValidationError ? err.errors.map((e) => [e.kind, e.nodes]) : []).toEqual([
      ["multiple_sinks", ["b", "c"]],
    ]);
  });

  it("treats a workflow without dependencies as flat", () => {
    const workflows = parseDeclaration(
      { workflows: { w: { prompts: { a: { path: "a.md" }, b: { path: "b.md" } } } } },
      { baseDir: "/" },
    );
    const plan = resolveWorkflow(workflows, undefined, "wf.yaml");
    expect(plan.flat).toBe(true);
    expect(plan.waves).toEqual([["a", "b"]]);
  });

  it("requires an id when several workflows are declared", () => {
    const workflows = parseDeclaration(
      { workflows: { one: { prompts: { a: { path: "a.md" } } }, two: { prompts: { b: { path: "b.md" } } } } },
      { baseDir: "/" },
    );
    expect(() => resolveWorkflow(workflows, undefined, "wf.yaml")).toThrow("2 workflows declared (one, two); choose one");
    expect(() => resolveWorkflow(workflows, "three", "wf.yaml")).toThrow('no workflow named "three"');
    expect(resolveWorkflow(workflows, "two", "wf.yaml").tasks.map((t) => t.id)).toEqual(["b"]);
  });
});

describe("parseWorkflowFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "taskwave-wf-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("resolves prompt paths against the file's directory", async () => {
    const file = join(dir, "workflow.yaml");
    await writeFile(file, DIAMOND);
    const [wf] = parseWorkflowFile(file);
    expect(wf.tasks[0].path).toBe(join(dir, "prompts/a.md"));
  });

  it("reports a missing file as a ConfigError", () => {
    expect(caught(() => parseWorkflowFile(join(dir, "absent.yaml")))).toBeInstanceOf(ConfigError);
  });
});

describe("taskIdFromPath", () => {
  it("prefers a gh-<n> prefix", () => {
    expect(taskIdFromPath("/x/gh-42-fix-login.md")).toBe("gh-42");
  });

  it("then an NNN-NN prefix", () => {
    expect(taskIdFromPath("prompts/001-02-setup-db.md")).toBe("001-02");
  });

  it("falls back to the stem", () => {
    expect(taskIdFromPath("refactor-auth.md")).toBe("refactor-auth");
  });
});

describe("flatPlan", () => {
  it("runs every prompt in one wave", () => {
    const plan = flatPlan(["b-task.md", "a-task.md"], "codex", "/work");
    expect(plan.flat).toBe(true);
    expect(plan.waves).toEqual([["a-task", "b-task"]]);
    expect(plan.tasks.map((t) => t.path)).toEqual(["/work/b-task.md", "/work/a-task.md"]);
  });

  it("rejects two prompts that map to the same task id", () => {
    expect(() => flatPlan(["gh-1-a.md", "gh-1-b.md"], "codex", "/work")).toThrow(
      'gh-1-b.md: task id "gh-1" is already used by another prompt file',
    );
  });
});
