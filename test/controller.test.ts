import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resetConfig } from "../src/config.js";
import { ExternalProcessError } from "../src/errors.js";
import { ExecutionController } from "../src/executor/controller.js";
import { StatusStore } from "../src/persistence/status-store.js";
import type { Task } from "../src/planner/types.js";
import { ScriptedLauncher, fakeRegistry, marker, type Step } from "./fakes.js";

const task: Task = { id: "gh-7", path: "/prompts/gh-7-add-login.md", dependsOn: [], model: "fake" };
const PROMPT = "Add a login form.";

describe("ExecutionController", () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "taskwave-exec-"));
    logPath = join(dir, "logs", "gh-7.log");
  });

  afterEach(async () => {
    resetConfig();
    await rm(dir, { recursive: true, force: true });
  });

  function controller(script: (call: number) => Step): { ctl: ExecutionController; launcher: ScriptedLauncher } {
    const launcher = new ScriptedLauncher(script);
    return { ctl: new ExecutionController({ registry: fakeRegistry(), cwd: dir, launcher }), launcher };
  }

  async function persisted(): Promise<Record<string, unknown>> {
    return JSON.parse(await readFile(join(dir, ".taskwave", "state", "gh-7.json"), "utf8"));
  }

  describe("runOnce", () => {
    it("writes a header and returns the byte range of the invocation", async () => {
      const { ctl, launcher } = controller(() => ({ output: "hello\n", exitCode: 0 }));
      const first = await ctl.runOnce(task, PROMPT, { logPath, iteration: 1 });
      const second = await ctl.runOnce(task, PROMPT, { logPath });

      expect(first.exitCode).toBe(0);
      expect(first.logStart).toBe(0);
      expect(second.logStart).toBe(first.logEnd);

      const log = await readFile(logPath, "utf8");
      expect(log).toMatch(/^\n--- Execution at \S+ \| model=fake \| iteration=1 ---\nhello\n/);
      expect(launcher.calls[0].inv).toEqual({
        program: "fake-agent",
        args: ["--run"],
        stdin: PROMPT,
        env: { FAKE_MODE: "test" },
      });
    });

    it("propagates a nonzero exit code", async () => {
      const { ctl } = controller(() => ({ output: "", exitCode: 9 }));
      expect((await ctl.runOnce(task, PROMPT, { logPath })).exitCode).toBe(9);
    });
  });

  describe("run", () => {
    it("stops after max iterations when every attempt asks for a retry", async () => {
      const { ctl, launcher } = controller(() => ({ output: marker("NEEDS_RETRY: x") }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true, maxIterations: 3 });

      expect(result.outcome).toEqual({ kind: "exhausted", lastReason: "x" });
      expect(result.iterations).toBe(3);
      expect(launcher.calls).toHaveLength(3);

      const state = await persisted();
      expect(state.status).toBe("exhausted");
      expect(state.iteration).toBe(3);
      expect(result.state.history.map((h) => h.retry_reason)).toEqual(["x", "x", "x"]);
    });

    it("retries with the original prompt, the transcript so far and the reason", async () => {
      const { ctl, launcher } = controller((call) =>
        call === 1 ? { output: marker("NEEDS_RETRY: missing tests") } : { output: marker("VERIFICATION_COMPLETE") },
      );
      const result = await ctl.run(task, PROMPT, { logPath, loop: true });

      expect(result.outcome).toEqual({ kind: "complete" });
      expect(result.iterations).toBe(2);
      expect(launcher.calls[0].prompt).toBe(PROMPT);

      const retry = launcher.calls[1].prompt;
      expect(retry.startsWith(`${PROMPT}\n\n--- Previous Attempt ---\n`)).toBe(true);
      expect(retry).toContain("| iteration=1 ---");
      expect(retry.endsWith("--- Retry Reason ---\nmissing tests\n\nPlease address the issue and try again.\n")).toBe(true);
    });

    it("only reads the marker written by the current iteration", async () => {
      const { ctl } = controller((call) => (call === 1 ? { output: marker("NEEDS_RETRY: again") } : { output: "no marker\n" }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true });
      expect(result.outcome).toEqual({ kind: "no_marker" });
      expect(result.iterations).toBe(2);
    });

    it("reports an unrecognized marker verbatim", async () => {
      const { ctl } = controller(() => ({ output: marker("PROBABLY_DONE") }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true });
      expect(result.outcome).toEqual({ kind: "unknown_marker", marker: "PROBABLY_DONE" });
      expect((await persisted()).status).toBe("unknown_marker");
    });

    it("stops on a nonzero exit", async () => {
      const { ctl, launcher } = controller(() => ({ output: marker("VERIFICATION_COMPLETE"), exitCode: 2 }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true });
      expect(result.outcome).toEqual({ kind: "process_error", exitCode: 2, message: "fake exited with code 2" });
      expect(launcher.calls).toHaveLength(1);
      expect(result.state.history[0]).toMatchObject({ exit_code: 2, marker_found: false });
    });

    it("records a process that cannot start", async () => {
      const { ctl } = controller(() => ({ throws: new ExternalProcessError(127, "Failed to start fake-agent: ENOENT") }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true });
      expect(result.outcome).toEqual({
        kind: "process_error",
        exitCode: 127,
        message: "Failed to start fake-agent: ENOENT",
      });
      expect((await persisted()).status).toBe("process_error");
    });

    it("succeeds on a clean exit without looping", async () => {
      const { ctl, launcher } = controller(() => ({ output: "done\n" }));
      const result = await ctl.run(task, PROMPT, { logPath });
      expect(result.outcome).toEqual({ kind: "complete" });
      expect(result.state.max_iterations).toBe(1);
      expect(launcher.calls).toHaveLength(1);
    });

    it("records suggested next steps", async () => {
      const { ctl } = controller(() => ({
        output: "Next steps:\n- add rate limiting\n- write docs\n\n" + marker("VERIFICATION_COMPLETE"),
      }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true });
      expect(result.state.suggested_next_steps).toEqual(["add rate limiting", "write docs"]);
      expect((await persisted()).suggested_next_steps).toEqual(["add rate limiting", "write docs"]);
    });

    it("resumes an interrupted run from the recorded iteration", async () => {
      const first = controller((call) => {
        if (call === 3) return { throws: new Error("controller killed") };
        return { output: marker("NEEDS_RETRY: x") };
      });
      await expect(first.ctl.run(task, PROMPT, { logPath, loop: true, maxIterations: 3 })).rejects.toThrow("controller killed");

      const interrupted = await persisted();
      expect(interrupted.status).toBe("running");
      expect(interrupted.iteration).toBe(2);

      const second = controller(() => ({ output: marker("VERIFICATION_COMPLETE") }));
      const result = await second.ctl.run(task, PROMPT, { logPath, loop: true, maxIterations: 3 });

      expect(result.resumedFrom).toBe(2);
      expect(result.iterations).toBe(3);
      expect(result.outcome).toEqual({ kind: "complete" });
      expect(second.launcher.calls).toHaveLength(1);
      expect(second.launcher.calls[0].prompt).toContain("--- Retry Reason ---\nx\n");
      expect(result.state.history.map((h) => h.iteration)).toEqual([1, 2, 3]);
    });

    it("starts over once the previous run finished", async () => {
      const { ctl } = controller(() => ({ output: marker("VERIFICATION_COMPLETE") }));
      await ctl.run(task, PROMPT, { logPath, loop: true });
      const again = await ctl.run(task, PROMPT, { logPath, loop: true });
      expect(again.resumedFrom).toBe(0);
      expect(again.iterations).toBe(1);
    });

    it("starts over when the executor changed", async () => {
      const first = controller(() => ({ throws: new Error("killed") }));
      await expect(first.ctl.run(task, PROMPT, { logPath, loop: true })).rejects.toThrow("killed");

      const registry = fakeRegistry();
      registry.add({ name: "other", command: ["other-agent"], inputMode: "argument", env: {} });
      const launcher = new ScriptedLauncher(() => ({ output: marker("VERIFICATION_COMPLETE") }));
      const ctl = new ExecutionController({ registry, cwd: dir, launcher });
      const result = await ctl.run({ ...task, model: "other" }, PROMPT, { logPath, loop: true });
      expect(result.resumedFrom).toBe(0);
      expect(launcher.calls[0].inv.args).toEqual([PROMPT]);
    });
  });

  describe("two-stage verification", () => {
    it("passes compliance, then quality", async () => {
      const outputs = [marker("COMPLIANCE_COMPLETE"), marker("NEEDS_RETRY: polish"), marker("QUALITY_COMPLETE")];
      const { ctl, launcher } = controller((call) => ({ output: outputs[call - 1] }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true, mode: "two-stage", maxIterations: 5 });

      expect(result.outcome).toEqual({ kind: "complete" });
      expect(result.state.history.map((h) => [h.stage, h.marker])).toEqual([
        [0, "COMPLIANCE_COMPLETE"],
        [1, "NEEDS_RETRY: polish"],
        [1, "QUALITY_COMPLETE"],
      ]);
      expect(result.state.stages).toEqual(["COMPLIANCE_COMPLETE", "QUALITY_COMPLETE"]);

      const advance = launcher.calls[1].prompt;
      expect(advance).toContain("The compliance check passed. Now verify quality.");
      expect(advance).toContain("<verification>QUALITY_COMPLETE</verification>");

      // The retry carries only the attempt before it.
      const retry = launcher.calls[2].prompt;
      expect(retry).toContain("| iteration=2 ---");
      expect(retry).not.toContain("| iteration=1 ---");
      expect(retry).not.toContain("COMPLIANCE_COMPLETE");
    });

    it("treats a quality token before compliance as unknown", async () => {
      const { ctl } = controller(() => ({ output: marker("QUALITY_COMPLETE") }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true, mode: "two-stage" });
      expect(result.outcome).toEqual({ kind: "unknown_marker", marker: "QUALITY_COMPLETE" });
    });

    it("exhausts when quality is never reached", async () => {
      const { ctl } = controller((call) => ({
        output: call === 1 ? marker("COMPLIANCE_COMPLETE") : marker("NEEDS_RETRY: still rough"),
      }));
      const result = await ctl.run(task, PROMPT, { logPath, loop: true, mode: "two-stage", maxIterations: 3 });
      expect(result.outcome).toEqual({ kind: "exhausted", lastReason: "still rough" });
      expect(result.state.stage_index).toBe(1);
    });
  });

  describe("runDetached", () => {
    it("returns the pid and records it on the agent", async () => {
      const store = new StatusStore({ cwd: dir });
      const session = await store.createSession({ source: "batch", sourceFile: "x", tasks: [task], waves: [["gh-7"]] });
      const { ctl, launcher } = controller(() => ({ output: "started\n" }));

      const pid = await ctl.runDetached(task, PROMPT, { logPath, status: { store, sessionId: session.session_id } });

      expect(pid).toBe(1000);
      expect(launcher.calls).toHaveLength(1);
      const doc = await store.load(session.session_id);
      expect(doc.agents[0]).toMatchObject({ status: "running", pid: 1000 });
      expect(await readFile(logPath, "utf8")).toContain("--- Background execution at ");
    });
  });
});
