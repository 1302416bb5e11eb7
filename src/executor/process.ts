import { spawn } from "node:child_process";
import { closeSync, openSync } from "node:fs";
import { constants } from "node:os";
import type { Invocation } from "../agents/profile.js";
import { ExternalProcessError } from "../errors.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("executor");

export type LaunchOptions = {
  cwd: string;
  /** stdout and stderr are appended here. */
  logPath: string;
  /** Called once the child has a pid. */
  onSpawn?: (pid: number) => void;
};

/** The boundary to the operating system: everything that starts a process goes through here. */
export interface ProcessLauncher {
  /** Run to completion and resolve with the exit code. Rejects with ExternalProcessError if the program cannot start. */
  run(inv: Invocation, opts: LaunchOptions): Promise<number>;
  /** Start detached from this process and return its pid without waiting. */
  spawnDetached(inv: Invocation, opts: LaunchOptions): number;
}

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) {
    const entry = Object.entries(constants.signals).find(([name]) => name === signal);
    return 128 + (typeof entry?.[1] === "number" ? entry[1] : 0);
  }
  return 1;
}

/** Spawns real child processes with node:child_process. */
export class NodeProcessLauncher implements ProcessLauncher {
  run(inv: Invocation, opts: LaunchOptions): Promise<number> {
    const fd = openSync(opts.logPath, "a");
    try {
      const child = spawn(inv.program, inv.args, {
        cwd: opts.cwd,
        env: { ...process.env, ...inv.env },
        stdio: [inv.stdin !== undefined ? "pipe" : "ignore", fd, fd],
      });

      return new Promise<number>((resolve, reject) => {
        child.once("error", (err) => {
          reject(new ExternalProcessError(127, `Failed to start ${inv.program}: ${err.message}`, { cause: err }));
        });
        child.once("close", (code, signal) => resolve(exitCodeOf(code, signal)));

        if (child.pid !== undefined) opts.onSpawn?.(child.pid);
        if (inv.stdin !== undefined && child.stdin) {
          child.stdin.on("error", (err) => log.debug(`stdin of ${inv.program} closed early`, { error: err.message }));
          child.stdin.end(inv.stdin);
        }
      });
    } finally {
      closeSync(fd);
    }
  }

  spawnDetached(inv: Invocation, opts: LaunchOptions): number {
    const fd = openSync(opts.logPath, "a");
    try {
      const child = spawn(inv.program, inv.args, {
        cwd: opts.cwd,
        env: { ...process.env, ...inv.env },
        stdio: [inv.stdin !== undefined ? "pipe" : "ignore", fd, fd],
        detached: true,
      });
      child.once("error", (err) => log.error(`Detached ${inv.program} failed`, { error: err.message }));

      if (child.pid === undefined) {
        throw new ExternalProcessError(127, `Failed to start ${inv.program} in the background`);
      }
      if (inv.stdin !== undefined && child.stdin) {
        child.stdin.on("error", (err) => log.debug(`stdin of ${inv.program} closed early`, { error: err.message }));
        child.stdin.end(inv.stdin);
      }
      child.unref();
      opts.onSpawn?.(child.pid);
      return child.pid;
    } finally {
      closeSync(fd);
    }
  }
}

/** Whether a pid names a live process (one we may not be allowed to signal still counts). */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}
