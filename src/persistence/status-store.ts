import { randomUUID } from "node:crypto";
import { mkdir, readdir, rm } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import type { z } from "zod";
import { getConfig } from "../config.js";
import { StoreError } from "../errors.js";
import type { Task, Wave } from "../planner/types.js";
import { SessionDocumentSchema, formatIssues, type AgentRecordSchema, type AgentStatusSchema, type SummarySchema } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { atomicWrite, atomicWriteJson, safeReadFile } from "./atomic.js";
import { withLock, type LockOptions } from "./lock.js";

const log = createLogger("status");

export type AgentStatus = z.infer<typeof AgentStatusSchema>;
export type AgentRecord = z.infer<typeof AgentRecordSchema>;
export type SessionSummary = z.infer<typeof SummarySchema>;
export type SessionDocument = z.infer<typeof SessionDocumentSchema>;
export type SessionStatus = SessionDocument["status"];

/** Fields a caller may change on an agent record. */
export type AgentUpdate = Partial<Pick<AgentRecord, "status" | "pid" | "started_at" | "exit_code" | "error">>;

export type CreateSessionInput = {
  source: string;
  sourceFile: string;
  tasks: readonly Task[];
  waves: readonly Wave[];
};

export type StatusStoreOptions = {
  /** Project directory; state lives under `<cwd>/<stateDir>/status`. */
  cwd: string;
  lock?: Partial<LockOptions>;
};

const TERMINAL_AGENT: ReadonlySet<AgentStatus> = new Set(["complete", "failed", "cancelled"]);

export function isTerminalAgentStatus(status: AgentStatus): boolean {
  return TERMINAL_AGENT.has(status);
}

export function isTerminalSessionStatus(status: SessionStatus): boolean {
  return status !== "running";
}

export function summarize(agents: readonly AgentRecord[]): SessionSummary {
  const summary: SessionSummary = { total: agents.length, queued: 0, running: 0, complete: 0, failed: 0, cancelled: 0 };
  for (const agent of agents) summary[agent.status] += 1;
  return summary;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYYMMDD-HHMMSS-xxxxxxxx`, local time plus 8 random hex chars. */
export function newSessionId(now = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}-${time}-${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

/** Human title from a prompt file name, without the task id prefix. */
function displayName(task: Task): string {
  const stem = basename(task.path, extname(task.path));
  const rest = stem.startsWith(task.id) ? stem.slice(task.id.length).replace(/^-+/, "") : stem;
  const title = rest
    .split(/[-_]+/)
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(" ");
  return title || task.id;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Session status ledger shared by concurrently running tasks. Every mutation
 * is a locked read-modify-write of the session's status document followed by
 * an atomic rename, so concurrent updates never lose each other.
 */
export class StatusStore {
  readonly root: string;
  private lockOptions?: Partial<LockOptions>;

  constructor(opts: StatusStoreOptions) {
    this.root = join(resolve(opts.cwd), getConfig().paths.stateDir, "status");
    this.lockOptions = opts.lock;
  }

  get sessionsDir(): string {
    return join(this.root, "sessions");
  }

  sessionDir(sessionId: string): string {
    return join(this.sessionsDir, sessionId);
  }

  statusFile(sessionId: string): string {
    return join(this.sessionDir(sessionId), "status.json");
  }

  logPath(sessionId: string, agentId: string): string {
    return join(this.sessionDir(sessionId), `${agentId}.log`);
  }

  private get activePointer(): string {
    return join(this.root, "active-session");
  }

  /** Create a session with every agent queued and make it the active session. */
  async createSession(input: CreateSessionInput): Promise<SessionDocument> {
    await mkdir(this.sessionsDir, { recursive: true });

    let sessionId = newSessionId();
    for (;;) {
      try {
        await mkdir(this.sessionDir(sessionId));
        break;
      } catch (err) {
        if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) {
          throw new StoreError("STORE_IO", `Could not create session directory for ${sessionId}`, { cause: err });
        }
        sessionId = newSessionId();
      }
    }

    const waveOf = new Map<string, number>();
    input.waves.forEach((wave, i) => wave.forEach((id) => waveOf.set(id, i)));

    const agents: AgentRecord[] = input.tasks.map((task) => ({
      id: task.id,
      name: displayName(task),
      status: "queued",
      wave: waveOf.get(task.id) ?? 0,
      model: task.model,
      prompt_path: task.path,
      started_at: null,
      completed_at: null,
      duration_seconds: null,
      exit_code: null,
      pid: null,
      error: null,
      log_file: this.logPath(sessionId, task.id),
    }));

    const doc: SessionDocument = {
      schema_version: "1.0",
      session_id: sessionId,
      source: input.source,
      source_file: input.sourceFile,
      started_at: new Date().toISOString(),
      completed_at: null,
      status: "running",
      agents,
      summary: summarize(agents),
      waves: input.waves.map((tasks, wave) => ({ wave, tasks: [...tasks] })),
    };

    await atomicWriteJson(this.statusFile(sessionId), doc);
    await atomicWrite(this.activePointer, sessionId + "\n");
    log.info(`Created session ${sessionId}`, { agents: agents.length, waves: input.waves.length });
    return doc;
  }

  async load(sessionId: string): Promise<SessionDocument> {
    const file = this.statusFile(sessionId);
    const text = await safeReadFile(file);
    if (text === null) {
      throw new StoreError("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new StoreError("STORE_CORRUPT", `Status document is not valid JSON: ${file}`, { cause: err });
    }
    const result = SessionDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw new StoreError("STORE_CORRUPT", `Malformed status document ${file}: ${formatIssues(result.error).join("; ")}`);
    }
    return result.data;
  }

  /** The session the active pointer references, if any. */
  async activeSessionId(): Promise<string | undefined> {
    const text = await safeReadFile(this.activePointer);
    const id = text?.trim();
    return id ? id : undefined;
  }

  /** The given session id, else the active one. */
  async resolveSessionId(sessionId?: string): Promise<string> {
    const id = sessionId ?? (await this.activeSessionId());
    if (!id) throw new StoreError("SESSION_NOT_FOUND", "No session given and no active session");
    return id;
  }

  /** Session ids, oldest first. */
  async listSessions(): Promise<string[]> {
    try {
      const entries = await readdir(this.sessionsDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StoreError("STORE_IO", `Cannot list sessions in ${this.sessionsDir}`, { cause: err });
    }
  }

  /**
   * Lock, read, mutate, write-then-rename, unlock. `mutate` returns false to
   * skip the write.
   */
  private async transact(sessionId: string, mutate: (doc: SessionDocument) => boolean): Promise<SessionDocument> {
    const file = this.statusFile(sessionId);
    return withLock(
      file,
      async (guard) => {
        const doc = await this.load(sessionId);
        if (mutate(doc)) {
          guard();
          await atomicWriteJson(file, doc);
        }
        return doc;
      },
      this.lockOptions,
    );
  }

  /**
   * Apply a partial update to one agent. Entering a terminal state stamps
   * `completed_at` and the duration; once every agent is terminal the session
   * closes as failed (any agent failed) or complete.
   * Terminal agents are final: later updates to them are dropped.
   */
  async updateAgent(sessionId: string, agentId: string, update: AgentUpdate): Promise<SessionDocument> {
    return this.transact(sessionId, (doc) => {
      const agent = doc.agents.find((a) => a.id === agentId);
      if (!agent) {
        throw new StoreError("AGENT_NOT_FOUND", `Agent "${agentId}" not found in session ${sessionId}`);
      }

      const wasTerminal = isTerminalAgentStatus(agent.status);
      if (wasTerminal) {
        log.warn(`Ignoring update to terminal agent "${agentId}"`, { status: agent.status, update });
        return false;
      }

      if (update.status !== undefined) agent.status = update.status;
      if (update.pid !== undefined) agent.pid = update.pid;
      if (update.started_at !== undefined) agent.started_at = update.started_at;
      if (update.exit_code !== undefined) agent.exit_code = update.exit_code;
      if (update.error !== undefined) agent.error = update.error;

      if (isTerminalAgentStatus(agent.status)) {
        const end = new Date();
        agent.completed_at = agent.completed_at ?? end.toISOString();
        if (agent.started_at && agent.duration_seconds === null) {
          agent.duration_seconds = (end.getTime() - Date.parse(agent.started_at)) / 1000;
        }
      }

      doc.summary = summarize(doc.agents);
      if (doc.status === "running" && doc.agents.every((a) => isTerminalAgentStatus(a.status))) {
        doc.status = doc.agents.some((a) => a.status === "failed") ? "failed" : "complete";
        doc.completed_at = new Date().toISOString();
        log.info(`Session ${sessionId} ${doc.status}`, { summary: doc.summary });
      }
      return true;
    });
  }

  startAgent(sessionId: string, agentId: string, pid?: number): Promise<SessionDocument> {
    return this.updateAgent(sessionId, agentId, {
      status: "running",
      started_at: new Date().toISOString(),
      pid: pid ?? null,
    });
  }

  /** Record an exit: complete on 0, failed otherwise. */
  completeAgent(sessionId: string, agentId: string, exitCode = 0): Promise<SessionDocument> {
    return this.updateAgent(sessionId, agentId, {
      status: exitCode === 0 ? "complete" : "failed",
      exit_code: exitCode,
    });
  }

  failAgent(sessionId: string, agentId: string, error: string, exitCode: number | null = 1): Promise<SessionDocument> {
    return this.updateAgent(sessionId, agentId, { status: "failed", exit_code: exitCode, error });
  }

  /**
   * Mark every queued or running agent cancelled and close the session.
   * Bookkeeping only: running processes are not signalled.
   */
  async cancelSession(sessionId: string): Promise<SessionDocument> {
    return this.transact(sessionId, (doc) => {
      if (isTerminalSessionStatus(doc.status)) return false;
      const now = new Date();
      for (const agent of doc.agents) {
        if (isTerminalAgentStatus(agent.status)) continue;
        agent.status = "cancelled";
        agent.completed_at = now.toISOString();
        if (agent.started_at) {
          agent.duration_seconds = (now.getTime() - Date.parse(agent.started_at)) / 1000;
        }
      }
      doc.status = "cancelled";
      doc.completed_at = now.toISOString();
      doc.summary = summarize(doc.agents);
      log.info(`Session ${sessionId} cancelled`, { summary: doc.summary });
      return true;
    });
  }

  async runningAgents(sessionId: string): Promise<AgentRecord[]> {
    const doc = await this.load(sessionId);
    return doc.agents.filter((a) => a.status === "running");
  }

  async queuedAgents(sessionId: string): Promise<AgentRecord[]> {
    const doc = await this.load(sessionId);
    return doc.agents.filter((a) => a.status === "queued");
  }

  async isTerminal(sessionId: string): Promise<boolean> {
    const doc = await this.load(sessionId);
    return isTerminalSessionStatus(doc.status);
  }

  /** Remove sessions started more than `keepDays` ago. Returns how many were removed. */
  async cleanup(keepDays = getConfig().retention.keepDays, now = Date.now()): Promise<number> {
    const cutoff = now - keepDays * 86_400_000;
    let removed = 0;
    for (const sessionId of await this.listSessions()) {
      let doc: SessionDocument;
      try {
        doc = await this.load(sessionId);
      } catch (err) {
        log.debug(`Skipping unreadable session ${sessionId}`, { error: String(err) });
        continue;
      }
      if (Date.parse(doc.started_at) < cutoff) {
        await rm(this.sessionDir(sessionId), { recursive: true, force: true });
        removed++;
      }
    }
    if (removed > 0) log.info(`Removed ${removed} session(s) older than ${keepDays} day(s)`);
    return removed;
  }
}
