import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { formatIssues, parseOrThrow } from "./schemas.js";

export type TaskwaveConfig = {
  paths: {
    /** Project-local directory holding status and execution state. */
    stateDir: string;
  };
  lock: {
    timeoutMs: number;
    /** A lock whose mtime is older than this is taken over. */
    staleMs: number;
    minRetryMs: number;
    maxRetryMs: number;
  };
  loop: {
    maxIterations: number;
  };
  verification: {
    completionMarker: string;
    retryPrefix: string;
    stages: Array<{ name: string; marker: string }>;
  };
  limits: {
    maxConcurrency: number;
    maxNextSteps: number;
  };
  retention: {
    keepDays: number;
  };
  monitor: {
    pollIntervalMs: number;
  };
  executors: {
    defaultModel: string;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends Array<unknown> ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: TaskwaveConfig = {
  paths: {
    stateDir: ".taskwave",
  },
  lock: {
    timeoutMs: 5_000,
    staleMs: 10_000,
    minRetryMs: 25,
    maxRetryMs: 250,
  },
  loop: {
    maxIterations: 3,
  },
  verification: {
    completionMarker: "VERIFICATION_COMPLETE",
    retryPrefix: "NEEDS_RETRY:",
    stages: [
      { name: "compliance", marker: "COMPLIANCE_COMPLETE" },
      { name: "quality", marker: "QUALITY_COMPLETE" },
    ],
  },
  limits: {
    maxConcurrency: 8,
    maxNextSteps: 10,
  },
  retention: {
    keepDays: 7,
  },
  monitor: {
    pollIntervalMs: 1_000,
  },
  executors: {
    defaultModel: "codex",
  },
};

let current: TaskwaveConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

const positiveInt = z.number().int().positive();

const sections = {
  paths: z.object({ stateDir: z.string().min(1) }).strict(),
  lock: z
    .object({ timeoutMs: positiveInt, staleMs: positiveInt, minRetryMs: positiveInt, maxRetryMs: positiveInt })
    .strict(),
  loop: z.object({ maxIterations: positiveInt }).strict(),
  verification: z
    .object({
      completionMarker: z.string().min(1),
      retryPrefix: z.string().min(1),
      stages: z.array(z.object({ name: z.string().min(1), marker: z.string().min(1) }).strict()).length(2),
    })
    .strict(),
  limits: z.object({ maxConcurrency: positiveInt, maxNextSteps: positiveInt }).strict(),
  retention: z.object({ keepDays: z.number().nonnegative() }).strict(),
  monitor: z.object({ pollIntervalMs: positiveInt }).strict(),
  executors: z.object({ defaultModel: z.string().min(1) }).strict(),
};

const TaskwaveConfigSchema: z.ZodType<TaskwaveConfig> = z.object(sections).strict();

const ConfigFileSchema = z
  .object({
    paths: sections.paths.partial(),
    lock: sections.lock.partial(),
    loop: sections.loop.partial(),
    verification: sections.verification.partial(),
    limits: sections.limits.partial(),
    retention: sections.retention.partial(),
    monitor: sections.monitor.partial(),
    executors: sections.executors.partial(),
  })
  .partial()
  .strict();

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<TaskwaveConfig>): void {
  const result = TaskwaveConfigSchema.safeParse(deepMerge(DEFAULTS, overrides));
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  current = result.data;
}

/** Read a JSON config file, validate it and apply it over the defaults. */
export function loadConfigFile(path: string): void {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`], { cause: err });
  }
  configure(parseOrThrow(ConfigFileSchema, raw, path));
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<TaskwaveConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<TaskwaveConfig> = Object.freeze(structuredClone(DEFAULTS));
