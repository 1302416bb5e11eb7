import { readFileSync } from "node:fs";
import { ConfigError, ValidationError } from "../errors.js";
import { ExecutorProfilesFileSchema, parseOrThrow } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { builtinProfiles, type ExecutorProfile } from "./profile.js";

const log = createLogger("executor");

/** Executor identity → invocation profile. Injected wherever tasks are run. */
export class ExecutorRegistry {
  private profiles = new Map<string, ExecutorProfile>();

  constructor(profiles: Iterable<ExecutorProfile> = []) {
    for (const p of profiles) this.add(p);
  }

  static withBuiltins(): ExecutorRegistry {
    return new ExecutorRegistry(builtinProfiles());
  }

  add(profile: ExecutorProfile): void {
    if (this.profiles.has(profile.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Executor "${profile.name}" already registered`);
    }
    this.profiles.set(profile.name, profile);
  }

  /** Add or replace a profile. */
  set(profile: ExecutorProfile): void {
    this.profiles.set(profile.name, profile);
  }

  remove(name: string): boolean {
    return this.profiles.delete(name);
  }

  get(name: string): ExecutorProfile | undefined {
    return this.profiles.get(name);
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  /** Like get(), but an unknown identity is an error naming the known ones. */
  resolve(name: string): ExecutorProfile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new ValidationError("UNKNOWN_EXECUTOR", `Unknown executor "${name}". Supported: ${this.names().join(", ")}`);
    }
    return profile;
  }

  list(): ExecutorProfile[] {
    return [...this.profiles.values()];
  }

  names(): string[] {
    return [...this.profiles.keys()];
  }

  /**
   * Load profiles from a JSON file of the form
   * `{ "executors": { "<name>": { "command": [...], "input_mode": "stdin", "env": {} } } }`.
   * Entries replace same-named profiles.
   */
  loadFile(path: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf8"));
    } catch (err) {
      throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`], { cause: err });
    }
    const { executors } = parseOrThrow(ExecutorProfilesFileSchema, raw, path);
    for (const [name, p] of Object.entries(executors)) {
      this.set({ name, command: p.command, inputMode: p.input_mode, env: p.env, extraArgs: p.extra_args });
    }
    log.debug(`Loaded ${Object.keys(executors).length} executor profile(s)`, { path });
  }
}
