/** How the prompt reaches the external program. */
export type InputMode = "stdin" | "argument";

/** How to invoke one executor identity (the `model` a task declares). */
export interface ExecutorProfile {
  name: string;
  /** Program followed by its fixed leading arguments. */
  command: string[];
  inputMode: InputMode;
  /** Merged over the parent environment. */
  env: Record<string, string>;
  /** Appended after `command`, before the prompt in argument mode. */
  extraArgs?: string[];
  description?: string;
}

/** A concrete process invocation for one prompt. */
export type Invocation = {
  program: string;
  args: string[];
  /** Written to the child's stdin, then stdin is closed. */
  stdin?: string;
  env: Record<string, string>;
};

export function buildInvocation(profile: ExecutorProfile, prompt: string): Invocation {
  const [program, ...leading] = profile.command;
  const args = [...leading, ...(profile.extraArgs ?? [])];
  if (profile.inputMode === "argument") {
    return { program, args: [...args, prompt], env: { ...profile.env } };
  }
  return { program, args, stdin: prompt, env: { ...profile.env } };
}

/** Short form for debug logs. The prompt itself is never included. */
export function describeInvocation(inv: Invocation): string {
  if (inv.stdin !== undefined) return `${[inv.program, ...inv.args].join(" ")} < prompt`;
  return `${[inv.program, ...inv.args.slice(0, -1)].join(" ")} <prompt>`;
}

export function builtinProfiles(): ExecutorProfile[] {
  return [
    { name: "codex", command: ["codex", "exec", "--full-auto", "-"], inputMode: "stdin", env: {} },
    { name: "gemini", command: ["gemini", "-y", "-p"], inputMode: "argument", env: {} },
    { name: "zai", command: ["zai", "-p"], inputMode: "argument", env: {} },
    { name: "opencode", command: ["opencode", "run"], inputMode: "argument", env: {} },
    { name: "opencode-zai", command: ["opencode", "--model", "zai/glm-4.7", "run"], inputMode: "argument", env: {} },
    {
      name: "opencode-codex",
      command: ["opencode", "--model", "openai/gpt-5.2-codex", "run"],
      inputMode: "argument",
      env: {},
    },
    {
      name: "claude-zai",
      command: ["claude", "-p"],
      inputMode: "argument",
      // The auth token is expected in the caller's own environment.
      env: { ANTHROPIC_BASE_URL: "https://api.z.ai/api/anthropic" },
      extraArgs: ["--dangerously-skip-permissions"],
    },
  ];
}
