import { z } from "zod";
import { ConfigError } from "./errors.js";

/** Render every zod issue as `path: message`, optionally under a source label. */
export function formatIssues(error: z.ZodError, source?: string): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    const where = [source, path].filter(Boolean).join(": ");
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

/** Parse with a schema, raising one ConfigError that lists every violation. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown, source?: string): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error, source));
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Workflow declaration
// ---------------------------------------------------------------------------

export const TASK_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const PromptDeclarationSchema = z
  .object({
    path: z.string().min(1, "path must not be empty"),
    after: z.array(z.string()).optional(),
    model: z.string().min(1).optional(),
  })
  .strict();

export const OnCompleteSchema = z
  .object({
    create_pr: z.boolean().optional(),
    merge_to: z.string().min(1).optional(),
    delete_worktree: z.boolean().optional(),
  })
  .strict()
  .refine((v) => !(v.create_pr === true && v.merge_to !== undefined), {
    message: "create_pr and merge_to are mutually exclusive",
  });

export const WorkflowDeclarationSchema = z
  .object({
    base: z.string().min(1).optional(),
    branch: z.string().min(1).optional(),
    on_complete: OnCompleteSchema.optional(),
    prompts: z
      .record(z.string().regex(TASK_ID_PATTERN, "task ids may only contain letters, digits, '.', '_' and '-'"), PromptDeclarationSchema)
      .refine((r) => Object.keys(r).length > 0, { message: "a workflow needs at least one prompt" }),
  })
  .strict();

export const WorkflowFileSchema = z
  .object({
    workflows: z
      .record(WorkflowDeclarationSchema)
      .refine((r) => Object.keys(r).length > 0, { message: "at least one workflow must be declared" }),
  })
  .strict();

export type PromptDeclaration = z.infer<typeof PromptDeclarationSchema>;
export type WorkflowDeclaration = z.infer<typeof WorkflowDeclarationSchema>;
export type WorkflowFile = z.infer<typeof WorkflowFileSchema>;

// ---------------------------------------------------------------------------
// Session status document
// ---------------------------------------------------------------------------

export const AgentStatusSchema = z.enum(["queued", "running", "complete", "failed", "cancelled"]);
export const SessionStatusSchema = z.enum(["running", "complete", "failed", "cancelled"]);

export const AgentRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: AgentStatusSchema,
  wave: z.number().int().nonnegative(),
  model: z.string(),
  prompt_path: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  duration_seconds: z.number().nullable(),
  exit_code: z.number().int().nullable(),
  pid: z.number().int().nullable(),
  error: z.string().nullable(),
  log_file: z.string(),
});

export const SummarySchema = z.object({
  total: z.number().int(),
  queued: z.number().int(),
  running: z.number().int(),
  complete: z.number().int(),
  failed: z.number().int(),
  cancelled: z.number().int(),
});

export const SessionDocumentSchema = z.object({
  schema_version: z.literal("1.0"),
  session_id: z.string(),
  source: z.string(),
  source_file: z.string(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
  status: SessionStatusSchema,
  agents: z.array(AgentRecordSchema),
  summary: SummarySchema,
  waves: z.array(z.object({ wave: z.number().int().nonnegative(), tasks: z.array(z.string()) })),
});

// ---------------------------------------------------------------------------
// Execution state document
// ---------------------------------------------------------------------------

export const ExecutionStatusSchema = z.enum([
  "created",
  "running",
  "complete",
  "process_error",
  "no_marker",
  "unknown_marker",
  "exhausted",
]);

export const IterationRecordSchema = z.object({
  iteration: z.number().int().positive(),
  ended_at: z.string(),
  exit_code: z.number().int(),
  marker_found: z.boolean(),
  retry_reason: z.string().optional(),
  marker: z.string().optional(),
  stage: z.number().int().nonnegative(),
  log_start: z.number().int().nonnegative(),
  log_end: z.number().int().nonnegative(),
});

export const ExecutionStateSchema = z.object({
  prompt_id: z.string(),
  model: z.string(),
  status: ExecutionStatusSchema,
  iteration: z.number().int().nonnegative(),
  max_iterations: z.number().int().positive(),
  log_path: z.string(),
  cwd: z.string(),
  started_at: z.string(),
  last_updated_at: z.string(),
  stages: z.array(z.string()).min(1),
  stage_index: z.number().int().nonnegative(),
  history: z.array(IterationRecordSchema),
  suggested_next_steps: z.array(z.string()),
});

// ---------------------------------------------------------------------------
// Executor profiles file
// ---------------------------------------------------------------------------

export const ExecutorProfileSchema = z
  .object({
    command: z.array(z.string().min(1)).min(1, "command needs at least the program name"),
    input_mode: z.enum(["stdin", "argument"]),
    env: z.record(z.string()).default({}),
    extra_args: z.array(z.string()).optional(),
  })
  .strict();

export const ExecutorProfilesFileSchema = z.object({ executors: z.record(ExecutorProfileSchema) }).strict();
