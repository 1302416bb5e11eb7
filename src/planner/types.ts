export type Task = {
  readonly id: string;
  /** Absolute path of the prompt file. */
  readonly path: string;
  readonly dependsOn: readonly string[];
  /** Executor identity, resolved through the executor registry. */
  readonly model: string;
};

/** Task id → ids it depends on. */
export type DependencyGraph = ReadonlyMap<string, ReadonlySet<string>>;

/** One batch of task ids, sorted by id, runnable concurrently. */
export type Wave = string[];

export type CompletionAction = {
  createPr: boolean;
  mergeTo?: string;
  deleteWorktree: boolean;
};

export type WorkflowSettings = {
  base?: string;
  branch?: string;
  onComplete?: CompletionAction;
};

export type WorkflowPlan = {
  id: string;
  /** Where the plan came from, e.g. "workflow" or "batch". */
  source: string;
  sourceFile: string;
  tasks: Task[];
  graph: DependencyGraph;
  waves: Wave[];
  settings: WorkflowSettings;
  /** True when no task declares a dependency; failures then never block siblings. */
  flat: boolean;
};
