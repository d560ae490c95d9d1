export type NodeConfig = Record<string, unknown>;

export type WorkflowNode = {
  readonly id: string;
  readonly dependencies: readonly string[];
  /** Artifact path, relative to the workflow's base directory. */
  readonly image: string;
  readonly instruction?: string;
  readonly config?: NodeConfig;
};

export type Workflow = {
  readonly name: string;
  readonly nodes: readonly WorkflowNode[];
  /** Directory artifact paths are resolved against. */
  readonly baseDir: string;
  readonly sourcePath?: string;
};
