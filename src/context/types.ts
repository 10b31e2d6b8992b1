import type { TreeBuildResult, TreeRenderOptions } from "../tree/types.js";

export interface ContextOptions {
  readonly now?: Date;
  readonly tree?: TreeRenderOptions;
}

export interface WriteContextOptions extends ContextOptions {
  /** Overrides the configured output file. */
  readonly outputFile?: string;
}

export interface ContextResult {
  readonly document: string;
  readonly warnings: readonly string[];
  readonly tree: TreeBuildResult;
}

export interface WrittenContext extends ContextResult {
  readonly outputPath: string;
}
