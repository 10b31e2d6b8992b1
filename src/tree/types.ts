export type TreeLineKind = "root" | "directory" | "file";

export interface TreeLine {
  readonly depth: number;
  readonly name: string;
  readonly kind: TreeLineKind;
  /** Posix path relative to the repository root; empty for the root. */
  readonly relativePath: string;
}

export type TreeWarningReason =
  | "missing"
  | "not-a-file"
  | "outside-root"
  | "empty-selection";

export interface TreeWarning {
  readonly reason: TreeWarningReason;
  readonly path?: string;
  readonly message: string;
}

export interface TreeBuildResult {
  readonly rootPath: string;
  readonly lines: readonly TreeLine[];
  readonly warnings: readonly TreeWarning[];
  /** Selected files left out because an excluded directory cut their chain. */
  readonly pruned: readonly string[];
}

export interface TreeRenderOptions {
  readonly indent?: string;
  readonly connector?: string;
}
