export interface FileKind {
  readonly extension: string;
  /** Fence language for Markdown code blocks; empty for plain text. */
  readonly language: string;
  readonly binary: boolean;
}

export interface CloneOptions {
  readonly url: string;
  readonly name: string;
  readonly reposDir: string;
}

export interface CloneResult {
  readonly status: "cloned" | "exists";
  readonly path: string;
}
