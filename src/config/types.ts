export interface SectionSource {
  /** File name, resolved against the static directory. */
  readonly file: string;
  readonly title: string;
}

export interface ContextConfig {
  readonly sourceDirectory: string;
  readonly importantFiles: readonly string[];
  readonly excludeDirs: readonly string[];
  readonly staticDir: string;
  readonly staticSections: readonly SectionSource[];
  readonly customSections: readonly SectionSource[];
  readonly globalFilesDir?: string;
  readonly outputFile: string;
}
