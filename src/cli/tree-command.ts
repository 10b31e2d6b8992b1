import { loadConfig } from "../config/config-loader.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { buildTree } from "../tree/tree-builder.js";
import { renderTree } from "../tree/tree-renderer.js";

export interface TreeCommandOptions {
  readonly config?: string;
  readonly root?: string;
  readonly files?: readonly string[];
  readonly exclude?: readonly string[];
  readonly plain?: boolean;
  readonly logger?: Logger;
}

/**
 * Render the whitelist tree. Explicit root, files and patterns take the
 * place of the configured ones; the configuration is read only when the
 * root or the files are missing.
 */
export async function runTreeCommand(
  options: TreeCommandOptions,
): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const needsConfig =
    options.root === undefined || options.files === undefined;
  const config = needsConfig ? await loadConfig(options.config) : undefined;

  const root = options.root ?? config?.sourceDirectory ?? ".";
  const files = options.files ?? config?.importantFiles ?? [];
  const exclude = options.exclude ?? config?.excludeDirs ?? [];

  const result = await buildTree(root, files, exclude);
  for (const warning of result.warnings) {
    logger.warn(warning.message);
  }
  for (const pruned of result.pruned) {
    logger.debug(`Excluded directory hides selected file: ${pruned}`);
  }

  const lines = renderTree(
    result.lines,
    options.plain ? { connector: "" } : {},
  );
  return lines.join("\n");
}
