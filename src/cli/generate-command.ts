import { loadConfig } from "../config/config-loader.js";
import { generateContext, writeContext } from "../context/context-document.js";
import type { ContextResult, WrittenContext } from "../context/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export interface GenerateOptions {
  readonly config?: string;
  readonly out?: string;
  readonly stdout?: boolean;
  readonly now?: Date;
  readonly logger?: Logger;
}

export interface GenerateResult {
  readonly document: string;
  readonly outputPath?: string;
}

export async function runGenerateCommand(
  options: GenerateOptions,
): Promise<GenerateResult> {
  const logger = options.logger ?? silentLogger;
  const config = await loadConfig(options.config);
  logger.debug(`Loaded configuration for ${config.sourceDirectory}`);

  const result:
    | WrittenContext
    | (ContextResult & { readonly outputPath?: undefined }) = options.stdout
    ? await generateContext(config, { now: options.now })
    : await writeContext(config, { now: options.now, outputFile: options.out });

  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  for (const pruned of result.tree.pruned) {
    logger.debug(`Excluded directory hides selected file: ${pruned}`);
  }

  if ("outputPath" in result) {
    logger.info(`Context file created: ${result.outputPath}`);
    return { document: result.document, outputPath: result.outputPath };
  }
  return { document: result.document };
}
