import {
  DEFAULT_REPOS_DIR,
  cloneRepository,
  listRepositories,
  listRepositoryFiles,
} from "../ingest/repo-loader.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export interface CloneCommandOptions {
  readonly url: string;
  readonly name: string;
  readonly reposDir?: string;
  readonly logger?: Logger;
}

export async function runCloneCommand(
  options: CloneCommandOptions,
): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const result = await cloneRepository({
    url: options.url,
    name: options.name,
    reposDir: options.reposDir ?? DEFAULT_REPOS_DIR,
  });
  if (result.status === "exists") {
    logger.warn(`Repository already cloned: ${result.path}`);
  } else {
    logger.info(`Repository cloned: ${result.path}`);
  }
  return result.path;
}

export async function runReposCommand(reposDir?: string): Promise<string> {
  const names = await listRepositories(reposDir ?? DEFAULT_REPOS_DIR);
  return names.join("\n");
}

export async function runFilesCommand(repoPath: string): Promise<string> {
  const files = await listRepositoryFiles(repoPath);
  return files.join("\n");
}
