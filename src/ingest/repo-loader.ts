import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { simpleGit } from "simple-git";
import { isNotFoundError } from "../errors.js";
import type { CloneOptions, CloneResult } from "./types.js";

export const DEFAULT_REPOS_DIR = "repositories";

export async function cloneRepository(
  options: CloneOptions,
): Promise<CloneResult> {
  const name = options.name.trim();
  if (!options.url.trim() || !name) {
    throw new Error("Provide both a repository URL and a repository name.");
  }
  if (name !== path.basename(name) || name === "." || name === "..") {
    throw new Error(
      `Repository name must be a single directory name: ${options.name}`,
    );
  }

  const reposDir = path.resolve(options.reposDir);
  const targetPath = path.join(reposDir, name);
  if (await pathExists(targetPath)) {
    return { status: "exists", path: targetPath };
  }

  await fs.mkdir(reposDir, { recursive: true });
  await simpleGit().clone(options.url, targetPath);
  return { status: "cloned", path: targetPath };
}

export async function listRepositories(reposDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(path.resolve(reposDir), { withFileTypes: true });
  } catch (error) {
    if (isNotFoundError(error)) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * List every directory (with a trailing slash) and file below the root as
 * posix paths relative to it. `.git` is skipped and symlinks are not
 * followed.
 */
export async function listRepositoryFiles(repoPath: string): Promise<string[]> {
  const rootPath = path.resolve(repoPath);
  const stats = await fs.stat(rootPath).catch((error: unknown) => {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  });
  if (!stats?.isDirectory()) {
    throw new Error(
      `Repository path must be an existing directory: ${rootPath}`,
    );
  }

  const results: string[] = [];
  await walkDirectory(rootPath, "", results);
  return results.sort();
}

async function walkDirectory(
  currentPath: string,
  relativeDir: string,
  results: string[],
): Promise<void> {
  const entries = await fs.readdir(currentPath, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name === ".git") {
      continue;
    }
    const relativePath = relativeDir
      ? `${relativeDir}/${entry.name}`
      : entry.name;
    if (entry.isDirectory()) {
      results.push(`${relativePath}/`);
      await walkDirectory(
        path.join(currentPath, entry.name),
        relativePath,
        results,
      );
    } else if (entry.isFile()) {
      results.push(relativePath);
    }
  }
}

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}
