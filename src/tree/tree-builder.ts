import fs from "node:fs/promises";
import path from "node:path";
import { ConfigurationError } from "../errors.js";
import {
  isExcludedDirectory,
  parseExclusionPattern,
  type ExclusionPattern,
} from "./exclusion-matcher.js";
import type { TreeBuildResult, TreeLine, TreeWarning } from "./types.js";

interface TreeEntry {
  readonly absolutePath: string;
  readonly name: string;
  readonly kind: "directory" | "file";
}

/**
 * Build the whitelist tree: the selected files plus the directories needed
 * to reach them from the root.
 *
 * Climbing from a file stops at the first ancestor matching an exclusion
 * pattern. That ancestor is not kept, but the nearer ones collected before
 * it are, so files below an excluded directory end up unreachable and are
 * reported in `pruned` instead of `lines`.
 */
export async function buildTree(
  repoRoot: string,
  selectedFiles: readonly string[],
  exclusionPatterns: readonly string[] = [],
): Promise<TreeBuildResult> {
  const rootPath = await resolveRoot(repoRoot);
  const warnings: TreeWarning[] = [];
  const files = await resolveSelectedFiles(rootPath, selectedFiles, warnings);
  const rootLine: TreeLine = {
    depth: 0,
    name: ".",
    kind: "root",
    relativePath: "",
  };

  if (files.size === 0) {
    warnings.push({
      reason: "empty-selection",
      message: "No valid selected files; directory tree is empty.",
    });
    return { rootPath, lines: [rootLine], warnings, pruned: [] };
  }

  const patterns = exclusionPatterns.map(parseExclusionPattern);
  const keptDirs = collectKeptDirectories(rootPath, files, patterns);
  const children = buildChildren(rootPath, keptDirs, files);

  const lines: TreeLine[] = [rootLine];
  const emitted = new Set<string>();
  const visit = (dirPath: string, depth: number): void => {
    for (const entry of children.get(dirPath) ?? []) {
      lines.push({
        depth,
        name: entry.name,
        kind: entry.kind,
        relativePath: toRelativePosix(rootPath, entry.absolutePath),
      });
      if (entry.kind === "directory") {
        visit(entry.absolutePath, depth + 1);
      } else {
        emitted.add(entry.absolutePath);
      }
    }
  };
  visit(rootPath, 1);

  const pruned = Array.from(files)
    .filter((filePath) => !emitted.has(filePath))
    .map((filePath) => toRelativePosix(rootPath, filePath))
    .sort();

  return { rootPath, lines, warnings, pruned };
}

async function resolveRoot(repoRoot: string): Promise<string> {
  let realRoot: string;
  try {
    realRoot = await fs.realpath(path.resolve(repoRoot));
  } catch {
    throw new ConfigurationError(
      `Repository root does not exist: ${path.resolve(repoRoot)}`,
    );
  }

  const stats = await fs.stat(realRoot);
  if (!stats.isDirectory()) {
    throw new ConfigurationError(
      `Repository root must be a directory: ${realRoot}`,
    );
  }
  return realRoot;
}

async function resolveSelectedFiles(
  rootPath: string,
  selectedFiles: readonly string[],
  warnings: TreeWarning[],
): Promise<Set<string>> {
  const files = new Set<string>();
  for (const selected of selectedFiles) {
    const candidate = path.resolve(rootPath, selected);
    let realPath: string;
    try {
      realPath = await fs.realpath(candidate);
    } catch {
      warnings.push({
        reason: "missing",
        path: selected,
        message: `Selected file missing on disk, skipped: ${selected}`,
      });
      continue;
    }

    if (!isWithinRoot(rootPath, realPath)) {
      warnings.push({
        reason: "outside-root",
        path: selected,
        message: `Selected file is outside the repository root, skipped: ${selected}`,
      });
      continue;
    }

    const stats = await fs.stat(realPath);
    if (!stats.isFile()) {
      warnings.push({
        reason: "not-a-file",
        path: selected,
        message: `Selected path is not a regular file, skipped: ${selected}`,
      });
      continue;
    }

    files.add(realPath);
  }
  return files;
}

function collectKeptDirectories(
  rootPath: string,
  files: ReadonlySet<string>,
  patterns: readonly ExclusionPattern[],
): Set<string> {
  const keptDirs = new Set<string>([rootPath]);
  for (const filePath of files) {
    let current = path.dirname(filePath);
    while (current !== rootPath && path.dirname(current) !== current) {
      if (isExcludedDirectory(path.relative(rootPath, current), patterns)) {
        break;
      }
      keptDirs.add(current);
      current = path.dirname(current);
    }
  }
  return keptDirs;
}

function buildChildren(
  rootPath: string,
  keptDirs: ReadonlySet<string>,
  files: ReadonlySet<string>,
): Map<string, TreeEntry[]> {
  const children = new Map<string, TreeEntry[]>();
  const add = (entry: TreeEntry): void => {
    const parent = path.dirname(entry.absolutePath);
    const siblings = children.get(parent);
    if (siblings) {
      siblings.push(entry);
    } else {
      children.set(parent, [entry]);
    }
  };

  for (const dirPath of keptDirs) {
    if (dirPath === rootPath) {
      continue;
    }
    add({
      absolutePath: dirPath,
      name: path.basename(dirPath),
      kind: "directory",
    });
  }
  for (const filePath of files) {
    add({ absolutePath: filePath, name: path.basename(filePath), kind: "file" });
  }

  for (const siblings of children.values()) {
    siblings.sort(compareEntries);
  }
  return children;
}

function compareEntries(a: TreeEntry, b: TreeEntry): number {
  if (a.kind !== b.kind) {
    return a.kind === "directory" ? -1 : 1;
  }
  const lowerA = a.name.toLowerCase();
  const lowerB = b.name.toLowerCase();
  if (lowerA !== lowerB) {
    return lowerA < lowerB ? -1 : 1;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  if (relative === ".." || relative.startsWith(`..${path.sep}`)) {
    return false;
  }
  return !path.isAbsolute(relative);
}
