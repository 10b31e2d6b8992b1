import fs from "node:fs/promises";
import path from "node:path";
import { isNotFoundError } from "../errors.js";
import { classifyFile } from "../ingest/file-classifier.js";

export function renderHeader(now: Date): string {
  return `# Repository Context\n\nGenerated on: ${formatDate(now)}\n\n`;
}

/**
 * Render a boilerplate section from a text file, or null when the file is
 * missing so the caller can report it.
 */
export async function renderTextSection(
  filePath: string,
  title: string,
): Promise<string | null> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
  return `## ${title}\n\n${contents}\n\n`;
}

export function renderTreeSection(treeLines: readonly string[]): string {
  const body = treeLines.map((line) => `${line}\n`).join("");
  return `## Directory Tree (Whitelist Only)\n\n\`\`\`\n${body}\`\`\`\n\n`;
}

export async function renderFileSection(
  rootPath: string,
  relativePath: string,
): Promise<string> {
  const absolutePath = path.resolve(rootPath, relativePath);
  if (!(await pathExists(absolutePath))) {
    return `*File \`${relativePath}\` not found – skipped.*\n\n`;
  }

  const kind = classifyFile(relativePath);
  const fence = kind.language ? `\`\`\`${kind.language}\n` : "```\n";
  let body: string;
  if (kind.binary) {
    body = `*Binary file (${kind.extension}) cannot be displayed.*\n`;
  } else {
    try {
      body = await fs.readFile(absolutePath, "utf8");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      body = `*Error reading file: ${message}*\n`;
    }
  }
  return `## ${relativePath}\n${fence}${body}\n\`\`\`\n\n`;
}

export async function listGlobalFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isNotFoundError(error)) {
      return [];
    }
    throw error;
  }
}

function formatDate(date: Date): string {
  const year = String(date.getFullYear());
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}
