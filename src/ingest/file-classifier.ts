import path from "node:path";
import type { FileKind } from "./types.js";

const LANGUAGES = new Map<string, string>([
  [".py", "python"],
  [".json", "json"],
  [".env", "bash"],
  [".sh", "bash"],
  [".js", "javascript"],
  [".cjs", "javascript"],
  [".mjs", "javascript"],
  [".ts", "typescript"],
  [".tsx", "tsx"],
  [".html", "html"],
  [".css", "css"],
  [".csv", "csv"],
  [".md", "markdown"],
  [".yml", "yaml"],
  [".yaml", "yaml"],
  [".xml", "xml"],
  [".txt", ""],
]);

const BINARY_EXTENSIONS = new Set([
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".svg",
  ".ico",
  ".db",
  ".exe",
  ".bin",
]);

export function classifyFile(relativePath: string): FileKind {
  const normalized = relativePath.split(path.sep).join(path.posix.sep);
  const basename = path.posix.basename(normalized).toLowerCase();
  // ".env" has no extension of its own as far as extname is concerned
  const extension = basename.startsWith(".") && !basename.slice(1).includes(".")
    ? basename
    : path.posix.extname(basename);

  return {
    extension,
    language: LANGUAGES.get(extension) ?? "",
    binary: BINARY_EXTENSIONS.has(extension),
  };
}
