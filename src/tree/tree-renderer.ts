import type { TreeLine, TreeRenderOptions } from "./types.js";

export const DEFAULT_INDENT = "    ";
export const DEFAULT_CONNECTOR = "├── ";

export function renderTree(
  lines: readonly TreeLine[],
  options: TreeRenderOptions = {},
): string[] {
  const indent = options.indent ?? DEFAULT_INDENT;
  const connector = options.connector ?? DEFAULT_CONNECTOR;
  return lines.map((line) => {
    if (line.kind === "root") {
      return ".";
    }
    const suffix = line.kind === "directory" ? "/" : "";
    return `${indent.repeat(line.depth)}${connector}${line.name}${suffix}`;
  });
}
