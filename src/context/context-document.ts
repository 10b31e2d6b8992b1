import fs from "node:fs/promises";
import path from "node:path";
import type { ContextConfig, SectionSource } from "../config/types.js";
import { buildTree } from "../tree/tree-builder.js";
import { renderTree } from "../tree/tree-renderer.js";
import {
  listGlobalFiles,
  renderFileSection,
  renderHeader,
  renderTextSection,
  renderTreeSection,
} from "./sections.js";
import type {
  ContextOptions,
  ContextResult,
  WriteContextOptions,
  WrittenContext,
} from "./types.js";

/**
 * Assemble the context document: header, static sections, whitelist tree,
 * important file dumps, custom sections and global files, in that order.
 */
export async function generateContext(
  config: ContextConfig,
  options: ContextOptions = {},
): Promise<ContextResult> {
  const warnings: string[] = [];
  const tree = await buildTree(
    config.sourceDirectory,
    config.importantFiles,
    config.excludeDirs,
  );
  warnings.push(...tree.warnings.map((warning) => warning.message));

  const parts: string[] = [renderHeader(options.now ?? new Date())];
  parts.push(
    ...(await renderSections(config.staticDir, config.staticSections, warnings)),
  );
  parts.push(renderTreeSection(renderTree(tree.lines, options.tree)));

  const outsideRoot = new Set(
    tree.warnings
      .filter((warning) => warning.reason === "outside-root")
      .map((warning) => warning.path),
  );
  parts.push("## Important Files\n\n");
  for (const relativePath of config.importantFiles) {
    if (outsideRoot.has(relativePath)) {
      parts.push(
        `*File \`${relativePath}\` is outside the repository root – skipped.*\n\n`,
      );
      continue;
    }
    parts.push(await renderFileSection(tree.rootPath, relativePath));
  }

  parts.push(
    ...(await renderSections(config.staticDir, config.customSections, warnings)),
  );

  if (config.globalFilesDir) {
    const globalSections = (await listGlobalFiles(config.globalFilesDir)).map(
      (name) => ({ file: name, title: name }),
    );
    parts.push(
      ...(await renderSections(config.globalFilesDir, globalSections, warnings)),
    );
  }

  return { document: parts.join(""), warnings, tree };
}

export async function writeContext(
  config: ContextConfig,
  options: WriteContextOptions = {},
): Promise<WrittenContext> {
  const outputPath = path.resolve(options.outputFile ?? config.outputFile);
  const result = await generateContext(config, options);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, result.document, "utf8");
  return { ...result, outputPath };
}

async function renderSections(
  dirPath: string,
  sections: readonly SectionSource[],
  warnings: string[],
): Promise<string[]> {
  const rendered: string[] = [];
  for (const section of sections) {
    const filePath = path.join(dirPath, section.file);
    const text = await renderTextSection(filePath, section.title);
    if (text === null) {
      warnings.push(`Static file missing, skipped: ${filePath}`);
      continue;
    }
    rendered.push(text);
  }
  return rendered;
}
