import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_STATIC_SECTIONS } from "../../src/config/config-validator.js";
import type { ContextConfig } from "../../src/config/types.js";
import {
  generateContext,
  writeContext,
} from "../../src/context/context-document.js";
import { classifyFile } from "../../src/ingest/file-classifier.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-context-doc-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("context document", () => {
  it("assembles every section in order", async () => {
    const config = await setupProject();

    const result = await generateContext(config, {
      now: new Date(2024, 2, 5),
    });

    expect(result.document).toBe(
      [
        "# Repository Context\n\n",
        "Generated on: 2024-03-05\n\n",
        "## Overview\n\nOverview text\n\n",
        "## To-Do List\n\n- item\n\n",
        "## Directory Tree (Whitelist Only)\n\n",
        "```\n.\n    ├── src/\n        ├── logo.png\n        ├── main.py\n```\n\n",
        "## Important Files\n\n",
        "## src/main.py\n```python\nprint('hi')\n\n```\n\n",
        "## src/logo.png\n```\n*Binary file (.png) cannot be displayed.*\n\n```\n\n",
        "*File `missing.md` not found – skipped.*\n\n",
        "## Notes\n\nnote body\n\n",
        "## g.txt\n\nglobal\n\n",
      ].join(""),
    );
    expect(result.warnings).toEqual([
      "Selected file missing on disk, skipped: missing.md",
      `Static file missing, skipped: ${path.join(config.staticDir, "important_info.txt")}`,
    ]);
  });

  it("renders the tree with custom render options", async () => {
    const config = await setupProject();

    const result = await generateContext(
      { ...config, importantFiles: ["src/main.py"] },
      { now: new Date(2024, 0, 1), tree: { connector: "" } },
    );

    expect(result.document).toContain(
      "```\n.\n    src/\n        main.py\n```\n\n",
    );
  });

  it("writes read errors inline", async () => {
    const config = await setupProject();

    const result = await generateContext({
      ...config,
      importantFiles: ["src"],
    });

    expect(result.document).toContain("## src\n```\n*Error reading file: ");
    expect(result.tree.warnings.map((warning) => warning.reason)).toEqual([
      "not-a-file",
      "empty-selection",
    ]);
  });

  it("skips files outside the repository root without dumping them", async () => {
    const config = await setupProject();
    await writeText(path.join(tempDir, "secret.txt"), "TOP SECRET\n");

    const result = await generateContext({
      ...config,
      importantFiles: ["src/main.py", "../secret.txt"],
    });

    expect(result.document).not.toContain("TOP SECRET");
    expect(result.document).toContain(
      "## Important Files\n\n" +
        "## src/main.py\n```python\nprint('hi')\n\n```\n\n" +
        "*File `../secret.txt` is outside the repository root – skipped.*\n\n",
    );
    expect(result.warnings).toContain(
      "Selected file is outside the repository root, skipped: ../secret.txt",
    );
  });

  it("orders global files by code unit", async () => {
    const config = await setupProject();
    await writeText(path.join(tempDir, "global", "B.txt"), "upper");
    await writeText(path.join(tempDir, "global", "a.txt"), "lower");

    const result = await generateContext(config);

    expect(
      result.document.endsWith(
        "## B.txt\n\nupper\n\n## a.txt\n\nlower\n\n## g.txt\n\nglobal\n\n",
      ),
    ).toBe(true);
  });

  it("writes the document to the output file", async () => {
    const config = await setupProject();
    const outputFile = path.join(tempDir, "out", "nested", "context.md");

    const written = await writeContext(config, {
      now: new Date(2024, 2, 5),
      outputFile,
    });
    const contents = await fs.readFile(outputFile, "utf8");

    expect(written.outputPath).toBe(outputFile);
    expect(contents).toBe(written.document);
  });
});

describe("classifyFile", () => {
  it("maps extensions to fence languages", () => {
    expect(classifyFile("src/app.py").language).toBe("python");
    expect(classifyFile("notes.txt").language).toBe("");
    expect(classifyFile("config/.env")).toEqual({
      extension: ".env",
      language: "bash",
      binary: false,
    });
  });

  it("flags binary extensions case-insensitively", () => {
    expect(classifyFile("assets/Logo.PNG")).toEqual({
      extension: ".png",
      language: "",
      binary: true,
    });
  });
});

async function setupProject(): Promise<ContextConfig> {
  const repoDir = path.join(tempDir, "repo");
  const staticDir = path.join(tempDir, "static");
  const globalDir = path.join(tempDir, "global");

  await writeText(path.join(repoDir, "src", "main.py"), "print('hi')\n");
  await writeText(path.join(repoDir, "src", "logo.png"), "not really a png");
  await writeText(path.join(staticDir, "overview.txt"), "Overview text");
  await writeText(path.join(staticDir, "to-do_list.txt"), "- item");
  await writeText(path.join(staticDir, "notes.txt"), "note body");
  await writeText(path.join(globalDir, "g.txt"), "global");

  return {
    sourceDirectory: repoDir,
    importantFiles: ["src/main.py", "src/logo.png", "missing.md"],
    excludeDirs: [],
    staticDir,
    staticSections: DEFAULT_STATIC_SECTIONS,
    customSections: [{ file: "notes.txt", title: "Notes" }],
    globalFilesDir: globalDir,
    outputFile: path.join(tempDir, "repo-context.txt"),
  };
}

async function writeText(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}
