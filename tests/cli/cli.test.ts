import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runGenerateCommand } from "../../src/cli/generate-command.js";
import {
  runFilesCommand,
  runReposCommand,
} from "../../src/cli/repository-commands.js";
import { runTreeCommand } from "../../src/cli/tree-command.js";
import { createLogger } from "../../src/logging/logger.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "repo-context-cli-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("cli commands", () => {
  it("generates the context file from a configuration", async () => {
    const configPath = await writeProject();
    const logged: string[] = [];

    const result = await runGenerateCommand({
      config: configPath,
      now: new Date(2024, 5, 1),
      logger: createLogger({ write: (line) => logged.push(line) }),
    });

    const outputPath = path.join(tempDir, "repo-context.txt");
    expect(result.outputPath).toBe(outputPath);
    expect(await fs.readFile(outputPath, "utf8")).toBe(result.document);
    expect(result.document).toContain("Generated on: 2024-06-01\n\n");
    expect(result.document).toContain(
      "```\n.\n    ├── lib/\n        ├── util.ts\n```\n\n",
    );
    expect(logged).toContain(
      "[WARN] Selected file missing on disk, skipped: gone.ts\n",
    );
    expect(logged).toContain(`[INFO] Context file created: ${outputPath}\n`);
  });

  it("returns the document without writing when printing to stdout", async () => {
    const configPath = await writeProject();

    const result = await runGenerateCommand({ config: configPath, stdout: true });

    expect(result.outputPath).toBeUndefined();
    await expect(
      fs.access(path.join(tempDir, "repo-context.txt")),
    ).rejects.toThrow();
  });

  it("prints the configured tree", async () => {
    const configPath = await writeProject();

    const output = await runTreeCommand({ config: configPath, plain: true });

    expect(output).toBe(".\n    lib/\n        util.ts");
  });

  it("prints a tree from explicit arguments without a configuration", async () => {
    const repoDir = path.join(tempDir, "project");
    await writeText(path.join(repoDir, "a", "b.txt"), "b\n");

    const output = await runTreeCommand({
      config: path.join(tempDir, "absent.yaml"),
      root: repoDir,
      files: ["a/b.txt"],
      exclude: [],
    });

    expect(output).toBe(".\n    ├── a/\n        ├── b.txt");
  });

  it("needs no configuration when only the exclusions are omitted", async () => {
    const repoDir = path.join(tempDir, "project");
    await writeText(path.join(repoDir, "a", "b.txt"), "b\n");

    const output = await runTreeCommand({
      config: path.join(tempDir, "absent.yaml"),
      root: repoDir,
      files: ["a/b.txt"],
      plain: true,
    });

    expect(output).toBe(".\n    a/\n        b.txt");
  });

  it("logs pruned files only when verbose", async () => {
    const repoDir = path.join(tempDir, "project");
    await writeText(path.join(repoDir, "cache", "x.txt"), "x\n");
    const quiet: string[] = [];
    const verbose: string[] = [];

    await runTreeCommand({
      root: repoDir,
      files: ["cache/x.txt"],
      exclude: ["cache"],
      logger: createLogger({ write: (line) => quiet.push(line) }),
    });
    await runTreeCommand({
      root: repoDir,
      files: ["cache/x.txt"],
      exclude: ["cache"],
      logger: createLogger({
        verbose: true,
        write: (line) => verbose.push(line),
      }),
    });

    expect(quiet).toEqual([]);
    expect(verbose).toEqual([
      "[DEBUG] Excluded directory hides selected file: cache/x.txt\n",
    ]);
  });

  it("lists repositories and their files", async () => {
    const reposDir = path.join(tempDir, "repositories");
    await writeText(path.join(reposDir, "demo", "main.ts"), "export {}\n");

    expect(await runReposCommand(reposDir)).toBe("demo");
    expect(await runFilesCommand(path.join(reposDir, "demo"))).toBe("main.ts");
  });
});

describe("logger", () => {
  it("keeps only warnings and errors when quiet", () => {
    const lines: string[] = [];
    const logger = createLogger({ quiet: true, write: (line) => lines.push(line) });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines).toEqual(["[WARN] w\n", "[ERROR] e\n"]);
  });
});

async function writeProject(): Promise<string> {
  const repoDir = path.join(tempDir, "project");
  await writeText(path.join(repoDir, "lib", "util.ts"), "export const x = 1;\n");
  const configPath = path.join(tempDir, "config.yaml");
  await writeText(
    configPath,
    [
      "source_directory: project",
      "important_files:",
      "  - lib/util.ts",
      "  - gone.ts",
      "static_sections: []",
      "",
    ].join("\n"),
  );
  return configPath;
}

async function writeText(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}
