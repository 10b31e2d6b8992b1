#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { createLogger, type Logger } from "../logging/logger.js";
import { runGenerateCommand } from "./generate-command.js";
import {
  runCloneCommand,
  runFilesCommand,
  runReposCommand,
} from "./repository-commands.js";
import { runTreeCommand } from "./tree-command.js";

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("repo-context")
  .description("Build a Markdown context document from selected repository files")
  .version(toolVersion)
  .option("--verbose", "Verbose output")
  .option("--quiet", "Suppress non-essential output");

program
  .command("generate")
  .description("Write the context document")
  .option("--config <path>", "Configuration file", "config.yaml")
  .option("--out <file>", "Write the document to this file")
  .option("--stdout", "Print the document instead of writing a file")
  .action(
    async (options: { config: string; out?: string; stdout?: boolean }) => {
      const logger = globalLogger();
      try {
        const result = await runGenerateCommand({
          config: options.config,
          out: options.out,
          stdout: Boolean(options.stdout),
          logger,
        });
        if (options.stdout) {
          await writeStdout(result.document);
        }
      } catch (error) {
        reportError(logger, error);
      }
    },
  );

program
  .command("tree")
  .description("Print the whitelist directory tree")
  .option("--config <path>", "Configuration file", "config.yaml")
  .option("--root <dir>", "Repository root")
  .option("--file <path...>", "Selected files, relative to the root")
  .option("--exclude <pattern...>", "Directory exclusion patterns")
  .option("--plain", "Indent only, without connector glyphs")
  .action(
    async (options: {
      config: string;
      root?: string;
      file?: string[];
      exclude?: string[];
      plain?: boolean;
    }) => {
      const logger = globalLogger();
      try {
        const output = await runTreeCommand({
          config: options.config,
          root: options.root,
          files: options.file,
          exclude: options.exclude,
          plain: Boolean(options.plain),
          logger,
        });
        await writeStdout(output + "\n");
      } catch (error) {
        reportError(logger, error);
      }
    },
  );

program
  .command("clone")
  .description("Clone a repository into the repositories directory")
  .argument("<url>", "Repository URL")
  .argument("<name>", "Directory name for the clone")
  .option("--repos-dir <dir>", "Repositories directory", "repositories")
  .action(async (url: string, name: string, options: { reposDir: string }) => {
    const logger = globalLogger();
    try {
      await runCloneCommand({ url, name, reposDir: options.reposDir, logger });
    } catch (error) {
      reportError(logger, error);
    }
  });

program
  .command("repos")
  .description("List cloned repositories")
  .option("--repos-dir <dir>", "Repositories directory", "repositories")
  .action(async (options: { reposDir: string }) => {
    const logger = globalLogger();
    try {
      const output = await runReposCommand(options.reposDir);
      if (output) {
        await writeStdout(output + "\n");
      }
    } catch (error) {
      reportError(logger, error);
    }
  });

program
  .command("files")
  .description("List directories and files of a repository")
  .argument("<repo>", "Repository path")
  .action(async (repo: string) => {
    const logger = globalLogger();
    try {
      const output = await runFilesCommand(repo);
      if (output) {
        await writeStdout(output + "\n");
      }
    } catch (error) {
      reportError(logger, error);
    }
  });

function globalLogger(): Logger {
  const options = program.opts<GlobalOptions>();
  return createLogger({
    verbose: Boolean(options.verbose),
    quiet: Boolean(options.quiet),
  });
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

function reportError(logger: Logger, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(message);
  process.exitCode = 1;
}

await program.parseAsync(process.argv);
