import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "../errors.js";
import type { ContextConfig, SectionSource } from "./types.js";

export const DEFAULT_OUTPUT_FILE = "repo-context.txt";
export const DEFAULT_SOURCE_DIRECTORY = "src";
export const DEFAULT_STATIC_DIR = "static_files";
export const DEFAULT_STATIC_SECTIONS: readonly SectionSource[] = [
  { file: "overview.txt", title: "Overview" },
  { file: "important_info.txt", title: "Important Information" },
  { file: "to-do_list.txt", title: "To-Do List" },
];

const CONFIG_KEYS = new Set([
  "source_directory",
  "important_files",
  "exclude_dirs",
  "static_dir",
  "static_sections",
  "custom_sections",
  "global_files_dir",
  "output_file",
]);
const SECTION_KEYS = new Set(["file", "section_title"]);

/**
 * Validate a parsed configuration document and resolve its paths against
 * `baseDir`. Every problem is collected before throwing.
 */
export function validateConfig(input: unknown, baseDir: string): ContextConfig {
  const errors: string[] = [];
  const config = parseConfig(input ?? {}, baseDir, errors);
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${errors.join("; ")}`);
  }
  return config;
}

function parseConfig(
  input: unknown,
  baseDir: string,
  errors: string[],
): ContextConfig {
  const record = isRecord(input) ? input : {};
  if (!isRecord(input)) {
    errors.push("configuration must be a mapping");
  }
  assertNoExtraKeys(record, CONFIG_KEYS, "configuration", errors);

  const sourceDirectory = parseString(
    record.source_directory,
    "source_directory",
    DEFAULT_SOURCE_DIRECTORY,
    errors,
  );
  const staticDir = parseString(
    record.static_dir,
    "static_dir",
    DEFAULT_STATIC_DIR,
    errors,
  );
  const outputFile = parseString(
    record.output_file,
    "output_file",
    DEFAULT_OUTPUT_FILE,
    errors,
  );
  const globalFilesDir =
    record.global_files_dir === undefined || record.global_files_dir === null
      ? undefined
      : parseString(record.global_files_dir, "global_files_dir", "", errors);

  return {
    sourceDirectory: resolvePath(baseDir, expandHome(sourceDirectory)),
    importantFiles: parseStringList(
      record.important_files,
      "important_files",
      errors,
    ),
    excludeDirs: parseStringList(record.exclude_dirs, "exclude_dirs", errors),
    staticDir: resolvePath(baseDir, staticDir),
    staticSections:
      record.static_sections === undefined
        ? DEFAULT_STATIC_SECTIONS
        : parseSections(record.static_sections, "static_sections", errors),
    customSections: parseSections(
      record.custom_sections,
      "custom_sections",
      errors,
    ),
    globalFilesDir: globalFilesDir
      ? resolvePath(baseDir, globalFilesDir)
      : undefined,
    outputFile: resolvePath(baseDir, outputFile),
  };
}

function parseString(
  value: unknown,
  field: string,
  fallback: string,
  errors: string[],
): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    errors.push(`${field} must be a non-empty string`);
    return fallback;
  }
  return value;
}

function parseStringList(
  value: unknown,
  field: string,
  errors: string[],
): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    errors.push(`${field} must be a list of strings`);
    return [];
  }
  const items: string[] = [];
  value.forEach((item: unknown, index) => {
    if (typeof item !== "string") {
      errors.push(`${field}[${index}] must be a string`);
      return;
    }
    items.push(item);
  });
  return items;
}

function parseSections(
  value: unknown,
  field: string,
  errors: string[],
): SectionSource[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    errors.push(`${field} must be a list`);
    return [];
  }

  const sections: SectionSource[] = [];
  value.forEach((item: unknown, index) => {
    const label = `${field}[${index}]`;
    if (!isRecord(item)) {
      errors.push(`${label} must be a mapping`);
      return;
    }
    assertNoExtraKeys(item, SECTION_KEYS, label, errors);
    if (typeof item.file !== "string" || item.file.trim().length === 0) {
      errors.push(`${label}.file must be a non-empty string`);
      return;
    }
    const title = item.section_title ?? "Custom Section";
    if (typeof title !== "string") {
      errors.push(`${label}.section_title must be a string`);
      return;
    }
    sections.push({ file: item.file, title });
  });
  return sections;
}

function expandHome(value: string): string {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

function resolvePath(baseDir: string, value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(baseDir, value);
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  label: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${label} has unknown key '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
