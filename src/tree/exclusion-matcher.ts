import path from "node:path";

export interface ExclusionPattern {
  readonly raw: string;
  readonly anchored: boolean;
  readonly pattern: string;
  readonly regex: RegExp | null;
}

export function parseExclusionPattern(raw: string): ExclusionPattern {
  const trimmed = raw.trim();
  const anchored = trimmed.startsWith("/");
  let pattern = anchored ? trimmed.slice(1) : trimmed;
  while (pattern.endsWith("/")) {
    pattern = pattern.slice(0, -1);
  }

  return {
    raw: trimmed,
    anchored,
    pattern,
    regex: buildPatternRegex(pattern, anchored),
  };
}

/**
 * A directory is excluded when its root-relative path matches the glob, or
 * when the pattern text, as written, occurs in the directory's own name.
 */
export function isExcludedDirectory(
  relativeDir: string,
  patterns: readonly ExclusionPattern[],
): boolean {
  const normalized = relativeDir.split(path.sep).join(path.posix.sep);
  const name = path.posix.basename(normalized);
  for (const pattern of patterns) {
    if (!pattern.raw) {
      continue;
    }
    if (pattern.regex?.test(normalized)) {
      return true;
    }
    if (name.includes(pattern.raw)) {
      return true;
    }
  }
  return false;
}

function buildPatternRegex(pattern: string, anchored: boolean): RegExp | null {
  if (!pattern) {
    return null;
  }

  const source = globToRegexSource(pattern);
  const prefix = anchored ? "^" : "(?:^|.*/)";
  return new RegExp(`${prefix}${source}$`);
}

function globToRegexSource(pattern: string): string {
  let regex = "";
  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    if (!char) {
      continue;
    }
    if (char === "*") {
      if (pattern[i + 1] === "*") {
        regex += ".*";
        i += 1;
      } else {
        regex += "[^/]*";
      }
      continue;
    }

    if (char === "?") {
      regex += "[^/]";
      continue;
    }

    regex += escapeRegex(char);
  }
  return regex;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
