const LINE_PATTERN = /[^\r\n]*(?:\r\n|\n|\r)|[^\r\n]+$/g;

/** Splits text into lines, each keeping its own line ending. */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(LINE_PATTERN) ?? [];
}

/**
 * Returns the parameter name of an INI line, or null for blank lines,
 * comments (`#`, `;`) and section headers. A line without `=` is treated as
 * a bare parameter name.
 */
export function parseIniLine(line: string): string | null {
  const stripped = line.trim();
  if (!stripped || stripped.startsWith("#") || stripped.startsWith(";") || stripped.startsWith("[")) {
    return null;
  }
  const separator = stripped.indexOf("=");
  if (separator === -1) {
    return stripped;
  }
  return stripped.slice(0, separator).trim();
}

export function parseSectionName(line: string): string | null {
  const stripped = line.trim();
  if (stripped.length < 2 || !stripped.startsWith("[") || !stripped.endsWith("]")) {
    return null;
  }
  return stripped.slice(1, -1).trim();
}

/**
 * Offset of the first line whose trimmed content equals `marker`
 * (case-insensitive), or -1.
 */
export function findMarkerOffset(text: string, marker: string): number {
  const needle = marker.trim().toLowerCase();
  let offset = 0;
  for (const line of splitLinesKeepEnds(text)) {
    if (line.trim().toLowerCase() === needle) {
      return offset;
    }
    offset += line.length;
  }
  return -1;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface SetValuesResult {
  text: string;
  updated: string[];
}

/**
 * Replaces the value of existing `key=value` lines, keeping indentation,
 * separator spacing and line endings. Keys are matched case-insensitively;
 * keys that do not exist are not appended.
 */
export function setIniValues(text: string, values: Record<string, string>): SetValuesResult {
  const patterns = Object.keys(values).map((key) => ({
    key,
    pattern: new RegExp(
      `^([ \\t]*)(${escapeRegExp(key)})([ \\t]*=[ \\t]*)(.*?)(\\r\\n|\\n|\\r)?$`,
      "i"
    )
  }));
  const updated = new Set<string>();

  const lines = splitLinesKeepEnds(text).map((line) => {
    for (const { key, pattern } of patterns) {
      const match = pattern.exec(line);
      if (!match) {
        continue;
      }
      const [, prefix, name, separator, , eol] = match;
      updated.add(key);
      return `${prefix}${name}${separator}${values[key]}${eol ?? ""}`;
    }
    return line;
  });

  return { text: lines.join(""), updated: Array.from(updated) };
}
