import { findMarkerOffset, parseIniLine, parseSectionName, splitLinesKeepEnds } from "./ini";

export const DEFAULT_MARKER = "[Global]";

/** Text from the marker line to the end of the document, or null without a marker. */
export function extractBody(text: string, marker: string): string | null {
  const offset = findMarkerOffset(text, marker);
  return offset === -1 ? null : text.slice(offset);
}

/**
 * Merges the synchronized section of `sourceText` into `targetText`.
 *
 * Everything in the target before its first marker line is kept as-is; the
 * marker line and everything after it is replaced by the source's. A target
 * without a marker gets the source body appended once. A source without a
 * marker leaves the target untouched.
 */
export function mergeSection(sourceText: string, targetText: string | null, marker: string): string {
  const sourceBody = extractBody(sourceText, marker);
  if (sourceBody === null) {
    return targetText ?? "";
  }
  if (!targetText) {
    return sourceBody.trimStart();
  }

  const targetOffset = findMarkerOffset(targetText, marker);
  if (targetOffset !== -1) {
    const header = targetText.slice(0, targetOffset).trimEnd();
    return `${header}\n${sourceBody.trimStart()}`;
  }

  const separator = targetText.endsWith("\n") ? "" : "\n";
  return `${targetText}${separator}${sourceBody.trimStart()}`;
}

function fieldKey(section: string | null, name: string): string {
  return `${(section ?? "").toLowerCase()}\n${name.toLowerCase()}`;
}

function stripLineEnding(line: string): { content: string; eol: string } {
  const match = /(\r\n|\n|\r)$/.exec(line);
  if (!match) {
    return { content: line, eol: "" };
  }
  return { content: line.slice(0, match.index), eol: match[1] };
}

/**
 * Puts the previous target's lines back for excluded fields inside the
 * synchronized body of `merged`. Fields are matched by section and name,
 * both case-insensitively, and repeated fields by their order within the
 * section. A field the previous target never had, or had fewer times, keeps
 * the merged value.
 */
export function restoreExcludedFields(
  merged: string,
  previousTarget: string | null,
  fields: readonly string[],
  marker: string
): string {
  if (!previousTarget || fields.length === 0) {
    return merged;
  }
  const bodyOffset = findMarkerOffset(merged, marker);
  if (bodyOffset === -1) {
    return merged;
  }

  const excluded = new Set(fields.map((field) => field.toLowerCase()));
  // repeated keys (e.g. GameplayTagList) are restored by position
  const previous = new Map<string, string[]>();
  let section: string | null = null;
  for (const line of splitLinesKeepEnds(previousTarget)) {
    const sectionName = parseSectionName(line);
    if (sectionName !== null) {
      section = sectionName;
      continue;
    }
    const name = parseIniLine(line);
    if (name === null || !excluded.has(name.toLowerCase())) {
      continue;
    }
    const key = fieldKey(section, name);
    const lines = previous.get(key) ?? [];
    lines.push(stripLineEnding(line).content);
    previous.set(key, lines);
  }
  if (previous.size === 0) {
    return merged;
  }

  section = null;
  const used = new Map<string, number>();
  const body = splitLinesKeepEnds(merged.slice(bodyOffset)).map((line) => {
    const sectionName = parseSectionName(line);
    if (sectionName !== null) {
      section = sectionName;
      return line;
    }
    const name = parseIniLine(line);
    if (name === null) {
      return line;
    }
    const key = fieldKey(section, name);
    const index = used.get(key) ?? 0;
    const kept = previous.get(key)?.[index];
    if (kept === undefined) {
      return line;
    }
    used.set(key, index + 1);
    return `${kept}${stripLineEnding(line).eol}`;
  });

  return merged.slice(0, bodyOffset) + body.join("");
}
