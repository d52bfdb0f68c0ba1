/**
 * Block Extractor
 *
 * Locates a module's declaration block in loosely structured config text by
 * counting braces line by line. There is no parser behind this: input that is
 * not closed or not formatted one-brace-per-line simply yields null, and the
 * caller moves on to its next source.
 */

import type { ExtractedBlock } from "./types.js";

const OPENING_BRACE_LINE = /^\s*\{\s*$/;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function declarationPattern(name: string, key: string): RegExp {
  return new RegExp(
    `\\b${escapeRegExp(key)}:\\s*(["'])${escapeRegExp(name)}\\1`,
  );
}

function count(line: string, char: string): number {
  let n = 0;
  for (const c of line) {
    if (c === char) n++;
  }
  return n;
}

/**
 * `{` count minus `}` count
 */
export function braceBalance(text: string): number {
  return count(text, "{") - count(text, "}");
}

/**
 * Extract the block declaring `name`, or null when it cannot be isolated
 *
 * The block starts at the nearest line above the declaration that holds only
 * `{` and ends where the running depth first drops back to zero.
 */
export function extractBlock(
  text: string,
  name: string,
  key = "module",
): ExtractedBlock | null {
  const lines = text.split("\n");
  const pattern = declarationPattern(name, key);

  const declarationLine = lines.findIndex((line) => pattern.test(line));
  if (declarationLine === -1) {
    return null;
  }

  let startLine = -1;
  for (let i = declarationLine - 1; i >= 0; i--) {
    if (OPENING_BRACE_LINE.test(lines[i])) {
      startLine = i;
      break;
    }
  }
  if (startLine === -1) {
    return null;
  }

  let depth = 0;
  for (let i = startLine; i < lines.length; i++) {
    depth += braceBalance(lines[i]);

    if (i === startLine) {
      continue;
    }
    if (depth < 0) {
      return null;
    }
    if (depth === 0) {
      // Closed before reaching the declaration: the brace belongs to a sibling
      if (i < declarationLine) {
        return null;
      }
      return {
        text: lines.slice(startLine, i + 1).join("\n"),
        startLine,
        endLine: i,
      };
    }
  }

  return null;
}

/**
 * Every module name declared in `text`, in document order
 */
export function listDeclaredEntities(text: string, key = "module"): string[] {
  const pattern = new RegExp(
    `\\b${escapeRegExp(key)}:\\s*(["'])([^"'\\n]+)\\1`,
    "g",
  );
  return Array.from(text.matchAll(pattern), (match) => match[2]);
}
