import { BookmarkParseError } from "./errors";
import { FIELD_MARKERS, sortBookmarks } from "./models/bookmark";
import type { Bookmark } from "./models/types";

function splitLines(text: string): string[] {
  return text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

function markerPositions(line: string): number[] | null {
  const positions: number[] = [];
  for (const [, marker] of FIELD_MARKERS) {
    const position = line.indexOf(marker);
    if (position === -1 || line.indexOf(marker, position + marker.length) !== -1) {
      return null;
    }
    positions.push(position);
  }
  return positions;
}

/**
 * Parses one non-blank line. Returns the error instead of throwing so that
 * callers can either stop at the first problem or collect all of them.
 */
export function parseBookmarkLine(line: string, lineNumber: number): Bookmark | BookmarkParseError {
  // A bare CR inside a line would survive the trim and break the one-line format.
  const positions = /[\r\n]/.test(line) ? null : markerPositions(line);
  if (!positions) {
    return BookmarkParseError.malformedLine(lineNumber, line);
  }

  const [titleAt, categoryAt, urlAt] = positions;
  if (!(titleAt < categoryAt && categoryAt < urlAt) || line.slice(0, titleAt).trim()) {
    return BookmarkParseError.malformedLine(lineNumber, line);
  }

  const ends = [categoryAt, urlAt, line.length];
  const values: string[] = [];
  for (let index = 0; index < FIELD_MARKERS.length; index += 1) {
    const [field, marker] = FIELD_MARKERS[index];
    const value = line.slice(positions[index] + marker.length, ends[index]).trim();
    if (!value) {
      return BookmarkParseError.emptyField(lineNumber, line, field);
    }
    values.push(value);
  }

  const [title, category, url] = values;
  return { title, category, url };
}

function parseLines(text: string, onError: (error: BookmarkParseError) => boolean): Bookmark[] {
  const parsed: Bookmark[] = [];
  const lines = splitLines(text);

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];
    if (!line.trim()) {
      continue;
    }

    const result = parseBookmarkLine(line, index + 1);
    if (result instanceof BookmarkParseError) {
      if (!onError(result)) {
        break;
      }
      continue;
    }
    parsed.push(result);
  }

  return parsed;
}

/**
 * Parses the whole bookmark file and returns the records sorted by
 * (category, title). Throws the first {@link BookmarkParseError} found.
 */
export function parseBookmarks(text: string): Bookmark[] {
  const errors: BookmarkParseError[] = [];
  const parsed = parseLines(text, (error) => {
    errors.push(error);
    return false;
  });
  if (errors.length > 0) {
    throw errors[0];
  }
  return sortBookmarks(parsed);
}

export function collectParseErrors(text: string): BookmarkParseError[] {
  const errors: BookmarkParseError[] = [];
  parseLines(text, (error) => {
    errors.push(error);
    return true;
  });
  return errors;
}
