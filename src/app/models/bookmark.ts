import { BookmarkValidationError } from "../errors";
import { compareText } from "../utils/text";
import type { Bookmark, BookmarkField } from "./types";

export const TITLE_MARKER = "{T}";
export const CATEGORY_MARKER = "{C}";
export const URL_MARKER = "{U}";

export const FIELD_MARKERS: ReadonlyArray<readonly [BookmarkField, string]> = [
  ["title", TITLE_MARKER],
  ["category", CATEGORY_MARKER],
  ["url", URL_MARKER]
];

export function defaultBookmark(): Bookmark {
  return {
    title: "Project's Github",
    category: "Development",
    url: "https://github.com/vannrr/fmark"
  };
}

function normalizeField(field: BookmarkField, raw: string): string {
  const value = raw.trim();
  if (!value) {
    throw new BookmarkValidationError(field, "must not be empty");
  }
  if (/[\r\n]/.test(value)) {
    throw new BookmarkValidationError(field, "must fit on one line");
  }
  for (const [, marker] of FIELD_MARKERS) {
    if (value.includes(marker)) {
      throw new BookmarkValidationError(field, `must not contain ${marker}`);
    }
  }
  return value;
}

/**
 * Returns a trimmed copy of the input, or throws {@link BookmarkValidationError}
 * naming the first field that cannot be stored.
 */
export function createBookmark(input: Bookmark): Bookmark {
  return {
    title: normalizeField("title", input.title),
    category: normalizeField("category", input.category),
    url: normalizeField("url", input.url)
  };
}

export function compareBookmarks(a: Bookmark, b: Bookmark): number {
  return compareText(a.category.trim(), b.category.trim()) || compareText(a.title.trim(), b.title.trim());
}

export function sortBookmarks(bookmarks: readonly Bookmark[]): Bookmark[] {
  return [...bookmarks].sort(compareBookmarks);
}
