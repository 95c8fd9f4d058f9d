import { CATEGORY_MARKER, TITLE_MARKER, URL_MARKER } from "./models/bookmark";
import type { Bookmark } from "./models/types";
import { charLength, padEndChars } from "./utils/text";

export interface ColumnWidths {
  title: number;
  category: number;
}

export function measureColumns(bookmarks: readonly Bookmark[]): ColumnWidths {
  return bookmarks.reduce<ColumnWidths>(
    (widths, bookmark) => ({
      title: Math.max(widths.title, charLength(bookmark.title.trim())),
      category: Math.max(widths.category, charLength(bookmark.category.trim()))
    }),
    { title: 0, category: 0 }
  );
}

export function formatBookmarkLine(bookmark: Bookmark, widths: ColumnWidths): string {
  const title = padEndChars(bookmark.title.trim(), widths.title);
  const category = padEndChars(bookmark.category.trim(), widths.category);
  return `${TITLE_MARKER}${title} ${CATEGORY_MARKER}${category} ${URL_MARKER}${bookmark.url.trim()}`;
}

export function buildBookmarkLines(bookmarks: readonly Bookmark[]): string[] {
  const widths = measureColumns(bookmarks);
  return bookmarks.map((bookmark) => formatBookmarkLine(bookmark, widths));
}

/**
 * Expects the collection in (category, title) order; the records are written
 * as given.
 */
export function serializeBookmarks(bookmarks: readonly Bookmark[]): string {
  return buildBookmarkLines(bookmarks).join("\n");
}
