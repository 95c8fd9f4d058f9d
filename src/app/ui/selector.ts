import { buildBookmarkLines } from "../exporter";
import type { Bookmark, Selection } from "../models/types";

export const ADD_BOOKMARK_ENTRY = "+ add bookmark";

export function renderBookmarkLines(bookmarks: readonly Bookmark[]): string[] {
  return buildBookmarkLines(bookmarks);
}

/**
 * Maps the menu's answer back onto the rendered lines. Identical lines
 * resolve to the first one in list order.
 */
export function resolveSelection(answer: string | null, lines: readonly string[]): Selection {
  const text = answer?.trim() ?? "";
  if (!text) {
    return { kind: "none" };
  }

  const index = lines.indexOf(text);
  if (index !== -1) {
    return { kind: "bookmark", index };
  }

  return { kind: "raw", text };
}

/** Same as {@link resolveSelection}, with the add entry offered on top of the list. */
export function resolveBrowseSelection(answer: string | null, lines: readonly string[]): Selection {
  if (answer?.trim() === ADD_BOOKMARK_ENTRY) {
    return { kind: "add" };
  }
  return resolveSelection(answer, lines);
}
