import { IndexOutOfRangeError } from "../errors";
import { compareBookmarks, createBookmark, sortBookmarks } from "../models/bookmark";
import type { Bookmark } from "../models/types";
import { compareText } from "../utils/text";

/**
 * In-memory bookmark collection for one run. Records stay sorted by
 * (category, title); records with equal keys keep their insertion order.
 */
export class BookmarkStore {
  private readonly bookmarks: Bookmark[];

  constructor(bookmarks: readonly Bookmark[] = []) {
    this.bookmarks = sortBookmarks(bookmarks.map((bookmark) => createBookmark(bookmark)));
  }

  public get size(): number {
    return this.bookmarks.length;
  }

  public get(index: number): Bookmark {
    this.assertIndex(index);
    return { ...this.bookmarks[index] };
  }

  public add(input: Bookmark): number {
    const bookmark = createBookmark(input);
    const index = this.insertionIndex(bookmark);
    this.bookmarks.splice(index, 0, bookmark);
    return index;
  }

  public update(index: number, input: Bookmark): number {
    this.assertIndex(index);
    const bookmark = createBookmark(input);
    this.bookmarks.splice(index, 1);
    const nextIndex = this.insertionIndex(bookmark);
    this.bookmarks.splice(nextIndex, 0, bookmark);
    return nextIndex;
  }

  public remove(index: number): Bookmark {
    this.assertIndex(index);
    const [removed] = this.bookmarks.splice(index, 1);
    return removed;
  }

  public snapshot(): readonly Bookmark[] {
    return this.bookmarks.map((bookmark) => ({ ...bookmark }));
  }

  public categories(): string[] {
    const seen = new Set(this.bookmarks.map((bookmark) => bookmark.category));
    return Array.from(seen).sort(compareText);
  }

  // Upper bound: after every record whose key is <= the new one.
  private insertionIndex(bookmark: Bookmark): number {
    let low = 0;
    let high = this.bookmarks.length;
    while (low < high) {
      const middle = (low + high) >>> 1;
      if (compareBookmarks(this.bookmarks[middle], bookmark) <= 0) {
        low = middle + 1;
      } else {
        high = middle;
      }
    }
    return low;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.bookmarks.length) {
      throw new IndexOutOfRangeError(index, this.bookmarks.length);
    }
  }
}
