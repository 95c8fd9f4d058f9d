import { existsSync } from "node:fs";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { BookmarkFileError } from "../errors";
import { serializeBookmarks } from "../exporter";
import { defaultBookmark } from "../models/bookmark";

export interface BookmarkStorage {
  readonly path: string;
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export function toFileContents(text: string): string {
  return text ? `${text}\n` : "";
}

/**
 * The backing plain-text file. Writes go to a temporary sibling first and are
 * renamed over the target.
 */
export class BookmarkFile implements BookmarkStorage {
  constructor(public readonly path: string) {}

  public async read(): Promise<string> {
    try {
      return await readFile(this.path, "utf8");
    } catch (error) {
      throw new BookmarkFileError("read", this.path, error);
    }
  }

  public async write(text: string): Promise<void> {
    const tmpPath = `${this.path}.tmp.${randomUUID().slice(0, 8)}`;
    try {
      await writeFile(tmpPath, toFileContents(text), "utf8");
      await rename(tmpPath, this.path);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn("[fmark.storage] leftover temporary file", { tmpPath, cleanupError });
      });
      throw new BookmarkFileError("write", this.path, error);
    }
  }
}

export function bookmarkFileTemplate(): string {
  return toFileContents(serializeBookmarks([defaultBookmark()]));
}

/** Creates the file with the template record when it is missing. Returns true if created. */
export async function ensureBookmarkFile(path: string): Promise<boolean> {
  if (existsSync(path)) {
    return false;
  }
  try {
    await writeFile(path, bookmarkFileTemplate(), { encoding: "utf8", flag: "wx" });
  } catch (error) {
    throw new BookmarkFileError("create", path, error);
  }
  console.error("[fmark.storage] created bookmark file", { path });
  return true;
}
