import { BookmarkValidationError, CollaboratorSpawnError } from "../errors";
import { serializeBookmarks } from "../exporter";
import type { ActionResult, ActionVerb, Bookmark, DispatcherState } from "../models/types";
import type { Browser } from "../services/browser";
import type { BookmarkStorage } from "../services/storage";
import type { BookmarkStore } from "../state/store";
import type { Menu } from "../ui/menu";
import { ADD_BOOKMARK_ENTRY, renderBookmarkLines, resolveBrowseSelection, resolveSelection } from "../ui/selector";

const OPTIONS_GOTO = "goto";
const OPTIONS_MODIFY = "modify";
const OPTIONS_REMOVE = "remove";
const OPTIONS_CANCEL = "cancel";
const OPTIONS = [OPTIONS_GOTO, OPTIONS_MODIFY, OPTIONS_REMOVE, OPTIONS_CANCEL];

const CANCELLED: ActionResult = { status: "cancelled" };

export interface BookmarkActionsDeps {
  store: BookmarkStore;
  storage: BookmarkStorage;
  menu: Menu;
  browser: Browser;
}

type Target = { index: number; bookmark: Bookmark };

/**
 * Runs the user-facing verbs against one store. Each verb is a single pass
 * that leaves the dispatcher idle again, however it ends.
 */
export class BookmarkActions {
  private currentState: DispatcherState = "idle";
  private readonly store: BookmarkStore;
  private readonly storage: BookmarkStorage;
  private readonly menu: Menu;
  private readonly browser: Browser;

  constructor(deps: BookmarkActionsDeps) {
    this.store = deps.store;
    this.storage = deps.storage;
    this.menu = deps.menu;
    this.browser = deps.browser;
  }

  public get state(): DispatcherState {
    return this.currentState;
  }

  public run(verb: ActionVerb): Promise<ActionResult> {
    switch (verb) {
      case "browse":
        return this.browse();
      case "view":
        return this.view();
      case "go":
        return this.go();
      case "create":
        return this.create();
      case "modify":
        return this.modify();
      case "delete":
        return this.delete();
    }
  }

  public view(): Promise<ActionResult> {
    return this.inState("viewing", async () => {
      const target = await this.pickBookmark("bookmarks");
      return target ? { status: "completed", bookmark: target.bookmark } : CANCELLED;
    });
  }

  public go(): Promise<ActionResult> {
    return this.inState("navigating", async () => {
      const target = await this.pickBookmark("go");
      return target ? this.openBookmark(target.bookmark) : CANCELLED;
    });
  }

  public create(initialTitle?: string): Promise<ActionResult> {
    return this.inState("creating", async () => {
      const fields = await this.promptFields(initialTitle === undefined ? undefined : { title: initialTitle });
      if (!fields) {
        return CANCELLED;
      }
      return this.mutate("create", () => {
        const index = this.store.add(fields);
        return this.store.get(index);
      });
    });
  }

  public modify(): Promise<ActionResult> {
    return this.inState("modifying", async () => {
      const target = await this.pickBookmark("modify");
      return target ? this.modifyTarget(target) : CANCELLED;
    });
  }

  public delete(): Promise<ActionResult> {
    return this.inState("deleting", async () => {
      const target = await this.pickBookmark("remove");
      return target ? this.deleteTarget(target) : CANCELLED;
    });
  }

  /**
   * Shows the list until the user cancels it. A chosen bookmark gets the
   * options menu; the add entry or typed text starts a new bookmark.
   */
  public async browse(): Promise<ActionResult> {
    let last: ActionResult = CANCELLED;
    for (;;) {
      const snapshot = this.store.snapshot();
      const lines = renderBookmarkLines(snapshot);
      this.currentState = "viewing";
      let answer: string | null;
      try {
        answer = await this.menu.choose({ prompt: "bookmarks", items: [ADD_BOOKMARK_ENTRY, ...lines] });
      } finally {
        this.currentState = "idle";
      }

      const selection = resolveBrowseSelection(answer, lines);
      switch (selection.kind) {
        case "none":
          return last;
        case "add":
          last = await this.create();
          break;
        case "raw":
          last = await this.create(selection.text);
          break;
        case "bookmark": {
          const option = await this.menu.choose({ prompt: "options", items: OPTIONS });
          const target = { index: selection.index, bookmark: snapshot[selection.index] };
          if (option === OPTIONS_GOTO) {
            return this.inState("navigating", () => this.openBookmark(target.bookmark));
          }
          if (option === OPTIONS_MODIFY) {
            last = await this.inState("modifying", () => this.modifyTarget(target));
          } else if (option === OPTIONS_REMOVE) {
            last = await this.inState("deleting", () => this.deleteTarget(target));
          }
          break;
        }
      }
    }
  }

  private async modifyTarget(target: Target): Promise<ActionResult> {
    const fields = await this.promptFields(target.bookmark);
    if (!fields) {
      return CANCELLED;
    }
    return this.mutate("modify", () => {
      const index = this.store.update(target.index, fields);
      return this.store.get(index);
    });
  }

  private async deleteTarget(target: Target): Promise<ActionResult> {
    const answer = await this.menu.choose({ prompt: `Remove ${target.bookmark.title}? (yes/no)` });
    if (answer?.toLowerCase() !== "yes") {
      return CANCELLED;
    }
    return this.mutate("delete", () => this.store.remove(target.index));
  }

  private async openBookmark(bookmark: Bookmark): Promise<ActionResult> {
    try {
      await this.browser.open(bookmark.url);
    } catch (error) {
      if (error instanceof CollaboratorSpawnError) {
        console.error("[fmark.browser]", error.message);
        return { status: "rejected", reason: error.message };
      }
      throw error;
    }
    return { status: "completed", bookmark };
  }

  private async pickBookmark(prompt: string): Promise<Target | null> {
    const snapshot = this.store.snapshot();
    const lines = renderBookmarkLines(snapshot);
    const answer = await this.menu.choose({ prompt, items: lines });
    const selection = resolveSelection(answer, lines);
    if (selection.kind !== "bookmark") {
      return null;
    }
    return { index: selection.index, bookmark: snapshot[selection.index] };
  }

  /**
   * Title, category and URL in turn. Existing categories are offered as
   * choices; `current` pre-fills every prompt.
   */
  private async promptFields(current?: Partial<Bookmark>): Promise<Bookmark | null> {
    const title = await this.menu.choose({ prompt: "title", current: current?.title });
    if (!title) {
      return null;
    }
    const category = await this.menu.choose({
      prompt: "category",
      items: this.store.categories(),
      current: current?.category
    });
    if (!category) {
      return null;
    }
    const url = await this.menu.choose({ prompt: "url", current: current?.url });
    if (!url) {
      return null;
    }
    return { title, category, url };
  }

  private async mutate(action: string, apply: () => Bookmark): Promise<ActionResult> {
    let bookmark: Bookmark;
    try {
      bookmark = apply();
    } catch (error) {
      if (error instanceof BookmarkValidationError) {
        console.warn(`[fmark.${action}] rejected`, error.message);
        return { status: "rejected", reason: error.message };
      }
      throw error;
    }
    await this.persist();
    return { status: "completed", bookmark };
  }

  private async persist(): Promise<void> {
    const snapshot = this.store.snapshot();
    await this.storage.write(serializeBookmarks(snapshot));
    console.error("[fmark.persist] bookmarks", { count: snapshot.length, path: this.storage.path });
  }

  private async inState(state: DispatcherState, body: () => Promise<ActionResult>): Promise<ActionResult> {
    this.currentState = state;
    try {
      return await body();
    } finally {
      this.currentState = "idle";
    }
  }
}
