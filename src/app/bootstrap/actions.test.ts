import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BookmarkFileError, CollaboratorSpawnError } from "../errors";
import type { Bookmark, DispatcherState } from "../models/types";
import type { Browser } from "../services/browser";
import type { BookmarkStorage } from "../services/storage";
import { BookmarkStore } from "../state/store";
import type { Menu, MenuRequest } from "../ui/menu";
import { ADD_BOOKMARK_ENTRY, renderBookmarkLines } from "../ui/selector";
import { BookmarkActions } from "./actions";

class ScriptedMenu implements Menu {
  public readonly requests: MenuRequest[] = [];
  public readonly states: DispatcherState[] = [];
  public observe: (() => DispatcherState) | null = null;

  constructor(private readonly answers: Array<string | null>) {}

  public choose(request: MenuRequest): Promise<string | null> {
    this.requests.push(request);
    if (this.observe) {
      this.states.push(this.observe());
    }
    if (this.answers.length === 0) {
      return Promise.reject(new Error(`unexpected prompt: ${request.prompt}`));
    }
    const [answer] = this.answers.splice(0, 1);
    return Promise.resolve(answer);
  }

  public get remaining(): number {
    return this.answers.length;
  }
}

class RecordingBrowser implements Browser {
  public readonly opened: string[] = [];

  constructor(private readonly failure: Error | null = null) {}

  public open(url: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    this.opened.push(url);
    return Promise.resolve();
  }
}

class MemoryStorage implements BookmarkStorage {
  public readonly path = "/memory/bookmarks";
  public readonly writes: string[] = [];

  constructor(private readonly failure: Error | null = null) {}

  public read(): Promise<string> {
    return Promise.resolve(this.writes[this.writes.length - 1] ?? "");
  }

  public write(text: string): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    this.writes.push(text);
    return Promise.resolve();
  }
}

function setup(
  bookmarks: Bookmark[],
  answers: Array<string | null>,
  options: { browser?: RecordingBrowser; storage?: MemoryStorage } = {}
) {
  const store = new BookmarkStore(bookmarks);
  const menu = new ScriptedMenu(answers);
  const browser = options.browser ?? new RecordingBrowser();
  const storage = options.storage ?? new MemoryStorage();
  const actions = new BookmarkActions({ store, storage, menu, browser });
  menu.observe = () => actions.state;
  return { store, menu, browser, storage, actions };
}

const pair: Bookmark[] = [
  { title: "A", category: "Development", url: "https://a.example" },
  { title: "B", category: "Development", url: "https://b.example" }
];

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("create", () => {
  it("adds the first bookmark and writes the file", async () => {
    const { actions, storage, store, menu } = setup([], ["Project's Github", "Development", "https://github.com/vannrr/fmark"]);

    const result = await actions.create();

    expect(result).toEqual({
      status: "completed",
      bookmark: { title: "Project's Github", category: "Development", url: "https://github.com/vannrr/fmark" }
    });
    expect(storage.writes).toEqual(["{T}Project's Github {C}Development {U}https://github.com/vannrr/fmark"]);
    expect(store.size).toBe(1);
    expect(menu.requests.map((request) => request.prompt)).toEqual(["title", "category", "url"]);
    expect(menu.states).toEqual(["creating", "creating", "creating"]);
    expect(actions.state).toBe("idle");
  });

  it("reports the save on stderr, never on stdout", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { actions } = setup(pair, ["C", "Development", "https://c.example"]);

    await actions.create();

    expect(console.error).toHaveBeenCalledWith("[fmark.persist] bookmarks", { count: 3, path: "/memory/bookmarks" });
    expect(info).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it("offers the existing categories", async () => {
    const { actions, menu } = setup(pair, ["C", "Development", "https://c.example"]);
    await actions.create();
    expect(menu.requests[1]).toEqual({ prompt: "category", items: ["Development"], current: undefined });
  });

  it("aborts without inserting when a prompt is cancelled", async () => {
    const { actions, storage, store } = setup([], ["Title", null]);

    expect(await actions.create()).toEqual({ status: "cancelled" });
    expect(storage.writes).toEqual([]);
    expect(store.size).toBe(0);
    expect(actions.state).toBe("idle");
  });

  it("rejects a blank field and keeps the run going", async () => {
    const { actions, storage, store } = setup([], ["   ", "Development", "https://x.example"]);

    const result = await actions.create();

    expect(result).toEqual({ status: "rejected", reason: "Invalid title: must not be empty" });
    expect(storage.writes).toEqual([]);
    expect(store.size).toBe(0);
    expect(actions.state).toBe("idle");
  });

  it("pre-fills the title with typed text", async () => {
    const { actions, menu } = setup([], ["Typed", "Misc", "https://typed.example"]);
    await actions.create("Typed");
    expect(menu.requests[0]).toEqual({ prompt: "title", current: "Typed" });
  });
});

describe("delete", () => {
  it("removes the chosen bookmark after confirmation", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, storage, store, menu } = setup(pair, [lines[1], "yes"]);

    const result = await actions.delete();

    expect(result).toEqual({ status: "completed", bookmark: pair[1] });
    expect(store.snapshot()).toEqual([pair[0]]);
    expect(storage.writes).toEqual(["{T}A {C}Development {U}https://a.example"]);
    expect(menu.requests[1].prompt).toBe("Remove B? (yes/no)");
    expect(menu.states).toEqual(["deleting", "deleting"]);
  });

  it("keeps the bookmark unless the answer is yes", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, storage, store } = setup(pair, [lines[1], "nope"]);

    expect(await actions.delete()).toEqual({ status: "cancelled" });
    expect(store.size).toBe(2);
    expect(storage.writes).toEqual([]);
  });

  it("accepts YES in any case", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, store } = setup(pair, [lines[0], "YES"]);
    await actions.delete();
    expect(store.snapshot()).toEqual([pair[1]]);
  });

  it("does nothing when the selection is cancelled", async () => {
    const { actions, storage } = setup(pair, [null]);
    expect(await actions.delete()).toEqual({ status: "cancelled" });
    expect(storage.writes).toEqual([]);
  });
});

describe("modify", () => {
  const letters: Bookmark[] = [
    { title: "Alpha", category: "M", url: "https://alpha.example" },
    { title: "Beta", category: "Z", url: "https://beta.example" },
    { title: "Gamma", category: "B", url: "https://gamma.example" }
  ];

  it("re-sorts a bookmark whose category changed", async () => {
    const lines = renderBookmarkLines(new BookmarkStore(letters).snapshot());
    const { actions, store, storage, menu } = setup(letters, [lines[2], "Beta", "A", "https://beta.example"]);

    const result = await actions.modify();

    expect(result).toEqual({ status: "completed", bookmark: { title: "Beta", category: "A", url: "https://beta.example" } });
    expect(store.snapshot().map((bookmark) => bookmark.title)).toEqual(["Beta", "Gamma", "Alpha"]);
    expect(storage.writes).toEqual([
      "{T}Beta  {C}A {U}https://beta.example\n{T}Gamma {C}B {U}https://gamma.example\n{T}Alpha {C}M {U}https://alpha.example"
    ]);
    expect(menu.requests.slice(1)).toEqual([
      { prompt: "title", current: "Beta" },
      { prompt: "category", items: ["B", "M", "Z"], current: "Z" },
      { prompt: "url", current: "https://beta.example" }
    ]);
  });

  it("aborts without changes when a field prompt is cancelled", async () => {
    const lines = renderBookmarkLines(new BookmarkStore(letters).snapshot());
    const { actions, store, storage } = setup(letters, [lines[0], "Renamed", null]);

    expect(await actions.modify()).toEqual({ status: "cancelled" });
    expect(store.snapshot().map((bookmark) => bookmark.title)).toEqual(["Gamma", "Alpha", "Beta"]);
    expect(storage.writes).toEqual([]);
  });

  it("aborts when the target selection is cancelled", async () => {
    const { actions, menu } = setup(letters, [null]);
    expect(await actions.modify()).toEqual({ status: "cancelled" });
    expect(menu.remaining).toBe(0);
    expect(menu.requests).toHaveLength(1);
  });
});

describe("view and go", () => {
  it("returns the chosen bookmark without writing", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, storage, menu } = setup(pair, [lines[0]]);

    expect(await actions.view()).toEqual({ status: "completed", bookmark: pair[0] });
    expect(storage.writes).toEqual([]);
    expect(menu.states).toEqual(["viewing"]);
  });

  it("treats typed text as no choice when only viewing", async () => {
    const { actions } = setup(pair, ["not a bookmark"]);
    expect(await actions.view()).toEqual({ status: "cancelled" });
  });

  it("opens the chosen url", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, browser, menu } = setup(pair, [lines[1]]);

    expect(await actions.go()).toEqual({ status: "completed", bookmark: pair[1] });
    expect(browser.opened).toEqual(["https://b.example"]);
    expect(menu.states).toEqual(["navigating"]);
  });

  it("reports a browser that fails to start without throwing", async () => {
    const lines = renderBookmarkLines(pair);
    const failure = new CollaboratorSpawnError("browser", "nobrowser", new Error("spawn nobrowser ENOENT"));
    const { actions } = setup(pair, [lines[0]], { browser: new RecordingBrowser(failure) });

    const result = await actions.go();

    expect(result).toEqual({ status: "rejected", reason: 'Failed to launch browser program "nobrowser": spawn nobrowser ENOENT' });
    expect(actions.state).toBe("idle");
  });

  it("does not open anything on cancel", async () => {
    const { actions, browser } = setup(pair, [null]);
    expect(await actions.go()).toEqual({ status: "cancelled" });
    expect(browser.opened).toEqual([]);
  });
});

describe("persist failures", () => {
  it("propagates a write error and returns to idle", async () => {
    const failure = new BookmarkFileError("write", "/memory/bookmarks", new Error("disk full"));
    const { actions, store } = setup([], ["T", "C", "https://u.example"], { storage: new MemoryStorage(failure) });

    await expect(actions.create()).rejects.toBe(failure);
    expect(store.size).toBe(1);
    expect(actions.state).toBe("idle");
  });
});

describe("browse", () => {
  it("creates from the add entry and returns to the list", async () => {
    const { actions, menu, store } = setup(pair, [ADD_BOOKMARK_ENTRY, "C", "Development", "https://c.example", null]);

    const result = await actions.browse();

    expect(result).toEqual({ status: "completed", bookmark: { title: "C", category: "Development", url: "https://c.example" } });
    expect(store.size).toBe(3);
    expect(menu.requests[0].items).toEqual([ADD_BOOKMARK_ENTRY, ...renderBookmarkLines(pair)]);
    expect(menu.requests[4].items).toHaveLength(4);
    expect(menu.states).toEqual(["viewing", "creating", "creating", "creating", "viewing"]);
  });

  it("uses typed text as the title of a new bookmark", async () => {
    const { actions, menu, store } = setup(pair, ["Fresh idea", "Fresh idea", "Notes", "https://notes.example", null]);

    await actions.browse();

    expect(menu.requests[1]).toEqual({ prompt: "title", current: "Fresh idea" });
    expect(store.snapshot().map((bookmark) => bookmark.category)).toEqual(["Development", "Development", "Notes"]);
  });

  it("opens a bookmark through the options menu and stops", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, browser, menu } = setup(pair, [lines[0], "goto"]);

    expect(await actions.browse()).toEqual({ status: "completed", bookmark: pair[0] });
    expect(browser.opened).toEqual(["https://a.example"]);
    expect(menu.requests[1]).toEqual({ prompt: "options", items: ["goto", "modify", "remove", "cancel"] });
    expect(menu.remaining).toBe(0);
  });

  it("removes through the options menu", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, store, storage } = setup(pair, [lines[0], "remove", "yes", null]);

    await actions.browse();

    expect(store.snapshot()).toEqual([pair[1]]);
    expect(storage.writes).toEqual(["{T}B {C}Development {U}https://b.example"]);
  });

  it("goes back to the list when the options menu is cancelled", async () => {
    const lines = renderBookmarkLines(pair);
    const { actions, menu, storage } = setup(pair, [lines[1], null, lines[1], "cancel", null]);

    expect(await actions.browse()).toEqual({ status: "cancelled" });
    expect(menu.requests.map((request) => request.prompt)).toEqual(["bookmarks", "options", "bookmarks", "options", "bookmarks"]);
    expect(storage.writes).toEqual([]);
  });

  it("runs the chosen verb", async () => {
    const { actions, menu } = setup(pair, [null]);
    expect(await actions.run("browse")).toEqual({ status: "cancelled" });
    expect(menu.requests[0].prompt).toBe("bookmarks");
  });
});
