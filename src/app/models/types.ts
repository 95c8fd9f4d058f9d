export interface Bookmark {
  title: string;
  category: string;
  url: string;
}

export type BookmarkField = keyof Bookmark;

export type MenuProgramName = "bemenu" | "dmenu" | "rofi" | "fzf";

export type ActionVerb = "browse" | "view" | "go" | "create" | "modify" | "delete";

export type DispatcherState = "idle" | "viewing" | "navigating" | "creating" | "modifying" | "deleting";

export type Selection =
  | { kind: "none" }
  | { kind: "add" }
  | { kind: "bookmark"; index: number }
  | { kind: "raw"; text: string };

export type ActionResult =
  | { status: "completed"; bookmark: Bookmark }
  | { status: "cancelled" }
  | { status: "rejected"; reason: string };

export interface CliSettings {
  menu: MenuProgramName;
  browser: string;
  path: string;
  rows: number;
  verb: ActionVerb;
  help: boolean;
}
