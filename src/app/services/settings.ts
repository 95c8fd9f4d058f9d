import { existsSync } from "node:fs";
import path from "node:path";
import { SettingsError } from "../errors";
import type { ActionVerb, CliSettings } from "../models/types";
import { SUPPORTED_MENU_PROGRAMS, isMenuProgramName } from "../ui/menu";

export const DEFAULT_OPTS_ENV = "FMARK_DEFAULT_OPTS";
export const DEFAULT_BOOKMARK_FILE = ".bookmarks";
export const DEFAULT_MENU_ROWS = 20;

const ACTION_VERBS: readonly ActionVerb[] = ["browse", "view", "go", "create", "modify", "delete"];

type PendingSettings = {
  menu?: string;
  browser?: string;
  path?: string;
  rows?: string;
  verb?: ActionVerb;
  help: boolean;
};

type ValueFlag = "menu" | "browser" | "path" | "rows";

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ["-m", "menu"],
  ["--menu", "menu"],
  ["-b", "browser"],
  ["--browser", "browser"],
  ["-p", "path"],
  ["--path", "path"],
  ["-r", "rows"],
  ["--rows", "rows"]
]);

export function defaultCliSettings(home: string): CliSettings {
  return {
    menu: "bemenu",
    browser: "firefox",
    path: path.join(home, DEFAULT_BOOKMARK_FILE),
    rows: DEFAULT_MENU_ROWS,
    verb: "browse",
    help: false
  };
}

function unrecognizedArgument(arg: string): SettingsError {
  return new SettingsError(`Unrecognized argument '${arg}'.\nUse '-h, --help' for more information about available options.`);
}

function isActionVerb(value: string): value is ActionVerb {
  return ACTION_VERBS.some((verb) => verb === value);
}

/** Applies one argument list on top of `pending`; later values win. */
export function applyArguments(args: readonly string[], pending: PendingSettings): PendingSettings {
  const next: PendingSettings = { ...pending };
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === "-h" || arg === "--help") {
      next.help = true;
      continue;
    }

    const flag = VALUE_FLAGS.get(arg);
    if (flag) {
      const value = args[index + 1];
      if (value === undefined || VALUE_FLAGS.has(value)) {
        throw new SettingsError(`Missing value for '${arg}'.`);
      }
      next[flag] = value;
      index += 1;
      continue;
    }

    if (!arg.startsWith("-") && isActionVerb(arg)) {
      next.verb = arg;
      continue;
    }

    throw unrecognizedArgument(arg);
  }
  return next;
}

export function splitDefaultOpts(value: string | undefined): string[] {
  return (value ?? "").split(/\s+/).filter((part) => part.length > 0);
}

export function normalizeMenuRows(raw: string | undefined): number {
  if (raw === undefined || !/^-?\d+$/.test(raw.trim())) {
    return DEFAULT_MENU_ROWS;
  }
  return Math.min(255, Math.max(1, Number(raw.trim())));
}

/**
 * Resolves settings from defaults, then `FMARK_DEFAULT_OPTS`, then the
 * command line.
 */
export function loadCliSettings(argv: readonly string[], env: NodeJS.ProcessEnv): CliSettings {
  const home = env.HOME;
  if (!home) {
    throw new SettingsError("Failed to get HOME environment variable.");
  }

  const defaults = defaultCliSettings(home);
  const fromEnv = applyArguments(splitDefaultOpts(env[DEFAULT_OPTS_ENV]), { help: false });
  const pending = applyArguments(argv, fromEnv);

  const menu = pending.menu ?? defaults.menu;
  if (!isMenuProgramName(menu)) {
    throw new SettingsError(`Unsupported menu program: ${menu}. Supported: ${SUPPORTED_MENU_PROGRAMS.join(", ")}.`);
  }

  return {
    menu,
    browser: pending.browser ?? defaults.browser,
    path: pending.path ?? defaults.path,
    rows: normalizeMenuRows(pending.rows),
    verb: pending.verb ?? defaults.verb,
    help: pending.help
  };
}

export function findProgram(name: string, searchPath: string | undefined): string {
  if (name.includes(path.sep)) {
    if (existsSync(name)) {
      return name;
    }
    throw new SettingsError(`Program (${name}) was not found.`);
  }

  const directories = (searchPath ?? "").split(path.delimiter).filter((entry) => entry.length > 0);
  for (const directory of directories) {
    if (existsSync(path.join(directory, name))) {
      return name;
    }
  }
  throw new SettingsError(`Program (${name}) was not found in the PATH.`);
}

export function formatHelpText(): string {
  return [
    "Usage: fmark [COMMAND] [OPTIONS]",
    "",
    "Searches and edits a list of websites kept in a text file with lines like:",
    "{T}Title {C}Category {U}https://example.com",
    "",
    "Commands:",
    "  browse                List bookmarks and act on the chosen one (default).",
    "  view                  Show the list without acting on it.",
    "  go                    Open the chosen bookmark in the browser.",
    "  create                Add a bookmark.",
    "  modify                Edit the chosen bookmark.",
    "  delete                Remove the chosen bookmark.",
    "",
    "Options:",
    "  -m, --menu            Menu program to use.",
    `                        Supported programs: ${SUPPORTED_MENU_PROGRAMS.join(", ")}.`,
    "                        Default: (bemenu)",
    "  -b, --browser         Browser to use.",
    "                        Default: (firefox)",
    "  -p, --path            Path to the bookmark file.",
    `                        Default: ($HOME/${DEFAULT_BOOKMARK_FILE})`,
    "  -r, --rows            Number of rows to show in the menu (1-255).",
    `                        Default: (${DEFAULT_MENU_ROWS})`,
    "  -h, --help            Show this help message and exit.",
    "",
    "Environment Variables:",
    `  ${DEFAULT_OPTS_ENV}    Default options, overridden by explicit flags`,
    `                        (e.g. '--menu fzf --rows ${DEFAULT_MENU_ROWS}')`
  ].join("\n");
}
