#!/usr/bin/env node
import { existsSync } from "node:fs";
import { BookmarkActions } from "./app/bootstrap/actions";
import { BookmarkParseError, SettingsError } from "./app/errors";
import { collectParseErrors, parseBookmarks } from "./app/parser";
import { BrowserProgram } from "./app/services/browser";
import { defaultCliSettings, findProgram, formatHelpText, loadCliSettings } from "./app/services/settings";
import { BookmarkFile, ensureBookmarkFile } from "./app/services/storage";
import { BookmarkStore } from "./app/state/store";
import { MenuProgram } from "./app/ui/menu";

function reportParseErrors(path: string, text: string): void {
  const errors = collectParseErrors(text);
  console.error(`[fmark.load] ${errors.length} invalid line(s) in ${path}:`);
  errors.forEach((error) => console.error(`  ${error.message}`));
}

export async function main(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
  const settings = loadCliSettings(argv, env);
  if (settings.help) {
    console.log(formatHelpText());
    return 0;
  }

  findProgram(settings.menu, env.PATH);
  findProgram(settings.browser, env.PATH);

  const home = env.HOME ?? "";
  if (settings.path === defaultCliSettings(home).path) {
    await ensureBookmarkFile(settings.path);
  } else if (!existsSync(settings.path)) {
    throw new SettingsError(`File not found: ${settings.path}`);
  }

  const storage = new BookmarkFile(settings.path);
  const text = await storage.read();
  let store: BookmarkStore;
  try {
    store = new BookmarkStore(parseBookmarks(text));
  } catch (error) {
    if (error instanceof BookmarkParseError) {
      reportParseErrors(settings.path, text);
      return 1;
    }
    throw error;
  }

  const actions = new BookmarkActions({
    store,
    storage,
    menu: new MenuProgram(settings.menu, settings.rows),
    browser: new BrowserProgram(settings.browser)
  });
  await actions.run(settings.verb);
  return 0;
}

if (require.main === module) {
  process.on("uncaughtException", (error) => {
    console.error("[fmark.uncaughtException]", error.stack || error.message);
    process.exitCode = 1;
  });

  process.on("unhandledRejection", (reason) => {
    const message = reason instanceof Error ? reason.stack || reason.message : String(reason);
    console.error("[fmark.unhandledRejection]", message);
    process.exitCode = 1;
  });

  main(process.argv.slice(2), process.env)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error("[fmark]", message);
      process.exitCode = 1;
    });
}
