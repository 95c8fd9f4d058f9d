import { spawn } from "node:child_process";
import { CollaboratorSpawnError } from "../errors";
import type { MenuProgramName } from "../models/types";

export const SUPPORTED_MENU_PROGRAMS: readonly MenuProgramName[] = ["bemenu", "dmenu", "rofi", "fzf"];
export const CURRENT_MARKER = " <-- current";

const FZF_CANCELLED_EXIT_CODE = 130;

export interface MenuRequest {
  prompt: string;
  items?: readonly string[];
  /** Highlighted in the item list and offered as the value to keep. */
  current?: string;
}

/**
 * Presents lines and returns the chosen or typed one; `null` when the user
 * cancels.
 */
export interface Menu {
  choose(request: MenuRequest): Promise<string | null>;
}

export function isMenuProgramName(value: string): value is MenuProgramName {
  return SUPPORTED_MENU_PROGRAMS.some((name) => name === value);
}

export function buildMenuArgs(program: MenuProgramName, rows: number, prompt: string): string[] {
  switch (program) {
    case "bemenu":
    case "dmenu":
      return ["-i", "-l", String(rows), "-p", prompt];
    case "rofi":
      return ["-dmenu", "-i", "-l", String(rows), "-p", prompt];
    case "fzf":
      return ["-i", "--print-query", "--prompt", `${prompt}> `];
  }
}

export function markCurrent(items: readonly string[], current: string | undefined): string[] {
  if (current === undefined) {
    return [...items];
  }
  return items.map((item) => (item === current ? `${item}${CURRENT_MARKER}` : item));
}

export function unmarkCurrent(answer: string): string {
  return answer.endsWith(CURRENT_MARKER) ? answer.slice(0, -CURRENT_MARKER.length) : answer;
}

/**
 * Turns raw program output into an answer. fzf prints the query before the
 * selection, so the last line wins.
 */
export function decodeMenuOutput(program: MenuProgramName, stdout: string, exitCode: number | null): string | null {
  if (program === "fzf" && exitCode === FZF_CANCELLED_EXIT_CODE) {
    return null;
  }
  const lines = stdout.trim().split("\n");
  const answer = (program === "fzf" ? lines[lines.length - 1] : stdout).trim();
  return answer ? unmarkCurrent(answer) : null;
}

export class MenuProgram implements Menu {
  constructor(
    private readonly program: MenuProgramName,
    private readonly rows: number
  ) {}

  public choose(request: MenuRequest): Promise<string | null> {
    const items = request.items ?? (request.current !== undefined ? [request.current] : []);
    const input = markCurrent(items, request.current).join("\n");
    const args = buildMenuArgs(this.program, this.rows, request.prompt);

    return new Promise((resolve, reject) => {
      const child = spawn(this.program, args, { stdio: ["pipe", "pipe", "inherit"] });
      const chunks: Buffer[] = [];

      child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
      child.on("error", (error) => reject(new CollaboratorSpawnError("menu", this.program, error)));
      child.on("close", (code) => {
        const stdout = Buffer.concat(chunks).toString("utf8");
        resolve(decodeMenuOutput(this.program, stdout, code));
      });

      // A menu that exits before reading everything closes the pipe early.
      child.stdin.on("error", (error) => {
        console.warn("[fmark.menu] stdin closed", error.message);
      });
      child.stdin.end(input ? `${input}\n` : "");
    });
  }
}
