import { spawn } from "node:child_process";
import { CollaboratorSpawnError } from "../errors";

/** Opens URLs; tests swap in a fake so no browser is started. */
export interface Browser {
  open(url: string): Promise<void>;
}

export class BrowserProgram implements Browser {
  constructor(private readonly program: string) {}

  public open(url: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.program, [url], { detached: true, stdio: "ignore" });
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
      child.once("error", (error) => reject(new CollaboratorSpawnError("browser", this.program, error)));
    });
  }
}
