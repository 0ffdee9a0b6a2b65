import { spawn } from "node:child_process";
import { errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";

/**
 * Opens a finished output with the desktop's default application. Calls may fail; callers
 * go through {@link openQuietly}, which never lets a failure reach the task outcome.
 */
export type FileOpener = {
  open: (filePath: string) => Promise<void>;
};

function openCommand(filePath: string): [string, string[]] {
  switch (process.platform) {
    case "darwin":
      return ["open", [filePath]];
    case "win32":
      return ["cmd", ["/c", "start", "", filePath]];
    default:
      return ["xdg-open", [filePath]];
  }
}

export const systemOpener: FileOpener = {
  open: (filePath) =>
    new Promise((resolve, reject) => {
      const [command, args] = openCommand(filePath);
      const child = spawn(command, args, { detached: true, stdio: "ignore" });
      child.once("error", reject);
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    }),
};

export async function openQuietly(opener: FileOpener, filePath: string, logger: Logger): Promise<void> {
  try {
    await opener.open(filePath);
  } catch (error) {
    logger.debug(`Could not open ${filePath}: ${errorMessage(error)}`);
  }
}
