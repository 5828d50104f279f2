import { exec } from "node:child_process";
import { createExportError } from "@tcx-bridge/shared";

export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): string {
  // URL must be quoted to prevent shell from interpreting & as background operator
  if (platform === "win32") {
    return `start "" "${url}"`;
  }
  if (platform === "darwin") {
    return `open "${url}"`;
  }
  return `xdg-open "${url}"`;
}

/**
 * Open a URL in the default browser
 */
export function openBrowser(url: string): Promise<void> {
  return new Promise((resolve, reject) => {
    exec(browserCommand(url), (error) => {
      if (error) {
        reject(createExportError(`Error opening browser: ${error.message}`, "BROWSER_LAUNCH", error));
        return;
      }
      resolve();
    });
  });
}
