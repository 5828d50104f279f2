import fs from "node:fs/promises";
import path from "node:path";
import { createExportError, errorMessage } from "@tcx-bridge/shared";

/**
 * Write the document, creating the directory first
 */
export async function saveToFile(filePath: string, content: string): Promise<string> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, { encoding: "utf-8", mode: 0o644 });
  } catch (error) {
    throw createExportError(`Failed to save data to '${filePath}': ${errorMessage(error)}`, "PERSISTENCE", error);
  }
  return filePath;
}

export function exportFileName(category: string, logId: number): string {
  return `${category.replace(/[\\/:*?"<>|]/g, "-")}-${logId}.tcx`;
}
