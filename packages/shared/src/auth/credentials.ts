/**
 * Credentials file reader - loads the Fitbit OAuth client from credentials.json
 * {
 *   "clientID": "...",
 *   "clientSecret": "...",     (optional, unused by the PKCE flow)
 *   "redirectUrl": "http://127.0.0.1:8080/callback"
 * }
 */

import fs from "node:fs/promises";
import { z } from "zod";
import { createExportError, errorMessage } from "../errors";

const CredentialsFileSchema = z.object({
  clientID: z.string().default(""),
  clientSecret: z.string().optional(),
  redirectUrl: z.string().default(""),
});

export interface Credentials {
  clientId: string;
  clientSecret?: string;
  redirectUrl: string;
}

/**
 * Parse the contents of a credentials file
 */
export function parseCredentials(content: string): Credentials {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw createExportError(`Failed to parse credentials JSON: ${errorMessage(error)}`, "CONFIGURATION", error);
  }

  const parsed = CredentialsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw createExportError(`Invalid credentials file${where}: ${issue?.message ?? "unknown error"}`, "CONFIGURATION");
  }

  const { clientID, clientSecret, redirectUrl } = parsed.data;
  if (!clientID || !redirectUrl) {
    throw createExportError("The clientID and redirect URL cannot be empty.", "CONFIGURATION");
  }
  return { clientId: clientID, clientSecret, redirectUrl };
}

/**
 * Read and validate a credentials file
 */
export async function readCredentials(path: string): Promise<Credentials> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    throw createExportError(`Failed to read credentials file ${path}: ${errorMessage(error)}`, "CONFIGURATION", error);
  }
  return parseCredentials(content);
}
