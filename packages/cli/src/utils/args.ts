import { DEFAULT_CREDENTIALS_FILE, createExportError, isActivityDate } from "@tcx-bridge/shared";

export interface ExportArgs {
  date: string;
  credentialsPath: string;
  outDir: string;
  timeoutMs?: number;
}

const VALUE_FLAGS = new Set(["--credentials", "--out", "--timeout"]);

/**
 * Parse `export <YYYY-MM-DD> [--credentials <path>] [--out <dir>] [--timeout <seconds>]`
 * (arguments after the subcommand).
 */
export function parseExportArgs(args: string[]): ExportArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw createExportError(`Missing value for ${arg}`, "INVALID_ARGUMENT");
      }
      flags.set(arg, value);
      i++;
    } else if (arg.startsWith("--")) {
      throw createExportError(`Unknown option: ${arg}`, "INVALID_ARGUMENT");
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) {
    throw createExportError("No date specified. Give a date in a format YYYY-MM-DD!", "INVALID_ARGUMENT");
  }
  if (positional.length > 1) {
    throw createExportError("Maximum of one date can be given in a format YYYY-MM-DD.", "INVALID_ARGUMENT");
  }

  const date = positional[0];
  if (!isActivityDate(date)) {
    throw createExportError(`Invalid date "${date}". Give a date in a format YYYY-MM-DD.`, "INVALID_ARGUMENT");
  }

  let timeoutMs: number | undefined;
  const timeout = flags.get("--timeout");
  if (timeout !== undefined) {
    const seconds = Number(timeout);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw createExportError(`Invalid --timeout "${timeout}": expected a positive number of seconds`, "INVALID_ARGUMENT");
    }
    timeoutMs = seconds * 1000;
  }

  return {
    date,
    credentialsPath: flags.get("--credentials") ?? DEFAULT_CREDENTIALS_FILE,
    outDir: flags.get("--out") ?? ".",
    timeoutMs,
  };
}
