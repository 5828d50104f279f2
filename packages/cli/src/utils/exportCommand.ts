/**
 * tcx-bridge export - log in to Fitbit, pick one activity of a day and write
 * it as an upload-ready TCX file.
 *
 * The login is a one-shot token-in-fragment flow with PKCE: a local listener
 * on port 8080 receives the token, the export runs, the listener stops.
 */

import path from "node:path";
import {
  FitbitClient,
  createExportError,
  createFitbitClientConfig,
  createLogger,
  parseTimeline,
  readCredentials,
  runImplicitSession,
  transformTimeline,
  type ActivitySummary,
  type BrowserLauncher,
  type Logger,
} from "@tcx-bridge/shared";
import { parseExportArgs } from "./args";
import { openBrowser } from "./browser";
import { exportFileName, saveToFile } from "./fileWriter";
import { promptForActivity } from "./prompt";

const HELP = `
Usage: tcx-bridge <command>

Commands:
  export <YYYY-MM-DD>   Export one activity of the given day as TCX
  help                  Show this help

Options for export:
  --credentials <path>  Credentials file (default: credentials.json)
  --out <dir>           Output directory (default: current directory)
  --timeout <seconds>   Stop waiting for the browser login after this long

Examples:
  tcx-bridge export 2024-09-07
  tcx-bridge export 2024-09-07 --out exports --timeout 300
`;

export interface ExportActivityOptions {
  date: string;
  outDir: string;
  logger: Logger;
  chooseActivity: (activities: ActivitySummary[]) => Promise<ActivitySummary>;
}

export function kilometersToMeters(km: number): number {
  // Round to millimetres so 0.57 km does not print as 569.9999999999999
  return Math.round(km * 1_000_000) / 1000;
}

/**
 * Post-login pipeline: list → choose → fetch TCX → transform → save.
 * Returns the written file path.
 */
export async function exportActivity(
  accessToken: string,
  options: ExportActivityOptions
): Promise<string> {
  const client = new FitbitClient(accessToken, options.logger);

  const activities = await client.listActivities(options.date);
  if (activities.length === 0) {
    throw createExportError(`No activities found on ${options.date}`, "INVALID_SELECTION");
  }

  const chosen = await options.chooseActivity(activities);
  const xml = await client.fetchActivityTcx(chosen.logId);

  const output = transformTimeline(parseTimeline(xml), {
    category: chosen.activityParentName,
    durationMs: chosen.duration,
    distanceMeters: kilometersToMeters(chosen.distance),
    calories: chosen.calories,
  });
  options.logger.debug({ bytes: output.length }, "TCX transformed");

  return saveToFile(
    path.join(options.outDir, exportFileName(chosen.activityParentName, chosen.logId)),
    output
  );
}

function printBrowserInstructions(url: string): void {
  console.log("Opening browser for authentication...\n");
  console.log("If the browser didn't open, visit:");
  console.log(`  ${url}\n`);
}

/**
 * Export one activity of a day
 */
async function handleExport(args: string[], launch: BrowserLauncher): Promise<void> {
  const { date, credentialsPath, outDir, timeoutMs } = parseExportArgs(args);
  const credentials = await readCredentials(credentialsPath);
  const logger = createLogger();

  await runImplicitSession({
    config: createFitbitClientConfig(credentials),
    logger,
    timeoutMs,
    openBrowser: async (url) => {
      printBrowserInstructions(url);
      await launch(url);
    },
    onAuthorized: async (accessToken) => {
      const filePath = await exportActivity(accessToken, {
        date,
        outDir,
        logger,
        chooseActivity: promptForActivity,
      });
      console.log(`Data saved to ${filePath}`);
    },
  });

  console.log("Server stopped gracefully");
}

/**
 * Handle command dispatch
 */
export async function handleCommand(
  args: string[],
  launch: BrowserLauncher = openBrowser
): Promise<void> {
  const subcommand: string | undefined = args[0];

  switch (subcommand) {
    case "export":
      await handleExport(args.slice(1), launch);
      break;
    case undefined:
    case "help":
    case "--help":
    case "-h":
      console.log(HELP);
      break;
    default:
      console.log(HELP);
      throw createExportError(`Unknown command: ${subcommand}`, "INVALID_ARGUMENT");
  }
}
