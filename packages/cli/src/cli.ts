#!/usr/bin/env -S npx tsx
import { errorMessage } from "@tcx-bridge/shared";
import { handleCommand } from "./utils/exportCommand";

handleCommand(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
