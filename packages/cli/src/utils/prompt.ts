import { createInterface } from "node:readline/promises";
import { createExportError, type ActivitySummary } from "@tcx-bridge/shared";

export function formatActivityList(activities: ActivitySummary[]): string {
  return activities
    .map((activity, index) =>
      [
        `ID: ${index + 1}`,
        `Activity Name: ${activity.name || activity.activityParentName}`,
        `Distance: ${activity.distance.toFixed(2)}`,
        `Start date: ${activity.startDate} ${activity.startTime}`,
        "-------------",
      ].join("\n")
    )
    .join("\n");
}

/**
 * Turn the typed answer into a zero-based index
 */
export function parseActivityChoice(input: string, count: number): number {
  const trimmed = input.trim();
  const choice = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isInteger(choice) || choice < 1 || choice > count) {
    throw createExportError(
      `Invalid choice "${trimmed}". Please enter a number between 1 and ${count}.`,
      "INVALID_SELECTION"
    );
  }
  return choice - 1;
}

export async function promptForActivity(activities: ActivitySummary[]): Promise<ActivitySummary> {
  console.log("Available Activities:");
  console.log(formatActivityList(activities));

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question("Enter the number of the activity you want to choose: ");
    const chosen = activities[parseActivityChoice(answer, activities.length)];
    console.log(`You selected: ${chosen.activityParentName} ${chosen.startDate} ${chosen.startTime}`);
    return chosen;
  } finally {
    rl.close();
  }
}
