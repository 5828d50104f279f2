/**
 * Timeline transformer: repairs Fitbit TCX exports so strict importers
 * (Strava among them) accept them.
 *
 * Swim exports arrive without any Lap/Track, so a lap with a two-point track
 * is synthesized from the summary. Treadmill and Weights exports only lack
 * the device name. Every other category passes through unchanged.
 *
 * The transformation is not idempotent: patching a patched document adds the
 * elements again.
 */

import { DEVICE_NAME } from "../constants";
import { createExportError } from "../errors";
import {
  appendElement,
  childElement,
  childElements,
  createElementFor,
  indentTimeline,
  selectPath,
  serializeTimeline,
} from "./document";
import { shiftTimestamp } from "./timestamp";

export type TimelineCategory = "Swim" | "Treadmill" | "Weights";

export type TimelinePatch =
  | { kind: "synthesize-lap"; category: "Swim" }
  | { kind: "device-name"; category: "Treadmill" | "Weights" }
  | { kind: "none" };

export interface TimelineActivity {
  category: string;
  durationMs: number;
  distanceMeters: number;
  calories: number;
}

const TIMELINE_PATCHES: Record<TimelineCategory, TimelinePatch> = {
  Swim: { kind: "synthesize-lap", category: "Swim" },
  Treadmill: { kind: "device-name", category: "Treadmill" },
  Weights: { kind: "device-name", category: "Weights" },
};

const ACTIVITY_PATH = ["TrainingCenterDatabase", "Activities", "Activity"];

// Activity_t children that come after the laps
const AFTER_LAPS = new Set(["Notes", "Training", "Creator", "Extensions"]);

export function isTimelineCategory(category: string): category is TimelineCategory {
  return Object.hasOwn(TIMELINE_PATCHES, category);
}

export function resolveTimelinePatch(category: string): TimelinePatch {
  return isTimelineCategory(category) ? TIMELINE_PATCHES[category] : { kind: "none" };
}

function findActivity(document: Document): Element {
  const activity = selectPath(document, ACTIVITY_PATH);
  if (!activity) {
    throw createExportError(`TCX document has no ${ACTIVITY_PATH.join("/")} element`, "MALFORMED_TIMELINE");
  }
  return activity;
}

/**
 * Device_t requires Name before UnitId/ProductID/Version.
 */
function addDeviceName(activity: Element): void {
  const creator = childElement(activity, "Creator");
  if (!creator) {
    throw createExportError("TCX activity has no Creator element", "MALFORMED_TIMELINE");
  }
  const name = createElementFor(creator, "Name", DEVICE_NAME);
  creator.insertBefore(name, childElements(creator)[0] ?? null);
}

function synthesizeLap(activity: Element, timeline: TimelineActivity): void {
  activity.setAttribute("Sport", timeline.category);
  const startId = (childElement(activity, "Id")?.textContent ?? "").trim();
  addDeviceName(activity);

  const startTime = shiftTimestamp(startId, 0);
  // only whole seconds of the duration are added
  const endTime = shiftTimestamp(startId, Math.floor(timeline.durationMs / 1000) * 1000);
  const distance = String(timeline.distanceMeters);

  const lap = createElementFor(activity, "Lap");
  lap.setAttribute("StartTime", startTime);
  appendElement(lap, "TotalTimeSeconds", String(timeline.durationMs / 1000));
  appendElement(lap, "DistanceMeters", distance);
  appendElement(lap, "Calories", String(timeline.calories));
  appendElement(lap, "Intensity", "Active");
  appendElement(lap, "TriggerMethod", "Manual");

  const track = appendElement(lap, "Track");
  const first = appendElement(track, "Trackpoint");
  appendElement(first, "Time", startTime);
  appendElement(first, "DistanceMeters", "0");
  const last = appendElement(track, "Trackpoint");
  appendElement(last, "Time", endTime);
  appendElement(last, "DistanceMeters", distance);

  const before = childElements(activity).find((child) => AFTER_LAPS.has(child.localName)) ?? null;
  activity.insertBefore(lap, before);
}

/**
 * Apply the category's patch in place.
 */
export function applyTimelinePatch(document: Document, timeline: TimelineActivity): TimelinePatch {
  const patch = resolveTimelinePatch(timeline.category);
  switch (patch.kind) {
    case "synthesize-lap":
      synthesizeLap(findActivity(document), timeline);
      break;
    case "device-name":
      addDeviceName(findActivity(document));
      break;
    case "none":
      break;
    default: {
      const unreachable: never = patch;
      throw new Error(`Unhandled timeline patch: ${JSON.stringify(unreachable)}`);
    }
  }
  return patch;
}

/**
 * Patch, re-indent with 2 spaces and serialize.
 */
export function transformTimeline(document: Document, timeline: TimelineActivity): string {
  applyTimelinePatch(document, timeline);
  indentTimeline(document, 2);
  return serializeTimeline(document);
}
