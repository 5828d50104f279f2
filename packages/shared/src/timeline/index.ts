export { parseTimeline, indentTimeline, serializeTimeline, selectPath, childElement, childElements } from './document';
export { parseTimestamp, formatTimestamp, shiftTimestamp } from './timestamp';
export {
  applyTimelinePatch,
  isTimelineCategory,
  resolveTimelinePatch,
  transformTimeline,
} from './transformer';
export type { TimelineActivity, TimelineCategory, TimelinePatch } from './transformer';
