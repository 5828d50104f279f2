import { z } from "zod";

// One entry of GET /activities/date/<date>.json. Fields the export does not
// read are passed through untouched.
export const ActivitySummarySchema = z
  .object({
    logId: z.number().int(),
    activityParentName: z.string(),
    name: z.string().default(""),
    calories: z.number().default(0),
    distance: z.number().default(0),      // km for metric accounts
    duration: z.number().default(0),      // milliseconds
    startDate: z.string().default(""),
    startTime: z.string().default(""),
  })
  .passthrough();

export const ActivityListSchema = z.object({
  activities: z.array(ActivitySummarySchema),
});

export type ActivitySummary = z.infer<typeof ActivitySummarySchema>;
export type ActivityList = z.infer<typeof ActivityListSchema>;
