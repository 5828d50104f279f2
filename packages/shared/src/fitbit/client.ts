/**
 * Fitbit Web API client for the two calls the export needs:
 * - the activity list of one day
 * - the TCX export of one logged activity
 */

import { API_TIMEOUT_MS, FITBIT_API_BASE_URL } from "../constants";
import { createExportError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { ActivityListSchema, type ActivitySummary } from "./types";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isActivityDate(value: string): boolean {
  return DATE_PATTERN.test(value);
}

export class FitbitClient {
  constructor(
    private readonly accessToken: string,
    private readonly logger: Logger,
    private readonly baseUrl: string = FITBIT_API_BASE_URL
  ) {}

  private async request(path: string, accept: string): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          Accept: accept,
        },
        signal: AbortSignal.timeout(API_TIMEOUT_MS),
      });
    } catch (error) {
      throw createExportError(`Failed to fetch ${path}: ${errorMessage(error)}`, "UPSTREAM", error);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "");
      throw createExportError(`Fitbit API failed: ${response.status} GET ${path} ${errorText}`.trim(), "UPSTREAM");
    }
    return response;
  }

  /**
   * Activities logged on a date (YYYY-MM-DD)
   */
  async listActivities(date: string): Promise<ActivitySummary[]> {
    if (!isActivityDate(date)) {
      throw createExportError(`Invalid date "${date}". Give a date in a format YYYY-MM-DD.`, "INVALID_ARGUMENT");
    }

    this.logger.info(`Fetching activities for ${date}...`);
    const response = await this.request(`/activities/date/${date}.json`, "application/json");

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw createExportError(`Activity list is not valid JSON: ${errorMessage(error)}`, "MALFORMED_PAYLOAD", error);
    }

    const parsed = ActivityListSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw createExportError(
        `Unexpected activity list payload at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown error"}`,
        "MALFORMED_PAYLOAD"
      );
    }

    this.logger.debug({ count: parsed.data.activities.length }, "Activity list received");
    return parsed.data.activities;
  }

  /**
   * TCX export of one activity, including partial exports of activities
   * recorded without GPS
   */
  async fetchActivityTcx(logId: number): Promise<string> {
    this.logger.info(`Fetching TCX for activity ${logId}...`);
    const response = await this.request(
      `/activities/${logId}.tcx?includePartialTCX=true`,
      "application/vnd.garmin.tcx+xml, application/xml"
    );
    return response.text();
  }
}
