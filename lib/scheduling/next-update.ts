import type { ZonedDateTime } from "@internationalized/date";
import { POLLING_CONFIG } from "../../config";
import { durationBetween, milliseconds, type Milliseconds } from "../measurement/time";

/**
 * When the API should have a fresh measurement, and how long until then
 */
export interface NextUpdateEstimate {
  nextUpdate: ZonedDateTime;
  /** Negative when `now` is already past `nextUpdate` */
  durationFromNow: Milliseconds;
}

export interface NextUpdateOptions {
  refreshIntervalMinutes?: number;
  graceSeconds?: number;
}

/**
 * Estimate when the next measurement will be published.
 *
 * Sites report about once per refresh interval; the grace margin allows for
 * the upload being a little late. Advisory only: the server enforces the real
 * request quota and answers 429 once it is used up.
 */
export function estimateNextUpdate(
  lastReading: ZonedDateTime,
  now: ZonedDateTime,
  options: NextUpdateOptions = {},
): NextUpdateEstimate {
  const refreshIntervalMinutes =
    options.refreshIntervalMinutes ?? POLLING_CONFIG.refreshIntervalMinutes;
  const graceSeconds = options.graceSeconds ?? POLLING_CONFIG.graceSeconds;

  const nextUpdate = lastReading.add({
    minutes: refreshIntervalMinutes,
    seconds: graceSeconds,
  });

  return {
    nextUpdate,
    durationFromNow: durationBetween(now, nextUpdate),
  };
}

/**
 * How long to wait before polling again; zero means poll immediately
 */
export function pollDelay(estimate: NextUpdateEstimate): Milliseconds {
  return milliseconds(Math.max(0, estimate.durationFromNow));
}
