import { now as zonedNow, type ZonedDateTime } from "@internationalized/date";
import { measureEnergy, measurePower, type Power } from "../measurement/quantity";
import { parseSiteDateTime } from "../measurement/time";
import {
  estimateNextUpdate,
  type NextUpdateEstimate,
  type NextUpdateOptions,
} from "../scheduling/next-update";
import { overviewReplySchema, parseWith } from "./schemas";
import type { ParseContext, TimeData } from "./types";

export interface OverviewFields {
  lastUpdateTime: ZonedDateTime;
  lifeTimeData: TimeData;
  lastYearData: TimeData;
  lastMonthData: TimeData;
  lastDayData: TimeData;
  currentPower: Power;
  measuredBy: string | null;
}

/**
 * The overview of a site: current power, and the energy produced today,
 * this month, this year and since installation
 */
export class Overview implements OverviewFields {
  readonly lastUpdateTime: ZonedDateTime;
  readonly lifeTimeData: TimeData;
  readonly lastYearData: TimeData;
  readonly lastMonthData: TimeData;
  readonly lastDayData: TimeData;
  readonly currentPower: Power;
  readonly measuredBy: string | null;

  constructor(fields: OverviewFields) {
    this.lastUpdateTime = fields.lastUpdateTime;
    this.lifeTimeData = fields.lifeTimeData;
    this.lastYearData = fields.lastYearData;
    this.lastMonthData = fields.lastMonthData;
    this.lastDayData = fields.lastDayData;
    this.currentPower = fields.currentPower;
    this.measuredBy = fields.measuredBy;
  }

  /**
   * When new data should be available, based on `lastUpdateTime`.
   * `durationFromNow` is negative when the site is late; wait a little
   * longer or poll right away in that case.
   */
  estimatedNextUpdate(
    now: ZonedDateTime = zonedNow(this.lastUpdateTime.timeZone),
    options?: NextUpdateOptions,
  ): NextUpdateEstimate {
    return estimateNextUpdate(this.lastUpdateTime, now, options);
  }
}

function buildTimeData(raw: { energy: number; revenue?: number | null }, path: string): TimeData {
  return {
    energy: measureEnergy(raw.energy, "Wh", `${path}.energy`),
    revenue: raw.revenue ?? null,
  };
}

/**
 * Build the overview from the body of /site/{id}/overview
 */
export function parseOverview(json: unknown, context: ParseContext): Overview {
  const { overview } = parseWith(overviewReplySchema, json);

  return new Overview({
    lastUpdateTime: parseSiteDateTime(
      overview.lastUpdateTime,
      context.timeZone,
      "overview.lastUpdateTime",
    ),
    lifeTimeData: buildTimeData(overview.lifeTimeData, "overview.lifeTimeData"),
    lastYearData: buildTimeData(overview.lastYearData, "overview.lastYearData"),
    lastMonthData: buildTimeData(overview.lastMonthData, "overview.lastMonthData"),
    lastDayData: buildTimeData(overview.lastDayData, "overview.lastDayData"),
    currentPower: measurePower(overview.currentPower.power, "W", "overview.currentPower.power"),
    measuredBy: overview.measuredBy ?? null,
  });
}
