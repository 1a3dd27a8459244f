import { getLocalTimeZone } from "@internationalized/date";
import { ERROR_MESSAGES, SOLAREDGE_API_CONFIG, USAGE_LIMITS } from "../../config";
import { ApiError, ParseError, RequestValidationError, TransportError } from "../errors";
import { createConsoleLogger, redactApiKey, type Logger } from "../logger";
import { formatDateISO, formatSiteDateTime } from "../measurement/time";
import { parseOverview, type Overview } from "./overview";
import { parseEnergySeries, parsePowerSeries, parseTimeFrameEnergy } from "./series";
import { parseDataPeriod, parseSiteDetails, parseSiteList } from "./site";
import { FetchTransport, type HttpResponse, type HttpTransport } from "./transport";
import {
  TimeUnit,
  type DataPeriod,
  type DateRange,
  type EnergySeries,
  type PowerSeries,
  type SiteDetails,
  type SiteList,
  type TimeFrameEnergy,
  type TimeRange,
} from "./types";

/**
 * SOLAREDGE MONITORING API NOTES
 *
 * - Authentication is an API key passed as the `api_key` query parameter.
 *   It is created in the monitoring portal (Admin > Site Access).
 * - All endpoints used here are read-only GETs returning JSON.
 * - Timestamps are site-local wall-clock strings without an offset, so the
 *   client needs to know the site's time zone to place them in time.
 * - Requests are rate limited per hour. Measurements only change about every
 *   15 minutes, see Overview.estimatedNextUpdate for when to poll again.
 * - Energy at DAY resolution is limited to one year per request, energy at
 *   QUARTER_OF_AN_HOUR or HOUR resolution and power to one month.
 */

export interface ISolarEdgeClient {
  listSites(apiKey: string): Promise<SiteList>;
  getSiteDetails(apiKey: string, siteId: number): Promise<SiteDetails>;
  getDataPeriod(apiKey: string, siteId: number): Promise<DataPeriod>;
  getOverview(apiKey: string, siteId: number): Promise<Overview>;
  getEnergy(
    apiKey: string,
    siteId: number,
    range: DateRange,
    timeUnit: TimeUnit,
  ): Promise<EnergySeries>;
  getTimeFrameEnergy(apiKey: string, siteId: number, range: DateRange): Promise<TimeFrameEnergy>;
  getPower(apiKey: string, siteId: number, range: TimeRange): Promise<PowerSeries>;
}

export interface SolarEdgeClientOptions {
  baseUrl?: string;
  transport?: HttpTransport;
  /** Time zone of the site(s) queried; defaults to the local zone */
  timeZone?: string;
  logger?: Logger;
}

interface SpanLimit {
  months?: number;
  years?: number;
}

export class SolarEdgeClient implements ISolarEdgeClient {
  private baseUrl: string;
  private transport: HttpTransport;
  private timeZone: string;
  private logger: Logger;

  constructor(options: SolarEdgeClientOptions = {}) {
    const timeZone = options.timeZone ?? getLocalTimeZone();
    if (!isValidTimeZone(timeZone)) {
      throw new RequestValidationError("timeZone", `unknown time zone "${timeZone}"`);
    }

    this.baseUrl = (options.baseUrl ?? SOLAREDGE_API_CONFIG.baseUrl).replace(/\/+$/, "");
    this.transport = options.transport ?? new FetchTransport();
    this.timeZone = timeZone;
    this.logger = options.logger ?? createConsoleLogger();
  }

  /**
   * List all sites of the account. Each site's id can be passed to the
   * other methods.
   */
  async listSites(apiKey: string): Promise<SiteList> {
    this.logger.debug("Getting list of sites");
    return this.call(apiKey, "/sites/list", {}, parseSiteList);
  }

  /**
   * Site details such as name, location, status and peak power
   */
  async getSiteDetails(apiKey: string, siteId: number): Promise<SiteDetails> {
    requireSiteId(siteId);
    this.logger.debug(`Getting details of site ${siteId}`);
    return this.call(apiKey, `/site/${siteId}/details`, {}, parseSiteDetails);
  }

  /**
   * First and last day the site produced energy
   */
  async getDataPeriod(apiKey: string, siteId: number): Promise<DataPeriod> {
    requireSiteId(siteId);
    this.logger.debug(`Getting data period of site ${siteId}`);
    return this.call(apiKey, `/site/${siteId}/dataPeriod`, {}, parseDataPeriod);
  }

  /**
   * Current power and the energy of today, this month, this year and
   * lifetime
   */
  async getOverview(apiKey: string, siteId: number): Promise<Overview> {
    requireSiteId(siteId);
    this.logger.debug(`Getting overview of site ${siteId}`);
    return this.call(apiKey, `/site/${siteId}/overview`, {}, (json) =>
      parseOverview(json, { timeZone: this.timeZone }),
    );
  }

  /**
   * Energy per `timeUnit` over an inclusive range of days
   */
  async getEnergy(
    apiKey: string,
    siteId: number,
    range: DateRange,
    timeUnit: TimeUnit,
  ): Promise<EnergySeries> {
    requireSiteId(siteId);
    requireDateRange(range, energySpanLimit(timeUnit));
    this.logger.debug(
      `Getting energy of site ${siteId} for ${formatDateISO(range.startDate)}..${formatDateISO(range.endDate)} per ${timeUnit}`,
    );

    const params = {
      startDate: formatDateISO(range.startDate),
      endDate: formatDateISO(range.endDate),
      timeUnit,
    };
    return this.call(apiKey, `/site/${siteId}/energy`, params, (json) =>
      parseEnergySeries(json, { timeZone: this.timeZone }),
    );
  }

  /**
   * Total energy produced over an inclusive range of days
   */
  async getTimeFrameEnergy(
    apiKey: string,
    siteId: number,
    range: DateRange,
  ): Promise<TimeFrameEnergy> {
    requireSiteId(siteId);
    requireDateRange(range);
    this.logger.debug(
      `Getting energy of site ${siteId} for period ${formatDateISO(range.startDate)}..${formatDateISO(range.endDate)}`,
    );

    const params = {
      startDate: formatDateISO(range.startDate),
      endDate: formatDateISO(range.endDate),
    };
    return this.call(apiKey, `/site/${siteId}/timeFrameEnergy`, params, parseTimeFrameEnergy);
  }

  /**
   * Power in 15 minute resolution between two site-local times
   */
  async getPower(apiKey: string, siteId: number, range: TimeRange): Promise<PowerSeries> {
    requireSiteId(siteId);
    requireTimeRange(range, { months: USAGE_LIMITS.powerMaxMonths });

    const params = {
      startTime: formatSiteDateTime(range.startTime),
      endTime: formatSiteDateTime(range.endTime),
    };
    this.logger.debug(`Getting power of site ${siteId} for ${params.startTime}..${params.endTime}`);

    return this.call(apiKey, `/site/${siteId}/power`, params, (json) =>
      parsePowerSeries(json, { timeZone: this.timeZone }),
    );
  }

  /**
   * One round trip: build the URL, GET it, map the outcome to a model or to
   * one of TransportError, ApiError, ParseError
   */
  private async call<T>(
    apiKey: string,
    path: string,
    params: Record<string, string>,
    build: (json: unknown) => T,
  ): Promise<T> {
    requireApiKey(apiKey);

    const query = new URLSearchParams({ api_key: apiKey, ...params });
    const url = `${this.baseUrl}${path}?${query}`;
    const loggedUrl = redactApiKey(url);
    this.logger.trace(`Calling ${loggedUrl}`);

    let response: HttpResponse;
    try {
      response = await this.transport.get(url);
    } catch (error) {
      this.logger.error(`${ERROR_MESSAGES.NETWORK_ERROR} (${path})`, error);
      if (error instanceof TransportError) throw error;
      throw new TransportError(`${ERROR_MESSAGES.NETWORK_ERROR} ${describeError(error)}`, loggedUrl, {
        cause: error,
      });
    }

    this.logger.trace(`Reply ${response.status} from ${path}: ${response.body}`);

    if (response.status < 200 || response.status >= 300) {
      const error = new ApiError(response.status, extractErrorMessage(response), response.body);
      if (error.isForbidden) {
        this.logger.warn(`${ERROR_MESSAGES.FORBIDDEN} (${error.message})`);
      } else if (error.isRateLimited) {
        this.logger.warn(`${ERROR_MESSAGES.RATE_LIMITED} (${error.message})`);
      } else {
        this.logger.warn(`${path} failed with HTTP ${response.status}: ${error.message}`);
      }
      throw error;
    }

    try {
      return build(decodeJson(response.body));
    } catch (error) {
      if (error instanceof ParseError) {
        this.logger.warn(`${ERROR_MESSAGES.INVALID_RESPONSE} ${error.message}`);
      }
      throw error;
    }
  }
}

// ============================================================================
// Validation
// ============================================================================

function requireApiKey(apiKey: string): void {
  if (apiKey.trim() === "") {
    throw new RequestValidationError("apiKey", "must not be empty");
  }
}

function requireSiteId(siteId: number): void {
  if (!Number.isInteger(siteId) || siteId <= 0) {
    throw new RequestValidationError("siteId", `must be a positive integer, got ${siteId}`);
  }
}

function describeSpan(limit: SpanLimit): string {
  if (limit.years) return `${limit.years} year(s)`;
  return `${limit.months ?? 0} month(s)`;
}

function energySpanLimit(timeUnit: TimeUnit): SpanLimit | undefined {
  switch (timeUnit) {
    case TimeUnit.QUARTER_OF_AN_HOUR:
    case TimeUnit.HOUR:
      return { months: USAGE_LIMITS.intradayEnergyMaxMonths };
    case TimeUnit.DAY:
      return { years: USAGE_LIMITS.dailyEnergyMaxYears };
    default:
      return undefined;
  }
}

/**
 * An inclusive day range is non-empty as long as start is not after end
 */
function requireDateRange(range: DateRange, limit?: SpanLimit): void {
  const { startDate, endDate } = range;
  if (startDate.compare(endDate) > 0) {
    throw new RequestValidationError(
      "range",
      `startDate ${formatDateISO(startDate)} is after endDate ${formatDateISO(endDate)}`,
    );
  }
  if (limit && startDate.add(limit).compare(endDate) < 0) {
    throw new RequestValidationError("range", `may span at most ${describeSpan(limit)}`);
  }
}

function requireTimeRange(range: TimeRange, limit: SpanLimit): void {
  const { startTime, endTime } = range;
  if (startTime.compare(endTime) >= 0) {
    throw new RequestValidationError(
      "range",
      `startTime ${formatSiteDateTime(startTime)} must be before endTime ${formatSiteDateTime(endTime)}`,
    );
  }
  if (startTime.add(limit).compare(endTime) < 0) {
    throw new RequestValidationError("range", `may span at most ${describeSpan(limit)}`);
  }
}

// ============================================================================
// Response helpers
// ============================================================================

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function decodeJson(body: string): unknown {
  const json = tryParseJson(body);
  if (json === undefined) {
    throw new ParseError("body", "response is not valid JSON");
  }
  return json;
}

/**
 * Error bodies are JSON with a `message` (or `String`) field on most
 * endpoints; anything else is used as is
 */
function extractErrorMessage(response: HttpResponse): string {
  const text = response.body.trim();
  const json = tryParseJson(text);

  if (typeof json === "object" && json !== null) {
    for (const key of ["message", "String"]) {
      const value: unknown = Reflect.get(json, key);
      if (typeof value === "string" && value.trim() !== "") {
        return value;
      }
    }
  }

  return text || `HTTP ${response.status}`;
}
