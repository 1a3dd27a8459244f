/**
 * SolarEdge Monitoring API domain types
 *
 * These are what callers get back: numbers are wrapped in quantities,
 * timestamps are zoned, and values the API did not report are `null`.
 */

import type { CalendarDate, CalendarDateTime, ZonedDateTime } from "@internationalized/date";
import type {
  Energy,
  EnergyUnit,
  Power,
  PowerUnit,
  TemperatureCoefficient,
} from "../measurement/quantity";

/**
 * Aggregation period of energy and power series
 */
export enum TimeUnit {
  QUARTER_OF_AN_HOUR = "QUARTER_OF_AN_HOUR",
  HOUR = "HOUR",
  DAY = "DAY",
  WEEK = "WEEK",
  MONTH = "MONTH",
  YEAR = "YEAR",
}

/**
 * Everything the builders need besides the JSON itself
 */
export interface ParseContext {
  /** IANA zone the API's local timestamps are expressed in */
  timeZone: string;
}

// ============================================================================
// Sites
// ============================================================================

export interface Location {
  country: string;
  state: string | null;
  city: string;
  address: string;
  address2: string | null;
  zip: string;
  timeZone: string;
  countryCode: string;
}

/**
 * Model of the site's primary PV module
 */
export interface PrimaryModule {
  manufacturerName: string;
  modelName: string;
  maximumPower: Power;
  temperatureCoef: TemperatureCoefficient;
}

export interface PublicSettings {
  isPublic: boolean;
  name: string | null;
}

export interface SiteDetails {
  id: number;
  name: string;
  accountId: number;
  status: string;
  peakPower: Power;
  lastUpdateTime: CalendarDate;
  installationDate: CalendarDate;
  /** Permission to operate date */
  ptoDate: CalendarDate | null;
  notes: string | null;
  type: string;
  location: Location;
  primaryModule: PrimaryModule | null;
  uris: Record<string, string>;
  publicSettings: PublicSettings;
}

export interface SiteList {
  count: number;
  sites: SiteDetails[];
}

/**
 * First and last day the site produced energy; both null for a site
 * without production data
 */
export interface DataPeriod {
  startDate: CalendarDate | null;
  endDate: CalendarDate | null;
}

// ============================================================================
// Energy and power
// ============================================================================

export interface TimeData {
  energy: Energy;
  /** Revenue in the site's currency, when the site has a tariff configured */
  revenue: number | null;
}

export interface Reading<Q> {
  date: ZonedDateTime;
  /** null when the site reported nothing for this slot */
  value: Q | null;
}

export type EnergyReading = Reading<Energy>;
export type PowerReading = Reading<Power>;

export interface EnergySeries {
  timeUnit: TimeUnit;
  unit: EnergyUnit;
  measuredBy: string | null;
  /** Chronological, as returned by the API */
  values: EnergyReading[];
}

export interface PowerSeries {
  timeUnit: TimeUnit;
  unit: PowerUnit;
  measuredBy: string | null;
  /** Chronological, as returned by the API */
  values: PowerReading[];
}

export interface LifetimeEnergySnapshot {
  date: CalendarDate;
  energy: Energy;
}

export interface TimeFrameEnergy {
  energy: Energy;
  unit: EnergyUnit;
  measuredBy: string | null;
  startLifetimeEnergy: LifetimeEnergySnapshot | null;
  endLifetimeEnergy: LifetimeEnergySnapshot | null;
}

// ============================================================================
// Request parameters
// ============================================================================

/**
 * Inclusive range of site-local days
 */
export interface DateRange {
  startDate: CalendarDate;
  endDate: CalendarDate;
}

/**
 * Range of site-local wall-clock times
 */
export interface TimeRange {
  startTime: CalendarDateTime;
  endTime: CalendarDateTime;
}
