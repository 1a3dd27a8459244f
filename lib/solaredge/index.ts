/**
 * SolarEdge Monitoring API client and response models
 */

export { SolarEdgeClient } from "./client";
export type { ISolarEdgeClient, SolarEdgeClientOptions } from "./client";

export { FetchTransport } from "./transport";
export type { HttpTransport, HttpResponse, FetchTransportOptions } from "./transport";

export { Overview, parseOverview } from "./overview";
export type { OverviewFields } from "./overview";
export { parseSiteList, parseSiteDetails, parseDataPeriod } from "./site";
export { parseEnergySeries, parsePowerSeries, parseTimeFrameEnergy } from "./series";

export { TimeUnit } from "./types";
export type {
  ParseContext,
  Location,
  PrimaryModule,
  PublicSettings,
  SiteDetails,
  SiteList,
  DataPeriod,
  TimeData,
  Reading,
  EnergyReading,
  PowerReading,
  EnergySeries,
  PowerSeries,
  LifetimeEnergySnapshot,
  TimeFrameEnergy,
  DateRange,
  TimeRange,
} from "./types";
