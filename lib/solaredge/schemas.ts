/**
 * Shapes of the raw JSON bodies, one schema per endpoint.
 *
 * Only structure is checked here. Units, ranges and timestamps are handled by
 * the builders through the measurement layer, which knows the field paths.
 */

import { z } from "zod";
import { ParseError } from "../errors";
import { TimeUnit } from "./types";

const locationSchema = z.object({
  country: z.string(),
  state: z.string().nullish(),
  city: z.string(),
  address: z.string(),
  address2: z.string().nullish(),
  zip: z.string(),
  timeZone: z.string(),
  countryCode: z.string(),
});

const primaryModuleSchema = z.object({
  manufacturerName: z.string(),
  modelName: z.string(),
  maximumPower: z.number(),
  temperatureCoef: z.number(),
});

export const siteSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  accountId: z.number().int(),
  status: z.string(),
  peakPower: z.number(),
  lastUpdateTime: z.string(),
  installationDate: z.string(),
  ptoDate: z.string().nullish(),
  notes: z.string().nullish(),
  type: z.string(),
  location: locationSchema,
  primaryModule: primaryModuleSchema.nullish(),
  uris: z.record(z.string()),
  publicSettings: z.object({
    isPublic: z.boolean(),
    name: z.string().nullish(),
  }),
});

export type RawSite = z.infer<typeof siteSchema>;

export const sitesReplySchema = z.object({
  sites: z.object({
    count: z.number().int(),
    site: z.array(siteSchema),
  }),
});

export const siteDetailsReplySchema = z.object({
  details: siteSchema,
});

export const dataPeriodReplySchema = z.object({
  dataPeriod: z.object({
    startDate: z.string().nullish(),
    endDate: z.string().nullish(),
  }),
});

const timeDataSchema = z.object({
  energy: z.number(),
  revenue: z.number().nullish(),
});

export const overviewReplySchema = z.object({
  overview: z.object({
    lastUpdateTime: z.string(),
    lifeTimeData: timeDataSchema,
    lastYearData: timeDataSchema,
    lastMonthData: timeDataSchema,
    lastDayData: timeDataSchema,
    currentPower: z.object({
      power: z.number(),
    }),
    measuredBy: z.string().nullish(),
  }),
});

const seriesValueSchema = z.object({
  date: z.string(),
  value: z.number().nullish(),
});

export type RawSeriesValue = z.infer<typeof seriesValueSchema>;

const seriesSchema = z.object({
  timeUnit: z.nativeEnum(TimeUnit),
  unit: z.string(),
  measuredBy: z.string().nullish(),
  values: z.array(seriesValueSchema),
});

export const energyReplySchema = z.object({
  energy: seriesSchema,
});

export const powerReplySchema = z.object({
  power: seriesSchema,
});

const lifetimeEnergySchema = z.object({
  date: z.string(),
  energy: z.number(),
  unit: z.string(),
});

export const timeFrameEnergyReplySchema = z.object({
  timeFrameEnergy: z.object({
    energy: z.number(),
    unit: z.string(),
    measuredBy: z.string().nullish(),
    startLifetimeEnergy: lifetimeEnergySchema.nullish(),
    endLifetimeEnergy: lifetimeEnergySchema.nullish(),
  }),
});

/**
 * Validate `json` against `schema`, reporting the first mismatch as a
 * ParseError named after the dotted path of the field
 */
export function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown): T {
  const result = schema.safeParse(json);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const field = issue.path.length > 0 ? issue.path.join(".") : "body";
  throw new ParseError(field, issue.message);
}
