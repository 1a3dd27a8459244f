import {
  measurePower,
  measureTemperatureCoefficient,
} from "../measurement/quantity";
import { parseSiteDate } from "../measurement/time";
import {
  dataPeriodReplySchema,
  parseWith,
  siteDetailsReplySchema,
  sitesReplySchema,
  type RawSite,
} from "./schemas";
import type { DataPeriod, SiteDetails, SiteList } from "./types";

// peakPower is reported in kW, the module's maximumPower in W
function buildSite(raw: RawSite, path: string): SiteDetails {
  const primaryModule = raw.primaryModule
    ? {
        manufacturerName: raw.primaryModule.manufacturerName,
        modelName: raw.primaryModule.modelName,
        maximumPower: measurePower(
          raw.primaryModule.maximumPower,
          "W",
          `${path}.primaryModule.maximumPower`,
        ),
        temperatureCoef: measureTemperatureCoefficient(
          raw.primaryModule.temperatureCoef,
          `${path}.primaryModule.temperatureCoef`,
        ),
      }
    : null;

  return {
    id: raw.id,
    name: raw.name,
    accountId: raw.accountId,
    status: raw.status,
    peakPower: measurePower(raw.peakPower, "kW", `${path}.peakPower`),
    lastUpdateTime: parseSiteDate(raw.lastUpdateTime, `${path}.lastUpdateTime`),
    installationDate: parseSiteDate(raw.installationDate, `${path}.installationDate`),
    ptoDate: raw.ptoDate == null ? null : parseSiteDate(raw.ptoDate, `${path}.ptoDate`),
    notes: raw.notes ?? null,
    type: raw.type,
    location: {
      country: raw.location.country,
      state: raw.location.state ?? null,
      city: raw.location.city,
      address: raw.location.address,
      address2: raw.location.address2 ?? null,
      zip: raw.location.zip,
      timeZone: raw.location.timeZone,
      countryCode: raw.location.countryCode,
    },
    primaryModule,
    uris: raw.uris,
    publicSettings: {
      isPublic: raw.publicSettings.isPublic,
      name: raw.publicSettings.name ?? null,
    },
  };
}

/**
 * Build the site list from the body of /sites/list
 */
export function parseSiteList(json: unknown): SiteList {
  const reply = parseWith(sitesReplySchema, json);
  return {
    count: reply.sites.count,
    sites: reply.sites.site.map((site, index) => buildSite(site, `sites.site.${index}`)),
  };
}

/**
 * Build site details from the body of /site/{id}/details
 */
export function parseSiteDetails(json: unknown): SiteDetails {
  const reply = parseWith(siteDetailsReplySchema, json);
  return buildSite(reply.details, "details");
}

/**
 * Build the data period from the body of /site/{id}/dataPeriod
 */
export function parseDataPeriod(json: unknown): DataPeriod {
  const { dataPeriod } = parseWith(dataPeriodReplySchema, json);
  return {
    startDate:
      dataPeriod.startDate == null
        ? null
        : parseSiteDate(dataPeriod.startDate, "dataPeriod.startDate"),
    endDate:
      dataPeriod.endDate == null ? null : parseSiteDate(dataPeriod.endDate, "dataPeriod.endDate"),
  };
}
