import {
  measureEnergy,
  measureOptionalEnergy,
  measureOptionalPower,
  parseEnergyUnit,
  parsePowerUnit,
} from "../measurement/quantity";
import { parseSiteDate, parseSiteDateTime } from "../measurement/time";
import {
  energyReplySchema,
  parseWith,
  powerReplySchema,
  timeFrameEnergyReplySchema,
  type RawSeriesValue,
} from "./schemas";
import type {
  EnergySeries,
  LifetimeEnergySnapshot,
  ParseContext,
  PowerSeries,
  Reading,
  TimeFrameEnergy,
} from "./types";

/**
 * Convert raw series values in API order. Slots without a value stay null.
 */
function buildReadings<Q>(
  values: RawSeriesValue[],
  path: string,
  context: ParseContext,
  measure: (raw: number | null | undefined, field: string) => Q | null,
): Reading<Q>[] {
  return values.map((raw, index) => ({
    date: parseSiteDateTime(raw.date, context.timeZone, `${path}.${index}.date`),
    value: measure(raw.value, `${path}.${index}.value`),
  }));
}

/**
 * Build an energy series from the body of /site/{id}/energy
 */
export function parseEnergySeries(json: unknown, context: ParseContext): EnergySeries {
  const { energy } = parseWith(energyReplySchema, json);
  const unit = parseEnergyUnit(energy.unit, "energy.unit");

  return {
    timeUnit: energy.timeUnit,
    unit,
    measuredBy: energy.measuredBy ?? null,
    values: buildReadings(energy.values, "energy.values", context, (raw, field) =>
      measureOptionalEnergy(raw, unit, field),
    ),
  };
}

/**
 * Build a power series from the body of /site/{id}/power
 */
export function parsePowerSeries(json: unknown, context: ParseContext): PowerSeries {
  const { power } = parseWith(powerReplySchema, json);
  const unit = parsePowerUnit(power.unit, "power.unit");

  return {
    timeUnit: power.timeUnit,
    unit,
    measuredBy: power.measuredBy ?? null,
    values: buildReadings(power.values, "power.values", context, (raw, field) =>
      measureOptionalPower(raw, unit, field),
    ),
  };
}

function buildSnapshot(
  raw: { date: string; energy: number; unit: string } | null | undefined,
  path: string,
): LifetimeEnergySnapshot | null {
  if (!raw) return null;

  return {
    date: parseSiteDate(raw.date, `${path}.date`),
    energy: measureEnergy(raw.energy, parseEnergyUnit(raw.unit, `${path}.unit`), `${path}.energy`),
  };
}

/**
 * Build the total energy of a period from the body of
 * /site/{id}/timeFrameEnergy
 */
export function parseTimeFrameEnergy(json: unknown): TimeFrameEnergy {
  const { timeFrameEnergy } = parseWith(timeFrameEnergyReplySchema, json);
  const unit = parseEnergyUnit(timeFrameEnergy.unit, "timeFrameEnergy.unit");

  return {
    energy: measureEnergy(timeFrameEnergy.energy, unit, "timeFrameEnergy.energy"),
    unit,
    measuredBy: timeFrameEnergy.measuredBy ?? null,
    startLifetimeEnergy: buildSnapshot(
      timeFrameEnergy.startLifetimeEnergy,
      "timeFrameEnergy.startLifetimeEnergy",
    ),
    endLifetimeEnergy: buildSnapshot(
      timeFrameEnergy.endLifetimeEnergy,
      "timeFrameEnergy.endLifetimeEnergy",
    ),
  };
}
