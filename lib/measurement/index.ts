/**
 * Measurement layer: quantities, site-local time and display formatting
 */

export {
  Quantity,
  watts,
  kilowatts,
  wattHours,
  kilowattHours,
  megawattHours,
  measurePower,
  measureEnergy,
  measureTemperatureCoefficient,
  measureOptionalPower,
  measureOptionalEnergy,
  isPowerUnit,
  isEnergyUnit,
  parsePowerUnit,
  parseEnergyUnit,
} from "./quantity";
export type {
  Dimension,
  UnitsOf,
  PowerUnit,
  EnergyUnit,
  Power,
  Energy,
  TemperatureCoefficient,
} from "./quantity";

export {
  milliseconds,
  seconds,
  minutes,
  durationBetween,
  parseSiteDate,
  parseSiteDateTime,
  formatDateISO,
  formatSiteDateTime,
} from "./time";
export type { Milliseconds } from "./time";

export { formatQuantity, formatQuantityText } from "./format";
export type { FormattedValue } from "./format";
