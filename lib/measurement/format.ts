/**
 * Display formatting for power and energy quantities
 * Pure functions, kept apart from parsing so they are easy to test
 */

import {
  isEnergyUnit,
  isPowerUnit,
  type Energy,
  type EnergyUnit,
  type Power,
  type PowerUnit,
} from "./quantity";

export type FormattedValue = {
  value: string;
  unit: string;
};

const SI_STEPS = [
  { scale: 1_000_000_000, prefix: "G" },
  { scale: 1_000_000, prefix: "M" },
  { scale: 1_000, prefix: "k" },
] as const;

function formatScaled(base: number, baseUnit: "W" | "Wh"): FormattedValue {
  const step = SI_STEPS.find(({ scale }) => Math.abs(base) >= scale) ?? SI_STEPS[2];
  return { value: (base / step.scale).toFixed(1), unit: `${step.prefix}${baseUnit}` };
}

/**
 * Format a quantity with one decimal. Without `unit` the SI prefix is chosen
 * by magnitude: kilo below one mega-unit, then mega, then giga.
 *
 * @example
 * formatQuantity(watts(1500))              // { value: "1.5", unit: "kW" }
 * formatQuantity(wattHours(19191678))      // { value: "19.2", unit: "MWh" }
 * formatQuantity(wattHours(1500), "Wh")    // { value: "1500.0", unit: "Wh" }
 * formatQuantity(null)                     // { value: "—", unit: "" }
 */
export function formatQuantity(quantity: Power | null | undefined, unit?: PowerUnit): FormattedValue;
export function formatQuantity(quantity: Energy | null | undefined, unit?: EnergyUnit): FormattedValue;
export function formatQuantity(
  quantity: Power | Energy | null | undefined,
  unit?: PowerUnit | EnergyUnit,
): FormattedValue;
export function formatQuantity(
  quantity: Power | Energy | null | undefined,
  unit?: PowerUnit | EnergyUnit,
): FormattedValue {
  if (quantity === null || quantity === undefined) {
    return { value: "—", unit: "" };
  }

  if (quantity.dimension === "power") {
    if (unit !== undefined && isPowerUnit(unit)) {
      return { value: quantity.to(unit).toFixed(1), unit };
    }
    return formatScaled(quantity.to("W"), "W");
  }

  if (unit !== undefined && isEnergyUnit(unit)) {
    return { value: quantity.to(unit).toFixed(1), unit };
  }
  return formatScaled(quantity.to("Wh"), "Wh");
}

/**
 * "1.5 kW", or just "—" when there is no value
 */
export function formatQuantityText(quantity: Power | Energy | null | undefined): string {
  const { value, unit } = formatQuantity(quantity);
  return unit ? `${value} ${unit}` : value;
}
