/**
 * Unit-bearing quantities
 *
 * The API sends bare numbers and leaves the unit implied by the field name.
 * Everything that leaves the parsing layer is wrapped in a `Quantity` whose
 * dimension and unit are fixed at construction. Unit conversion happens here
 * and nowhere else.
 */

import { ParseError } from "../errors";

export type Dimension = "power" | "energy" | "temperatureCoefficient";

export interface UnitsOf {
  power: "W" | "kW" | "MW";
  energy: "Wh" | "kWh" | "MWh";
  temperatureCoefficient: "%/°C";
}

export type PowerUnit = UnitsOf["power"];
export type EnergyUnit = UnitsOf["energy"];

/**
 * Factor from each unit to the base unit of its dimension (W, Wh, %/°C)
 */
const UNIT_FACTORS: { [D in Dimension]: Record<UnitsOf[D], number> } = {
  power: { W: 1, kW: 1_000, MW: 1_000_000 },
  energy: { Wh: 1, kWh: 1_000, MWh: 1_000_000 },
  temperatureCoefficient: { "%/°C": 1 },
};

export class Quantity<D extends Dimension> {
  private constructor(
    public readonly dimension: D,
    public readonly value: number,
    public readonly unit: UnitsOf[D],
  ) {}

  static of<D extends Dimension>(
    dimension: D,
    value: number,
    unit: UnitsOf[D],
  ): Quantity<D> {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Quantity value must be finite, got ${value}`);
    }
    return new Quantity(dimension, value, unit);
  }

  /**
   * Numeric value expressed in `unit`
   */
  to(unit: UnitsOf[D]): number {
    if (unit === this.unit) return this.value;
    return roundConversion(
      (this.value * factor(this.dimension, this.unit)) / factor(this.dimension, unit),
    );
  }

  convert(unit: UnitsOf[D]): Quantity<D> {
    return new Quantity(this.dimension, this.to(unit), unit);
  }

  /**
   * Equal when both have the same dimension and the same value in base units.
   * A power and an energy never compare equal, whatever their numbers.
   */
  equals(other: Quantity<Dimension>): boolean {
    return other.dimension === this.dimension && other.baseValue() === this.baseValue();
  }

  /**
   * Negative when this is smaller than `other`, 0 when equal, positive otherwise
   */
  compare(other: Quantity<D>): number {
    return this.baseValue() - other.baseValue();
  }

  /**
   * Sum expressed in this quantity's unit
   */
  add(other: Quantity<D>): Quantity<D> {
    return new Quantity(this.dimension, this.value + other.to(this.unit), this.unit);
  }

  toString(): string {
    return `${this.value} ${this.unit}`;
  }

  private baseValue(): number {
    return roundConversion(this.value * factor(this.dimension, this.unit));
  }
}

// 1.001 kW * 1000 is 1000.9999999999999 W in binary floating point; rounding
// to 15 significant digits drops the representation error
function roundConversion(value: number): number {
  return Number(value.toPrecision(15));
}

function factor<D extends Dimension>(dimension: D, unit: UnitsOf[D]): number {
  const factors: Record<UnitsOf[D], number> = UNIT_FACTORS[dimension];
  return factors[unit];
}

export type Power = Quantity<"power">;
export type Energy = Quantity<"energy">;
export type TemperatureCoefficient = Quantity<"temperatureCoefficient">;

export const watts = (value: number): Power => Quantity.of("power", value, "W");
export const kilowatts = (value: number): Power => Quantity.of("power", value, "kW");
export const wattHours = (value: number): Energy => Quantity.of("energy", value, "Wh");
export const kilowattHours = (value: number): Energy => Quantity.of("energy", value, "kWh");
export const megawattHours = (value: number): Energy => Quantity.of("energy", value, "MWh");

// ============================================================================
// Parsing raw JSON values
// ============================================================================

function requireNumber(raw: unknown, field: string): number {
  if (raw === undefined || raw === null) {
    throw new ParseError(field, "value is missing");
  }
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    throw new ParseError(field, `expected a number, got ${JSON.stringify(raw)}`);
  }
  return raw;
}

function requireNonNegative(value: number, field: string): number {
  if (value < 0) {
    throw new ParseError(field, `expected a non-negative value, got ${value}`);
  }
  return value;
}

export function measurePower(raw: unknown, unit: PowerUnit, field: string): Power {
  return Quantity.of("power", requireNonNegative(requireNumber(raw, field), field), unit);
}

export function measureEnergy(raw: unknown, unit: EnergyUnit, field: string): Energy {
  return Quantity.of("energy", requireNonNegative(requireNumber(raw, field), field), unit);
}

export function measureTemperatureCoefficient(
  raw: unknown,
  field: string,
): TemperatureCoefficient {
  return Quantity.of("temperatureCoefficient", requireNumber(raw, field), "%/°C");
}

/**
 * `null` or `undefined` means "not reported" and stays `null`. It is never
 * turned into a zero reading.
 */
export function measureOptionalPower(
  raw: unknown,
  unit: PowerUnit,
  field: string,
): Power | null {
  return raw === null || raw === undefined ? null : measurePower(raw, unit, field);
}

export function measureOptionalEnergy(
  raw: unknown,
  unit: EnergyUnit,
  field: string,
): Energy | null {
  return raw === null || raw === undefined ? null : measureEnergy(raw, unit, field);
}

function isUnitOf<D extends Dimension>(dimension: D, raw: unknown): raw is UnitsOf[D] {
  return typeof raw === "string" && Object.keys(UNIT_FACTORS[dimension]).includes(raw);
}

export function isPowerUnit(raw: unknown): raw is PowerUnit {
  return isUnitOf("power", raw);
}

export function isEnergyUnit(raw: unknown): raw is EnergyUnit {
  return isUnitOf("energy", raw);
}

export function parsePowerUnit(raw: unknown, field: string): PowerUnit {
  if (!isPowerUnit(raw)) {
    throw new ParseError(field, `unsupported power unit ${JSON.stringify(raw)}`);
  }
  return raw;
}

export function parseEnergyUnit(raw: unknown, field: string): EnergyUnit {
  if (!isEnergyUnit(raw)) {
    throw new ParseError(field, `unsupported energy unit ${JSON.stringify(raw)}`);
  }
  return raw;
}
