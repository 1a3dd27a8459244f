import { describe, test, expect } from '@jest/globals';
import { formatQuantity, formatQuantityText } from '../format';
import { kilowatts, megawattHours, wattHours, watts } from '../quantity';

describe('formatQuantity', () => {
  test('returns em-dash for null/undefined', () => {
    expect(formatQuantity(null)).toEqual({ value: '—', unit: '' });
    expect(formatQuantity(undefined)).toEqual({ value: '—', unit: '' });
  });

  test('formats power in kW below one megawatt', () => {
    expect(formatQuantity(watts(1500))).toEqual({ value: '1.5', unit: 'kW' });
    expect(formatQuantity(watts(0))).toEqual({ value: '0.0', unit: 'kW' });
  });

  test('formats power in MW from one megawatt', () => {
    expect(formatQuantity(kilowatts(2500))).toEqual({ value: '2.5', unit: 'MW' });
  });

  test('switches to giga from one billion base units', () => {
    expect(formatQuantity(kilowatts(2_000_000))).toEqual({ value: '2.0', unit: 'GW' });
    expect(formatQuantity(wattHours(1_500_000_000))).toEqual({ value: '1.5', unit: 'GWh' });
  });

  test('formats in a fixed unit when one is given', () => {
    expect(formatQuantity(wattHours(1500), 'Wh')).toEqual({ value: '1500.0', unit: 'Wh' });
    expect(formatQuantity(kilowatts(3), 'W')).toEqual({ value: '3000.0', unit: 'W' });
    expect(formatQuantity(watts(2_500_000), 'kW')).toEqual({ value: '2500.0', unit: 'kW' });
  });

  test('formats energy in kWh or MWh', () => {
    expect(formatQuantity(wattHours(18234))).toEqual({ value: '18.2', unit: 'kWh' });
    expect(formatQuantity(wattHours(23456789))).toEqual({ value: '23.5', unit: 'MWh' });
    expect(formatQuantity(megawattHours(0.5))).toEqual({ value: '500.0', unit: 'kWh' });
  });
});

describe('formatQuantityText', () => {
  test('joins value and unit', () => {
    expect(formatQuantityText(watts(1500))).toBe('1.5 kW');
  });

  test('prints only the dash without a value', () => {
    expect(formatQuantityText(null)).toBe('—');
  });
});
