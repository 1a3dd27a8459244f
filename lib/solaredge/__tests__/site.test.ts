import { describe, test, expect } from '@jest/globals';
import { ParseError } from '../../errors';
import { kilowatts, watts } from '../../measurement/quantity';
import { formatDateISO } from '../../measurement/time';
import { parseDataPeriod, parseSiteDetails, parseSiteList } from '../site';
import { loadFixture, readFixture } from './fixtures';

describe('parseSiteDetails', () => {
  const details = parseSiteDetails(loadFixture('site-details.json'));

  test('reads identity and status', () => {
    expect(details.id).toBe(2089471);
    expect(details.name).toBe('Test Rooftop');
    expect(details.accountId).toBe(55012);
    expect(details.status).toBe('Active');
    expect(details.type).toBe('Optimizers & Inverters');
  });

  test('peak power is reported in kW', () => {
    expect(details.peakPower.unit).toBe('kW');
    expect(details.peakPower.equals(kilowatts(7.41))).toBe(true);
  });

  test('module maximum power is reported in W', () => {
    expect(details.primaryModule?.maximumPower.equals(watts(390))).toBe(true);
    expect(details.primaryModule?.temperatureCoef.value).toBe(-0.35);
    expect(details.primaryModule?.modelName).toBe('EX-390');
  });

  test('dates are calendar dates', () => {
    expect(formatDateISO(details.installationDate)).toBe('2021-02-25');
    expect(formatDateISO(details.lastUpdateTime)).toBe('2024-06-12');
    expect(details.ptoDate).toBeNull();
  });

  test('location and settings', () => {
    expect(details.location).toEqual({
      country: 'Netherlands',
      state: null,
      city: 'Utrecht',
      address: 'Teststraat 1',
      address2: '',
      zip: '1234 AB',
      timeZone: 'Europe/Amsterdam',
      countryCode: 'NL',
    });
    expect(details.publicSettings).toEqual({ isPublic: false, name: null });
    expect(details.uris.OVERVIEW).toBe('/site/2089471/overview');
  });

  test('names the field when the shape is wrong', () => {
    expect(() => parseSiteDetails({ details: { id: 1 } })).toThrow(ParseError);
    expect(() => parseSiteDetails({})).toThrow('Cannot parse field "details": Required');
  });
});

describe('parseSiteList', () => {
  const list = parseSiteList(loadFixture('sites-list.json'));

  test('keeps count and order', () => {
    expect(list.count).toBe(2);
    expect(list.sites.map((site) => site.id)).toEqual([2089471, 3100452]);
  });

  test('optional parts of a site become null', () => {
    const barn = list.sites[1];
    expect(barn.primaryModule).toBeNull();
    expect(barn.notes).toBeNull();
    expect(barn.location.state).toBe('Victoria');
    expect(barn.location.address2).toBeNull();
    expect(barn.ptoDate && formatDateISO(barn.ptoDate)).toBe('2022-09-14');
    expect(barn.publicSettings).toEqual({ isPublic: true, name: 'Barn array' });
  });

  test('an empty ptoDate is malformed, not absent', () => {
    const json = readFixture('sites-list.json').replace('"ptoDate": "2022-09-14"', '"ptoDate": ""');
    const broken: unknown = JSON.parse(json);
    expect(() => parseSiteList(broken)).toThrow(
      'Cannot parse field "sites.site.1.ptoDate": expected YYYY-MM-DD, got ""',
    );
  });

  test('reports the index of a broken site', () => {
    const json = loadFixture('sites-list.json');
    const broken: unknown = JSON.parse(JSON.stringify(json).replace('"peakPower":12', '"peakPower":-12'));
    expect(() => parseSiteList(broken)).toThrow(
      'Cannot parse field "sites.site.1.peakPower": expected a non-negative value, got -12',
    );
  });
});

describe('parseDataPeriod', () => {
  test('reads both dates', () => {
    const period = parseDataPeriod(loadFixture('data-period.json'));
    expect(period.startDate && formatDateISO(period.startDate)).toBe('2021-02-25');
    expect(period.endDate && formatDateISO(period.endDate)).toBe('2024-06-12');
  });

  test('a site without production has no dates', () => {
    expect(parseDataPeriod({ dataPeriod: { startDate: null } })).toEqual({
      startDate: null,
      endDate: null,
    });
  });

  test('an empty date string is malformed, not absent', () => {
    expect(() => parseDataPeriod({ dataPeriod: { startDate: '', endDate: '2024-06-12' } })).toThrow(
      'Cannot parse field "dataPeriod.startDate": expected YYYY-MM-DD, got ""',
    );
  });

  test('rejects a malformed date', () => {
    expect(() => parseDataPeriod({ dataPeriod: { startDate: '25/02/2021' } })).toThrow(
      'Cannot parse field "dataPeriod.startDate": expected YYYY-MM-DD, got "25/02/2021"',
    );
  });
});
