/**
 * Unit tests for src/utils/holidays.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import {
  allHolidays,
  holidaysForYear,
  loadHolidayTable,
  parseHolidayTable,
  toHolidaySet,
} from '../holidays.js';

const DATA_FILE = fileURLToPath(new URL('../../../data/holidays.json', import.meta.url));

describe('parseHolidayTable', () => {
  it('keys the table by year and sorts each year', () => {
    const table = parseHolidayTable({
      '2026': [
        { date: '2026-12-25', name: 'Christmas Day' },
        { date: '2026-01-01', name: "New Year's Day" },
      ],
    });

    assert.deepEqual(holidaysForYear(table, 2026), [
      { date: '2026-01-01', name: "New Year's Day" },
      { date: '2026-12-25', name: 'Christmas Day' },
    ]);
  });

  it('treats an unconfigured year as having no holidays', () => {
    const table = parseHolidayTable({ '2026': [] });
    assert.deepEqual(holidaysForYear(table, 2031), []);
  });

  it('rejects a date filed under the wrong year', () => {
    assert.throws(
      () => parseHolidayTable({ '2026': [{ date: '2027-01-01', name: "New Year's Day" }] }),
      { message: 'Invalid holiday table: 2026.0.date: 2027-01-01 is not in 2026' },
    );
  });

  it('rejects a duplicate date', () => {
    assert.throws(
      () =>
        parseHolidayTable({
          '2026': [
            { date: '2026-07-03', name: 'Independence Day (observed)' },
            { date: '2026-07-03', name: 'Independence Day' },
          ],
        }),
      { message: 'Invalid holiday table: 2026.1.date: 2026-07-03 is listed twice' },
    );
  });

  it('rejects an impossible calendar date', () => {
    assert.throws(
      () => parseHolidayTable({ '2026': [{ date: '2026-02-30', name: 'Nope' }] }),
      /Date is not a valid calendar date/,
    );
  });

  it('rejects a non-year key', () => {
    assert.throws(
      () => parseHolidayTable({ next: [] }),
      /Year keys must be four digits/,
    );
  });

  it('rejects a blank name', () => {
    assert.throws(
      () => parseHolidayTable({ '2026': [{ date: '2026-01-01', name: '  ' }] }),
      /Holiday name is required/,
    );
  });
});

describe('allHolidays / toHolidaySet', () => {
  const table = parseHolidayTable({
    '2027': [{ date: '2027-01-01', name: "New Year's Day" }],
    '2026': [
      { date: '2026-12-25', name: 'Christmas Day' },
      { date: '2026-11-26', name: 'Thanksgiving Day' },
    ],
  });

  it('lists every year oldest first', () => {
    assert.deepEqual(
      allHolidays(table).map((h) => h.date),
      ['2026-11-26', '2026-12-25', '2027-01-01'],
    );
  });

  it('flattens to a date set', () => {
    const set = toHolidaySet(table);
    assert.equal(set.size, 3);
    assert.ok(set.has('2026-12-25'));
    assert.ok(!set.has('2026-12-24'));
  });
});

describe('loadHolidayTable', () => {
  it('loads the bundled table', () => {
    const table = loadHolidayTable(DATA_FILE);
    const y2026 = holidaysForYear(table, 2026);

    assert.equal(y2026.length, 11);
    assert.deepEqual(y2026[1], { date: '2026-01-19', name: 'Martin Luther King Jr. Day' });
    assert.equal(toHolidaySet(table).size, 22);
  });
});
