/**
 * Unit tests for src/utils/sweepLookup.ts
 */

import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { messageFor, ErrorCode } from '../AppError.js';
import {
  formatStreetSummary,
  getSweepDetails,
  lookupSweepInfo,
  summarizeRoutes,
  type ScheduleContext,
} from '../sweepLookup.js';
import type { SweepRouteRecord } from '../sweepRoutes.js';
import { weekdayDatesInMonth } from '../sweepSchedule.js';
import { fakeArcgis, routeFeature } from './fakeArcgis.js';

const POINT = { x: -118.25, y: 34.05 };
const MARCH_1: ScheduleContext = { today: '2026-03-01', holidays: new Set() };

function record(overrides: Partial<SweepRouteRecord> = {}): SweepRouteRecord {
  return {
    route: '12P356 M',
    postedDay: 'Monday',
    postedTime: '8am-10am',
    boundaries: 'Main to Grand',
    weeks: '2 & 4',
    dayShort: 'M',
    streetName: 'VENICE',
    travelDirection: 'E',
    streetSuffix: 'BLVD',
    ...overrides,
  };
}

/** Parsed `data_quality` entries from captured console.warn calls. */
function dataQualityLogs(calls: { arguments: unknown[] }[]): Record<string, unknown>[] {
  return calls
    .map((call): Record<string, unknown> => JSON.parse(String(call.arguments[0])))
    .filter((entry) => entry.type === 'data_quality');
}

afterEach(() => {
  mock.restoreAll();
});

/* ================================================================== */
/*  summarizeRoutes                                                   */
/* ================================================================== */

describe('summarizeRoutes', () => {
  it('returns null when nothing is posted', () => {
    assert.equal(summarizeRoutes([]), null);
    assert.equal(summarizeRoutes([record({ postedDay: null }), record({ postedDay: '' })]), null);
  });

  it('keeps the most common street', () => {
    const details = summarizeRoutes([
      record({ streetName: 'MAIN', streetSuffix: 'ST', postedDay: 'Friday' }),
      record(),
      record({ postedDay: 'Tuesday', travelDirection: 'W' }),
    ]);

    assert.ok(details);
    assert.equal(details.streetName, 'VENICE BLVD');
    assert.deepEqual(details.sweepDays, ['Monday', 'Tuesday']);
    assert.equal(details.routes.length, 2);
  });

  it('lets the first-seen street win a tie', () => {
    const details = summarizeRoutes([
      record({ streetName: 'MAIN', streetSuffix: 'ST' }),
      record(),
    ]);
    assert.equal(details?.streetName, 'MAIN ST');
  });

  it('ignores unposted segments when counting', () => {
    const details = summarizeRoutes([
      record({ streetName: 'MAIN', postedDay: null }),
      record({ streetName: 'MAIN', postedDay: null }),
      record(),
    ]);
    assert.equal(details?.streetName, 'VENICE BLVD');
  });

  it('merges distinct times and omits a missing suffix', () => {
    const details = summarizeRoutes([
      record({ streetName: 'Broadway', streetSuffix: null }),
      record({ streetName: 'Broadway', streetSuffix: null, postedTime: '10am-12pm' }),
      record({ streetName: 'Broadway', streetSuffix: null }),
    ]);

    assert.ok(details);
    assert.deepEqual(details.sweepDays, ['Monday']);
    assert.equal(details.sweepSchedule, '2 & 4');
    assert.equal(details.sweepTime, '8am-10am, 10am-12pm');
    assert.equal(details.streetName, 'BROADWAY');
  });

  it('leaves the time out when no segment has one', () => {
    const details = summarizeRoutes([record({ postedTime: null })]);
    assert.equal(details?.sweepTime, null);
  });
});

/* ================================================================== */
/*  formatStreetSummary                                               */
/* ================================================================== */

describe('formatStreetSummary', () => {
  it('formats a single-day route', () => {
    const details = summarizeRoutes([record()]);
    assert.ok(details);

    assert.equal(
      formatStreetSummary(details, MARCH_1),
      '🧹 *VENICE BLVD*\n' +
        '📅 Monday\n' +
        '🔄 2 & 4\n' +
        '🕐 8am-10am\n' +
        '\n📆 Next: Mon Mar 9, Mon Mar 23, Mon Apr 13',
    );
  });

  it('merges dates across posted days and shows at most four', () => {
    const details = summarizeRoutes([record(), record({ postedDay: 'Tuesday' })]);
    assert.ok(details);

    assert.equal(
      formatStreetSummary(details, MARCH_1),
      '🧹 *VENICE BLVD*\n' +
        '📅 Monday & Tuesday\n' +
        '🔄 2 & 4\n' +
        '🕐 8am-10am\n' +
        '\n📆 Next: Mon Mar 9, Tue Mar 10, Mon Mar 23, Tue Mar 24',
    );
  });

  it('warns when sweeping is today', () => {
    const details = summarizeRoutes([record()]);
    assert.ok(details);

    assert.equal(
      formatStreetSummary(details, { today: '2026-03-09', holidays: new Set() }),
      '🧹 *VENICE BLVD*\n' +
        '📅 Monday\n' +
        '🔄 2 & 4\n' +
        '🕐 8am-10am\n' +
        '\n⚠️ *SWEEPING TODAY — MOVE YOUR CAR!*\n' +
        '\n📆 Next: Mon Mar 9, Mon Mar 23, Mon Apr 13',
    );
  });

  it('does not warn on a holiday', () => {
    const details = summarizeRoutes([record()]);
    assert.ok(details);

    const card = formatStreetSummary(details, {
      today: '2026-03-09',
      holidays: new Set(['2026-03-09']),
    });
    assert.equal(card.split('\n').at(-1), '📆 Next: Mon Mar 23, Mon Apr 13, Mon Apr 27');
    assert.ok(!card.includes('SWEEPING TODAY'));
  });

  it('accepts abbreviated posted days', () => {
    const details = summarizeRoutes([record({ postedDay: 'Tu' })]);
    assert.ok(details);
    assert.equal(
      formatStreetSummary(details, MARCH_1).split('\n').at(-1),
      '📆 Next: Tue Mar 10, Tue Mar 24, Tue Apr 14',
    );
  });

  it('falls back to a notice when the week pattern is unreadable', () => {
    const details = summarizeRoutes([record({ weeks: '3 & 5' })]);
    assert.ok(details);

    assert.equal(
      formatStreetSummary(details, MARCH_1),
      '🧹 *VENICE BLVD*\n' +
        '📅 Monday\n' +
        '🔄 3 & 5\n' +
        '🕐 8am-10am\n' +
        `\n⚠️ ${messageFor(ErrorCode.UNPARSEABLE_SCHEDULE)} Check the posted signs.`,
    );
  });

  it('reports a missing week pattern as unreadable', () => {
    const warn = mock.method(console, 'warn', () => {});
    const details = summarizeRoutes([record({ weeks: null, postedTime: null })]);
    assert.ok(details);

    assert.equal(
      formatStreetSummary(details, MARCH_1),
      '🧹 *VENICE BLVD*\n' +
        '📅 Monday\n' +
        `\n⚠️ ${messageFor(ErrorCode.UNPARSEABLE_SCHEDULE)} Check the posted signs.`,
    );

    const logged = dataQualityLogs(warn.mock.calls);
    assert.equal(logged.length, 1);
    assert.equal(logged[0].code, ErrorCode.UNPARSEABLE_SCHEDULE);
    assert.equal(logged[0].message, 'Unrecognized sweep weeks "".');
    assert.equal(logged[0].route, '12P356 M');
  });

  it('logs the partial dates when the search horizon runs out', () => {
    const warn = mock.method(console, 'warn', () => {});
    // Every 2nd and 4th Monday from March 2026 to March 2027, except the last
    const holidays = new Set<string>();
    for (let offset = 0; offset <= 12; offset++) {
      const year = 2026 + Math.floor((2 + offset) / 12);
      const month = ((2 + offset) % 12) + 1;
      const mondays = weekdayDatesInMonth(year, month, 'Monday');
      holidays.add(mondays[1]);
      holidays.add(mondays[3]);
    }
    holidays.delete('2027-03-22');

    const details = summarizeRoutes([record()]);
    assert.ok(details);

    assert.equal(
      formatStreetSummary(details, { today: '2026-03-01', holidays }).split('\n').at(-1),
      `⚠️ ${messageFor(ErrorCode.SEARCH_HORIZON_EXHAUSTED)} Check the posted signs.`,
    );

    const logged = dataQualityLogs(warn.mock.calls);
    assert.equal(logged.length, 1);
    assert.equal(logged[0].code, ErrorCode.SEARCH_HORIZON_EXHAUSTED);
    assert.deepEqual(logged[0].partialDates, ['2027-03-22']);
  });

  it('leaves partial dates out of the log for a parse failure', () => {
    const warn = mock.method(console, 'warn', () => {});
    const details = summarizeRoutes([record({ weeks: '3 & 5' })]);
    assert.ok(details);

    formatStreetSummary(details, MARCH_1);

    const logged = dataQualityLogs(warn.mock.calls);
    assert.equal(logged.length, 1);
    assert.equal('partialDates' in logged[0], false);
  });
});

/* ================================================================== */
/*  getSweepDetails / lookupSweepInfo                                 */
/* ================================================================== */

describe('getSweepDetails', () => {
  it('stops at the near radius when it finds routes', async () => {
    const requests = fakeArcgis({ routeResults: [[routeFeature()]] });

    const details = await getSweepDetails(POINT);

    assert.equal(requests.length, 1);
    assert.equal(details?.streetName, 'VENICE BLVD');
  });

  it('widens to 500 ft when nothing is within 200 ft', async () => {
    const requests = fakeArcgis({
      routeResults: [[], [routeFeature({ STNAME: 'MAIN', STSFX: 'ST' })]],
    });

    const details = await getSweepDetails(POINT);

    assert.equal(requests.length, 2);
    const xmin = Number(requests[1].searchParams.get('geometry')?.split(',')[0]);
    assert.ok(Math.abs(xmin - -118.2515) < 1e-9);
    assert.equal(details?.streetName, 'MAIN ST');
  });

  it('returns null when neither radius finds a posted route', async () => {
    const requests = fakeArcgis({ routeResults: [[]] });
    assert.equal(await getSweepDetails(POINT), null);
    assert.equal(requests.length, 2);
  });
});

describe('lookupSweepInfo', () => {
  it('returns the card when a route is found', async () => {
    fakeArcgis({ routeResults: [[routeFeature()]] });

    const result = await lookupSweepInfo(POINT, MARCH_1);

    assert.equal(result.found, true);
    assert.equal(result.text.split('\n')[0], '🧹 *VENICE BLVD*');
  });

  it('explains when no route is nearby', async () => {
    fakeArcgis({ routeResults: [[routeFeature({ Posted_Day: null })]] });

    assert.deepEqual(await lookupSweepInfo(POINT, MARCH_1), {
      found: false,
      text: messageFor(ErrorCode.NO_ROUTE_AT_LOCATION),
    });
  });
});
