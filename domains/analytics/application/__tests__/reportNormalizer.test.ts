import { describe, expect, it } from 'vitest';

import { createReportTable } from '../../../../test/mocks/gaClients';
import { parseMetricValue, toReportSnapshot } from '../reportNormalizer';

describe('parseMetricValue', () => {
  it.each([
    ['42', 42],
    ['3.5', 3.5],
    [' 7 ', 7],
    ['-0.25', -0.25],
    ['1e3', 1000],
  ])('parses %j as %d', (text, expected) => {
    expect(parseMetricValue(text)).toBe(expected);
  });

  it('rounds values of an integer metric', () => {
    expect(parseMetricValue('12.0', 'TYPE_INTEGER')).toBe(12);
    expect(parseMetricValue('3.6', 'TYPE_INTEGER')).toBe(4);
    expect(parseMetricValue('3.6', 'TYPE_FLOAT')).toBe(3.6);
    expect(parseMetricValue('n/a', 'TYPE_INTEGER')).toBe('n/a');
  });

  it('keeps non-numeric text', () => {
    expect(parseMetricValue('n/a')).toBe('n/a');
    expect(parseMetricValue('')).toBe('');
    expect(parseMetricValue('12abc')).toBe('12abc');
  });
});

describe('toReportSnapshot', () => {
  const rows = [
    { dimensions: ['US'], metrics: ['10', '0.5'] },
    { dimensions: ['DE'], metrics: ['5', '0.25'] },
  ];

  it('keys rows by header and uses API totals', () => {
    const table = createReportTable(['sessions', 'bounceRate'], rows, {
      dimensions: ['country'],
      totals: ['15', '0.4'],
    });

    expect(toReportSnapshot('111', table)).toEqual({
      propertyId: '111',
      dimensions: ['country'],
      metrics: ['sessions', 'bounceRate'],
      rows: [
        { country: 'US', sessions: 10, bounceRate: 0.5 },
        { country: 'DE', sessions: 5, bounceRate: 0.25 },
      ],
      rowCount: 2,
      totalRows: 2,
      totals: { sessions: 15, bounceRate: 0.4 },
      totalsSource: 'api',
      nonNumericMetrics: [],
    });
  });

  it('sums rows when the API sent no totals', () => {
    const snapshot = toReportSnapshot('111', createReportTable(['sessions', 'bounceRate'], rows, {
      dimensions: ['country'],
      rowCount: 40,
    }));

    expect(snapshot.totals).toEqual({ sessions: 15, bounceRate: 0.75 });
    expect(snapshot.totalsSource).toBe('rows');
    expect(snapshot.rowCount).toBe(2);
    expect(snapshot.totalRows).toBe(40);
  });

  it('leaves non-numeric metrics out of the totals', () => {
    const snapshot = toReportSnapshot('111', createReportTable(['sessions', 'label'], [
      { metrics: ['3', 'n/a'] },
    ]));
    expect(snapshot.totals).toEqual({ sessions: 3 });
    expect(snapshot.nonNumericMetrics).toEqual(['label']);
  });

  it('reads metric types from the headers for rows and totals', () => {
    const snapshot = toReportSnapshot('111', createReportTable(
      ['sessions', 'engagementRate'],
      [{ metrics: ['10.0', '0.5'] }],
      { totals: ['10.4', '0.5'], metricTypes: ['TYPE_INTEGER', 'TYPE_FLOAT'] }
    ));
    expect(snapshot.rows).toEqual([{ sessions: 10, engagementRate: 0.5 }]);
    expect(snapshot.totals).toEqual({ sessions: 10, engagementRate: 0.5 });
  });

  it('totals an empty report as zero', () => {
    const snapshot = toReportSnapshot('111', createReportTable(['sessions'], []));
    expect(snapshot.rows).toEqual([]);
    expect(snapshot.totals).toEqual({ sessions: 0 });
  });
});
