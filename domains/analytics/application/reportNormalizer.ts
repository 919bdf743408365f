import type { CellValue, ReportRow, ReportSnapshot } from '../domain/entities/QueryResult';
import type { ReportTable } from './ports/DataApiClient';

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_TYPE = 'TYPE_INTEGER';

/**
* Metric text to a number when it is one, otherwise unchanged.
* Values of an integer-typed metric are rounded to whole numbers.
*/
export function parseMetricValue(text: string, type?: string): CellValue {
  const trimmed = text.trim();
  if (!NUMERIC_TEXT.test(trimmed)) return text;
  const value = Number(trimmed);
  if (!Number.isFinite(value)) return text;
  return type === INTEGER_TYPE ? Math.round(value) : value;
}

/**
* Turn a Data API table into keyed rows with totals.
*
* Grand totals from the API are used when every metric has one; otherwise
* numeric metric columns are summed over the returned rows.
*/
export function toReportSnapshot(propertyId: string, table: ReportTable): ReportSnapshot {
  const dimensions = [...table.dimensionHeaders];
  const metrics = table.metricHeaders.map(header => header.name);
  const types = table.metricHeaders.map(header => header.type);

  const rows: ReportRow[] = table.rows.map(row => {
    const record: ReportRow = {};
    dimensions.forEach((name, i) => {
      record[name] = row.dimensionValues[i] ?? '';
    });
    metrics.forEach((name, i) => {
      record[name] = parseMetricValue(row.metricValues[i] ?? '', types[i]);
    });
    return record;
  });

  const apiTotals = readApiTotals(metrics, types, table.totals);
  const totals: Record<string, number> = {};
  const nonNumericMetrics: string[] = [];

  for (const metric of metrics) {
    if (apiTotals) {
      const total = apiTotals[metric];
      if (total === undefined) nonNumericMetrics.push(metric);
      else totals[metric] = total;
      continue;
    }

    let sum = 0;
    let numeric = true;
    for (const row of rows) {
      const value = row[metric];
      if (typeof value !== 'number') {
        numeric = false;
        break;
      }
      sum += value;
    }
    if (numeric) totals[metric] = sum;
    else nonNumericMetrics.push(metric);
  }

  return {
    propertyId,
    dimensions,
    metrics,
    rows,
    rowCount: rows.length,
    totalRows: Math.max(table.rowCount, rows.length),
    totals,
    totalsSource: apiTotals ? 'api' : 'rows',
    nonNumericMetrics,
  };
}

function readApiTotals(
  metrics: readonly string[],
  types: ReadonlyArray<string | undefined>,
  values: readonly string[] | undefined
): Record<string, number> | undefined {
  if (!values || values.length < metrics.length) return undefined;

  const totals: Record<string, number> = {};
  metrics.forEach((metric, i) => {
    const parsed = parseMetricValue(values[i] ?? '', types[i]);
    if (typeof parsed === 'number') totals[metric] = parsed;
  });
  return totals;
}
