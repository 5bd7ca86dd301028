// src/lib/chart.ts
import type { GzCurve, GzPoint } from '@/types';
import { curveRows, type CurveRow } from '@/lib/report';

export interface GzChartData {
  rows: CurveRow[];
  max: GzPoint | null;        // first point of highest GZ
  yDomain: [number, number];  // always spans zero
}

/** Rows, max-GZ marker and y domain for the line chart. */
export function gzChartData(curve: GzCurve): GzChartData {
  const rows = curveRows(curve);
  if (rows.length === 0) return { rows, max: null, yDomain: [0, 0] };

  let max = rows[0];
  for (const r of rows) if (r.gz > max.gz) max = r;

  const gzs = rows.map(r => r.gz);
  return {
    rows,
    max,
    yDomain: [Math.min(0, ...gzs), Math.max(0, ...gzs)],
  };
}
