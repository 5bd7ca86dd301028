// src/lib/report.ts
import type { GzCurve, StabilityResult, StabilitySummary } from '@/types';

export interface SummaryReport {
  displacementTonnes: number;
  kgMeters: number;
  maxGzMeters: number;
  maxGzAngleDegrees: number;
  areaUnderCurve30Deg: number;
  vanishingAngleDegrees: number | 'N/A';
}

export interface CurveRow {
  angle: number;
  gz: number;
}

export function round(x: number, dp: number): number {
  return Number(x.toFixed(dp));
}

export function formatSummary(summary: StabilitySummary): SummaryReport {
  return {
    displacementTonnes: round(summary.displacement, 2),
    kgMeters: round(summary.kg, 3),
    maxGzMeters: round(summary.maxGz, 3),
    maxGzAngleDegrees: round(summary.maxGzAngle, 1),
    areaUnderCurve30Deg: round(summary.areaUnder30Deg, 3),
    vanishingAngleDegrees: summary.vanishingAngle == null ? 'N/A' : round(summary.vanishingAngle, 1),
  };
}

export function curveRows(curve: GzCurve): CurveRow[] {
  return curve.map(p => ({ angle: p.angle, gz: round(p.gz, 4) }));
}

function csvField(v: string | number) {
  const s = String(v);
  return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/** Two-part CSV: a key/value block for the condition, then the curve table. */
export function curveToCsv(result: StabilityResult): string {
  const s = formatSummary(result.summary);
  const rows: (string | number)[][] = [
    ['Ship', result.shipName],
    ['Draft (m)', round(result.draft, 3)],
    ['Displacement (t)', s.displacementTonnes],
    ['KG (m)', s.kgMeters],
    ['Max GZ (m)', s.maxGzMeters],
    ['Max GZ angle (deg)', s.maxGzAngleDegrees],
    ['Area to 30 deg (m.deg)', s.areaUnderCurve30Deg],
    ['Vanishing angle (deg)', s.vanishingAngleDegrees],
    [],
    ['Heel (deg)', 'GZ (m)'],
    ...curveRows(result.curve).map(r => [r.angle, r.gz]),
  ];
  return rows.map(r => r.map(csvField).join(',')).join('\n');
}
