// src/lib/stability.ts
import type { GzCurve, GzPoint, LoadingCondition, StabilityResult, StabilitySummary } from '@/types';
import type { TableModel } from '@/lib/tables';
import { ValidationError } from '@/lib/errors';
import { assertValidInput } from '@/lib/validate';

export const M_PER_FT = 0.3048;
const KG_PER_1000_TONNES = 1_000_000;

// Righting energy is reported up to this heel. Only segments lying wholly at or
// below it count; a segment crossing it is dropped, not clipped.
export const AREA_LIMIT_DEG = 30;

export interface StabilityConfig {
  kgDraftFactor: number;            // KG as a fraction of draft
  kgLoadAdjustmentPer1000t: number; // m of KG added per 1000 t of load
}

/**
 * Simplified KG proxy: a fixed fraction of draft plus a small rise with load.
 * Real KG needs compartment-level moments; these constants are the model, not a fit.
 */
export const DEFAULT_STABILITY_CONFIG: Readonly<StabilityConfig> = {
  kgDraftFactor: 0.45,
  kgLoadAdjustmentPer1000t: 0.05,
};

export interface CalculateOptions {
  kg?: number;        // use this KG instead of estimating it
  angles?: number[];  // defaults to the table's heel angles
  config?: Partial<StabilityConfig>;
}

function radians(deg: number) {
  return (deg * Math.PI) / 180;
}

export function convertFeetToMeters(feet: number): number {
  return feet * M_PER_FT;
}

export function estimateKG(
  loadMassKg: number,
  draftM: number,
  config: Partial<StabilityConfig> = DEFAULT_STABILITY_CONFIG,
): number {
  const { kgDraftFactor, kgLoadAdjustmentPer1000t } = { ...DEFAULT_STABILITY_CONFIG, ...config };
  return kgDraftFactor * draftM + (loadMassKg / KG_PER_1000_TONNES) * kgLoadAdjustmentPer1000t;
}

/** GZ = KN − KG·sin(heel) at each angle, in the order the angles are given. */
export function buildGZCurve(model: TableModel, draftM: number, kgM: number, angles?: readonly number[]): GzCurve {
  const displacement = model.displacementAt(draftM);
  const heel = angles ?? model.availableHeelAngles();

  const curve: GzPoint[] = heel.map(angle => ({
    angle,
    gz: model.knAt(displacement, angle) - kgM * Math.sin(radians(angle)),
  }));
  return curve;
}

export function summarize(curve: GzCurve, displacement: number, kg: number): StabilitySummary {
  if (curve.length === 0) throw new ValidationError('GZ curve has no points to summarise');

  let max = curve[0];
  for (const p of curve) {
    if (p.gz > max.gz) max = p;
  }

  const vanishing = curve.find(p => p.gz < 0);

  let area = 0;
  for (let i = 0; i + 1 < curve.length; i++) {
    const a = curve[i];
    const b = curve[i + 1];
    if (a.angle <= AREA_LIMIT_DEG && b.angle <= AREA_LIMIT_DEG) {
      area += ((a.gz + b.gz) / 2) * (b.angle - a.angle);
    }
  }

  return {
    displacement,
    kg,
    maxGz: max.gz,
    maxGzAngle: max.angle,
    areaUnder30Deg: area,
    vanishingAngle: vanishing ? vanishing.angle : null,
  };
}

/**
 * Full stability check for one loading condition. Input is validated first, so
 * either a complete curve and summary come back or an error is thrown.
 */
export function calculate(model: TableModel, condition: LoadingCondition, options: CalculateOptions = {}): StabilityResult {
  const { draft, loadMass } = condition;
  const kg = options.kg ?? estimateKG(loadMass, draft, options.config);

  assertValidInput(model, draft, kg);

  const displacement = model.displacementAt(draft);
  const curve = buildGZCurve(model, draft, kg, options.angles);

  return {
    shipName: model.shipName(),
    draft,
    displacement,
    kg,
    curve,
    summary: summarize(curve, displacement, kg),
  };
}
