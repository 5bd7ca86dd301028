import { describe, expect, it } from 'vitest';
import { OutOfRangeError, ValidationError } from '@/lib/errors';
import {
  buildGZCurve,
  calculate,
  convertFeetToMeters,
  DEFAULT_STABILITY_CONFIG,
  estimateKG,
  summarize,
} from '@/lib/stability';
import type { GzCurve } from '@/types';
import { testModel } from '@test/helpers/fixtures';

const sin = (deg: number) => Math.sin((deg * Math.PI) / 180);

describe('estimateKG', () => {
  it('should scale with draft and add 0.05 m per 1000 t of load', () => {
    expect(estimateKG(0, 4)).toBeCloseTo(1.8, 12);
    expect(estimateKG(1_000_000, 4)).toBeCloseTo(1.85, 12);
    expect(estimateKG(500_000, 4)).toBeCloseTo(1.825, 12);
  });

  it('should expose its constants as defaults', () => {
    expect(DEFAULT_STABILITY_CONFIG).toEqual({ kgDraftFactor: 0.45, kgLoadAdjustmentPer1000t: 0.05 });
  });

  it('should accept overridden constants', () => {
    expect(estimateKG(2_000_000, 10, { kgDraftFactor: 0.5 })).toBeCloseTo(5.1, 12);
    expect(estimateKG(2_000_000, 10, { kgLoadAdjustmentPer1000t: 0.1 })).toBeCloseTo(4.7, 12);
  });
});

describe('convertFeetToMeters', () => {
  it('should use the 0.3048 factor', () => {
    expect(convertFeetToMeters(1)).toBe(0.3048);
    expect(convertFeetToMeters(0)).toBe(0);
    expect(convertFeetToMeters(100)).toBeCloseTo(30.48, 12);
  });
});

describe('buildGZCurve', () => {
  const model = testModel();

  it('should compute GZ = KN - KG sin(heel) at every table angle', () => {
    const curve = buildGZCurve(model, 4, 1);
    expect(curve.map(p => p.angle)).toEqual([0, 10, 20, 30, 40]);
    // displacement 2300 t sits 30% of the way from the 2000 t to the 3000 t row
    expect(curve[1].gz).toBeCloseTo(0.93 - sin(10), 10);
    expect(curve[2].gz).toBeCloseTo(1.86 - sin(20), 10);
    expect(curve[3].gz).toBeCloseTo(2.09, 10);
    expect(curve[4].gz).toBeCloseTo(2.92 - sin(40), 10);
  });

  it('should give GZ equal to KN at zero heel for any KG', () => {
    for (const [draft, kg] of [[2, 0.5], [4.5, 3], [6, 11]]) {
      const displacement = model.displacementAt(draft);
      const [upright] = buildGZCurve(model, draft, kg, [0]);
      expect(upright.gz).toBe(model.knAt(displacement, 0));
    }
  });

  it('should keep a caller-supplied angle order', () => {
    const curve = buildGZCurve(model, 4, 1, [30, 15, 25]);
    expect(curve.map(p => p.angle)).toEqual([30, 15, 25]);
  });

  it('should throw OutOfRangeError for drafts outside the table', () => {
    expect(() => buildGZCurve(model, 7, 1)).toThrow(OutOfRangeError);
  });

  it('should throw OutOfRangeError when any angle is outside the table', () => {
    expect(() => buildGZCurve(model, 4, 1, [10, 20, 50])).toThrow('Heel angle 50° is outside valid range [0, 40]°');
  });
});

describe('summarize', () => {
  it('should find the vanishing angle as the first negative GZ', () => {
    const curve: GzCurve = [
      { angle: 0, gz: 1.0 },
      { angle: 10, gz: 0.6 },
      { angle: 20, gz: -0.1 },
      { angle: 30, gz: -0.5 },
    ];
    expect(summarize(curve, 1000, 1).vanishingAngle).toBe(20);
  });

  it('should report no vanishing angle when GZ never goes negative', () => {
    const curve: GzCurve = [
      { angle: 0, gz: 0 },
      { angle: 10, gz: 0.2 },
    ];
    expect(summarize(curve, 1000, 1).vanishingAngle).toBeNull();
  });

  it('should integrate only segments lying wholly at or below 30 degrees', () => {
    const curve: GzCurve = [0, 10, 20, 30, 40].map(angle => ({ angle, gz: 1 }));
    expect(summarize(curve, 1000, 1).areaUnder30Deg).toBe(30);
  });

  it('should drop a segment that straddles 30 degrees instead of clipping it', () => {
    const curve: GzCurve = [
      { angle: 0, gz: 0 },
      { angle: 20, gz: 1 },
      { angle: 40, gz: 2 },
    ];
    expect(summarize(curve, 1000, 1).areaUnder30Deg).toBe(10);
  });

  it('should take the first point on a tie for maximum GZ', () => {
    const curve: GzCurve = [
      { angle: 10, gz: 0.5 },
      { angle: 20, gz: 0.9 },
      { angle: 30, gz: 0.9 },
      { angle: 40, gz: 0.4 },
    ];
    const summary = summarize(curve, 1234, 2.5);
    expect(summary).toEqual({
      displacement: 1234,
      kg: 2.5,
      maxGz: 0.9,
      maxGzAngle: 20,
      areaUnder30Deg: 16,
      vanishingAngle: null,
    });
  });

  it('should reject an empty curve', () => {
    expect(() => summarize([], 1000, 1)).toThrow(ValidationError);
  });
});

describe('calculate', () => {
  const model = testModel();

  it('should estimate KG and return the full result', () => {
    const result = calculate(model, { draft: 4, loadMass: 500_000 });
    expect(result.shipName).toBe('MV Test Vessel');
    expect(result.displacement).toBe(2300);
    expect(result.kg).toBeCloseTo(1.825, 12);
    expect(result.curve).toHaveLength(5);
    expect(result.summary.maxGzAngle).toBe(40);
    expect(result.summary.maxGz).toBeCloseTo(2.92 - 1.825 * sin(40), 10);
    expect(result.summary.areaUnder30Deg).toBeCloseTo(26.876553, 5);
    expect(result.summary.vanishingAngle).toBeNull();
  });

  it('should use a supplied KG instead of the estimate', () => {
    const result = calculate(model, { draft: 4, loadMass: 500_000 }, { kg: 1 });
    expect(result.kg).toBe(1);
    expect(result.summary.areaUnder30Deg).toBeCloseTo(33.193317, 5);
  });

  it('should pass angle and config overrides through', () => {
    const result = calculate(
      model,
      { draft: 4, loadMass: 0 },
      { angles: [0, 15], config: { kgDraftFactor: 0.25 } },
    );
    expect(result.kg).toBe(1);
    expect(result.curve.map(p => p.angle)).toEqual([0, 15]);
    expect(result.curve[1].gz).toBeCloseTo((0.93 + 1.86) / 2 - sin(15), 10);
  });

  it('should report a vanishing angle when KG is high', () => {
    // at 2300 t: GZ(10°) = 0.93 - 11·sin(10°) < 0
    const result = calculate(model, { draft: 4, loadMass: 0 }, { kg: 11 });
    expect(result.summary.vanishingAngle).toBe(10);
  });

  it('should throw ValidationError before computing anything for bad input', () => {
    expect(() => calculate(model, { draft: 6.5, loadMass: 0 })).toThrow('Draft cannot exceed 6 meters');
    expect(() => calculate(model, { draft: 4, loadMass: 0 }, { kg: 0 })).toThrow(ValidationError);
    expect(() => calculate(model, { draft: 4, loadMass: 0 }, { kg: 12.5 })).toThrow(
      'KG value seems unreasonably high (should typically be less than 12 meters)',
    );
  });
});
