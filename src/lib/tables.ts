// src/lib/tables.ts
import type {
  CrossCurveColumn,
  CrossCurveTable,
  HydrostaticTable,
  ParticularValue,
  ParticularsMap,
} from '@/types';
import { OutOfRangeError, SchemaError } from '@/lib/errors';
import { interp1D, interp2D } from '@/lib/interpolate';
import {
  DISPLACEMENT_COLUMN,
  DRAFT_COLUMN,
  NumericCellSchema,
  SHEET_DISPLACEMENT,
  SHEET_KN,
  SHEET_PARTICULARS,
  WorkbookSchema,
  type KnRow,
  type ParticularRow,
} from '@/lib/schema';

const SHIP_NAME_KEY = 'Ship Name';
const UNKNOWN_SHIP = 'Unknown';

// "KN at 10°" or "10°"; decimals and negative angles allowed.
const HEEL_LABEL_RE = /^\s*(?:KN\s+at\s+)?(-?\d+(?:\.\d+)?)\s*°\s*$/i;

/** Numeric heel angle from a KN column header, or null when the header is not an angle label. */
export function parseHeelAngleLabel(label: string): number | null {
  const m = label.match(HEEL_LABEL_RE);
  if (!m) return null;
  const angle = Number(m[1]);
  return Number.isFinite(angle) ? angle : null;
}

function isStrictlyIncreasing(xs: readonly number[]) {
  for (let i = 1; i < xs.length; i++) {
    if (!(xs[i] > xs[i - 1])) return false;
  }
  return true;
}

function particularsFromRows(rows: ParticularRow[]): Record<string, ParticularValue> {
  const out: Record<string, ParticularValue> = {};
  for (const row of rows) {
    const param = row.Parameter == null ? '' : String(row.Parameter).trim();
    const value = row.Value;
    if (!param || value == null || value === '') continue;
    out[param] = value;
  }
  return out;
}

function crossCurvesFromRows(rows: KnRow[]): CrossCurveTable {
  const headers: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }

  const dispHeader = headers.find(h => h.includes('Displacement'));
  if (dispHeader === undefined) {
    throw new SchemaError(`${SHEET_KN}: no displacement column`);
  }

  const issues: string[] = [];
  const angleHeaders: { header: string; angle: number }[] = [];
  for (const header of headers) {
    if (header === dispHeader) continue;
    const angle = parseHeelAngleLabel(header);
    if (angle === null) {
      issues.push(`${SHEET_KN}: unrecognised heel angle column "${header}"`);
      continue;
    }
    const clash = angleHeaders.find(a => a.angle === angle);
    if (clash) {
      issues.push(`${SHEET_KN}: columns "${clash.header}" and "${header}" both give ${angle}°`);
      continue;
    }
    angleHeaders.push({ header, angle });
  }

  const cell = (row: KnRow, header: string, rowIndex: number): number => {
    const parsed = NumericCellSchema.safeParse(row[header]);
    if (parsed.success) return parsed.data;
    issues.push(`${SHEET_KN} row ${rowIndex + 1}: "${header}" is not numeric`);
    return NaN;
  };

  const displacements = rows.map((row, i) => cell(row, dispHeader, i));
  const columns: CrossCurveColumn[] = angleHeaders.map(({ header, angle }) => ({
    angle,
    values: rows.map((row, i) => cell(row, header, i)),
  }));

  if (issues.length > 0) throw new SchemaError(issues);
  return { displacements, columns };
}

function freezeTables(
  hydrostatics: HydrostaticTable,
  crossCurves: CrossCurveTable,
): [HydrostaticTable, CrossCurveTable] {
  const columns = [...crossCurves.columns]
    .sort((a, b) => a.angle - b.angle)
    .map(c => Object.freeze({ angle: c.angle, values: Object.freeze([...c.values]) }));
  return [
    Object.freeze({
      drafts: Object.freeze([...hydrostatics.drafts]),
      displacements: Object.freeze([...hydrostatics.displacements]),
    }),
    Object.freeze({
      displacements: Object.freeze([...crossCurves.displacements]),
      columns: Object.freeze(columns),
    }),
  ];
}

function checkTables(hydrostatics: HydrostaticTable, crossCurves: CrossCurveTable): string[] {
  const issues: string[] = [];
  const { drafts, displacements } = hydrostatics;

  if (drafts.length < 2) issues.push('displacement table needs at least two rows');
  if (drafts.length !== displacements.length) issues.push('displacement table columns differ in length');
  if (!isStrictlyIncreasing(drafts)) issues.push('drafts must be strictly increasing');

  const axis = crossCurves.displacements;
  if (axis.length < 2) issues.push('KN curves need at least two displacement rows');
  if (!isStrictlyIncreasing(axis)) issues.push('KN curve displacements must be strictly increasing');
  if (crossCurves.columns.length === 0) issues.push('KN curves have no heel angle columns');

  const seen = new Set<number>();
  for (const col of crossCurves.columns) {
    if (seen.has(col.angle)) issues.push(`heel angle ${col.angle}° appears twice`);
    seen.add(col.angle);
    if (col.values.length !== axis.length) {
      issues.push(`KN column ${col.angle}° has ${col.values.length} values for ${axis.length} displacements`);
    }
  }

  const numbers = [...drafts, ...displacements, ...axis, ...crossCurves.columns.flatMap(c => [c.angle, ...c.values])];
  if (numbers.some(n => !Number.isFinite(n))) issues.push('tables contain non-finite numbers');

  return issues;
}

/**
 * Validated hydrostatic data for one ship. Frozen on construction and safe to
 * share across any number of calculations.
 */
export class TableModel {
  private readonly kn: CrossCurveTable;
  private readonly hydro: HydrostaticTable;
  private readonly info: ParticularsMap;

  private constructor(hydrostatics: HydrostaticTable, crossCurves: CrossCurveTable, particulars: ParticularsMap) {
    const [hydro, kn] = freezeTables(hydrostatics, crossCurves);
    this.hydro = hydro;
    this.kn = kn;
    this.info = Object.freeze({ ...particulars });
    Object.freeze(this);
  }

  /** Builds a model from a workbook-shaped object (three sheets of row records). */
  static load(source: unknown): TableModel {
    const parsed = WorkbookSchema.safeParse(source);
    if (!parsed.success) {
      throw new SchemaError(parsed.error.issues.map(i => `${i.path.join(' > ') || 'workbook'}: ${i.message}`));
    }
    const book = parsed.data;

    const hydrostatics: HydrostaticTable = {
      drafts: book[SHEET_DISPLACEMENT].map(r => r[DRAFT_COLUMN]),
      displacements: book[SHEET_DISPLACEMENT].map(r => r[DISPLACEMENT_COLUMN]),
    };
    return TableModel.fromTables(hydrostatics, crossCurvesFromRows(book[SHEET_KN]), particularsFromRows(book[SHEET_PARTICULARS]));
  }

  static fromTables(hydrostatics: HydrostaticTable, crossCurves: CrossCurveTable, particulars: ParticularsMap = {}): TableModel {
    const issues = checkTables(hydrostatics, crossCurves);
    if (issues.length > 0) throw new SchemaError(issues);
    return new TableModel(hydrostatics, crossCurves, particulars);
  }

  draftRange(): readonly [min: number, max: number] {
    const { drafts } = this.hydro;
    return [drafts[0], drafts[drafts.length - 1]];
  }

  displacementAt(draft: number): number {
    const [min, max] = this.draftRange();
    if (!(draft >= min && draft <= max)) throw new OutOfRangeError('draft', draft, min, max, 'm');
    return interp1D(draft, this.hydro.drafts, this.hydro.displacements, 'draft');
  }

  availableHeelAngles(): number[] {
    return this.kn.columns.map(c => c.angle);
  }

  knAt(displacement: number, angle: number): number {
    const axis = this.kn.displacements;
    const min = axis[0];
    const max = axis[axis.length - 1];
    if (!(displacement >= min && displacement <= max)) {
      throw new OutOfRangeError('displacement', displacement, min, max, 't');
    }
    return interp2D(displacement, angle, this.kn);
  }

  shipName(): string {
    const name = this.info[SHIP_NAME_KEY];
    return name == null || String(name).trim() === '' ? UNKNOWN_SHIP : String(name);
  }

  particulars(): ParticularsMap {
    return this.info;
  }
}
