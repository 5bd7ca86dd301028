// src/types.ts

export type ParticularValue = string | number;
export type ParticularsMap = Readonly<Record<string, ParticularValue>>;

export interface HydrostaticTable {
  drafts: readonly number[];        // m, strictly increasing
  displacements: readonly number[]; // tonnes, aligned to drafts
}

export interface CrossCurveColumn {
  angle: number;             // degrees
  values: readonly number[]; // KN in m, aligned to the displacement axis
}

export interface CrossCurveTable {
  displacements: readonly number[];     // tonnes, strictly increasing
  columns: readonly CrossCurveColumn[]; // ascending by angle
}

export interface LoadingCondition {
  draft: number;    // m
  loadMass: number; // kg
}

export interface GzPoint {
  angle: number; // degrees
  gz: number;    // m
}

export type GzCurve = readonly GzPoint[];

export interface StabilitySummary {
  displacement: number;
  kg: number;
  maxGz: number;
  maxGzAngle: number;
  areaUnder30Deg: number;        // m·deg
  vanishingAngle: number | null; // first sampled angle with negative GZ
}

export interface StabilityResult {
  shipName: string;
  draft: number;
  displacement: number;
  kg: number;
  curve: GzCurve;
  summary: StabilitySummary;
}
