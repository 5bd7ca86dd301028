// src/lib/validate.ts
import type { TableModel } from '@/lib/tables';
import { ValidationError } from '@/lib/errors';

export interface ValidationResult {
  ok: boolean;
  message: string;
}

// KG above twice the deepest tabulated draft is treated as an input mistake.
const KG_SANITY_FACTOR = 2;

/** Sanity checks on draft (m) and KG (m); reports the first rule that fails. */
export function validateInput(model: TableModel, draftM: number, kg: number): ValidationResult {
  const [minDraft, maxDraft] = model.draftRange();
  const kgLimit = maxDraft * KG_SANITY_FACTOR;

  const failures = [
    !(draftM >= minDraft) ? `Draft must be at least ${minDraft} meters` : null,
    !(draftM <= maxDraft) ? `Draft cannot exceed ${maxDraft} meters` : null,
    !(kg > 0) ? 'KG (Vertical Center of Gravity) must be a positive value' : null,
    kg > kgLimit ? `KG value seems unreasonably high (should typically be less than ${kgLimit} meters)` : null,
  ];

  const message = failures.find((f): f is string => f !== null);
  return message === undefined ? { ok: true, message: '' } : { ok: false, message };
}

export function assertValidInput(model: TableModel, draftM: number, kg: number): void {
  const { ok, message } = validateInput(model, draftM, kg);
  if (!ok) throw new ValidationError(message);
}
