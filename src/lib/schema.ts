// src/lib/schema.ts
import { z } from 'zod';

export const SHEET_PARTICULARS = 'Ship Particulars';
export const SHEET_DISPLACEMENT = 'Displacement Table';
export const SHEET_KN = 'KN Curves';

export const DRAFT_COLUMN = 'Draft (m)';
export const DISPLACEMENT_COLUMN = 'Displacement (tonnes)';

// Spreadsheet readers hand numbers over either as numbers or as their text.
export const NumericCellSchema = z
  .union([z.number(), z.string().trim().min(1, 'empty cell').transform(Number)])
  .pipe(z.number().finite());

const ParticularCellSchema = z.union([z.string(), z.number()]).nullish();

export const ParticularRowSchema = z.object({
  Parameter: ParticularCellSchema,
  Value: ParticularCellSchema,
  Unit: ParticularCellSchema,
});

export const DisplacementRowSchema = z.object({
  [DRAFT_COLUMN]: NumericCellSchema,
  [DISPLACEMENT_COLUMN]: NumericCellSchema,
});

// KN headers vary (two heel-angle label styles), so rows stay open records here
// and TableModel.load resolves the columns.
export const KnRowSchema = z.record(z.string(), z.unknown());

export const WorkbookSchema = z.object({
  [SHEET_PARTICULARS]: z.array(ParticularRowSchema),
  [SHEET_DISPLACEMENT]: z.array(DisplacementRowSchema).min(2, 'needs at least two rows'),
  [SHEET_KN]: z.array(KnRowSchema).min(2, 'needs at least two rows'),
});

export type ParticularRow = z.infer<typeof ParticularRowSchema>;
export type KnRow = z.infer<typeof KnRowSchema>;
