import { z } from 'zod';
import sampleShip from '@/data/sample_ship.json';
import { OutOfRangeError, SchemaError, ValidationError } from '@/lib/errors';
import { curveRows, formatSummary, round } from '@/lib/report';
import { calculate, convertFeetToMeters } from '@/lib/stability';
import { TableModel } from '@/lib/tables';

/* ----------------------------- helpers ----------------------------- */
const RequestSchema = z.object({
  draft: z.number().finite(),
  draftUnit: z.enum(['meters', 'feet']).default('meters'),
  loadKg: z.number().finite().nonnegative(),
  kg: z.number().finite().optional(),
  source: z.unknown().optional(),
});

// Bundled ship, shared read-only by every request that brings no workbook.
const sampleModel = TableModel.load(sampleShip);

function json(body: unknown, status: number) {
  return new Response(JSON.stringify(body), {
    status, headers: { 'content-type': 'application/json', 'cache-control': 'no-store' },
  });
}

function statusFor(e: unknown): number {
  if (e instanceof SchemaError) return 400;
  if (e instanceof ValidationError || e instanceof OutOfRangeError) return 422;
  return 500;
}

/* ------------------------------ handler ----------------------------- */
export default async function handler(req: Request): Promise<Response> {
  if (req.method !== 'POST') {
    return json({ error: 'Use POST with a JSON body' }, 405);
  }

  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return json({ error: 'Request body is not valid JSON' }, 400);
  }

  const parsed = RequestSchema.safeParse(body);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    return json({ error: detail }, 400);
  }
  const input = parsed.data;

  try {
    const model = input.source === undefined ? sampleModel : TableModel.load(input.source);
    const draftM = input.draftUnit === 'feet' ? convertFeetToMeters(input.draft) : input.draft;
    const result = calculate(model, { draft: draftM, loadMass: input.loadKg }, { kg: input.kg });

    return json({
      shipName: result.shipName,
      draftM: round(draftM, 3),
      displacement: round(result.displacement, 2),
      kg: round(result.kg, 3),
      curve: curveRows(result.curve),
      summary: formatSummary(result.summary),
    }, 200);
  } catch (e: unknown) {
    return json({ error: e instanceof Error ? e.message : String(e) }, statusFor(e));
  }
}
