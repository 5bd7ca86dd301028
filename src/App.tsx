import React, { useMemo, useState } from 'react';
import NumberInput from '@/components/NumberInput';
import Select from '@/components/Select';
import GzChart from '@/components/GzChart';
import sampleShip from '@/data/sample_ship.json';
import type { StabilityResult } from '@/types';
import { TableModel } from '@/lib/tables';
import { calculate, convertFeetToMeters, M_PER_FT } from '@/lib/stability';
import { curveRows, curveToCsv, formatSummary } from '@/lib/report';

type DraftUnit = 'meters' | 'feet';

const SAMPLE_MODEL = TableModel.load(sampleShip);

function downloadCsv(filename: string, csv: string) {
  const blob = new Blob([csv], { type: 'text/csv' });
  const a = document.createElement('a');
  const url = URL.createObjectURL(blob);
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
}

export default function App() {
  // the loaded ship lives here; uploads replace it for this session only
  const [model, setModel] = useState<TableModel>(SAMPLE_MODEL);
  const [draft, setDraft] = useState<number>(5);
  const [draftUnit, setDraftUnit] = useState<DraftUnit>('meters');
  const [loadKg, setLoadKg] = useState<number>(500000);
  const [result, setResult] = useState<StabilityResult | null>(null);
  const [status, setStatus] = useState<string>('');

  const [minDraft, maxDraft] = model.draftRange();
  const draftHint = useMemo(() => {
    if (draftUnit === 'meters') return `Table range ${minDraft}–${maxDraft} m`;
    return `Table range ${(minDraft / M_PER_FT).toFixed(2)}–${(maxDraft / M_PER_FT).toFixed(2)} ft`;
  }, [minDraft, maxDraft, draftUnit]);

  function onCalculate() {
    const draftM = draftUnit === 'feet' ? convertFeetToMeters(draft) : draft;
    try {
      setResult(calculate(model, { draft: draftM, loadMass: loadKg }));
      setStatus('');
    } catch (e: unknown) {
      setResult(null);
      setStatus(e instanceof Error ? e.message : String(e));
    }
  }

  async function onUpload(e: React.ChangeEvent<HTMLInputElement>) {
    const file = e.target.files?.[0];
    if (!file) return;
    try {
      const next = TableModel.load(JSON.parse(await file.text()));
      setModel(next);
      setResult(null);
      setStatus(`Loaded ship data for: ${next.shipName()}`);
    } catch (err: unknown) {
      setStatus(`Could not load ${file.name}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  function onReset() {
    setDraft(5); setDraftUnit('meters'); setLoadKg(500000); setResult(null); setStatus('');
  }

  const summary = result ? formatSummary(result.summary) : null;

  return (
    <div className="min-h-screen p-6 sm:p-10">
      <div className="max-w-3xl mx-auto">
        <header className="mb-6">
          <h1 className="text-2xl font-semibold">GZ Stability Curve: {model.shipName()}</h1>
          <p className="text-gray-600 mt-1">Righting arm from cross curves (KN) and the displacement table.</p>
        </header>

        <div className="grid grid-cols-1 sm:grid-cols-2 gap-4">
          <div className="grid grid-cols-2 gap-3">
            <NumberInput
              label="Draft"
              value={draft}
              onChange={e => setDraft(Number(e.target.value))}
              step={0.1}
              hint={draftHint}
            />
            <Select<DraftUnit>
              label="Unit"
              value={draftUnit}
              onChange={setDraftUnit}
              options={[
                { label: 'Meters', value: 'meters' },
                { label: 'Feet', value: 'feet' },
              ]}
            />
          </div>
          <NumberInput
            label="Load"
            value={loadKg}
            onChange={e => setLoadKg(Number(e.target.value))}
            min={0}
            step={1000}
            suffix="kg"
          />

          <label className="block sm:col-span-2">
            <span className="block text-sm font-medium text-gray-700 mb-1">Ship data (JSON workbook)</span>
            <input type="file" accept="application/json,.json" onChange={onUpload} className="text-sm" />
          </label>
        </div>

        <div className="mt-4 flex gap-3">
          <button
            onClick={onCalculate}
            className="rounded-xl bg-sky-700 text-white px-5 py-2 font-medium hover:bg-sky-800"
          >
            Calculate
          </button>
          <button
            onClick={onReset}
            className="rounded-xl bg-gray-200 text-gray-800 px-5 py-2 font-medium hover:bg-gray-300"
          >
            Reset
          </button>
          {result && (
            <button
              onClick={() => downloadCsv(`gz_curve_${Math.round(result.draft * 100)}.csv`, curveToCsv(result))}
              className="rounded-xl bg-emerald-600 text-white px-5 py-2 font-medium hover:bg-emerald-700"
            >
              Export CSV
            </button>
          )}
        </div>

        {status && <p className="mt-3 text-sm text-gray-700">{status}</p>}

        {result && summary && (
          <section className="mt-8">
            <div className="grid grid-cols-2 sm:grid-cols-3 gap-4">
              <Stat title="Displacement" value={`${summary.displacementTonnes} t`} />
              <Stat title="KG" value={`${summary.kgMeters} m`} />
              <Stat title="Max GZ" value={`${summary.maxGzMeters} m @ ${summary.maxGzAngleDegrees}°`} />
              <Stat title="Area to 30°" value={`${summary.areaUnderCurve30Deg} m·deg`} />
              <Stat
                title="Vanishing angle"
                value={summary.vanishingAngleDegrees === 'N/A' ? 'N/A' : `${summary.vanishingAngleDegrees}°`}
              />
            </div>

            <div className="mt-6 rounded-2xl border p-4 bg-white">
              <GzChart curve={result.curve} />
            </div>

            <table className="mt-6 w-full text-sm">
              <thead>
                <tr className="text-left text-gray-600"><th>Heel (°)</th><th>GZ (m)</th></tr>
              </thead>
              <tbody>
                {curveRows(result.curve).map(r => (
                  <tr key={r.angle} className={r.gz < 0 ? 'text-red-600' : ''}>
                    <td>{r.angle}</td><td>{r.gz}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </section>
        )}

        <footer className="mt-10 text-xs text-gray-500">
          <p>
            KG is a simplified estimate from draft and load. The vanishing angle is the first tabulated
            heel with negative GZ, not an interpolated crossing.
          </p>
        </footer>
      </div>
    </div>
  );
}

function Stat({ title, value }: { title: string; value: string }) {
  return (
    <div className="rounded-2xl border p-4 bg-white">
      <h2 className="font-semibold mb-1 text-sm text-gray-600">{title}</h2>
      <p className="text-xl font-bold">{value}</p>
    </div>
  );
}
