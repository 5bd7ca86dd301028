import React from 'react';
import {
  CartesianGrid,
  Line,
  LineChart,
  ReferenceDot,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import type { GzCurve } from '@/types';
import { gzChartData } from '@/lib/chart';

interface Props {
  curve: GzCurve;
}

export default function GzChart({ curve }: Props) {
  const { rows, max, yDomain } = gzChartData(curve);

  return (
    <div className="h-[360px]" role="img" aria-label="GZ curve">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={rows} margin={{ top: 8, right: 24, bottom: 8, left: 8 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#e5e7eb" />
          <XAxis
            dataKey="angle"
            type="number"
            domain={['dataMin', 'dataMax']}
            tick={{ fontSize: 10 }}
            tickFormatter={(v: number) => `${v}°`}
          />
          <YAxis
            domain={yDomain}
            tick={{ fontSize: 10 }}
            label={{ value: 'GZ (m)', angle: -90, position: 'insideLeft', style: { fontSize: '10px', fill: '#6b7280' } }}
          />
          <Tooltip formatter={v => `${v} m`} labelFormatter={a => `Heel ${a}°`} />
          <ReferenceLine y={0} stroke="#dc2626" strokeDasharray="4 4" />
          <Line type="linear" dataKey="gz" stroke="#0369a1" strokeWidth={2} dot={{ r: 3 }} name="GZ" />
          {max && <ReferenceDot x={max.angle} y={max.gz} r={5} fill="#dc2626" stroke="none" />}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
