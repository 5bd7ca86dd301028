import React from 'react';

interface Option<T extends string> {
  label: string;
  value: T;
}

interface Props<T extends string> extends Omit<React.SelectHTMLAttributes<HTMLSelectElement>, 'value' | 'onChange'> {
  label: string;
  value: T;
  options: Option<T>[];
  onChange: (value: T) => void;
}

export default function Select<T extends string>({ label, value, options, onChange, ...rest }: Props<T>) {
  function handleChange(e: React.ChangeEvent<HTMLSelectElement>) {
    const picked = options.find(o => o.value === e.target.value);
    if (picked) onChange(picked.value);
  }

  return (
    <label className="block">
      <span className="block text-sm font-medium text-gray-700 mb-1">{label}</span>
      <select
        className="w-full rounded-xl border px-3 py-2 outline-none focus:ring-2 focus:ring-sky-600 border-gray-300 bg-white"
        value={value}
        onChange={handleChange}
        {...rest}
      >
        {options.map(o => (
          <option key={o.value} value={o.value}>{o.label}</option>
        ))}
      </select>
    </label>
  );
}
