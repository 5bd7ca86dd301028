import { TableModel } from '@/lib/tables';

/**
 * Small hand-checkable ship: drafts 2–6 m, KN columns at 0–40° using both
 * heel-angle label styles.
 */
export function testWorkbook() {
  return {
    'Ship Particulars': [
      { Parameter: 'Ship Name', Value: 'MV Test Vessel', Unit: '' },
      { Parameter: 'Breadth', Value: 20, Unit: 'm' },
      { Parameter: 'Notes', Value: '', Unit: '' },
    ],
    'Displacement Table': [
      { 'Draft (m)': 2, 'Displacement (tonnes)': 1000 },
      { 'Draft (m)': 3, 'Displacement (tonnes)': 1600 },
      { 'Draft (m)': 4, 'Displacement (tonnes)': 2300 },
      { 'Draft (m)': 5, 'Displacement (tonnes)': 3100 },
      { 'Draft (m)': 6, 'Displacement (tonnes)': 4000 },
    ],
    'KN Curves': [
      { 'Displacement (tonnes)': 1000, '0°': 0, 'KN at 10°': 0.8, '20°': 1.6, 'KN at 30°': 2.2, '40°': 2.4 },
      { 'Displacement (tonnes)': 2000, '0°': 0, 'KN at 10°': 0.9, '20°': 1.8, 'KN at 30°': 2.5, '40°': 2.8 },
      { 'Displacement (tonnes)': 3000, '0°': 0, 'KN at 10°': 1.0, '20°': 2.0, 'KN at 30°': 2.8, '40°': 3.2 },
      { 'Displacement (tonnes)': 4000, '0°': 0, 'KN at 10°': 1.1, '20°': 2.2, 'KN at 30°': 3.1, '40°': 3.6 },
    ],
  };
}

export function testModel(): TableModel {
  return TableModel.load(testWorkbook());
}
