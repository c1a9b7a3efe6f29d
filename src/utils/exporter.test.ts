import { describe, expect, it } from 'vitest';
import { DriftReport } from '../types/comparison.js';
import { DriftExporter } from './exporter.js';

const report: DriftReport = {
  sourceEnv: 'prod',
  targetEnv: 'dev',
  clean: false,
  counts: { tables: 0, sequences: 0, columns: 1, constraints: 0, policies: 1, grants: 0, rls: 0, extensions: 0, scheduledJobs: 0 },
  items: [
    { category: 'columns', change: 'missing_in_target', name: 'public.orders.note', details: 'text' },
    { category: 'policies', change: 'mismatch', name: 'public.orders.read_own', details: '' },
  ],
  expectedExclusions: ['auth'],
  rowCounts: [{ table: 'public.orders', source: 10, target: 8 }],
};

describe('DriftExporter', () => {
  it('should list one row per drift item', () => {
    const sheet = DriftExporter.buildWorkbook(report).getWorksheet('Drift');

    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(2).getCell(2).value).toBe('missing in target');
    expect(sheet?.getRow(3).getCell(3).value).toBe('public.orders.read_own');
    expect(sheet?.getRow(3).getCell(4).value).toBe('-');
  });

  it('should add row counts headed by environment names', () => {
    const counts = DriftExporter.buildWorkbook(report).getWorksheet('Row counts');

    expect(counts?.getRow(1).getCell(2).value).toBe('prod');
    expect(counts?.getRow(2).getCell(3).value).toBe(8);
  });

  it('should keep plain sheets for CSV output', () => {
    const workbook = DriftExporter.buildWorkbook(report, false);

    expect(workbook.getWorksheet('Row counts')).toBeUndefined();
  });
});
