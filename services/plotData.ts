import type { ComparisonDataset, PlotDataItem } from '../types';
import { EXACT_LABEL } from '../constants';

const roundTo = (value: number, digits: number): number | null =>
  Number.isFinite(value) ? parseFloat(value.toFixed(digits)) : null;

export const legendLabels = (dataset: ComparisonDataset): string[] => [
  ...[...dataset.runs.values()].map(run => run.methodName),
  EXACT_LABEL,
];

/**
 * Flattens a comparison into chart rows keyed by `t`. Each row carries one
 * series value and null for every other series, since the numerical meshes
 * and the exact overlay mesh do not share points.
 */
export const toComparisonPlotData = (dataset: ComparisonDataset): PlotDataItem[] => {
  const labels = legendLabels(dataset);
  const series = [
    { label: EXACT_LABEL, t: dataset.exact.t, u: dataset.exact.u },
    ...[...dataset.runs.values()].map(run => ({ label: run.methodName, t: run.t, u: run.u })),
  ];

  const rows: { time: number; item: PlotDataItem }[] = [];
  for (const { label, t, u } of series) {
    t.forEach((t_n, idx) => {
      const item: PlotDataItem = { t: parseFloat(t_n.toFixed(3)) };
      for (const other of labels) {
        item[other] = null;
      }
      item[label] = roundTo(u[idx], 4);
      rows.push({ time: t_n, item });
    });
  }

  return rows.sort((lhs, rhs) => lhs.time - rhs.time).map(row => row.item);
};
