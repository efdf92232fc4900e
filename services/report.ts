import type { ConvergenceResult, ErrorSummary } from '../types';

const COLUMNS = [
  { title: 'Method', width: 16, alignLeft: true },
  { title: 'Steps', width: 6 },
  { title: 'dt', width: 8 },
  { title: 'T', width: 8 },
  { title: 'L2 Error', width: 10 },
];

const formatError = (error: number): string =>
  error === Infinity ? 'Inf' : isNaN(error) ? 'NaN' : error.toExponential(2);

const formatRow = (cells: string[]): string =>
  cells
    .map((cell, idx) => (COLUMNS[idx].alignLeft ? cell.padEnd(COLUMNS[idx].width) : cell.padStart(COLUMNS[idx].width)))
    .join(' | ');

export const formatErrorTable = (summaries: readonly ErrorSummary[]): string => {
  const header = formatRow(COLUMNS.map(col => col.title));
  const separator = COLUMNS.map(col => '-'.repeat(col.width)).join('-|-');
  const rows = summaries.map(s =>
    formatRow([s.methodName, String(s.Nt), s.dt.toFixed(4), s.T.toFixed(4), formatError(s.error)]),
  );
  return [header, separator, ...rows].join('\n');
};

// First run has no rate; every later line carries the order observed against its predecessor.
export const formatConvergence = (result: ConvergenceResult): string => {
  const lines = result.runs.map((run, idx) => {
    const base = `  dt=${run.dt.toFixed(4)}  E=${formatError(run.error)}`;
    return idx === 0 ? base : `${base}  r=${result.rates[idx - 1].toFixed(2)}`;
  });
  return [`${result.methodName} (theta=${result.theta})`, ...lines].join('\n');
};
