/**
 * Report rendering (JSON, HTML, CSV) and file sinks
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { IOError, toErrorMessage } from './errors.js';
import { rate } from './identifier.js';
import type {
  IdentificationReport,
  IdentificationResult,
  RenamingReport,
  ReportFormat,
  ReportSink,
} from './types.js';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'html', 'csv'];

const CSV_HEADER = 'File Name,Identified,Match Type,Confidence,Correct Name,Name Matches';

export function isRenamingReport(report: IdentificationReport | RenamingReport): report is RenamingReport {
  return 'renamed' in report;
}

function identificationsOf(report: IdentificationReport | RenamingReport): IdentificationResult[] {
  return isRenamingReport(report) ? report.results.map((r) => r.identification) : report.results;
}

/**
 * Format a ratio in [0, 1] as a percentage with one decimal, e.g. `95.0%`
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function quoteCsv(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function renderJson(report: IdentificationReport | RenamingReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function renderCsv(results: IdentificationResult[]): string {
  const lines = [CSV_HEADER];

  for (const result of results) {
    lines.push(
      [
        quoteCsv(result.fileName),
        String(result.identified),
        result.matchType ?? 'N/A',
        formatPercent(result.matchConfidence ?? 0),
        quoteCsv(result.correctName ?? 'N/A'),
        String(result.nameMatches ?? false),
      ].join(',')
    );
  }

  return `${lines.join('\n')}\n`;
}

export function renderHtml(results: IdentificationResult[]): string {
  const total = results.length;
  const identified = results.filter((r) => r.identified).length;
  const correct = results.filter((r) => r.nameMatches === true).length;

  const rows = results.map((result) => {
    const statusClass = result.identified ? 'success' : 'error';
    const nameClass = result.nameMatches ? 'success' : result.identified ? 'warning' : 'error';

    return `      <tr>
        <td>${escapeHtml(result.fileName)}</td>
        <td class="${statusClass}">${result.identified}</td>
        <td>${result.matchType ?? 'N/A'}</td>
        <td>${formatPercent(result.matchConfidence ?? 0)}</td>
        <td>${escapeHtml(result.correctName ?? 'N/A')}</td>
        <td class="${nameClass}">${result.nameMatches ?? false}</td>
      </tr>`;
  });

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>ROM Identification Report</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 20px; }
    table { border-collapse: collapse; width: 100%; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    th { background-color: #f2f2f2; }
    .success { color: green; }
    .error { color: red; }
    .warning { color: orange; }
    .summary { margin: 20px 0; padding: 10px; background-color: #f2f2f2; }
  </style>
</head>
<body>
  <h1>ROM Identification Report</h1>
  <div class="summary">
    <h2>Summary</h2>
    <p>Total ROMs: ${total}</p>
    <p>Identified ROMs: ${identified} (${formatPercent(rate(identified, total))})</p>
    <p>Correct Names: ${correct} (${formatPercent(rate(correct, identified))} of identified)</p>
  </div>
  <h2>Details</h2>
  <table>
    <thead>
      <tr>
        <th>File Name</th>
        <th>Identified</th>
        <th>Match Type</th>
        <th>Confidence</th>
        <th>Correct Name</th>
        <th>Name Matches</th>
      </tr>
    </thead>
    <tbody>
${rows.join('\n')}
    </tbody>
  </table>
</body>
</html>
`;
}

export function renderReport(report: IdentificationReport | RenamingReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return renderJson(report);
    case 'html':
      return renderHtml(identificationsOf(report));
    case 'csv':
      return renderCsv(identificationsOf(report));
  }
}

/**
 * Sink that renders a report and writes it to `path`
 */
export function createFileSink(path: string, format: ReportFormat = 'json'): ReportSink {
  return {
    async write(report) {
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, renderReport(report, format), 'utf-8');
      } catch (error) {
        throw new IOError(`Cannot write report to ${path}: ${toErrorMessage(error)}`, path, error);
      }
    },
  };
}
