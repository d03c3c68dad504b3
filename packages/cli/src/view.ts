/**
 * HTML view generation for the conversion review report (Tailwind, black + green, red for issues).
 */

import type { Diagnostic } from "@db2sf/core";
import { escapeHtml } from "./utils";

const TAILWIND_CDN =
  '<script src="https://cdn.tailwindcss.com"></script>';

export interface ReviewTable {
  /** `SCHEMA.TABLE`, the key diagnostics are logged under */
  name: string;
  fileName: string;
  pageName: string;
  sql: string;
  diagnostics: Diagnostic[];
}

export interface ReviewReport {
  tables: ReviewTable[];
  /** Diagnostics whose table matches no converted file (read failures and the like) */
  unassigned: Diagnostic[];
  generatedAt: string;
}

function layout(title: string, bodyContent: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  ${TAILWIND_CDN}
</head>
<body class="bg-black text-green-400 font-mono min-h-screen antialiased">
  <div class="max-w-6xl mx-auto px-4 py-8">
    ${bodyContent}
  </div>
</body>
</html>`;
}

function statCard(value: number, label: string, alert = false): string {
  const border = alert ? "border-red-700" : "border-green-800";
  const color = alert ? "text-red-400" : "text-green-400";
  return `
      <div class="bg-black border ${border} rounded p-4">
        <div class="text-2xl font-bold ${color}">${value}</div>
        <div class="text-green-600 text-sm mt-1">${label}</div>
      </div>`;
}

function diagnosticRows(diagnostics: Diagnostic[], withTable: boolean): string {
  return diagnostics
    .map(
      (d) => `
    <tr class="border-b border-green-800/50">
      ${withTable ? `<td class="px-4 py-2 font-semibold">${escapeHtml(d.table)}</td>` : ""}
      <td class="px-4 py-2">${escapeHtml(d.section)}</td>
      <td class="px-4 py-2 text-red-400">${escapeHtml(d.issue)}</td>
      <td class="px-4 py-2"><code class="bg-green-950 text-green-300 px-2 py-0.5 rounded border border-green-800 text-xs">${escapeHtml(d.snippet)}</code></td>
    </tr>
  `,
    )
    .join("");
}

function diagnosticTable(diagnostics: Diagnostic[], withTable: boolean): string {
  if (diagnostics.length === 0) {
    return `<p class="text-green-600">No issues logged.</p>`;
  }
  return `
    <div class="border border-green-800 rounded overflow-hidden">
      <table class="w-full text-sm">
        <thead>
          <tr class="bg-green-950 border-b border-green-800">
            ${withTable ? `<th class="px-4 py-2 text-left text-green-400">Table</th>` : ""}
            <th class="px-4 py-2 text-left text-green-400">Section</th>
            <th class="px-4 py-2 text-left text-green-400">Issue</th>
            <th class="px-4 py-2 text-left text-green-400">Snippet</th>
          </tr>
        </thead>
        <tbody>${diagnosticRows(diagnostics, withTable)}</tbody>
      </table>
    </div>
  `;
}

export function generateOverviewHTML(report: ReviewReport): string {
  const issueCount =
    report.tables.reduce((sum, t) => sum + t.diagnostics.length, 0) +
    report.unassigned.length;
  const withIssues = report.tables.filter((t) => t.diagnostics.length > 0).length;

  const tableRows = report.tables
    .map(
      (table) => `
    <tr class="border-b border-green-800 hover:bg-green-950/30">
      <td class="px-4 py-3"><a href="${table.pageName}" class="text-green-400 hover:text-green-300 underline">${escapeHtml(table.name)}</a></td>
      <td class="px-4 py-3 text-green-300">${escapeHtml(table.fileName)}</td>
      <td class="px-4 py-3 ${table.diagnostics.length > 0 ? "text-red-400" : ""}">${table.diagnostics.length}</td>
    </tr>
  `,
    )
    .join("");

  const body = `
    <h1 class="text-2xl font-bold text-green-400 mb-2">DB2 → Snowflake Conversion Review</h1>
    <p class="text-green-600 mb-6">Generated ${escapeHtml(report.generatedAt)}</p>

    <div class="grid grid-cols-2 md:grid-cols-3 gap-4 mb-6">
      ${statCard(report.tables.length, "Tables")}
      ${statCard(withIssues, "Tables With Issues", withIssues > 0)}
      ${statCard(issueCount, "Issues", issueCount > 0)}
    </div>

    <div class="border border-green-800 rounded overflow-hidden mb-8">
      <table class="w-full">
        <thead>
          <tr class="bg-green-950 border-b border-green-800">
            <th class="px-4 py-3 text-left text-green-400 font-semibold">Table</th>
            <th class="px-4 py-3 text-left text-green-400 font-semibold">File</th>
            <th class="px-4 py-3 text-left text-green-400 font-semibold">Issues</th>
          </tr>
        </thead>
        <tbody>
          ${tableRows}
        </tbody>
      </table>
    </div>

    ${report.unassigned.length > 0 ? `
    <h2 class="text-xl font-bold text-red-400 mb-4">File-level Issues</h2>
    ${diagnosticTable(report.unassigned, true)}
    ` : ""}
  `;

  return layout("DB2 → Snowflake Conversion Review", body);
}

export function generateTableHTML(table: ReviewTable): string {
  const body = `
    <div class="mb-6">
      <a href="index.html" class="text-green-600 hover:text-green-400 text-sm">← Back to Overview</a>
      <h1 class="text-2xl font-bold text-green-400 mt-2">Table: ${escapeHtml(table.name)}</h1>
      <p class="text-green-600 text-sm">${escapeHtml(table.fileName)}</p>
    </div>

    <div class="border border-green-800 rounded p-5 bg-black mb-6">
      <h2 class="text-lg font-semibold text-green-400 mb-4">Snowflake DDL</h2>
      <pre class="bg-green-950/40 border border-green-800 rounded p-4 text-sm text-green-300 overflow-x-auto">${escapeHtml(table.sql)}</pre>
    </div>

    <div class="border border-green-800 rounded p-5 bg-black">
      <h2 class="text-lg font-semibold text-green-400 mb-4">Issues (${table.diagnostics.length})</h2>
      ${diagnosticTable(table.diagnostics, false)}
    </div>
  `;

  return layout(`${table.name} - Conversion Review`, body);
}
