import { csvFormat } from 'd3-dsv';
import type { LegislatorRecord, Party } from './types';

export interface ReportRow {
  ancestorPercentage: number;
  relationsPercentage: number;
  count: number;
}

export interface PartyReportRow extends ReportRow {
  party: Party;
}

export interface RelationsReport {
  overall: ReportRow;
  byParty: PartyReportRow[];
}

export interface CsvRow {
  id: number;
  name: string;
  url: string;
  raw_party: string;
  party: Party;
  political_relations_count: number;
  political_ancestor_count: number;
}

const CSV_COLUMNS: Array<keyof CsvRow> = [
  'id',
  'name',
  'url',
  'raw_party',
  'party',
  'political_relations_count',
  'political_ancestor_count',
];

function percentage(hits: number, count: number): number {
  if (count === 0) return 0;
  return Math.round((hits / count) * 100 * 100) / 100;
}

function summarize(records: readonly LegislatorRecord[]): ReportRow {
  const withAncestors = records.filter((r) => r.ancestorCount > 0).length;
  const withRelations = records.filter((r) => r.relationsCount > 0).length;
  return {
    ancestorPercentage: percentage(withAncestors, records.length),
    relationsPercentage: percentage(withRelations, records.length),
    count: records.length,
  };
}

/**
 * Share of legislators with at least one political relation / ancestor, overall and per party.
 * Parties are ordered by ancestor percentage, highest first.
 */
export function buildReport(records: readonly LegislatorRecord[]): RelationsReport {
  const groups = new Map<Party, LegislatorRecord[]>();
  for (const record of records) {
    const group = groups.get(record.party);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.party, [record]);
    }
  }

  const byParty = Array.from(groups, ([party, members]) => ({ party, ...summarize(members) }));
  byParty.sort(
    (a, b) => b.ancestorPercentage - a.ancestorPercentage || a.party.localeCompare(b.party)
  );

  return { overall: summarize(records), byParty };
}

function markdownTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length))
  );
  const line = (cells: string[]) =>
    `| ${cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ')} |`;
  const divider = `|${widths.map((w) => '-'.repeat(w + 2)).join('|')}|`;
  return [line(headers), divider, ...rows.map(line)].join('\n');
}

export function formatReport(report: RelationsReport): string {
  const stats = (row: ReportRow) => [
    row.ancestorPercentage.toFixed(2),
    row.relationsPercentage.toFixed(2),
    String(row.count),
  ];
  const statHeaders = ['political_ancestor_percentage', 'political_relations_percentage', 'mps'];

  const overall = markdownTable(statHeaders, [stats(report.overall)]);
  const byParty = markdownTable(
    ['party', ...statHeaders],
    report.byParty.map((row) => [row.party, ...stats(row)])
  );
  return `${overall}\n\n${byParty}`;
}

export function toCsv(records: readonly LegislatorRecord[]): string {
  const rows: CsvRow[] = records.map((record) => ({
    id: record.id,
    name: record.name,
    url: record.url,
    raw_party: record.rawParty,
    party: record.party,
    political_relations_count: record.relationsCount,
    political_ancestor_count: record.ancestorCount,
  }));
  return `${csvFormat(rows, CSV_COLUMNS)}\n`;
}
