import type { QuarterlyEntry, QuarterlySummary, Row } from "./types";

export type AttentionDate = {
  year: number;
  month: number;
  day: number;
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}(?::\d{2}(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const DMY_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  // Day 0 of the next month is the last day of this one.
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function toDate(year: string, month: string, day: string): AttentionDate | null {
  const y = Number.parseInt(year, 10);
  const m = Number.parseInt(month, 10);
  const d = Number.parseInt(day, 10);
  if (!isCalendarDate(y, m, d)) return null;
  return { year: y, month: m, day: d };
}

/**
 * Parses an attention date.
 *
 * Strings containing `-` are read as ISO (`YYYY-MM-DD`, optionally with a time
 * part); anything else as `DD/MM/YYYY`. Returns `null` when the chosen format
 * does not match or the date does not exist (e.g. `31/02/2024`).
 */
export function parseAttentionDate(raw: string): AttentionDate | null {
  const s = raw.trim();
  if (!s) return null;

  if (s.includes("-")) {
    const iso = s.match(ISO_DATE);
    return iso ? toDate(iso[1], iso[2], iso[3]) : null;
  }

  const dmy = s.match(DMY_DATE);
  return dmy ? toDate(dmy[3], dmy[2], dmy[1]) : null;
}

const QUARTERS = [1, 2, 3, 4] as const;

export function quarterOf(month: number): 1 | 2 | 3 | 4 {
  const i = Math.min(Math.max(Math.floor((month - 1) / 3), 0), 3);
  return QUARTERS[i];
}

/**
 * Orders identifiers by UTF-16 code unit, independent of the host locale
 * ("B1" sorts before "a1").
 */
function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function formatQuarter(quarter: 1 | 2 | 3 | 4): string {
  return `Q${quarter}`;
}

/**
 * Rows that count for reports and exports: those with a non-empty identifier.
 */
export function committedRows(rows: readonly Row[]): Row[] {
  return rows.filter((r) => r.identifier.trim().length > 0);
}

/**
 * Counts attentions per (identifier, year, quarter).
 *
 * Rows without an identifier or date, and rows whose date does not parse, do
 * not count. Entries are ordered by identifier, then year, then quarter.
 */
export function aggregateQuarterly(rows: readonly Row[]): QuarterlySummary {
  const committed = committedRows(rows);
  if (committed.length === 0) return { status: "no-data", entries: [] };

  const groups = new Map<string, QuarterlyEntry>();

  for (const row of committed) {
    const identifier = row.identifier.trim();
    const date = parseAttentionDate(row.attentionDate);
    if (!date) continue;

    const quarter = quarterOf(date.month);
    const key = JSON.stringify([identifier, date.year, quarter]);
    const existing = groups.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      groups.set(key, { identifier, year: date.year, quarter, count: 1 });
    }
  }

  if (groups.size === 0) return { status: "no-valid-dates", entries: [] };

  const entries = Array.from(groups.values()).sort(
    (a, b) =>
      compareIdentifiers(a.identifier, b.identifier) ||
      a.year - b.year ||
      a.quarter - b.quarter
  );

  return { status: "ok", entries };
}
