import { parse } from "csv-parse/sync";
import type { PatientId, RosterEntry } from "./types";

export type RosterMatch = {
  name: string;
  benefit: string;
};

const EMPTY_MATCH: RosterMatch = { name: "", benefit: "" };

/**
 * Exact-match lookup of patient identifiers against the roster.
 *
 * Identifiers are compared as trimmed strings: no case folding, no partial
 * matches. When the roster repeats an identifier the first entry wins and the
 * identifier is listed in `duplicates`.
 */
export class RosterIndex {
  private readonly byId = new Map<PatientId, RosterMatch>();
  readonly duplicates: PatientId[];
  readonly size: number;

  constructor(entries: readonly RosterEntry[] = []) {
    const duplicates = new Set<PatientId>();

    for (const e of entries) {
      const id = e.identifier.trim();
      if (this.byId.has(id)) {
        duplicates.add(id);
        continue;
      }
      this.byId.set(id, { name: e.name, benefit: e.benefit });
    }

    this.duplicates = Array.from(duplicates).sort((a, b) => a.localeCompare(b));
    this.size = entries.length;
  }

  lookup(identifier: string): RosterMatch {
    const hit = this.byId.get(identifier.trim());
    return hit ? { ...hit } : { ...EMPTY_MATCH };
  }
}

/**
 * Stringifies a roster cell. Missing cells become `""`.
 */
function asCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Picks the first key present, comparing trimmed header names.
 *
 * Spreadsheets exported by hand often carry stray spaces around headers.
 */
function pickField(record: Record<string, unknown>, keys: string[]): unknown {
  for (const [k, v] of Object.entries(record)) {
    if (keys.includes(k.trim())) return v;
  }
  return undefined;
}

/**
 * Converts loosely keyed roster records into RosterEntry values.
 *
 * Accepts the spreadsheet headers (`DNI`, `Nombre`, `Beneficio`) as well as
 * the field names of RosterEntry. Absent fields default to `""`.
 */
export function normalizeRosterRecords(
  records: readonly Record<string, unknown>[]
): RosterEntry[] {
  return records.map((r) => ({
    identifier: asCell(pickField(r, ["DNI", "dni", "identifier"])).trim(),
    name: asCell(pickField(r, ["Nombre", "nombre", "name"])),
    benefit: asCell(pickField(r, ["Beneficio", "beneficio", "benefit"])),
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a CSV roster. The first non-blank line is the header; quoted cells
 * may contain commas, escaped quotes and line breaks.
 */
export function parseRosterCsv(text: string): RosterEntry[] {
  const parsed: unknown = parse(text, {
    bom: true,
    columns: (header: string[]) => header.map((h) => h.trim()),
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!Array.isArray(parsed)) return [];
  return normalizeRosterRecords(parsed.filter(isRecord));
}
