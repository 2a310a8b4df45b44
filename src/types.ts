/**
 * Patient identifier (DNI). Compared as a trimmed string, never coerced to a
 * number.
 */
export type PatientId = string;

/**
 * One record of the externally supplied roster.
 */
export type RosterEntry = {
  identifier: PatientId;
  name: string;
  benefit: string;
};

/**
 * Chronic-condition classification assigned to each row.
 */
export const CATEGORIES = [
  "diabetes",
  "hta",
  "hipotiroidismo",
  "mixto",
  "ninguno",
] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * One editable clinical record of the grid.
 *
 * Every input column is kept as the raw (trimmed) text the user committed.
 * `bmi` and `category` are derived and only ever written by the edit rules.
 */
export type Row = {
  identifier: PatientId;
  name: string;
  benefit: string;
  bloodPressure: string;
  weightKg: string;
  heightM: string;
  /** `null` when weight/height are missing or invalid. */
  bmi: number | null;
  diagnosis: string;
  treatment: string;
  category: Category;
  /** Background color of the row, follows `category`. */
  color: string;
  attentionDate: string;
};

export const EDITABLE_FIELDS = [
  "identifier",
  "name",
  "benefit",
  "bloodPressure",
  "weightKg",
  "heightM",
  "diagnosis",
  "treatment",
  "attentionDate",
] as const;

export type EditableField = (typeof EDITABLE_FIELDS)[number];

/**
 * Attendance count for one patient in one calendar quarter.
 */
export type QuarterlyEntry = {
  identifier: PatientId;
  year: number;
  quarter: 1 | 2 | 3 | 4;
  count: number;
};

/**
 * Result of the quarterly report.
 *
 * - `no-data`: no committed row (non-empty identifier) at all
 * - `no-valid-dates`: committed rows exist but none carries a parseable date
 * - `ok`: `entries` holds at least one group
 */
export type QuarterlySummary = {
  status: "no-data" | "no-valid-dates" | "ok";
  entries: QuarterlyEntry[];
};

export type CategoryStyle = {
  background: string;
  foreground: string;
};

/**
 * Committed row as handed to spreadsheet/PDF writers.
 */
export type ExportRow = {
  columns: Record<ExportColumn, string>;
  category: Category;
  style: CategoryStyle;
};

export const EXPORT_COLUMNS = [
  "DNI",
  "Nombre",
  "Beneficio",
  "Presión Arterial (mmHg)",
  "Peso (kg)",
  "Estatura (m)",
  "IMC",
  "Diagnóstico",
  "Tratamiento",
  "Fecha Atención",
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];
