import { categoryColor, type ConditionClassifier } from "./classifier";
import { computeBmi } from "./numeric";
import type { RosterIndex } from "./roster";
import { normalizeText } from "./text";
import { EDITABLE_FIELDS, type EditableField, type Row } from "./types";

export const DEFAULT_ROW_COUNT = 30;

/** Unit marker searched for in normalized blood-pressure text. */
const BP_UNIT_TOKEN = "mmhg";
const BP_UNIT_SUFFIX = "mmHg";

/**
 * Collaborators the edit rules read from. Neither is mutated by a rule.
 */
export type EditContext = {
  roster: RosterIndex;
  classifier: ConditionClassifier;
};

/**
 * A recomputation rule: reads the row's current state, returns the fields to
 * write back. Rules never mutate the row themselves.
 */
export type EditRule = (row: Readonly<Row>, ctx: EditContext) => Partial<Row>;

export function createEmptyRow(): Row {
  return {
    identifier: "",
    name: "",
    benefit: "",
    bloodPressure: "",
    weightKg: "",
    heightM: "",
    bmi: null,
    diagnosis: "",
    treatment: "",
    category: "ninguno",
    color: categoryColor("ninguno"),
    attentionDate: "",
  };
}

export function createRowPool(size: number = DEFAULT_ROW_COUNT): Row[] {
  return Array.from({ length: size }, () => createEmptyRow());
}

/**
 * Appends the pressure unit unless it is already there. Idempotent.
 */
export function normalizeBloodPressure(value: string): string {
  const bp = value.trim();
  if (!bp) return "";
  if (normalizeText(bp).includes(BP_UNIT_TOKEN)) return bp;
  return `${bp} ${BP_UNIT_SUFFIX}`;
}

const autocompleteFromRoster: EditRule = (row, { roster }) => {
  const id = row.identifier.trim();
  if (!id) return {};

  // Re-entering an identifier discards manual edits to name/benefit.
  const { name, benefit } = roster.lookup(id);
  return { name, benefit };
};

const appendPressureUnit: EditRule = (row) => {
  if (!row.bloodPressure) return {};
  return { bloodPressure: normalizeBloodPressure(row.bloodPressure) };
};

const recomputeBmi: EditRule = (row) => ({
  bmi: computeBmi(row.weightKg, row.heightM),
});

const recomputeCategory: EditRule = (row, { classifier }) => {
  const category = classifier.classify(row.diagnosis, row.treatment);
  return { category, color: categoryColor(category) };
};

/**
 * Recomputation rules keyed by the edited field. Fields without an entry
 * have no side effects.
 */
export const EDIT_RULES: Readonly<Record<EditableField, readonly EditRule[]>> = {
  identifier: [autocompleteFromRoster],
  name: [],
  benefit: [],
  bloodPressure: [appendPressureUnit],
  weightKg: [recomputeBmi],
  heightM: [recomputeBmi],
  diagnosis: [recomputeCategory],
  treatment: [recomputeCategory],
  attentionDate: [],
};

export function isEditableField(field: unknown): field is EditableField {
  return EDITABLE_FIELDS.some((f) => f === field);
}

/**
 * Commits an edited cell value to `row` and fires the rules of that field.
 *
 * The value is trimmed before it is stored. The row is mutated in place and
 * returned for convenience.
 */
export function applyEdit(
  row: Row,
  field: EditableField,
  value: string,
  ctx: EditContext
): Row {
  row[field] = value.trim();

  for (const rule of EDIT_RULES[field]) {
    Object.assign(row, rule(row, ctx));
  }

  return row;
}
