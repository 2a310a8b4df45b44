import { normalizeText } from "./text";
import type { Category, CategoryStyle } from "./types";

/**
 * Detection terms for one condition.
 *
 * Matching is a plain "contains" check on normalized text, not whole words:
 * "hipot" matches "hipotiroidismo subclinico" as well as typos like "hipotiroidsmo".
 */
export type ConditionRule = {
  diagnosisKeywords: readonly string[];
  medications: readonly string[];
};

export type ClassifierConfig = {
  diabetes: ConditionRule;
  hta: ConditionRule;
  hipotiroidismo: ConditionRule;
};

/**
 * Keyword and medication lists used by the registry.
 *
 * Accented duplicates are kept as they appear on prescriptions; terms are
 * normalized before matching so they collapse onto the unaccented form.
 */
export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  diabetes: {
    diagnosisKeywords: ["diabetes", "dmt2", "dm2", "mellitus tipo 2"],
    medications: [
      "insulina",
      "metformina",
      "dapagliflozina",
      "vildagliptina",
      "sitagliptina",
    ],
  },
  hta: {
    diagnosisKeywords: ["hipertension", "hipertensión arterial", "hta"],
    medications: [
      "losartan",
      "losartán",
      "amlodipina",
      "carvedilol",
      "hidroclorotiazida",
      "bisoprolol",
      "enalapril",
      "telmisartan",
      "telmisartán",
      "valsartan",
      "valsartán",
    ],
  },
  hipotiroidismo: {
    diagnosisKeywords: ["hipotiroidismo", "hipot"],
    medications: ["levotiroxina"],
  },
};

const CATEGORY_STYLES: Record<Category, CategoryStyle> = {
  diabetes: { background: "#9370DB", foreground: "#FFFFFF" },
  hta: { background: "#87CEEB", foreground: "#000000" },
  hipotiroidismo: { background: "#90EE90", foreground: "#000000" },
  mixto: { background: "#FF6B6B", foreground: "#FFFFFF" },
  ninguno: { background: "#FFFFFF", foreground: "#000000" },
};

const CATEGORY_LABELS: Record<Category, string> = {
  diabetes: "Diabetes",
  hta: "HTA",
  hipotiroidismo: "Hipotiroidismo",
  mixto: "Diabetes + HTA",
  ninguno: "Sin diagnóstico",
};

/**
 * Background color of a category, as used by the grid and the exports.
 */
export function categoryColor(category: Category): string {
  return CATEGORY_STYLES[category].background;
}

export function categoryStyle(category: Category): CategoryStyle {
  return { ...CATEGORY_STYLES[category] };
}

export function categoryLabel(category: Category): string {
  return CATEGORY_LABELS[category];
}

type CompiledRule = {
  diagnosisKeywords: string[];
  medications: string[];
};

function compileRule(rule: ConditionRule): CompiledRule {
  const compile = (terms: readonly string[]) =>
    Array.from(new Set(terms.map(normalizeText))).filter((t) => t.length > 0);

  return {
    diagnosisKeywords: compile(rule.diagnosisKeywords),
    medications: compile(rule.medications),
  };
}

function matches(rule: CompiledRule, diagnosis: string, treatment: string): boolean {
  return (
    rule.diagnosisKeywords.some((k) => diagnosis.includes(k)) ||
    rule.medications.some((m) => treatment.includes(m))
  );
}

/**
 * Maps (diagnosis, treatment) free text to a condition category.
 *
 * Precedence: `mixto` (diabetes and hypertension) > `diabetes` > `hta` >
 * `hipotiroidismo` > `ninguno`. Hypothyroidism never combines: a diabetic
 * patient on levotiroxina is still `diabetes`.
 */
export class ConditionClassifier {
  private readonly diabetes: CompiledRule;
  private readonly hta: CompiledRule;
  private readonly hipotiroidismo: CompiledRule;

  constructor(config: ClassifierConfig = DEFAULT_CLASSIFIER_CONFIG) {
    this.diabetes = compileRule(config.diabetes);
    this.hta = compileRule(config.hta);
    this.hipotiroidismo = compileRule(config.hipotiroidismo);
  }

  classify(diagnosis: unknown, treatment: unknown): Category {
    const diag = normalizeText(diagnosis);
    const trat = normalizeText(treatment);

    const diabetic = matches(this.diabetes, diag, trat);
    const hypertensive = matches(this.hta, diag, trat);

    if (diabetic && hypertensive) return "mixto";
    if (diabetic) return "diabetes";
    if (hypertensive) return "hta";
    if (matches(this.hipotiroidismo, diag, trat)) return "hipotiroidismo";

    return "ninguno";
  }
}

const defaultClassifier = new ConditionClassifier();

/**
 * Classifies with the default keyword and medication lists.
 */
export function classify(diagnosis: unknown, treatment: unknown): Category {
  return defaultClassifier.classify(diagnosis, treatment);
}
