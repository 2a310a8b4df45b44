import { describe, expect, test } from "vitest";
import {
  categoryColor,
  categoryLabel,
  categoryStyle,
  classify,
  ConditionClassifier,
  DEFAULT_CLASSIFIER_CONFIG,
} from "./classifier";
import { CATEGORIES } from "./types";

describe("classify", () => {
  test("diabetes from diagnosis", () => {
    expect(classify("Diabetes Mellitus Tipo 2", "")).toBe("diabetes");
    expect(classify("DMT2", "")).toBe("diabetes");
    expect(classify("dm2 en control", "")).toBe("diabetes");
  });

  test("hypertension from medication, accented or not", () => {
    expect(classify("", "Losartán 50mg")).toBe("hta");
    expect(classify("", "losartan 50mg")).toBe("hta");
    expect(classify("", "Valsartán + Amlodipina")).toBe("hta");
  });

  test("hypertension from diagnosis", () => {
    expect(classify("Hipertensión arterial", "")).toBe("hta");
    expect(classify("HTA", "")).toBe("hta");
  });

  test("diabetes and hypertension together is mixto", () => {
    expect(classify("Diabetes", "Losartan")).toBe("mixto");
    expect(classify("HTA", "Metformina 850")).toBe("mixto");
    expect(classify("", "Insulina NPH, Enalapril 10mg")).toBe("mixto");
  });

  test("hypothyroidism", () => {
    expect(classify("Hipotiroidismo", "")).toBe("hipotiroidismo");
    expect(classify("", "Levotiroxina 100")).toBe("hipotiroidismo");
  });

  test("hypothyroidism loses to diabetes and hypertension", () => {
    expect(classify("Hipotiroidismo", "Metformina")).toBe("diabetes");
    expect(classify("Hipotiroidismo", "Bisoprolol")).toBe("hta");
    expect(classify("Hipotiroidismo, DM2", "Carvedilol")).toBe("mixto");
  });

  test("empty or unrelated input is ninguno", () => {
    expect(classify("", "")).toBe("ninguno");
    expect(classify(null, undefined)).toBe("ninguno");
    expect(classify("Control de rutina", "Paracetamol")).toBe("ninguno");
  });

  test("matches substrings, not whole words", () => {
    expect(classify("hipotiroidsmo", "")).toBe("hipotiroidismo");
    expect(classify("prediabetes", "")).toBe("diabetes");
  });

  test("medications only count in the treatment column", () => {
    expect(classify("metformina", "")).toBe("ninguno");
  });
});

describe("ConditionClassifier configuration", () => {
  test("uses injected lists", () => {
    const classifier = new ConditionClassifier({
      ...DEFAULT_CLASSIFIER_CONFIG,
      diabetes: {
        diagnosisKeywords: ["diabetes"],
        medications: ["Glibenclamida"],
      },
    });
    expect(classifier.classify("", "glibenclamida 5mg")).toBe("diabetes");
    expect(classifier.classify("", "metformina")).toBe("ninguno");
  });

  test("normalizes configured terms", () => {
    const classifier = new ConditionClassifier({
      diabetes: { diagnosisKeywords: [], medications: [] },
      hta: { diagnosisKeywords: ["  HIPERTENSIÓN "], medications: [] },
      hipotiroidismo: { diagnosisKeywords: [], medications: [] },
    });
    expect(classifier.classify("hipertension", "")).toBe("hta");
  });

  test("blank terms never match everything", () => {
    const classifier = new ConditionClassifier({
      diabetes: { diagnosisKeywords: ["", "  "], medications: [] },
      hta: { diagnosisKeywords: [], medications: [] },
      hipotiroidismo: { diagnosisKeywords: [], medications: [] },
    });
    expect(classifier.classify("anything", "")).toBe("ninguno");
  });
});

describe("category styles", () => {
  test("background colors", () => {
    expect(categoryColor("diabetes")).toBe("#9370DB");
    expect(categoryColor("hta")).toBe("#87CEEB");
    expect(categoryColor("hipotiroidismo")).toBe("#90EE90");
    expect(categoryColor("mixto")).toBe("#FF6B6B");
    expect(categoryColor("ninguno")).toBe("#FFFFFF");
  });

  test("each category has its own color", () => {
    const colors = CATEGORIES.map(categoryColor);
    expect(new Set(colors).size).toBe(CATEGORIES.length);
  });

  test("foreground contrasts with dark backgrounds", () => {
    expect(categoryStyle("mixto")).toEqual({
      background: "#FF6B6B",
      foreground: "#FFFFFF",
    });
    expect(categoryStyle("hta").foreground).toBe("#000000");
  });

  test("labels", () => {
    expect(categoryLabel("mixto")).toBe("Diabetes + HTA");
  });
});
