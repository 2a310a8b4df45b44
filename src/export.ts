import { categoryStyle, ConditionClassifier } from "./classifier";
import { formatBmi } from "./numeric";
import { committedRows } from "./quarterly";
import type { ExportColumn, ExportRow, Row } from "./types";

/**
 * Builds the rows handed to spreadsheet/PDF writers.
 *
 * Only committed rows (non-empty identifier) are exported, in grid order.
 * The category is reclassified from the current diagnosis/treatment so the
 * export color never lags behind the text.
 */
export function buildExportRows(
  rows: readonly Row[],
  classifier: ConditionClassifier = new ConditionClassifier()
): ExportRow[] {
  return committedRows(rows).map((row) => {
    const category = classifier.classify(row.diagnosis, row.treatment);
    const columns: Record<ExportColumn, string> = {
      DNI: row.identifier.trim(),
      Nombre: row.name.trim(),
      Beneficio: row.benefit.trim(),
      "Presión Arterial (mmHg)": row.bloodPressure.trim(),
      "Peso (kg)": row.weightKg.trim(),
      "Estatura (m)": row.heightM.trim(),
      IMC: formatBmi(row.bmi),
      Diagnóstico: row.diagnosis.trim(),
      Tratamiento: row.treatment.trim(),
      "Fecha Atención": row.attentionDate.trim(),
    };

    return { columns, category, style: categoryStyle(category) };
  });
}
