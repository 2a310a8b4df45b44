import { ConditionClassifier } from "./classifier";
import { buildExportRows } from "./export";
import { aggregateQuarterly, committedRows } from "./quarterly";
import { RosterIndex } from "./roster";
import {
  applyEdit,
  createRowPool,
  DEFAULT_ROW_COUNT,
  isEditableField,
  type EditContext,
} from "./row";
import { EDITABLE_FIELDS } from "./types";
import type { ExportRow, QuarterlySummary, RosterEntry, Row } from "./types";

type GridSessionOptions = {
  rowCount?: number;
  roster?: readonly RosterEntry[];
  classifier?: ConditionClassifier;
};

/**
 * The editable grid: a fixed pool of rows plus the roster they autocomplete
 * from.
 */
export class GridSession {
  private readonly rowCount: number;
  private readonly classifier: ConditionClassifier;
  private roster: RosterIndex;
  private pool: Row[];

  constructor({
    rowCount = DEFAULT_ROW_COUNT,
    roster = [],
    classifier = new ConditionClassifier(),
  }: GridSessionOptions = {}) {
    if (!Number.isInteger(rowCount) || rowCount < 1) {
      throw new Error(`Row count must be a positive integer, got ${rowCount}`);
    }
    this.rowCount = rowCount;
    this.classifier = classifier;
    this.roster = new RosterIndex(roster);
    this.pool = createRowPool(rowCount);
  }

  get rows(): readonly Readonly<Row>[] {
    return this.pool;
  }

  get rosterIndex(): RosterIndex {
    return this.roster;
  }

  /**
   * Replaces the roster wholesale. Rows already filled keep their names until
   * their identifier is edited again.
   */
  loadRoster(entries: readonly RosterEntry[]): RosterIndex {
    this.roster = new RosterIndex(entries);
    return this.roster;
  }

  /**
   * Commits one cell edit. Throws on an out-of-range index or a field that
   * cannot be edited (including the derived `bmi` and `category`).
   */
  editCell(index: number, field: string, value: string): Readonly<Row> {
    if (!Number.isInteger(index) || index < 0 || index >= this.pool.length) {
      throw new Error(
        `Row index ${index} out of range (0..${this.pool.length - 1})`
      );
    }
    if (!isEditableField(field)) {
      throw new Error(`Field "${field}" is not editable`);
    }

    const ctx: EditContext = {
      roster: this.roster,
      classifier: this.classifier,
    };
    return applyEdit(this.pool[index], field, value, ctx);
  }

  /**
   * Replays loosely typed records as cell edits, one row each from the top of
   * the grid. Fields are committed in column order, so roster autocomplete
   * runs before an explicit name/benefit. Records past the pool size are
   * ignored. Returns the number of rows filled.
   */
  replay(records: readonly unknown[]): number {
    let index = 0;
    for (const record of records) {
      if (index >= this.pool.length) break;
      if (typeof record !== "object" || record === null) continue;

      for (const field of EDITABLE_FIELDS) {
        const value: unknown = Reflect.get(record, field);
        if (value === undefined || value === null) continue;
        this.editCell(index, field, String(value));
      }
      index += 1;
    }
    return index;
  }

  /**
   * Drops every row and recreates the empty pool.
   */
  clear(): void {
    this.pool = createRowPool(this.rowCount);
  }

  committedRows(): Readonly<Row>[] {
    return committedRows(this.pool);
  }

  summary(): QuarterlySummary {
    return aggregateQuarterly(this.pool);
  }

  exportRows(): ExportRow[] {
    return buildExportRows(this.pool, this.classifier);
  }
}
