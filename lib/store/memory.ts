import type { CellValue, RawRow, TableSnapshot } from "@/lib/domain/types";
import { StoreWriteError, TabNotFoundError } from "./errors";
import { FIRST_DATA_POSITION, type RecordStore } from "./types";

type Table = { header: string[]; rows: CellValue[][] };

// In-process store with the spreadsheet's positional semantics. Used for local runs and tests.
export class MemoryStore implements RecordStore {
  readonly backend = "memory" as const;
  private readonly tables = new Map<string, Table>();

  constructor(seed: Record<string, { header: string[]; rows?: CellValue[][] }> = {}) {
    for (const [tab, t] of Object.entries(seed)) this.createTable(tab, t.header, t.rows ?? []);
  }

  createTable(tab: string, header: readonly string[], rows: CellValue[][] = []): void {
    this.tables.set(tab, { header: [...header], rows: rows.map((r) => [...r]) });
  }

  dropTable(tab: string): void {
    this.tables.delete(tab);
  }

  rowCount(tab: string): number {
    return this.table(tab).rows.length;
  }

  rows(tab: string): CellValue[][] {
    return this.table(tab).rows.map((r) => [...r]);
  }

  async readTable(tab: string): Promise<TableSnapshot> {
    const t = this.table(tab);
    const rows = t.rows.map((values) => {
      const row: RawRow = {};
      t.header.forEach((h, i) => {
        row[h] = values[i] ?? "";
      });
      return row;
    });
    return { header: [...t.header], rows };
  }

  async appendRows(tab: string, rows: CellValue[][]): Promise<void> {
    const t = this.table(tab);
    for (const r of rows) t.rows.push([...r]);
  }

  async deleteRow(tab: string, position: number): Promise<void> {
    const t = this.table(tab);
    const index = position - FIRST_DATA_POSITION;
    if (!Number.isInteger(index) || index < 0 || index >= t.rows.length) {
      throw new StoreWriteError(`No row at position ${position} in '${tab}'`);
    }
    t.rows.splice(index, 1);
  }

  private table(tab: string): Table {
    const t = this.tables.get(tab);
    if (!t) throw new TabNotFoundError(tab);
    return t;
  }
}
