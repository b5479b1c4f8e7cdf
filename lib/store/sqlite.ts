import { mkdirSync } from "fs";
import path from "path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { CellValue, RawRow, TableSnapshot } from "@/lib/domain/types";
import { StoreWriteError, TabNotFoundError, errorMessage } from "./errors";
import { FIRST_DATA_POSITION, type RecordStore } from "./types";

const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

const TableInfoSchema = z.array(z.object({ name: z.string() }));

function isRow(v: unknown): v is RawRow {
  return typeof v === "object" && v !== null;
}

// Local file database: one table per tab, columns untyped so values keep their stored type.
// Physical row order (rowid) stands in for spreadsheet row order.
export class SqliteStore implements RecordStore {
  readonly backend = "sqlite" as const;

  constructor(private readonly db: Database.Database) {}

  static open(file: string): SqliteStore {
    if (file !== ":memory:") mkdirSync(path.dirname(file), { recursive: true });
    return new SqliteStore(new Database(file));
  }

  ensureTable(tab: string, header: readonly string[]): void {
    const cols = header.map(quoteIdent).join(", ");
    this.db.prepare(`CREATE TABLE IF NOT EXISTS ${quoteIdent(tab)} (${cols})`).run();
  }

  close(): void {
    this.db.close();
  }

  private hasTable(tab: string): boolean {
    const row = this.db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?").get(tab);
    return row !== undefined;
  }

  private header(tab: string): string[] {
    const info = TableInfoSchema.parse(this.db.prepare(`PRAGMA table_info(${quoteIdent(tab)})`).all());
    return info.map((c) => c.name);
  }

  async readTable(tab: string): Promise<TableSnapshot> {
    if (!this.hasTable(tab)) throw new TabNotFoundError(tab);
    const header = this.header(tab);
    const rows = this.db.prepare(`SELECT * FROM ${quoteIdent(tab)} ORDER BY rowid`).all().filter(isRow);
    return { header, rows };
  }

  async appendRows(tab: string, rows: CellValue[][]): Promise<void> {
    if (!this.hasTable(tab)) throw new TabNotFoundError(tab);
    const width = this.header(tab).length;
    const stmt = this.db.prepare(
      `INSERT INTO ${quoteIdent(tab)} VALUES (${Array.from({ length: width }, () => "?").join(", ")})`
    );
    const insertAll = this.db.transaction((batch: CellValue[][]) => {
      for (const r of batch) stmt.run(...Array.from({ length: width }, (_, i) => r[i] ?? ""));
    });
    try {
      insertAll(rows);
    } catch (e) {
      throw new StoreWriteError(`Append to '${tab}' failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  async deleteRow(tab: string, position: number): Promise<void> {
    if (!this.hasTable(tab)) throw new TabNotFoundError(tab);
    if (!Number.isInteger(position) || position < FIRST_DATA_POSITION) {
      throw new StoreWriteError(`No row at position ${position} in '${tab}'`);
    }
    const t = quoteIdent(tab);
    const res = this.db
      .prepare(`DELETE FROM ${t} WHERE rowid = (SELECT rowid FROM ${t} ORDER BY rowid LIMIT 1 OFFSET ?)`)
      .run(position - FIRST_DATA_POSITION);
    if (res.changes === 0) throw new StoreWriteError(`No row at position ${position} in '${tab}'`);
  }
}
