import { google, type sheets_v4 } from "googleapis";
import { z } from "zod";
import type { CellValue, RawRow, TableSnapshot } from "@/lib/domain/types";
import { logger } from "@/lib/log";
import { StoreConnectionError, StoreWriteError, TabNotFoundError, errorMessage } from "./errors";
import type { RecordStore } from "./types";

const log = logger("sheets");

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

// The part of the generated Sheets v4 client this store calls.
export interface SpreadsheetsApi {
  get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
  batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate): Promise<unknown>;
  values: {
    get(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<{ data: sheets_v4.Schema$ValueRange }>;
    append(params: sheets_v4.Params$Resource$Spreadsheets$Values$Append): Promise<unknown>;
  };
}

export const ServiceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

export function spreadsheetIdFromUrl(urlOrId: string): string {
  const s = urlOrId.trim();
  const m = s.match(/\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/);
  if (m) return m[1];
  if (/^[a-zA-Z0-9_-]{20,}$/.test(s)) return s;
  throw new StoreConnectionError(`Not a spreadsheet URL: ${s}`);
}

// A1 range covering a whole tab
const tabRange = (tab: string) => `'${tab.replace(/'/g, "''")}'`;

function toCell(v: unknown): unknown {
  return v === null || v === undefined ? "" : v;
}

export class SheetsStore implements RecordStore {
  readonly backend = "sheets" as const;
  private sheetIds: Map<string, number> | null = null;

  constructor(
    private readonly api: SpreadsheetsApi,
    readonly spreadsheetId: string
  ) {}

  // Tab title -> numeric sheet id; fetched once per connection.
  async tabs(): Promise<Map<string, number>> {
    if (this.sheetIds) return this.sheetIds;
    let res: { data: sheets_v4.Schema$Spreadsheet };
    try {
      res = await this.api.get({ spreadsheetId: this.spreadsheetId, fields: "sheets.properties" });
    } catch (e) {
      throw new StoreConnectionError(`Could not open spreadsheet: ${errorMessage(e)}`, { cause: e });
    }
    const ids = new Map<string, number>();
    for (const sheet of res.data.sheets ?? []) {
      const title = sheet.properties?.title;
      const id = sheet.properties?.sheetId;
      if (typeof title === "string" && typeof id === "number") ids.set(title, id);
    }
    this.sheetIds = ids;
    return ids;
  }

  private async sheetId(tab: string): Promise<number> {
    const id = (await this.tabs()).get(tab);
    if (id === undefined) throw new TabNotFoundError(tab);
    return id;
  }

  // First row is the header; shorter rows are padded with "".
  async readTable(tab: string): Promise<TableSnapshot> {
    await this.sheetId(tab);
    let res: { data: sheets_v4.Schema$ValueRange };
    try {
      res = await this.api.values.get({
        spreadsheetId: this.spreadsheetId,
        range: tabRange(tab),
        valueRenderOption: "UNFORMATTED_VALUE",
      });
    } catch (e) {
      throw new StoreConnectionError(`Could not read '${tab}': ${errorMessage(e)}`, { cause: e });
    }
    const values: unknown[][] = res.data.values ?? [];
    if (values.length === 0) return { header: [], rows: [] };

    const header = values[0].map((h) => String(h ?? ""));
    const rows = values.slice(1).map((cells) => {
      const row: RawRow = {};
      header.forEach((h, i) => {
        if (!Object.hasOwn(row, h)) row[h] = toCell(cells[i]);
      });
      return row;
    });
    return { header, rows };
  }

  async appendRows(tab: string, rows: CellValue[][]): Promise<void> {
    await this.sheetId(tab);
    try {
      await this.api.values.append({
        spreadsheetId: this.spreadsheetId,
        range: tabRange(tab),
        valueInputOption: "USER_ENTERED",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: rows },
      });
    } catch (e) {
      throw new StoreWriteError(`Append to '${tab}' failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  async deleteRow(tab: string, position: number): Promise<void> {
    const sheetId = await this.sheetId(tab);
    try {
      await this.api.batchUpdate({
        spreadsheetId: this.spreadsheetId,
        requestBody: {
          requests: [
            {
              deleteDimension: {
                range: { sheetId, dimension: "ROWS", startIndex: position - 1, endIndex: position },
              },
            },
          ],
        },
      });
    } catch (e) {
      throw new StoreWriteError(`Delete of row ${position} in '${tab}' failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}

export async function connectSheets(serviceAccountJson: string, sheetUrl: string): Promise<SheetsStore> {
  let credentials: z.infer<typeof ServiceAccountSchema>;
  try {
    credentials = ServiceAccountSchema.parse(JSON.parse(serviceAccountJson));
  } catch (e) {
    throw new StoreConnectionError(`Invalid service account credentials: ${errorMessage(e)}`, { cause: e });
  }
  const auth = new google.auth.GoogleAuth({ credentials, scopes: SCOPES });
  const sheets = google.sheets({ version: "v4", auth });
  const store = new SheetsStore(sheets.spreadsheets, spreadsheetIdFromUrl(sheetUrl));
  const tabs = await store.tabs();
  log.info(`connected to spreadsheet ${store.spreadsheetId} (${tabs.size} tabs)`);
  return store;
}
