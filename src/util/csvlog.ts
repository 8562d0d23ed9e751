import fs from "fs";
import path from "path";

export type CsvValue = string | number | boolean | null | undefined;
export type Row = Record<string, CsvValue>;

type CsvLogOpts = {
  truncate?: boolean;
  header?: string[];
};

export function csvEscape(x: CsvValue): string {
  if (x === null || x === undefined) return "";
  const s = String(x);
  return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export class CsvLog {
  readonly file: string;
  private header?: string[];
  private rows = 0;

  constructor(file: string, opts: CsvLogOpts = {}) {
    this.file = file;
    fs.mkdirSync(path.dirname(file), { recursive: true });

    if (opts.truncate) fs.writeFileSync(this.file, "");

    if (opts.header && opts.header.length) {
      this.header = [...opts.header];
      fs.appendFileSync(this.file, this.header.join(",") + "\n");
    }
  }

  get written() {
    return this.rows;
  }

  write(row: Row) {
    this.writeAll([row]);
  }

  /** one append per batch; the header comes from the first row when none was given */
  writeAll(rows: readonly Row[]) {
    if (rows.length === 0) return;

    let out = "";
    if (!this.header) {
      const first = rows[0] ?? {};
      this.header = Object.keys(first);
      out += this.header.join(",") + "\n";
    }
    const keys = this.header;
    for (const row of rows) out += keys.map((k) => csvEscape(row[k])).join(",") + "\n";

    fs.appendFileSync(this.file, out);
    this.rows += rows.length;
  }
}
