import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { stringify } from "csv-stringify/sync";
import { buildControlRunTables, type OutputTable } from "../../application/output-tables.js";
import type { ControlRunResult, FieldValue } from "../../domain/types.js";
import type { ControlRunSinkPort } from "../../ports/control-run-sink.js";

function formatCell(value: FieldValue): string {
  if (value === null) {
    return "";
  }
  return String(value);
}

export function renderCsvTable<TColumn extends string>(table: OutputTable<TColumn>): string {
  const records = table.rows.map((row) => table.columns.map((column) => formatCell(row[column])));
  return stringify([[...table.columns], ...records]);
}

export class CsvControlRunSink implements ControlRunSinkPort {
  constructor(readonly location: string) {}

  filePath(table: string): string {
    return join(this.location, `${table}.csv`);
  }

  async write(run: ControlRunResult): Promise<void> {
    const tables = buildControlRunTables(run);
    await mkdir(this.location, { recursive: true });
    await writeFile(this.filePath(tables.decisions.name), renderCsvTable(tables.decisions), "utf8");
    await writeFile(this.filePath(tables.hits.name), renderCsvTable(tables.hits), "utf8");
    await writeFile(this.filePath(tables.metrics.name), renderCsvTable(tables.metrics), "utf8");
  }
}
