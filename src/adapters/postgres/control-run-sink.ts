import { buildControlRunTables, type OutputTable } from "../../application/output-tables.js";
import type { ControlRunResult, FieldValue } from "../../domain/types.js";
import type { ControlRunSinkPort } from "../../ports/control-run-sink.js";

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
}

// Satisfied by pg's Pool.
export interface SqlPool {
  connect(): Promise<SqlClient>;
}

interface PostgresControlRunSinkOptions {
  tablePrefix: string;
  batchSize: number;
}

const DEFAULT_OPTIONS: PostgresControlRunSinkOptions = {
  tablePrefix: "rc_",
  batchSize: 500,
};

export function buildInsertStatement<TColumn extends string>(
  tableName: string,
  columns: readonly TColumn[],
  rows: ReadonlyArray<Record<TColumn, FieldValue>>,
): { text: string; values: FieldValue[] } {
  const values: FieldValue[] = [];
  const tuples = rows.map((row) => {
    const placeholders = columns.map((column) => {
      values.push(row[column]);
      return `$${values.length}`;
    });
    return `(${placeholders.join(", ")})`;
  });
  return {
    text: `INSERT INTO ${tableName} (${columns.join(", ")}) VALUES ${tuples.join(", ")}`,
    values,
  };
}

export class PostgresControlRunSink implements ControlRunSinkPort {
  readonly location: string;
  private readonly options: PostgresControlRunSinkOptions;

  constructor(
    private readonly pool: SqlPool,
    options: Partial<PostgresControlRunSinkOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.location = `postgres:${this.options.tablePrefix}control_*`;
  }

  async write(run: ControlRunResult): Promise<void> {
    const tables = buildControlRunTables(run);
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await this.replaceTable(client, tables.decisions);
      await this.replaceTable(client, tables.hits);
      await this.replaceTable(client, tables.metrics);
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  private async replaceTable<TColumn extends string>(
    client: SqlClient,
    table: OutputTable<TColumn>,
  ): Promise<void> {
    const tableName = `${this.options.tablePrefix}${table.name}`;
    await client.query(`DELETE FROM ${tableName}`);
    for (let offset = 0; offset < table.rows.length; offset += this.options.batchSize) {
      const chunk = table.rows.slice(offset, offset + this.options.batchSize);
      const statement = buildInsertStatement(tableName, table.columns, chunk);
      await client.query(statement.text, statement.values);
    }
  }
}
