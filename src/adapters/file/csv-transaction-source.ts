import { parse } from "csv-parse/sync";
import { parseTransactionRecords } from "../../application/transaction-batch.js";
import { REQUIRED_TRANSACTION_FIELDS, type FieldValue, type TransactionRecord } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";
import type { TransactionSourcePort } from "../../ports/transaction-source.js";
import { readInputFile } from "./read-input-file.js";

const MISSING_TOKENS = new Set(["", "NA", "N/A", "n/a", "NaN", "nan", "null", "NULL", "None", "<NA>"]);

const PLAIN_DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const LEADING_ZERO_INTEGER = /^[+-]?0\d/;

// Identifiers stay as the raw cell text.
const TEXT_COLUMNS: ReadonlySet<string> = new Set(["tx_id", "rail", "timestamp", "user_id"]);

/**
 * Cell typing for untyped CSV text: missing markers become null, true/false
 * become booleans and plain decimal text becomes a number. Hex, octal, binary
 * and exponent notation, zero-padded integers and integers beyond the safe
 * range keep their text.
 */
export function inferCellValue(cell: string): FieldValue {
  const trimmed = cell.trim();
  if (MISSING_TOKENS.has(trimmed)) {
    return null;
  }
  const lower = trimmed.toLowerCase();
  if (lower === "true") {
    return true;
  }
  if (lower === "false") {
    return false;
  }
  if (!PLAIN_DECIMAL.test(trimmed) || LEADING_ZERO_INTEGER.test(trimmed)) {
    return cell;
  }
  const numeric = Number(trimmed);
  if (!Number.isFinite(numeric) || (Number.isInteger(numeric) && !Number.isSafeInteger(numeric))) {
    return cell;
  }
  return numeric;
}

function textCellValue(cell: string): FieldValue {
  return cell.trim() === "" ? null : cell;
}

function toStringRows(parsed: unknown, location: string): string[][] {
  if (!Array.isArray(parsed)) {
    throw new AppError(422, "invalid_transaction_batch", `${location} could not be read as CSV.`);
  }
  return parsed.map((row: unknown) => {
    if (!Array.isArray(row)) {
      throw new AppError(422, "invalid_transaction_batch", `${location} could not be read as CSV.`);
    }
    return row.map((cell: unknown) => (typeof cell === "string" ? cell : String(cell)));
  });
}

export class CsvTransactionSource implements TransactionSourcePort {
  constructor(readonly location: string) {}

  async loadTransactions(): Promise<TransactionRecord[]> {
    const text = await readInputFile(this.location);
    let parsed: unknown;
    try {
      parsed = parse(text, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: false,
      });
    } catch (error) {
      if (error instanceof Error) {
        throw new AppError(422, "invalid_transaction_batch", `${this.location} is not valid CSV: ${error.message}`);
      }
      throw error;
    }
    const [header, ...body] = toStringRows(parsed, this.location);
    const columns = (header ?? []).map((column) => column.trim());

    for (const field of REQUIRED_TRANSACTION_FIELDS) {
      if (!columns.includes(field)) {
        throw new AppError(
          422,
          "missing_required_field",
          `Missing required column '${field}' in ${this.location}.`,
        );
      }
    }

    const rows = body.map((cells) =>
      Object.fromEntries(
        columns.map((column, index): [string, FieldValue] => {
          const cell = cells[index] ?? "";
          return [column, TEXT_COLUMNS.has(column) ? textCellValue(cell) : inferCellValue(cell)];
        }),
      ),
    );
    return parseTransactionRecords(rows, this.location);
  }
}
