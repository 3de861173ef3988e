import { isFieldValue, toNumber } from "../domain/conditions.js";
import {
  REQUIRED_TRANSACTION_FIELDS,
  type FieldValue,
  type TransactionRecord,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function missingRequiredField(field: string, source: string, row: number): AppError {
  return new AppError(
    422,
    "missing_required_field",
    `Missing required column '${field}' in ${source} (row ${row}).`,
  );
}

function invalidField(field: string, source: string, row: number, expectation: string): AppError {
  return new AppError(
    422,
    "invalid_transaction_field",
    `Column '${field}' in ${source} (row ${row}) ${expectation}.`,
  );
}

function requireText(raw: Record<string, unknown>, field: string, source: string, row: number): string {
  const value = raw[field];
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return String(value);
  }
  throw invalidField(field, source, row, "must be a non-empty string");
}

function requireAmount(raw: Record<string, unknown>, source: string, row: number): number {
  const value = raw.amount;
  const amount = typeof value === "number" || typeof value === "string" ? toNumber(value) : null;
  if (amount === null) {
    throw invalidField("amount", source, row, "must be numeric");
  }
  return amount;
}

function requireLabel(raw: Record<string, unknown>, source: string, row: number): boolean {
  const value = raw.is_fraud_pattern;
  if (typeof value === "boolean") {
    return value;
  }
  if (value === 0 || value === 1) {
    return value === 1;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1") {
      return true;
    }
    if (normalized === "false" || normalized === "0") {
      return false;
    }
  }
  throw invalidField("is_fraud_pattern", source, row, "must be a boolean");
}

/**
 * Fails on the first record lacking a required field or repeating a tx_id.
 * Optional fields are never checked here; controls treat them as missing.
 */
export function assertTransactionBatch(records: readonly TransactionRecord[], source = "transaction batch"): void {
  const seen = new Set<string>();
  for (const [index, record] of records.entries()) {
    for (const field of REQUIRED_TRANSACTION_FIELDS) {
      const value: FieldValue | undefined = record[field];
      if (value === undefined || value === null) {
        throw missingRequiredField(field, source, index + 1);
      }
    }
    if (seen.has(record.tx_id)) {
      throw new AppError(
        422,
        "duplicate_transaction_id",
        `Duplicate tx_id '${record.tx_id}' in ${source} (row ${index + 1}).`,
      );
    }
    seen.add(record.tx_id);
  }
}

/**
 * Converts loosely typed rows (CSV cells, JSON bodies) into transaction records.
 */
export function parseTransactionRecords(rows: unknown, source: string): TransactionRecord[] {
  if (!Array.isArray(rows)) {
    throw new AppError(422, "invalid_transaction_batch", `${source} must be a list of transactions.`);
  }

  const records: TransactionRecord[] = [];
  for (const [index, raw] of rows.entries()) {
    const row = index + 1;
    if (!isObject(raw)) {
      throw new AppError(422, "invalid_transaction_batch", `${source} row ${row} must be an object.`);
    }
    for (const field of REQUIRED_TRANSACTION_FIELDS) {
      if (raw[field] === undefined || raw[field] === null) {
        throw missingRequiredField(field, source, row);
      }
    }

    const record: TransactionRecord = {
      tx_id: requireText(raw, "tx_id", source, row),
      rail: requireText(raw, "rail", source, row),
      timestamp: requireText(raw, "timestamp", source, row),
      user_id: requireText(raw, "user_id", source, row),
      amount: requireAmount(raw, source, row),
      is_fraud_pattern: requireLabel(raw, source, row),
    };
    for (const [field, value] of Object.entries(raw)) {
      if (Object.hasOwn(record, field)) {
        continue;
      }
      if (value === undefined) {
        continue;
      }
      if (!isFieldValue(value)) {
        throw invalidField(field, source, row, "must be a string, number, boolean or null");
      }
      record[field] = value;
    }
    records.push(record);
  }

  assertTransactionBatch(records, source);
  return records;
}
