import { parseControlSet } from "../src/application/control-set.js";
import type { Control, TransactionRecord } from "../src/domain/types.js";
import { AppError } from "../src/infra/app-error.js";

export function transaction(overrides: Partial<TransactionRecord> & { tx_id: string }): TransactionRecord {
  return {
    rail: "ACH",
    timestamp: "2026-01-05T09:00:00Z",
    user_id: "u_1",
    amount: 100,
    is_fraud_pattern: false,
    ...overrides,
  };
}

export function controls(document: unknown): Control[] {
  return parseControlSet(document, "test controls");
}

export function catchAppError(action: () => unknown): AppError {
  try {
    action();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected an AppError to be thrown.");
}

export async function rejectAppError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected an AppError to be thrown.");
}
