import type { TransactionRecord } from "../domain/types.js";

export interface TransactionSourcePort {
  readonly location: string;
  loadTransactions(): Promise<TransactionRecord[]>;
}
