import { resolveFinalAction } from "../domain/action-priority.js";
import type { ControlHit, TransactionDecision, TransactionRecord } from "../domain/types.js";

interface TriggeredSet {
  controls: Set<string>;
  actions: Set<string>;
}

function sortedValues(values: Set<string>): string[] {
  return [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * One decision per transaction, in batch order. Transactions without hits
 * resolve to ALLOW with nothing triggered.
 */
export function resolveDecisions(
  records: readonly TransactionRecord[],
  hits: readonly ControlHit[],
): TransactionDecision[] {
  const triggered = new Map<string, TriggeredSet>();
  for (const hit of hits) {
    let entry = triggered.get(hit.tx_id);
    if (!entry) {
      entry = { controls: new Set(), actions: new Set() };
      triggered.set(hit.tx_id, entry);
    }
    entry.controls.add(hit.control_id);
    entry.actions.add(hit.action);
  }

  return records.map((record) => {
    const entry = triggered.get(record.tx_id);
    return {
      tx_id: record.tx_id,
      rail: record.rail,
      timestamp: record.timestamp,
      user_id: record.user_id,
      amount: record.amount,
      is_fraud_pattern: record.is_fraud_pattern,
      final_action: entry ? resolveFinalAction(entry.actions) : "ALLOW",
      triggered_controls: entry ? sortedValues(entry.controls) : [],
      triggered_actions: entry ? sortedValues(entry.actions) : [],
    };
  });
}
