import type { ControlHit, ControlMetric, TransactionRecord } from "../domain/types.js";

export function roundTo4(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value) * 10_000) / 10_000;
}

interface ControlTally {
  hits: number;
  labelled: number;
  positives: number;
}

function joinKey(txId: string, rail: string): string {
  return `${rail}\u0000${txId}`;
}

/**
 * Per-control monitoring rows for every control with at least one hit.
 *
 * hit_rate is taken over the whole batch, not the control's rail, so rates stay
 * comparable across rails. precision_proxy is the share of hits whose record
 * carries the synthetic fraud label.
 */
export function aggregateControlMetrics(
  records: readonly TransactionRecord[],
  hits: readonly ControlHit[],
): ControlMetric[] {
  const labels = new Map<string, boolean>();
  for (const record of records) {
    labels.set(joinKey(record.tx_id, record.rail), record.is_fraud_pattern);
  }

  const tallies = new Map<string, ControlTally>();
  for (const hit of hits) {
    let tally = tallies.get(hit.control_id);
    if (!tally) {
      tally = { hits: 0, labelled: 0, positives: 0 };
      tallies.set(hit.control_id, tally);
    }
    tally.hits += 1;
    const label = labels.get(joinKey(hit.tx_id, hit.rail));
    if (label !== undefined) {
      tally.labelled += 1;
      tally.positives += label ? 1 : 0;
    }
  }

  const population = records.length;
  const metrics: ControlMetric[] = [];
  for (const [controlId, tally] of tallies) {
    metrics.push({
      control_id: controlId,
      hits: tally.hits,
      hit_rate: population > 0 ? roundTo4(tally.hits / population) : 0,
      precision_proxy: tally.labelled > 0 ? roundTo4(tally.positives / tally.labelled) : 0,
    });
  }

  return metrics.sort((a, b) => {
    if (a.hits !== b.hits) {
      return b.hits - a.hits;
    }
    return a.control_id < b.control_id ? -1 : a.control_id > b.control_id ? 1 : 0;
  });
}
