import { describe, expect, it } from "vitest";
import { aggregateControlMetrics, roundTo4 } from "../src/application/monitoring-aggregator.js";
import { summarizeDecisions } from "../src/application/run-summary.js";
import type { ControlHit, TransactionDecision } from "../src/domain/types.js";
import { transaction } from "./fixtures.js";

function hit(txId: string, rail: string, controlId: string): ControlHit {
  return { tx_id: txId, rail, control_id: controlId, severity: "HIGH", action: "REVIEW", description: "" };
}

describe("aggregateControlMetrics", () => {
  const records = [
    transaction({ tx_id: "a1", rail: "ACH", is_fraud_pattern: true }),
    transaction({ tx_id: "a2", rail: "ACH", is_fraud_pattern: false }),
    transaction({ tx_id: "c1", rail: "CARD", is_fraud_pattern: true }),
    transaction({ tx_id: "c2", rail: "CARD", is_fraud_pattern: false }),
  ];

  it("rates hits over the whole population and orders by hit count", () => {
    const metrics = aggregateControlMetrics(records, [
      hit("c1", "CARD", "CARD_CNP"),
      hit("a1", "ACH", "ACH_INSTANT"),
      hit("a2", "ACH", "ACH_INSTANT"),
    ]);

    expect(metrics).toEqual([
      { control_id: "ACH_INSTANT", hits: 2, hit_rate: 0.5, precision_proxy: 0.5 },
      { control_id: "CARD_CNP", hits: 1, hit_rate: 0.25, precision_proxy: 1 },
    ]);
  });

  it("breaks hit-count ties by control id", () => {
    const metrics = aggregateControlMetrics(records, [hit("a2", "ACH", "B_CONTROL"), hit("a1", "ACH", "A_CONTROL")]);
    expect(metrics.map((metric) => metric.control_id)).toEqual(["A_CONTROL", "B_CONTROL"]);
  });

  it("rounds rates to four decimals", () => {
    const three = records.slice(0, 3);
    const metrics = aggregateControlMetrics(three, [
      hit("a1", "ACH", "ACH_ANY"),
      hit("a2", "ACH", "ACH_ANY"),
      hit("c1", "CARD", "CARD_ANY"),
    ]);
    expect(metrics).toEqual([
      { control_id: "ACH_ANY", hits: 2, hit_rate: 0.6667, precision_proxy: 0.5 },
      { control_id: "CARD_ANY", hits: 1, hit_rate: 0.3333, precision_proxy: 1 },
    ]);
  });

  it("joins labels on transaction id and rail", () => {
    const [metric] = aggregateControlMetrics(records, [hit("a1", "CARD", "MISMATCHED")]);
    expect(metric).toEqual({ control_id: "MISMATCHED", hits: 1, hit_rate: 0.25, precision_proxy: 0 });
  });

  it("returns no rows without hits", () => {
    expect(aggregateControlMetrics(records, [])).toEqual([]);
    expect(aggregateControlMetrics([], [])).toEqual([]);
  });
});

describe("roundTo4", () => {
  it("rounds half away from zero", () => {
    expect(roundTo4(0.00005)).toBe(0.0001);
    expect(roundTo4(-0.00005)).toBe(-0.0001);
    expect(roundTo4(1 / 12)).toBe(0.0833);
    expect(roundTo4(0)).toBe(0);
  });
});

describe("summarizeDecisions", () => {
  function decision(txId: string, rail: string, finalAction: TransactionDecision["final_action"]): TransactionDecision {
    return {
      tx_id: txId,
      rail,
      timestamp: "2026-01-05T09:00:00Z",
      user_id: "u_1",
      amount: 100,
      is_fraud_pattern: false,
      final_action: finalAction,
      triggered_controls: [],
      triggered_actions: [],
    };
  }

  it("counts final actions overall and per rail", () => {
    const summary = summarizeDecisions([
      decision("a1", "ACH", "REVIEW"),
      decision("a2", "ACH", "ALLOW"),
      decision("c1", "CARD", "BLOCK"),
    ]);

    expect(summary).toEqual({
      transactions: 3,
      by_action: { ALLOW: 1, REVIEW: 1, BLOCK: 1 },
      action_rate: 0.6667,
      by_rail: {
        ACH: { ALLOW: 1, REVIEW: 1, BLOCK: 0 },
        CARD: { ALLOW: 0, REVIEW: 0, BLOCK: 1 },
      },
    });
  });

  it("reports a zero rate for an empty batch", () => {
    expect(summarizeDecisions([])).toEqual({
      transactions: 0,
      by_action: { ALLOW: 0, REVIEW: 0, BLOCK: 0 },
      action_rate: 0,
      by_rail: {},
    });
  });
});
