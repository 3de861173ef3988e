import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { InMemoryControlRunStore } from "../src/adapters/inmemory/control-run-store.js";
import { InMemoryControlSource } from "../src/adapters/inmemory/control-source.js";
import { FixedClock } from "../src/infra/clock.js";
import type { RuntimeConfig } from "../src/infra/config.js";
import { createLogger } from "../src/infra/logger.js";
import { buildApp } from "../src/server.js";

const CONTROL_DOCUMENT = [
  {
    control_id: "ACH_LARGE",
    rail: "ACH",
    severity: "HIGH",
    action: "REVIEW",
    description: "ACH over 1000",
    conditions: { amount_gt: 1000 },
  },
  {
    control_id: "ACH_RETURNS",
    rail: "ACH",
    severity: "CRITICAL",
    action: "BLOCK",
    conditions: { return_code_in: ["R01"] },
  },
];

const BATCH = [
  { tx_id: "t1", rail: "ACH", timestamp: "2026-01-05T09:00:00Z", user_id: "u1", amount: 5000, is_fraud_pattern: true, return_code: null },
  { tx_id: "t2", rail: "ACH", timestamp: "2026-01-05T09:01:00Z", user_id: "u2", amount: 200, is_fraud_pattern: true, return_code: "R01" },
  { tx_id: "t3", rail: "ACH", timestamp: "2026-01-05T09:02:00Z", user_id: "u3", amount: 3000, is_fraud_pattern: false },
  { tx_id: "t4", rail: "CARD", timestamp: "2026-01-05T09:03:00Z", user_id: "u4", amount: 10, is_fraud_pattern: false },
];

function testConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: "127.0.0.1",
    port: 8080,
    apiKey: "test-api-key",
    apiKeys: ["test-api-key", "test-api-key-old"],
    cursorSecret: "test-cursor-secret-123",
    cursorVerificationSecrets: ["test-cursor-secret-123"],
    controlsPath: "controls/controls.yaml",
    transactionsPath: "data/combined_transactions.csv",
    outputDir: "data",
    outputBackend: "csv",
    logLevel: "silent",
    metricsEnabled: true,
    listDefaultLimit: 50,
    listMaxLimit: 500,
    maxBatchSize: 100,
    ...overrides,
  };
}

function withAuth(headers?: Record<string, string>): Record<string, string> {
  return {
    authorization: "Bearer test-api-key",
    ...(headers ?? {}),
  };
}

function createApp(config: RuntimeConfig = testConfig()): FastifyInstance {
  return buildApp(config, {
    controlSource: new InMemoryControlSource(CONTROL_DOCUMENT),
    runStore: new InMemoryControlRunStore(),
    clock: new FixedClock("2026-02-01T12:00:00.000Z"),
    logger: createLogger("silent"),
  });
}

describe("Controls API", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = createApp();
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function submitBatch(transactions: unknown[] = BATCH) {
    return app.inject({
      method: "POST",
      url: "/v1/control-runs",
      headers: withAuth(),
      payload: { transactions },
    });
  }

  it("serves health checks without an API key", async () => {
    const live = await app.inject({ method: "GET", url: "/health/live" });
    const ready = await app.inject({ method: "GET", url: "/health/ready" });

    expect(live.statusCode).toBe(200);
    expect(ready.json()).toEqual({ status: "ready" });
  });

  it("rejects requests without a valid API key", async () => {
    const missing = await app.inject({ method: "GET", url: "/v1/controls" });
    expect(missing.statusCode).toBe(401);
    expect(missing.json().error.code).toBe("missing_api_key");

    const invalid = await app.inject({
      method: "GET",
      url: "/v1/controls",
      headers: { authorization: "Bearer wrong-key" },
    });
    expect(invalid.statusCode).toBe(401);
    expect(invalid.json().error.code).toBe("invalid_api_key");

    const rotated = await app.inject({
      method: "GET",
      url: "/v1/controls",
      headers: { authorization: "Bearer test-api-key-old" },
    });
    expect(rotated.statusCode).toBe(200);
  });

  it("lists loaded controls with their authored conditions", async () => {
    const response = await app.inject({ method: "GET", url: "/v1/controls", headers: withAuth() });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toEqual([
      {
        control_id: "ACH_LARGE",
        rail: "ACH",
        severity: "HIGH",
        action: "REVIEW",
        description: "ACH over 1000",
        conditions: { amount_gt: 1000 },
      },
      {
        control_id: "ACH_RETURNS",
        rail: "ACH",
        severity: "CRITICAL",
        action: "BLOCK",
        description: "",
        conditions: { return_code_in: ["R01"] },
      },
    ]);
  });

  it("evaluates a submitted batch", async () => {
    const response = await submitBatch();

    expect(response.statusCode).toBe(201);
    const body = response.json();
    expect(body.run_id).toMatch(/^run_[0-9a-f]{24}$/);
    expect(body.evaluated_at).toBe("2026-02-01T12:00:00.000Z");
    expect(body.controls).toBe(2);
    expect(body.hits).toBe(3);
    expect(body.summary).toEqual({
      transactions: 4,
      by_action: { ALLOW: 1, REVIEW: 2, BLOCK: 1 },
      action_rate: 0.75,
      by_rail: {
        ACH: { ALLOW: 0, REVIEW: 2, BLOCK: 1 },
        CARD: { ALLOW: 1, REVIEW: 0, BLOCK: 0 },
      },
    });
    expect(body.metrics).toEqual([
      { control_id: "ACH_LARGE", hits: 2, hit_rate: 0.5, precision_proxy: 0.5 },
      { control_id: "ACH_RETURNS", hits: 1, hit_rate: 0.25, precision_proxy: 1 },
    ]);
  });

  it("rejects malformed batches", async () => {
    const notList = await app.inject({
      method: "POST",
      url: "/v1/control-runs",
      headers: withAuth(),
      payload: { transactions: "t1" },
    });
    expect(notList.statusCode).toBe(422);
    expect(notList.json().error.code).toBe("invalid_transactions");

    const missingField = await submitBatch([{ tx_id: "t1", rail: "ACH", amount: 1, is_fraud_pattern: false }]);
    expect(missingField.statusCode).toBe(422);
    expect(missingField.json().error).toMatchObject({
      code: "missing_required_field",
      message: "Missing required column 'timestamp' in request body transactions (row 1).",
    });

    const duplicate = await submitBatch([BATCH[0], BATCH[0]]);
    expect(duplicate.statusCode).toBe(422);
    expect(duplicate.json().error.code).toBe("duplicate_transaction_id");
  });

  it("rejects batches over the configured size", async () => {
    const smallApp = createApp(testConfig({ maxBatchSize: 2 }));
    await smallApp.ready();
    try {
      const response = await smallApp.inject({
        method: "POST",
        url: "/v1/control-runs",
        headers: withAuth(),
        payload: { transactions: BATCH },
      });
      expect(response.statusCode).toBe(413);
      expect(response.json().error.code).toBe("batch_too_large");
    } finally {
      await smallApp.close();
    }
  });

  it("returns 404 before any run was recorded", async () => {
    const response = await app.inject({ method: "GET", url: "/v1/control-runs/latest", headers: withAuth() });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe("run_not_found");
  });

  it("summarizes the latest run", async () => {
    const created = (await submitBatch()).json();
    const response = await app.inject({ method: "GET", url: "/v1/control-runs/latest", headers: withAuth() });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      run_id: created.run_id,
      evaluated_at: "2026-02-01T12:00:00.000Z",
      controls: 2,
      hits: 3,
      summary: created.summary,
    });
  });

  it("pages decisions most severe first", async () => {
    await submitBatch();

    const first = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?limit=3",
      headers: withAuth(),
    });
    expect(first.statusCode).toBe(200);
    const firstBody = first.json();
    expect(firstBody.total).toBe(4);
    expect(firstBody.data.map((row: { tx_id: string }) => row.tx_id)).toEqual(["t2", "t1", "t3"]);
    expect(firstBody.data[0]).toEqual({
      tx_id: "t2",
      rail: "ACH",
      timestamp: "2026-01-05T09:01:00Z",
      user_id: "u2",
      amount: 200,
      is_fraud_pattern: true,
      final_action: "BLOCK",
      triggered_controls: "ACH_RETURNS",
      triggered_actions: "BLOCK",
    });
    expect(firstBody.pagination.has_more).toBe(true);
    expect(typeof firstBody.pagination.next_cursor).toBe("string");

    const second = await app.inject({
      method: "GET",
      url: `/v1/control-runs/latest/decisions?limit=3&cursor=${firstBody.pagination.next_cursor}`,
      headers: withAuth(),
    });
    const secondBody = second.json();
    expect(secondBody.data.map((row: { tx_id: string }) => row.tx_id)).toEqual(["t4"]);
    expect(secondBody.pagination).toEqual({ limit: 3, has_more: false, next_cursor: null });
  });

  it("filters decisions", async () => {
    await submitBatch();

    const review = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?final_action=review",
      headers: withAuth(),
    });
    expect(review.json().data.map((row: { tx_id: string }) => row.tx_id)).toEqual(["t1", "t3"]);

    const byControl = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?control_id=ACH_RETURNS",
      headers: withAuth(),
    });
    expect(byControl.json().total).toBe(1);

    const byAmount = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?amount_min=100&amount_max=3000",
      headers: withAuth(),
    });
    expect(byAmount.json().data.map((row: { tx_id: string }) => row.tx_id)).toEqual(["t2", "t3"]);

    const byRail = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?rail=card",
      headers: withAuth(),
    });
    expect(byRail.json().data.map((row: { tx_id: string }) => row.tx_id)).toEqual(["t4"]);
  });

  it("validates decision query parameters", async () => {
    await submitBatch();

    const badLimit = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?limit=0",
      headers: withAuth(),
    });
    expect(badLimit.statusCode).toBe(422);
    expect(badLimit.json().error.code).toBe("invalid_limit");

    const badRail = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?rail=WIRE",
      headers: withAuth(),
    });
    expect(badRail.json().error.code).toBe("invalid_rail");

    const badRange = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?amount_min=10&amount_max=5",
      headers: withAuth(),
    });
    expect(badRange.json().error.code).toBe("invalid_amount_range");
  });

  it("rejects a cursor from a previous run", async () => {
    await submitBatch();
    const first = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/decisions?limit=1",
      headers: withAuth(),
    });
    const cursor: string = first.json().pagination.next_cursor;

    await submitBatch(BATCH.slice(0, 3));
    const stale = await app.inject({
      method: "GET",
      url: `/v1/control-runs/latest/decisions?limit=1&cursor=${cursor}`,
      headers: withAuth(),
    });

    expect(stale.statusCode).toBe(409);
    expect(stale.json().error.code).toBe("stale_cursor");
  });

  it("lists hits by control", async () => {
    await submitBatch();

    const response = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/hits?control_id=ACH_LARGE",
      headers: withAuth(),
    });

    expect(response.json()).toMatchObject({
      total: 2,
      data: [
        { tx_id: "t1", rail: "ACH", control_id: "ACH_LARGE", severity: "HIGH", action: "REVIEW", description: "ACH over 1000" },
        { tx_id: "t3", rail: "ACH", control_id: "ACH_LARGE", severity: "HIGH", action: "REVIEW", description: "ACH over 1000" },
      ],
      pagination: { limit: 50, has_more: false, next_cursor: null },
    });
  });

  it("sorts monitoring metrics on request", async () => {
    await submitBatch();

    const byPrecision = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/metrics?sort=precision_proxy",
      headers: withAuth(),
    });
    expect(byPrecision.json().data.map((row: { control_id: string }) => row.control_id)).toEqual([
      "ACH_RETURNS",
      "ACH_LARGE",
    ]);

    const invalid = await app.inject({
      method: "GET",
      url: "/v1/control-runs/latest/metrics?sort=severity",
      headers: withAuth(),
    });
    expect(invalid.statusCode).toBe(422);
    expect(invalid.json().error.code).toBe("invalid_sort");
  });

  it("exposes Prometheus metrics without an API key", async () => {
    await submitBatch();

    const response = await app.inject({ method: "GET", url: "/metrics" });
    const lines = response.body.split("\n");

    expect(response.statusCode).toBe(200);
    expect(lines).toContain('rc_control_runs_total{outcome="completed"} 1');
    expect(lines).toContain('rc_transactions_evaluated_total{rail="ACH"} 3');
    expect(lines).toContain('rc_control_hits_total{control_id="ACH_LARGE"} 2');
    expect(lines).toContain('rc_final_actions_total{final_action="REVIEW"} 2');
  });

  it("counts failed runs", async () => {
    await submitBatch([BATCH[0], BATCH[0]]);

    const response = await app.inject({ method: "GET", url: "/metrics" });
    expect(response.body.split("\n")).toContain('rc_control_runs_total{outcome="failed"} 1');
  });

  it("answers unknown routes with resource_not_found", async () => {
    const response = await app.inject({ method: "GET", url: "/v1/unknown", headers: withAuth() });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe("resource_not_found");
  });
});
