import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from "fastify";
import { InMemoryControlRunStore } from "./adapters/inmemory/control-run-store.js";
import { YamlControlSource } from "./adapters/file/yaml-control-source.js";
import {
  paginate,
  queryDecisions,
  queryHits,
  sortMetrics,
} from "./application/control-run-queries.js";
import { ControlsEngine } from "./application/controls-engine.js";
import { buildControlRunTables, decisionTableRow, hitTableRow } from "./application/output-tables.js";
import { parseTransactionRecords } from "./application/transaction-batch.js";
import { conditionsToMapping } from "./domain/conditions.js";
import type { ControlRunResult } from "./domain/types.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { CursorTokenService } from "./infra/cursor-token.js";
import { createLogger, type Logger } from "./infra/logger.js";
import { ControlsMetricsRegistry } from "./infra/metrics.js";
import type { ControlRunStorePort } from "./ports/control-run-sink.js";
import type { ControlSourcePort } from "./ports/control-source.js";
import {
  assertCreateControlRunInput,
  normalizeAmount,
  normalizeCursor,
  normalizeFinalAction,
  normalizeLimit,
  normalizeMetricsSort,
  normalizeRail,
  normalizeResourceId,
} from "./api/validators.js";

export interface AppDependencies {
  controlSource: ControlSourcePort;
  runStore: ControlRunStorePort;
  clock: ClockPort;
  logger: Logger;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  overrides: Partial<AppDependencies> = {},
): FastifyInstance {
  const app = Fastify({
    logger: config.logLevel === "silent" ? false : { level: config.logLevel },
    bodyLimit: 64 * 1024 * 1024,
  });
  const metrics = new ControlsMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const requestStarts = new WeakMap<FastifyRequest, bigint>();

  const deps: AppDependencies = {
    controlSource: overrides.controlSource ?? new YamlControlSource(config.controlsPath),
    runStore: overrides.runStore ?? new InMemoryControlRunStore(),
    clock: overrides.clock ?? new SystemClock(),
    logger: overrides.logger ?? createLogger(config.logLevel),
  };
  const cursorTokens = new CursorTokenService(config.cursorSecret, config.cursorVerificationSecrets);
  let engine: ControlsEngine | null = null;

  const requireEngine = (): ControlsEngine => {
    if (!engine) {
      throw new AppError(503, "controls_not_loaded", "Control set has not been loaded.");
    }
    return engine;
  };

  const requireLatestRun = async (): Promise<ControlRunResult> => {
    const run = await deps.runStore.getLatest();
    if (!run) {
      throw new AppError(404, "run_not_found", "No control run has been recorded yet.");
    }
    return run;
  };

  app.addHook("onReady", async () => {
    const controls = await deps.controlSource.loadControls();
    engine = new ControlsEngine(controls, deps.clock, deps.logger);
    deps.logger.info(
      { controls: controls.length, source: deps.controlSource.location },
      "control set loaded",
    );
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    if (!engine) {
      return reply.status(503).send({ status: "loading" });
    }
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStarts.set(request, process.hrtime.bigint());
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStarts.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.get("/v1/controls", async (_, reply) => {
    const controls = requireEngine().listControls();
    return reply.status(200).send({
      data: controls.map((control) => ({
        control_id: control.control_id,
        rail: control.rail,
        severity: control.severity,
        action: control.action,
        description: control.description,
        conditions: conditionsToMapping(control.conditions),
      })),
    });
  });

  app.post("/v1/control-runs", async (request, reply) => {
    const current = requireEngine();
    assertCreateControlRunInput(request.body, config.maxBatchSize);
    const startNs = process.hrtime.bigint();
    let run: ControlRunResult;
    try {
      const records = parseTransactionRecords(request.body.transactions, "request body transactions");
      run = current.run(records);
      await deps.runStore.write(run);
    } catch (error) {
      if (config.metricsEnabled) {
        metrics.recordRunFailure();
      }
      throw error;
    }
    if (config.metricsEnabled) {
      metrics.recordRun(run, Number(process.hrtime.bigint() - startNs) / 1_000_000_000);
    }
    return reply.status(201).send({
      run_id: run.run_id,
      evaluated_at: run.evaluated_at,
      controls: run.controls,
      hits: run.hits.length,
      summary: run.summary,
      metrics: buildControlRunTables(run).metrics.rows,
    });
  });

  app.get("/v1/control-runs/latest", async (_, reply) => {
    const run = await requireLatestRun();
    return reply.status(200).send({
      run_id: run.run_id,
      evaluated_at: run.evaluated_at,
      controls: run.controls,
      hits: run.hits.length,
      summary: run.summary,
    });
  });

  app.get("/v1/control-runs/latest/decisions", async (request, reply) => {
    const query = request.query as {
      limit?: string;
      cursor?: string;
      rail?: string;
      final_action?: string;
      control_id?: string;
      amount_min?: string;
      amount_max?: string;
    };
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeCursor(query.cursor);
    const rail = normalizeRail(query.rail);
    const finalAction = normalizeFinalAction(query.final_action);
    const controlId = normalizeResourceId(query.control_id, "control_id");
    const amountMin = normalizeAmount(query.amount_min, "amount_min");
    const amountMax = normalizeAmount(query.amount_max, "amount_max");
    if (amountMin !== undefined && amountMax !== undefined && amountMin > amountMax) {
      throw new AppError(422, "invalid_amount_range", "amount_min must be lower or equal to amount_max.");
    }

    const run = await requireLatestRun();
    const offset = cursor ? cursorTokens.decode(cursor, run.run_id) : 0;
    const matching = queryDecisions(run.decisions, {
      ...(rail ? { rail } : {}),
      ...(finalAction ? { finalAction } : {}),
      ...(controlId ? { controlId } : {}),
      ...(amountMin !== undefined ? { amountMin } : {}),
      ...(amountMax !== undefined ? { amountMax } : {}),
    });
    const page = paginate(matching, offset, limit);
    return reply.status(200).send({
      run_id: run.run_id,
      total: matching.length,
      data: page.data.map(decisionTableRow),
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextOffset !== undefined ? cursorTokens.encode(run.run_id, page.nextOffset) : null,
      },
    });
  });

  app.get("/v1/control-runs/latest/hits", async (request, reply) => {
    const query = request.query as {
      limit?: string;
      cursor?: string;
      rail?: string;
      control_id?: string;
    };
    const limit = normalizeLimit(query.limit, config.listDefaultLimit, config.listMaxLimit);
    const cursor = normalizeCursor(query.cursor);
    const rail = normalizeRail(query.rail);
    const controlId = normalizeResourceId(query.control_id, "control_id");

    const run = await requireLatestRun();
    const offset = cursor ? cursorTokens.decode(cursor, run.run_id) : 0;
    const matching = queryHits(run.hits, {
      ...(rail ? { rail } : {}),
      ...(controlId ? { controlId } : {}),
    });
    const page = paginate(matching, offset, limit);
    return reply.status(200).send({
      run_id: run.run_id,
      total: matching.length,
      data: page.data.map(hitTableRow),
      pagination: {
        limit,
        has_more: page.hasMore,
        next_cursor: page.nextOffset !== undefined ? cursorTokens.encode(run.run_id, page.nextOffset) : null,
      },
    });
  });

  app.get("/v1/control-runs/latest/metrics", async (request, reply) => {
    const query = request.query as { sort?: string };
    const sort = normalizeMetricsSort(query.sort);
    const run = await requireLatestRun();
    return reply.status(200).send({
      run_id: run.run_id,
      data: sortMetrics(run.metrics, sort),
    });
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Resource not found.",
      },
    });
  });

  app.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  return app;
}
