import { Pool } from "pg";
import { CsvControlRunSink } from "./adapters/file/csv-run-sink.js";
import { CsvTransactionSource } from "./adapters/file/csv-transaction-source.js";
import { YamlControlSource } from "./adapters/file/yaml-control-source.js";
import { PostgresControlRunSink } from "./adapters/postgres/control-run-sink.js";
import { ControlRunService } from "./application/control-run-service.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock } from "./infra/clock.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger, type Logger } from "./infra/logger.js";
import type { ControlRunSinkPort } from "./ports/control-run-sink.js";

export interface ControlsCliOptions {
  // Replaces the logger built from RC_LOG_LEVEL.
  logger?: Logger;
}

/**
 * One batch run configured from RC_* variables. Resolves to the process exit code;
 * every failure, configuration included, is logged at fatal level.
 */
export async function runControlsCli(options: ControlsCliOptions = {}): Promise<number> {
  let logger = options.logger ?? createLogger("info");
  const closeActions: Array<() => Promise<void>> = [];

  try {
    const config = loadRuntimeConfig();
    logger = options.logger ?? createLogger(config.logLevel);

    let sink: ControlRunSinkPort;
    if (config.outputBackend === "postgres") {
      if (!config.postgresUrl) {
        throw new AppError(500, "invalid_runtime_config", "Postgres output requested without RC_POSTGRES_URL.");
      }
      const pool = new Pool({ connectionString: config.postgresUrl });
      closeActions.push(async () => {
        await pool.end();
      });
      sink = new PostgresControlRunSink(pool);
    } else {
      sink = new CsvControlRunSink(config.outputDir);
    }

    const service = new ControlRunService(
      new CsvTransactionSource(config.transactionsPath),
      new YamlControlSource(config.controlsPath),
      sink,
      new SystemClock(),
      logger,
    );

    const run = await service.run();
    logger.info(
      {
        run_id: run.run_id,
        transactions: run.summary.transactions,
        hit_rows: run.hits.length,
        by_action: run.summary.by_action,
        action_rate: run.summary.action_rate,
        destination: sink.location,
      },
      "controls:run OK",
    );
    return 0;
  } catch (error) {
    if (error instanceof AppError) {
      logger.fatal({ code: error.code }, error.message);
    } else {
      logger.fatal({ err: error }, "controls:run failed");
    }
    return 1;
  } finally {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  }
}
