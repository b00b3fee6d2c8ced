// ============================================
// Strategy Worker Entry Point
//
// Consumes strategy jobs from BullMQ one at a time, records every strategy
// event in Postgres and reports balances on an interval.
// ============================================

import {
  closeDbPool,
  closeRedis,
  createLogger,
  createWorker,
  errorMessage,
  getDbPool,
  loadConfig,
  poolQuery,
  type AppConfig,
  type StrategyJob,
} from "@stakequeue/common";
import { createEvmStrategy, createSimulatedStrategy, type CooldownStakingStrategy } from "@stakequeue/strategy";
import { processStrategyJob } from "./jobs/process-strategy-job.js";
import { EventRecorder } from "./jobs/record-events.js";
import { reportBalance } from "./jobs/report-balance.js";

const logger = createLogger("worker");

async function buildStrategy(config: AppConfig): Promise<CooldownStakingStrategy> {
  if (!config.strategy.dryRun) return createEvmStrategy(config);

  logger.warn("DRY_RUN enabled: running against an in-process simulated chain");
  const { strategy } = await createSimulatedStrategy({
    owner: config.strategy.owner,
    name: config.strategy.name,
    description: config.strategy.description,
    depositThreshold: config.strategy.depositThreshold,
  });
  return strategy;
}

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info("Strategy worker starting", {
    chain: config.chain,
    dryRun: config.strategy.dryRun,
    queue: config.worker.queueName,
    reportIntervalMs: config.worker.reportIntervalMs,
  });

  const strategy = await buildStrategy(config);

  // Verify connections
  const db = getDbPool(config.postgres);
  await db.query("SELECT 1");
  logger.info("Database connection established");
  const query = poolQuery(db);

  const recorder = new EventRecorder(query, strategy.name());
  strategy.onEvent(recorder.listener);

  // ---- BullMQ worker: one strategy call at a time ----
  const worker = createWorker<StrategyJob>(
    config.worker.queueName,
    async (job) => {
      logger.info(`Processing ${job.data.type} job`, { jobId: job.id });
      const outcome = await processStrategyJob(strategy, job.data);
      await recorder.flush();
      return outcome;
    },
    config.redis,
  );

  worker.on("failed", (job, err) => {
    logger.error("Strategy job failed", { jobId: job?.id, type: job?.data.type, error: err.message });
  });

  // ---- Balance reports ----
  const runReport = async (): Promise<void> => {
    try {
      await reportBalance(strategy, query);
    } catch (err) {
      logger.error("Balance report failed", { error: errorMessage(err) });
    }
  };
  await runReport();
  const reportInterval = setInterval(() => void runReport(), config.worker.reportIntervalMs);

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("Strategy worker shutting down...");
    clearInterval(reportInterval);
    try {
      await worker.close();
      await recorder.flush();
      await closeDbPool();
      await closeRedis();
    } catch (err) {
      logger.error("Shutdown incomplete", { error: errorMessage(err) });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  logger.info("Strategy worker running", { strategy: strategy.name(), account: strategy.account });
}

main().catch((err) => {
  logger.error("Strategy worker failed to start", { error: errorMessage(err) });
  process.exit(1);
});
