// ============================================
// Redis Connection & BullMQ Helpers
// ============================================

import { Queue, Worker, type Processor, type WorkerOptions, type QueueOptions } from "bullmq";
import { Redis } from "ioredis";
import type { AppConfig } from "./config.js";

let connection: Redis | null = null;

export function getRedisConnection(config: AppConfig["redis"]): Redis {
  if (!connection) {
    connection = new Redis({
      host: config.host,
      port: config.port,
      password: config.password,
      // BullMQ workers block on the connection
      maxRetriesPerRequest: null,
    });
  }
  return connection;
}

export function createQueue<T>(
  name: string,
  redis: AppConfig["redis"],
  opts?: Partial<QueueOptions>,
): Queue<T> {
  return new Queue<T>(name, {
    connection: getRedisConnection(redis),
    ...opts,
  });
}

export function createWorker<T = unknown>(
  name: string,
  processor: Processor<T>,
  redis: AppConfig["redis"],
  opts?: Partial<WorkerOptions>
): Worker<T> {
  return new Worker<T>(name, processor, {
    connection: getRedisConnection(redis),
    concurrency: 1,
    ...opts,
  });
}

export async function closeRedis(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = null;
  }
}
