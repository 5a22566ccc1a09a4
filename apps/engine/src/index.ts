import "dotenv/config";
import { readFile } from "fs/promises";
import { HandlerRegistry } from "@canvasflow/sdk";
import { loadConfig } from "./config";
import { createRedis } from "./db";
import { HealthService } from "./grpc/health.service";
import { createGrpcServer, startGrpcServer, stopGrpcServer } from "./grpc/server";
import { WorkflowServiceImpl } from "./grpc/workflow.service";
import { registerExampleHandlers } from "./handlers";
import { RunStatusRepository } from "./repositories/run-status.repository";
import {
  BackpressureGuard,
  EventBus,
  EventLoopMonitor,
  WorkflowEngine,
  WorkflowManager,
} from "./services";
import { createTriggerFactory, loadTriggerBindings, TriggerManager } from "./triggers";

const TAG = "[canvasflow]";

const config = loadConfig();

// Wiring
const redis = createRedis(config.redisUrl);
const registry = registerExampleHandlers(new HandlerRegistry());
const monitor = new EventLoopMonitor();

const engine = new WorkflowEngine(registry, {
  failurePolicy: config.failurePolicy,
  concurrency: config.concurrency,
  retry: { maxRetries: config.moduleMaxRetries },
  moduleTimeoutMs: config.moduleTimeoutMs,
});
const manager = new WorkflowManager({
  registry,
  engine,
  repository: new RunStatusRepository(redis, config.statusTtlSeconds),
  bus: new EventBus(),
  backpressure: new BackpressureGuard(monitor, {
    maxActiveRuns: config.maxActiveRuns,
    maxEventLoopLag: config.maxEventLoopLag,
  }),
});
const triggers = new TriggerManager();
const grpcServer = createGrpcServer(
  new HealthService(redis),
  new WorkflowServiceImpl(manager, triggers),
);

async function loadTriggers(file: string): Promise<void> {
  const raw: unknown = JSON.parse(await readFile(file, "utf-8"));
  const loaded = loadTriggerBindings(raw, createTriggerFactory(), (document, options) =>
    manager.submit(document, options),
  );
  for (const { id, trigger } of loaded) triggers.add(id, trigger);
  console.log(`${TAG} loaded ${loaded.length} trigger(s) from ${file}`);
}

async function main() {
  console.log(`${TAG} starting engine... (handlers: ${registry.list().join(", ")})`);

  await redis.connect();
  await redis.ping();
  console.log(`${TAG} redis connected`);

  if (config.triggersFile) {
    await loadTriggers(config.triggersFile);
  }

  await startGrpcServer(grpcServer, config.port);
  triggers.startAll();

  console.log(`${TAG} engine ready`);
}

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${TAG} ${signal} received, shutting down...`);

  triggers.stopAll();
  manager.cancelAll();
  await manager.drain();
  await stopGrpcServer(grpcServer);
  monitor.disable();

  await redis.quit();
  console.log(`${TAG} shutdown complete`);
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    console.error(`${TAG} shutdown failed:`, err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGUSR2", () => onSignal("SIGUSR2"));

main().catch((err) => {
  console.error(`${TAG} fatal:`, err);
  process.exit(1);
});
