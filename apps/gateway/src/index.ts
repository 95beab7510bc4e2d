import http from "node:http";
import express from "express";
import cors from "cors";

import { loadDotEnvFromCwd } from "./dotenv";
import { loadEnv } from "./env";
import { errorMessage } from "./errors";
import { makeRoutes } from "./http/routes";
import { BrokerBridge } from "./pubsub/bridge";
import { MemoryBroker } from "./pubsub/memory";
import { RedisBrokerClient } from "./pubsub/redis";
import type { BrokerClient } from "./pubsub/types";
import { Broadcaster } from "./ws/broadcaster";
import { WsHub } from "./ws/hub";
import { ConnectionRegistry } from "./ws/registry";

// Load apps/gateway/.env automatically when running via npm workspaces.
loadDotEnvFromCwd(".env");

const env = loadEnv();

async function createBroker(): Promise<BrokerClient> {
  if (env.mockBroker) return new MemoryBroker().connect();
  const redis = new RedisBrokerClient(env.redisUrl);
  await redis.connect();
  return redis;
}

async function main() {
  const broker = await createBroker();

  const registry = new ConnectionRegistry();
  const broadcaster = new Broadcaster(registry, {
    concurrency: env.deliveryConcurrency,
    maxQueued: env.deliveryQueueLimit,
    overflow: env.deliveryOverflow,
  });
  const bridge = new BrokerBridge(registry, broadcaster, broker, {
    channel: env.brokerChannel,
    routing: env.routingMode,
  });

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use("/api", makeRoutes({ registry, bridge }));

  const server = http.createServer(app);
  const hub = new WsHub(server, { registry, bridge });

  await bridge.startup();
  server.listen(env.port, () => {
    console.log(`[gateway] listening on http://localhost:${env.port} (ws path /ws)`);
    console.log(`[gateway] broker: ${env.mockBroker ? "in-process" : env.redisUrl}, channel: ${env.brokerChannel}`);
  });

  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[gateway] ${signal} received, shutting down`);
    await bridge.shutdown();
    hub.close();
    await broker.quit();
    server.close(() => process.exit(0));
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      stop(signal).catch((e: unknown) => {
        console.error(`[gateway] shutdown failed: ${errorMessage(e)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((e: unknown) => {
  console.error(`[gateway] failed to start: ${errorMessage(e)}`);
  process.exit(1);
});
