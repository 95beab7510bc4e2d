import type { OverflowPolicy, RoutingMode } from "@topicgate/common";

export type GatewayEnv = {
  port: number;
  redisUrl: string;
  brokerChannel: string;
  // In-process broker instead of Redis; only instances in this process share it.
  mockBroker: boolean;
  routingMode: RoutingMode;
  // Delivery pool
  deliveryConcurrency: number;
  deliveryQueueLimit: number;
  deliveryOverflow: OverflowPolicy;
};

function oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) throw new Error(`${name} must be one of ${allowed.join(", ")} (got "${value}")`);
  return match;
}

function positiveInt(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new Error(`${name} must be a positive integer (got "${value}")`);
  return n;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): GatewayEnv {
  const port = Number(source.PORT || "4000");
  const redisUrl = source.REDIS_URL || "redis://localhost:6379";
  const brokerChannel = source.BROKER_CHANNEL || "topicgate";
  const mockBroker = (source.MOCK_BROKER || "1") === "1";
  const routingMode = oneOf("ROUTING_MODE", source.ROUTING_MODE || "envelope", ["envelope", "channel"] as const);

  const deliveryConcurrency = positiveInt("DELIVERY_CONCURRENCY", source.DELIVERY_CONCURRENCY || "64");
  const deliveryQueueLimit = positiveInt("DELIVERY_QUEUE_LIMIT", source.DELIVERY_QUEUE_LIMIT || "10000");
  const deliveryOverflow = oneOf("DELIVERY_OVERFLOW", source.DELIVERY_OVERFLOW || "drop-oldest", [
    "drop-oldest",
    "drop-newest",
  ] as const);

  return {
    port,
    redisUrl,
    brokerChannel,
    mockBroker,
    routingMode,
    deliveryConcurrency,
    deliveryQueueLimit,
    deliveryOverflow,
  };
}
