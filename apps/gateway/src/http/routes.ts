import express from "express";
import type { PublishRequest } from "@topicgate/common";
import { PublishRequestSchema } from "@topicgate/common";
import { errorMessage } from "../errors";
import { tagClientMessage } from "../protocol/envelope";
import type { BrokerBridge } from "../pubsub/bridge";
import type { ConnectionRegistry } from "../ws/registry";

export type RouteDeps = {
  registry: ConnectionRegistry;
  bridge: Pick<BrokerBridge, "publish" | "currentState">;
};

export function makeRoutes({ registry, bridge }: RouteDeps) {
  const router = express.Router();

  router.get("/health", (_req, res) =>
    res.json({ ok: bridge.currentState === "active", state: bridge.currentState, connections: registry.size })
  );

  router.get("/connections", (_req, res) => {
    return res.json({ connections: registry.list().map((c) => c.info()) });
  });

  // Same path as a client frame: tag, then out through the broker.
  router.post("/publish", async (req, res) => {
    const parsed = PublishRequestSchema.safeParse(req.body as PublishRequest);
    if (!parsed.success) return res.status(400).json({ error: "bad_body", issues: parsed.error.issues });

    if (bridge.currentState !== "active") {
      return res.status(503).json({ error: "not_active", state: bridge.currentState });
    }

    const envelope = tagClientMessage(parsed.data.payload, parsed.data.topic);
    try {
      await bridge.publish(envelope);
    } catch (e) {
      console.error(`[http] publish failed: ${errorMessage(e)}`);
      return res.status(502).json({ error: "publish_failed", detail: errorMessage(e) });
    }
    return res.json({ ok: true, type: envelope.type, topic: envelope.topic });
  });

  return router;
}
