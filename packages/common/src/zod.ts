import { z } from "zod";

// ── Envelope headers ──

export const SendHeaderSchema = z.object({
  type: z.literal("send"),
  topic: z.string().min(1),
});

export const BroadcastHeaderSchema = z.object({
  type: z.literal("broadcast"),
  topic: z.null(),
});

export const EnvelopeHeaderSchema = z.discriminatedUnion("type", [SendHeaderSchema, BroadcastHeaderSchema]);

// ── Client → gateway ──

// `type` from the client is ignored; the gateway re-tags from `topic`.
export const ClientMessageSchema = z
  .object({
    topic: z.string().nullish(),
  })
  .passthrough();

export const PublishRequestSchema = z.object({
  topic: z.string().min(1).nullish(),
  payload: z.record(z.unknown()),
});

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type PublishRequest = z.infer<typeof PublishRequestSchema>;
