import type { Payload, TaggedMessage } from "@topicgate/common";
import { EnvelopeHeaderSchema } from "@topicgate/common";
import { DeserializationError, ProtocolError, errorMessage } from "../errors";

export type UntaggedMessage =
  | { type: "send"; topic: string; remainder: Payload }
  | { type: "broadcast"; topic: null; remainder: Payload };

/**
 * Wrap a client payload with routing metadata. A missing or empty topic makes
 * it a broadcast. Returns a new object; `payload` is left untouched.
 */
export function tagClientMessage(payload: Payload, topic?: string | null): TaggedMessage {
  if (!topic) return { ...payload, type: "broadcast", topic: null };
  return { ...payload, type: "send", topic };
}

function isPayload(value: unknown): value is Payload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split a tagged message into its routing header and the application fields.
 * Strings are decoded as JSON first.
 */
export function untagBrokerMessage(raw: string | Payload): UntaggedMessage {
  let decoded: unknown = raw;
  if (typeof raw === "string") {
    try {
      decoded = JSON.parse(raw);
    } catch (e) {
      throw new DeserializationError(`Envelope is not valid JSON: ${errorMessage(e)}`, { cause: e });
    }
  }

  if (!isPayload(decoded)) throw new ProtocolError("Envelope must be a JSON object");
  if (!("type" in decoded)) throw new ProtocolError("Envelope is missing `type`");
  if (!("topic" in decoded)) throw new ProtocolError("Envelope is missing `topic`");

  const { type, topic, ...remainder } = decoded;
  const header = EnvelopeHeaderSchema.safeParse({ type, topic });
  if (!header.success) {
    throw new ProtocolError(`Invalid envelope header (type=${String(type)}, topic=${String(topic)})`, {
      cause: header.error,
    });
  }

  if (header.data.type === "send") return { type: "send", topic: header.data.topic, remainder };
  return { type: "broadcast", topic: null, remainder };
}
