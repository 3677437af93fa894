import type { RuntimeEvent } from "../core/runtime.js";
import { rpcNotification } from "./protocol.js";

export type RpcEventEnvelope<E extends RuntimeEvent = RuntimeEvent> = {
  type: E["type"];
  timestamp: string;
  payload: E["payload"];
};

export function buildEventNotification(event: RuntimeEvent, now: Date = new Date()) {
  const envelope: RpcEventEnvelope = {
    type: event.type,
    timestamp: now.toISOString(),
    payload: event.payload,
  };

  return rpcNotification("event", envelope);
}
