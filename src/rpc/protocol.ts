import type { ChatRequestBody, RequestUser } from "../chat-types.js";
import { isRecord, normalizeChatRequest } from "../core/messages.js";

export type JsonRpcId = string | number | null;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type JsonRpcNotification = {
  jsonrpc: "2.0";
  method: string;
  params?: unknown;
};

export type JsonRpcResponse = {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result?: unknown;
  error?: JsonRpcError;
};

export type JsonRpcError = {
  code: number;
  message: string;
  data?: unknown;
};

export const JSON_RPC_VERSION = "2.0" as const;

export const JSON_RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  UPSTREAM_ERROR: -32001,
} as const;

export const ANONYMOUS_USER: RequestUser = { id: "anonymous" };

export class RpcMethodError extends Error {
  code: number;
  data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = "RpcMethodError";
    this.code = code;
    this.data = data;
  }
}

export function isRpcMethodError(value: unknown): value is RpcMethodError {
  return value instanceof RpcMethodError;
}

export type JsonRpcMessage = JsonRpcResponse | JsonRpcNotification;

/** What a single line read from the transport turned out to be. */
export type RpcLine =
  | { kind: "blank" }
  | { kind: "request"; request: JsonRpcRequest }
  | { kind: "notification"; notification: JsonRpcNotification }
  | { kind: "rejected"; response: JsonRpcResponse };

export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return { jsonrpc: JSON_RPC_VERSION, id, error: { code, message, data } };
}

/**
 * Turns whatever a method handler threw into an error response. Anything that is
 * not an `RpcMethodError` is reported as an internal error.
 */
export function rpcFailure(id: JsonRpcId, error: unknown): JsonRpcResponse {
  if (isRpcMethodError(error)) {
    return rpcError(id, error.code, error.message, error.data);
  }
  const message = error instanceof Error ? error.message : String(error);
  return rpcError(id, JSON_RPC_ERROR.INTERNAL_ERROR, message, { reason: "internal_error" });
}

export function rpcNotification(method: string, params?: unknown): JsonRpcNotification {
  return { jsonrpc: JSON_RPC_VERSION, method, params };
}

export function readRpcLine(line: string): RpcLine {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: "blank" };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return reject(JSON_RPC_ERROR.PARSE_ERROR, `parse error: ${detail}`, "parse_error");
  }

  if (Array.isArray(payload)) {
    return reject(JSON_RPC_ERROR.INVALID_REQUEST, "batch requests are not supported", "batch_not_supported");
  }
  if (!isRecord(payload) || payload.jsonrpc !== JSON_RPC_VERSION) {
    return reject(JSON_RPC_ERROR.INVALID_REQUEST, "invalid request", "invalid_request");
  }

  const method = typeof payload.method === "string" ? payload.method.trim() : "";
  if (!method) {
    return reject(JSON_RPC_ERROR.INVALID_REQUEST, "invalid request", "invalid_request");
  }
  if (!("id" in payload)) {
    return { kind: "notification", notification: { jsonrpc: JSON_RPC_VERSION, method, params: payload.params } };
  }

  const id = payload.id;
  if (typeof id !== "string" && typeof id !== "number" && id !== null) {
    return reject(JSON_RPC_ERROR.INVALID_REQUEST, "invalid request", "invalid_request");
  }
  return { kind: "request", request: { jsonrpc: JSON_RPC_VERSION, id, method, params: payload.params } };
}

function reject(code: number, message: string, reason: string): RpcLine {
  return { kind: "rejected", response: rpcError(null, code, message, { reason }) };
}

export function assertObjectParams(params: unknown, method: string): Record<string, unknown> {
  if (params === undefined) {
    return {};
  }
  if (!isRecord(params)) {
    throw invalidParams(method, "expected object");
  }
  return params;
}

export function assertChatRequest(value: unknown, method: string): ChatRequestBody {
  const normalized = normalizeChatRequest(value);
  if (!normalized.ok) {
    throw invalidParams(method, `\`request\` is invalid: ${normalized.error}`, "request");
  }
  if (normalized.body.messages.length === 0) {
    throw invalidParams(method, "`request.messages` must contain at least one message", "request");
  }
  return normalized.body;
}

export function assertRequestUser(value: unknown, method: string): RequestUser {
  if (value === undefined || value === null) {
    return ANONYMOUS_USER;
  }
  if (!isRecord(value) || typeof value.id !== "string" || !value.id.trim()) {
    throw invalidParams(method, "`user.id` must be a non-empty string", "user");
  }
  const name = typeof value.name === "string" && value.name.trim() ? value.name.trim() : undefined;
  return name ? { id: value.id.trim(), name } : { id: value.id.trim() };
}

export function assertOptionalString(value: unknown, field: string, method: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw invalidParams(method, `\`${field}\` must be a string`, field);
  }
  return value.trim() || undefined;
}

export function assertOptionalBoolean(value: unknown, field: string, method: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw invalidParams(method, `\`${field}\` must be a boolean`, field);
  }
  return value;
}

function invalidParams(method: string, detail: string, field?: string): RpcMethodError {
  return new RpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, `invalid params for ${method}: ${detail}`, {
    reason: "invalid_params",
    ...(field ? { field } : {}),
  });
}
