import type { VisionPipeRuntime } from "../core/runtime.js";
import { CompletionRequestError } from "../openai.js";
import {
  JSON_RPC_ERROR,
  RpcMethodError,
  assertChatRequest,
  assertObjectParams,
  assertOptionalBoolean,
  assertOptionalString,
  assertRequestUser,
  type JsonRpcRequest,
} from "./protocol.js";

export type RouterRuntime = Pick<VisionPipeRuntime, "models" | "describeConfig" | "run" | "shutdown">;

type MethodHandler = (params: Record<string, unknown>, method: string) => Promise<unknown> | unknown;

export class RpcRouter {
  private readonly handlers: Map<string, MethodHandler>;

  constructor(private readonly runtime: RouterRuntime) {
    this.handlers = new Map<string, MethodHandler>([
      ["system.ping", () => ({ ok: true, time: new Date().toISOString() })],
      [
        "system.shutdown",
        (params, method) => this.runtime.shutdown(assertOptionalString(params.reason, "reason", method)),
      ],
      ["pipeline.models", () => this.runtime.models()],
      ["pipeline.config", () => this.runtime.describeConfig()],
      ["pipeline.run", (params, method) => this.runPipeline(params, method)],
    ]);
  }

  methods(): string[] {
    return [...this.handlers.keys()];
  }

  async dispatch(request: JsonRpcRequest): Promise<unknown> {
    const handler = this.handlers.get(request.method);
    if (!handler) {
      throw new RpcMethodError(JSON_RPC_ERROR.METHOD_NOT_FOUND, `method not found: ${request.method}`, {
        reason: "method_not_found",
      });
    }
    const params = assertObjectParams(request.params, request.method);
    return handler(params, request.method);
  }

  private async runPipeline(params: Record<string, unknown>, method: string): Promise<unknown> {
    const body = assertChatRequest(params.request, method);
    const user = assertRequestUser(params.user, method);
    const streamEvents = assertOptionalBoolean(params.stream_events, "stream_events", method) ?? true;
    try {
      return await this.runtime.run({ body, user, streamEvents });
    } catch (error) {
      if (error instanceof CompletionRequestError) {
        throw new RpcMethodError(JSON_RPC_ERROR.UPSTREAM_ERROR, error.message, {
          reason: "upstream_error",
          status: error.status,
        });
      }
      throw error;
    }
  }
}
