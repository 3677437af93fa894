import type { RpcRouter } from "./router.js";
import { readRpcLine, rpcFailure, rpcResult, type JsonRpcMessage, type JsonRpcRequest } from "./protocol.js";

export type RpcSessionOptions = {
  router: Pick<RpcRouter, "dispatch">;
  write: (message: JsonRpcMessage) => void;
  onShutdownRequested?: () => void;
};

/**
 * One client conversation over a line transport. Requests run concurrently and
 * answer in completion order; once the session stops, new lines are ignored but
 * requests already accepted still answer.
 */
export class RpcSession {
  private stopped = false;
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly options: RpcSessionOptions) {}

  handleLine(line: string): void {
    if (this.stopped) {
      return;
    }

    const parsed = readRpcLine(line);
    switch (parsed.kind) {
      case "blank":
      case "notification":
        return;
      case "rejected":
        this.send(parsed.response);
        return;
      case "request": {
        const running = this.answer(parsed.request).finally(() => {
          this.pending.delete(running);
        });
        this.pending.add(running);
      }
    }
  }

  send(message: JsonRpcMessage): void {
    this.options.write(message);
  }

  stop(): void {
    this.stopped = true;
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private async answer(request: JsonRpcRequest): Promise<void> {
    let result: unknown;
    try {
      result = await this.options.router.dispatch(request);
    } catch (error) {
      this.send(rpcFailure(request.id, error));
      return;
    }

    this.send(rpcResult(request.id, result));
    if (request.method === "system.shutdown") {
      this.stop();
      this.options.onShutdownRequested?.();
    }
  }
}
