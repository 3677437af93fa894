import readline from "node:readline";
import type { ServiceConfig } from "../config.js";
import { VisionPipeRuntime } from "../core/runtime.js";
import { createLogger } from "../logger.js";
import { buildEventNotification } from "./events.js";
import { RpcRouter } from "./router.js";
import { RpcSession } from "./session.js";

/**
 * Serves newline-delimited JSON-RPC on stdin/stdout until stdin closes, a client
 * calls `system.shutdown`, or the process is signalled.
 */
export async function startRpcStdioServer(config: ServiceConfig): Promise<void> {
  const logger = createLogger({ debug: config.debug });
  const runtime = new VisionPipeRuntime({ config, logger });
  const router = new RpcRouter(runtime);
  const lines = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });

  const session = new RpcSession({
    router,
    write: (message) => {
      process.stdout.write(`${JSON.stringify(message)}\n`);
    },
    onShutdownRequested: () => lines.close(),
  });
  const unsubscribe = runtime.onEvent((event) => session.send(buildEventNotification(event)));

  const closed = new Promise<void>((resolve) => lines.once("close", () => resolve()));
  const stopOnSignal = () => {
    session.stop();
    lines.close();
  };
  process.once("SIGINT", stopOnSignal);
  process.once("SIGTERM", stopOnSignal);

  lines.on("line", (line) => session.handleLine(line));
  logger.info(`rpc server ready (${router.methods().join(", ")})`);

  await closed;
  session.stop();
  await session.drain();
  unsubscribe();
  process.off("SIGINT", stopOnSignal);
  process.off("SIGTERM", stopOnSignal);
  await runtime.shutdown("stdin_closed");
}
