#!/usr/bin/env node
import { parseAskArgs, runAsk } from "./ask.js";
import { mountAskView } from "./ask-view.js";
import { readServiceConfig } from "./config.js";
import { VisionPipeRuntime } from "./core/runtime.js";
import { silentLogger } from "./logger.js";
import { startRpcStdioServer } from "./rpc/stdio-server.js";

const argv = process.argv.slice(2);

void main(argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[visionpipe] fatal: ${message}`);
  process.exitCode = 1;
});

async function main(args: string[]): Promise<void> {
  const first = (args[0] ?? "").trim().toLowerCase();

  if (first === "ask") {
    const askArgs = parseAskArgs(args.slice(1));
    const config = readServiceConfig();
    const view = process.stderr.isTTY ? mountAskView(process.stderr) : null;
    let answered = false;
    try {
      await runAsk(config, askArgs, {
        onEvent: view ? (event) => view.apply(event) : undefined,
        writeAnswer: (content) => {
          answered = true;
          view?.finish(content);
          process.stdout.write(`${content}\n`);
        },
      });
    } finally {
      if (!answered) {
        view?.finish("");
      }
    }
    return;
  }

  if (first === "rpc") {
    await startRpcStdioServer(readServiceConfig());
    return;
  }

  if (first === "models") {
    const runtime = new VisionPipeRuntime({ config: readServiceConfig(), logger: silentLogger });
    for (const pipe of runtime.models().models) {
      process.stdout.write(`${pipe.id}\t${pipe.name}\n`);
    }
    return;
  }

  if (first) {
    console.error(`unknown subcommand: ${args[0]}`);
  }
  console.error("usage:");
  console.error("  visionpipe ask <prompt> [--image <url|path>]... [--stream]");
  console.error("  visionpipe rpc      # start json-rpc stdio server");
  console.error("  visionpipe models   # list the exposed pipe");
  process.exitCode = 1;
}
