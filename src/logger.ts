import type { DebugEvent } from "./chat-types.js";

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  debug: (event: DebugEvent) => void;
};

// stdout carries rpc frames and answers, so everything here goes to stderr
export function createLogger(options: { debug?: boolean; write?: (line: string) => void } = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  return {
    info: (message) => write(`[visionpipe] ${message}`),
    warn: (message) => write(`[visionpipe] warn: ${message}`),
    debug: (event) => {
      if (!options.debug) {
        return;
      }
      write(`[visionpipe] debug ${event.stage}: ${compactJson(event.data)}`);
    },
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
};

function compactJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
