import type { ChatRequestBody, CompleteChat, RequestUser } from "../chat-types.js";
import type { ServiceConfig } from "../config.js";
import { createLogger, type Logger } from "../logger.js";
import { createOpenAiCompatibleFunnel } from "../openai.js";
import { MultimodalPipeline, type PipeDescriptor } from "../pipeline/orchestrator.js";
import type { PipelineEvent } from "../pipeline/notifier.js";
import { collectStreamText, extractResponseText } from "../pipeline/response.js";

export type RuntimeEvent =
  | { type: "pipeline.status"; payload: { run_id: string; description: string; done: boolean; hidden: boolean } }
  | { type: "pipeline.message"; payload: { run_id: string; content: string } }
  | { type: "pipeline.chunk"; payload: { run_id: string; delta: string } };

export type RuntimeRunResult = {
  run_id: string;
  model: string;
  streamed: boolean;
  content: string;
  response: Record<string, unknown> | null;
};

export type RuntimeEventListener = (event: RuntimeEvent) => void;

export type RuntimeOptions = {
  config: ServiceConfig;
  complete?: CompleteChat;
  logger?: Logger;
};

/**
 * Owns one pipeline and fans its events out to listeners, so hosts (the rpc
 * server, the cli) only deal with plain event payloads.
 */
export class VisionPipeRuntime {
  private readonly listeners = new Set<RuntimeEventListener>();
  private readonly pipeline: MultimodalPipeline;
  private readonly logger: Logger;
  private nextRunNumber = 1;
  private shuttingDown = false;

  constructor(private readonly options: RuntimeOptions) {
    this.logger = options.logger ?? createLogger({ debug: options.config.debug });
    const complete =
      options.complete ??
      createOpenAiCompatibleFunnel({
        baseUrl: options.config.apiBaseUrl,
        apiKey: options.config.apiKey,
      });
    this.pipeline = new MultimodalPipeline(options.config, { complete, logger: this.logger });
  }

  onEvent(listener: RuntimeEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  models(): { models: PipeDescriptor[] } {
    return { models: this.pipeline.pipes() };
  }

  describeConfig(): Record<string, unknown> {
    const { apiKey, ...rest } = this.options.config;
    return { ...rest, api_key_configured: Boolean(apiKey) };
  }

  async run(params: { body: ChatRequestBody; user: RequestUser; streamEvents?: boolean }): Promise<RuntimeRunResult> {
    if (this.shuttingDown) {
      throw new Error("runtime is shutting down");
    }
    const runId = `run-${this.nextRunNumber}`;
    this.nextRunNumber += 1;

    const outcome = await this.pipeline.run(params.body, params.user, {
      notify: (event) => this.emit(toRuntimeEvent(runId, event)),
    });

    if (outcome.kind === "response") {
      return {
        run_id: runId,
        model: this.options.config.reasoningModel,
        streamed: false,
        content: extractResponseText(outcome.response),
        response: outcome.response,
      };
    }

    const content = await collectStreamText(outcome.chunks, (delta) => {
      if (params.streamEvents !== false) {
        this.emit({ type: "pipeline.chunk", payload: { run_id: runId, delta } });
      }
    });
    return {
      run_id: runId,
      model: this.options.config.reasoningModel,
      streamed: true,
      content,
      response: null,
    };
  }

  async shutdown(reason?: string): Promise<{ accepted: true; reason?: string }> {
    this.shuttingDown = true;
    this.logger.info(`shutting down${reason ? ` (${reason})` : ""}`);
    this.listeners.clear();
    return { accepted: true, reason };
  }

  private emit(event: RuntimeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`event listener failed: ${message}`);
      }
    }
  }
}

function toRuntimeEvent(runId: string, event: PipelineEvent): RuntimeEvent {
  if (event.type === "status") {
    return { type: "pipeline.status", payload: { run_id: runId, ...event.data } };
  }
  return { type: "pipeline.message", payload: { run_id: runId, content: event.data.content } };
}
