import type {
  ChatCompletion,
  ChatRequestBody,
  CompleteChat,
  CompletionOutcome,
  RequestUser,
} from "../chat-types.js";
import type { PipelineConfig } from "../config.js";
import {
  collectImageReferences,
  extractImageArtifacts,
  extractSinceLastAssistant,
  type ImageReference,
} from "../core/images.js";
import { silentLogger, type Logger } from "../logger.js";
import { createEmptyAggregate, mergeAggregates, type AggregateOcrResult } from "../ocr/types.js";
import { runVisionOcr } from "../ocr/vision.js";
import { composeReasonerRequest } from "./context.js";
import { RunNotifier, TtlSeenCache, type PipelineEventSink, type SeenCache } from "./notifier.js";
import { mergePreviewIntoAnswer, renderOcrPreview } from "./preview.js";
import { collectStreamText, rewriteFirstChoiceContent, withCompletionCallback } from "./response.js";

export type PipelineStage =
  | "idle"
  | "detecting_images"
  | "no_images"
  | "running_ocr"
  | "composing_context"
  | "calling_reasoner"
  | "streaming_response"
  | "done";

export type PipelineRun = {
  stage: PipelineStage;
  references: ImageReference[];
  aggregate: AggregateOcrResult;
  composed: ChatRequestBody | null;
};

export type PipeDescriptor = {
  id: string;
  name: string;
};

export type PipelineDeps = {
  complete: CompleteChat;
  seenCache?: SeenCache;
  logger?: Logger;
};

export type RunOptions = {
  notify?: PipelineEventSink;
};

/**
 * Image-aware front for a text-only reasoning model: images in the pending user
 * turns are transcribed by the vision model first, and the result is handed to the
 * reasoning model as a leading system message.
 */
export class MultimodalPipeline {
  private readonly seenCache: SeenCache;
  private readonly logger: Logger;

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: PipelineDeps,
  ) {
    this.seenCache = deps.seenCache ?? new TtlSeenCache();
    this.logger = deps.logger ?? silentLogger;
  }

  pipes(): PipeDescriptor[] {
    return [{ id: this.config.pipeId, name: this.config.pipeName }];
  }

  async run(body: ChatRequestBody, user: RequestUser, options: RunOptions = {}): Promise<CompletionOutcome> {
    const config = this.config;
    const notifier = new RunNotifier({
      sink: options.notify,
      cache: this.seenCache,
      showStatus: config.showOcrStatus,
      showResults: config.showOcrResults,
      dedupTtlMs: config.statusDedupMs,
      logger: this.logger,
    });
    const run: PipelineRun = {
      stage: "idle",
      references: [],
      aggregate: createEmptyAggregate(),
      composed: null,
    };

    try {
      this.advance(run, "detecting_images");
      const artifacts = extractImageArtifacts(body, { maxUserMessages: config.scanUserMessages });
      run.references = collectImageReferences(artifacts);

      if (run.references.length > 0) {
        this.advance(run, "running_ocr");
        run.aggregate = await this.runOcr(run.references, user, notifier, "attached");
      } else {
        // stay quiet here so an earlier run's status is not clobbered
        this.advance(run, "no_images");
      }

      if (config.incrementalMerge) {
        const pending = collectImageReferences(extractSinceLastAssistant(body)).filter(
          (reference) => !run.aggregate.processed.includes(reference.locator),
        );
        if (pending.length > 0) {
          this.advance(run, "running_ocr");
          run.references = [...run.references, ...pending];
          const incremental = await this.runOcr(pending, user, notifier, "newly attached");
          run.aggregate = mergeAggregates(run.aggregate, incremental);
        }
      }

      this.advance(run, "composing_context");
      const preview = renderOcrPreview(run.aggregate, {
        maxTextChars: config.ocrMaxChars,
        maxDescriptionChars: config.ocrDescriptionMaxChars,
        includeDescription: config.includeDescription,
      });
      const mergeIntoFinal = config.mergeOcrIntoFinal && Boolean(preview);
      if (preview && !mergeIntoFinal) {
        await notifier.message(preview);
      }

      const finalBody = composeReasonerRequest(body, run.aggregate, {
        reasoningModel: config.reasoningModel,
        maxTextChars: config.ocrMaxChars,
        maxDescriptionChars: config.ocrDescriptionMaxChars,
        includeDescription: config.includeDescription,
      });
      if (mergeIntoFinal) {
        finalBody.stream = false;
      }
      run.composed = finalBody;

      this.advance(run, "calling_reasoner");
      let outcome = await this.deps.complete(finalBody, user);
      if (mergeIntoFinal) {
        const response = await collapseToResponse(outcome);
        const answer = response.choices[0]?.message.content ?? "";
        outcome = {
          kind: "response",
          response: rewriteFirstChoiceContent(
            response,
            mergePreviewIntoAnswer(preview, answer, config.mergePlacement),
          ),
        };
      }

      this.advance(run, outcome.kind === "stream" ? "streaming_response" : "done");
      return await withCompletionCallback(outcome, async () => {
        await notifier.finish();
        if (run.stage === "streaming_response") {
          this.advance(run, "done");
        }
      });
    } catch (error) {
      await notifier.finish();
      throw error;
    }
  }

  private async runOcr(
    references: ImageReference[],
    user: RequestUser,
    notifier: RunNotifier,
    label: string,
  ): Promise<AggregateOcrResult> {
    const config = this.config;
    await notifier.status(`Running OCR on ${references.length} ${label} image(s)...`, false);

    const { aggregate, requests } = await runVisionOcr({
      references,
      complete: this.deps.complete,
      user,
      visionModel: config.visionModel,
      mode: config.ocrMode,
      includeDescription: config.includeDescription,
      onRequestStart: async (info) => {
        if (info.total > 1) {
          await notifier.status(`Running OCR on image ${info.index + 1} of ${info.total}...`, false);
        }
      },
      onRequestFailure: async (failure) => {
        this.logger.warn(`ocr request failed for ${failure.locators.join(", ")}: ${failure.message}`);
        const description =
          failure.total > 1
            ? `OCR failed for image ${failure.index + 1} of ${failure.total}: ${failure.message}`
            : `OCR failed: ${failure.message}`;
        await notifier.status(description, true);
      },
    });

    if (requests > aggregate.failures.length) {
      await notifier.status("OCR complete.", true);
    }
    this.logger.debug({
      stage: "ocr.aggregate",
      data: {
        requests,
        failures: aggregate.failures.length,
        text_chars: aggregate.text.length,
        description_chars: aggregate.description.length,
        categories: aggregate.categories,
      },
    });
    return aggregate;
  }

  private advance(run: PipelineRun, stage: PipelineStage): void {
    this.logger.debug({ stage: "pipeline.stage", data: { from: run.stage, to: stage } });
    run.stage = stage;
  }
}

async function collapseToResponse(outcome: CompletionOutcome): Promise<ChatCompletion> {
  if (outcome.kind === "response") {
    return outcome.response;
  }
  // the funnel streamed even though we asked it not to
  const content = await collectStreamText(outcome.chunks);
  return {
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
  };
}
