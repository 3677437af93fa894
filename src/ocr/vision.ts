import type { CompleteChat, RequestUser } from "../chat-types.js";
import type { ImageReference } from "../core/images.js";
import { readOutcomeText } from "../pipeline/response.js";
import { parseOcrStructuredOutput } from "./parser.js";
import { buildOcrMessages } from "./prompt.js";
import {
  appendOcrResult,
  createEmptyAggregate,
  createEmptyOcrResult,
  type AggregateOcrResult,
  type OcrMode,
} from "./types.js";

export type VisionRequestInfo = {
  index: number;
  total: number;
  locators: string[];
};

export type VisionRequestFailure = VisionRequestInfo & {
  message: string;
};

export type VisionOcrOutcome = {
  aggregate: AggregateOcrResult;
  requests: number;
};

export type VisionOcrParams = {
  references: ImageReference[];
  complete: CompleteChat;
  user: RequestUser;
  visionModel: string;
  mode: OcrMode;
  includeDescription: boolean;
  onRequestStart?: (info: VisionRequestInfo) => void | Promise<void>;
  onRequestFailure?: (failure: VisionRequestFailure) => void | Promise<void>;
};

/**
 * Sends the referenced images to the vision model, one request per image or a
 * single batched request, strictly in order. A failed request contributes an empty
 * result and is reported through `onRequestFailure`; it never rejects.
 */
export async function runVisionOcr(params: VisionOcrParams): Promise<VisionOcrOutcome> {
  const batches = planBatches(params.references, params.mode);
  let aggregate = createEmptyAggregate();

  for (const [index, batch] of batches.entries()) {
    const info: VisionRequestInfo = {
      index,
      total: batches.length,
      locators: batch.map((reference) => reference.locator),
    };
    await params.onRequestStart?.(info);

    try {
      const outcome = await params.complete(
        {
          model: params.visionModel,
          stream: false,
          messages: buildOcrMessages(batch, params.includeDescription),
        },
        params.user,
      );
      const raw = await readOutcomeText(outcome);
      const parsed = parseOcrStructuredOutput(raw, { includeDescription: params.includeDescription });
      aggregate = appendOcrResult(aggregate, parsed, info.locators);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      aggregate = appendOcrResult(aggregate, createEmptyOcrResult(), info.locators);
      aggregate = {
        ...aggregate,
        failures: [...aggregate.failures, { locators: info.locators, message }],
      };
      await params.onRequestFailure?.({ ...info, message });
    }
  }

  return { aggregate, requests: batches.length };
}

function planBatches(references: ImageReference[], mode: OcrMode): ImageReference[][] {
  if (references.length === 0) {
    return [];
  }
  if (mode === "batch") {
    return [references];
  }
  return references.map((reference) => [reference]);
}
