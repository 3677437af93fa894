export type * from "./chat-types.js";
export { readServiceConfig, DEFAULT_PIPELINE_CONFIG, type PipelineConfig, type ServiceConfig } from "./config.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export { CompletionRequestError, createOpenAiCompatibleFunnel, type OpenAiFunnelOptions } from "./openai.js";
export {
  collectImageReferences,
  extractImageArtifacts,
  extractSinceLastAssistant,
  type ImageArtifacts,
  type ImageReference,
} from "./core/images.js";
export { normalizeChatRequest } from "./core/messages.js";
export { VisionPipeRuntime, type RuntimeEvent, type RuntimeRunResult } from "./core/runtime.js";
export { parseOcrStructuredOutput } from "./ocr/parser.js";
export { OCR_CATEGORIES, type AggregateOcrResult, type OcrCategory, type OcrResult } from "./ocr/types.js";
export { runVisionOcr } from "./ocr/vision.js";
export { buildOcrContextMessage, composeReasonerRequest } from "./pipeline/context.js";
export { RunNotifier, TtlSeenCache, type PipelineEvent, type PipelineEventSink } from "./pipeline/notifier.js";
export { MultimodalPipeline, type PipelineDeps, type RunOptions } from "./pipeline/orchestrator.js";
export { mergePreviewIntoAnswer, renderOcrPreview } from "./pipeline/preview.js";
export { startRpcStdioServer } from "./rpc/stdio-server.js";
