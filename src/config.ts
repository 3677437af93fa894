import fs from "node:fs";
import path from "node:path";
import { config as loadDotEnv } from "dotenv";
import type { OcrMode } from "./ocr/types.js";
import type { MergePlacement } from "./pipeline/preview.js";

const localEnvPath = path.resolve(process.cwd(), ".env.local");
if (fs.existsSync(localEnvPath)) {
  loadDotEnv({ path: localEnvPath, quiet: true });
}
loadDotEnv({ quiet: true });

export type PipelineConfig = {
  visionModel: string;
  reasoningModel: string;
  ocrMaxChars: number;
  ocrDescriptionMaxChars: number;
  includeDescription: boolean;
  showOcrResults: boolean;
  showOcrStatus: boolean;
  mergeOcrIntoFinal: boolean;
  mergePlacement: MergePlacement;
  ocrMode: OcrMode;
  scanUserMessages: number;
  incrementalMerge: boolean;
  statusDedupMs: number;
  pipeId: string;
  pipeName: string;
};

export type ServiceConfig = PipelineConfig & {
  apiBaseUrl: string;
  apiKey: string;
  debug: boolean;
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  visionModel: "mistral-small3.2:24b-instruct-2506-q8_0",
  reasoningModel: "gpt-oss:20b",
  ocrMaxChars: 50_000,
  ocrDescriptionMaxChars: 50_000,
  includeDescription: true,
  showOcrResults: true,
  showOcrStatus: true,
  mergeOcrIntoFinal: false,
  mergePlacement: "top",
  ocrMode: "per_image",
  scanUserMessages: 5,
  incrementalMerge: true,
  statusDedupMs: 3_000,
  pipeId: "multimodal-reasoner",
  pipeName: "Multimodal Reasoner",
};

const DEFAULT_API_BASE_URL = "http://localhost:11434/v1";

export function readServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const defaults = DEFAULT_PIPELINE_CONFIG;
  return {
    visionModel: env.VISIONPIPE_OCR_MODEL?.trim() || defaults.visionModel,
    reasoningModel: env.VISIONPIPE_MAIN_MODEL?.trim() || defaults.reasoningModel,
    ocrMaxChars: parseNonNegativeInt(env.VISIONPIPE_OCR_MAX_CHARS, "VISIONPIPE_OCR_MAX_CHARS", defaults.ocrMaxChars),
    ocrDescriptionMaxChars: parseNonNegativeInt(
      env.VISIONPIPE_OCR_DESC_MAX_CHARS,
      "VISIONPIPE_OCR_DESC_MAX_CHARS",
      defaults.ocrDescriptionMaxChars,
    ),
    includeDescription: parseFlag(env.VISIONPIPE_OCR_INCLUDE_DESCRIPTION, defaults.includeDescription),
    showOcrResults: parseFlag(env.VISIONPIPE_SHOW_OCR_RESULTS, defaults.showOcrResults),
    showOcrStatus: parseFlag(env.VISIONPIPE_SHOW_OCR_STATUS, defaults.showOcrStatus),
    mergeOcrIntoFinal: parseFlag(env.VISIONPIPE_MERGE_OCR_INTO_FINAL, defaults.mergeOcrIntoFinal),
    mergePlacement: parseMergePlacement(env.VISIONPIPE_MERGE_PLACEMENT),
    ocrMode: parseOcrMode(env.VISIONPIPE_OCR_MODE),
    scanUserMessages: Math.max(
      1,
      parseNonNegativeInt(env.VISIONPIPE_SCAN_USER_MESSAGES, "VISIONPIPE_SCAN_USER_MESSAGES", defaults.scanUserMessages),
    ),
    incrementalMerge: parseFlag(env.VISIONPIPE_INCREMENTAL_MERGE, defaults.incrementalMerge),
    statusDedupMs: parseNonNegativeInt(env.VISIONPIPE_STATUS_DEDUP_MS, "VISIONPIPE_STATUS_DEDUP_MS", defaults.statusDedupMs),
    pipeId: env.VISIONPIPE_PIPE_ID?.trim() || defaults.pipeId,
    pipeName: env.VISIONPIPE_PIPE_NAME?.trim() || defaults.pipeName,
    apiBaseUrl: env.VISIONPIPE_API_BASE_URL?.trim() || DEFAULT_API_BASE_URL,
    apiKey: env.VISIONPIPE_API_KEY?.trim() || env.OPENAI_API_KEY?.trim() || "",
    debug: parseFlag(env.VISIONPIPE_DEBUG, false),
  };
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = (value ?? "").trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }
  return normalized !== "false" && normalized !== "0" && normalized !== "off" && normalized !== "no";
}

function parseNonNegativeInt(value: string | undefined, name: string, fallback: number): number {
  const normalized = (value ?? "").trim();
  if (!normalized) {
    return fallback;
  }
  const parsed = Number(normalized);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name} "${value}". Use a whole number >= 0.`);
  }
  return parsed;
}

function parseMergePlacement(value: string | undefined): MergePlacement {
  const normalized = (value ?? "").trim().toLowerCase() || "top";
  if (normalized === "top" || normalized === "bottom") {
    return normalized;
  }
  throw new Error(`Invalid VISIONPIPE_MERGE_PLACEMENT "${value}". Use "top" or "bottom".`);
}

function parseOcrMode(value: string | undefined): OcrMode {
  const normalized = (value ?? "").trim().toLowerCase().replace(/-/g, "_") || "per_image";
  if (normalized === "per_image" || normalized === "batch") {
    return normalized;
  }
  throw new Error(`Invalid VISIONPIPE_OCR_MODE "${value}". Use "per_image" or "batch".`);
}
