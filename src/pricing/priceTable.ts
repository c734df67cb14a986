/**
 * Price table (USD) for the generation services.
 *
 * Bump PRICE_TABLE_VERSION whenever a price changes so stored estimates
 * can be traced back to the table that produced them.
 */

import type { ImageModel, ImageTier, VideoModel } from "../contracts";

export const PRICE_TABLE_VERSION = "2025-11-09";

export const IMAGE_PRICES: Readonly<Record<ImageModel, Readonly<Record<ImageTier, number>>>> = {
  "imagen-3.0": { "1K": 0.02, "2K": 0.04 },
  "imagen-4.0": { "1K": 0.04, "2K": 0.08 },
};

/** Per second of generated video. */
export const VIDEO_PRICES: Readonly<Record<VideoModel, number>> = {
  veo2: 0.4,
  veo3: 0.75,
  veo3_fast: 0.4,
};

/** Per 1K tokens. */
export const TEXT_PRICES = {
  gemini_flash: 0.0005,
  claude_sonnet: 0.003,
} as const;

export const CONTENT_MODEL = "gemini-2.5-flash";
/** Prompt plus response for one platform caption, averaged. */
export const AVG_TOKENS_PER_CONTENT_PIECE = 750;

export const IMAGE_MODELS: readonly ImageModel[] = ["imagen-3.0", "imagen-4.0"];
export const VIDEO_MODELS: readonly VideoModel[] = ["veo2", "veo3", "veo3_fast"];

/** API model ids behind each image model name. */
export const IMAGE_MODEL_IDS: Readonly<Record<ImageModel, string>> = {
  "imagen-3.0": "imagen-3.0-generate-002",
  "imagen-4.0": "imagen-4.0-generate-001",
};

export function isImageModel(value: string): value is ImageModel {
  return IMAGE_MODELS.some((model) => model === value);
}

export function isVideoModel(value: string): value is VideoModel {
  return VIDEO_MODELS.some((model) => model === value);
}
