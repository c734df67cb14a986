/**
 * Read-only pricing and model resources, mirroring what the service
 * publishes to callers that plan a campaign before running it.
 */

import {
  AVG_TOKENS_PER_CONTENT_PIECE,
  CONTENT_MODEL,
  IMAGE_MODEL_IDS,
  IMAGE_PRICES,
  PRICE_TABLE_VERSION,
  TEXT_PRICES,
  VIDEO_PRICES,
} from "./priceTable";

export interface PricingInfo {
  currency: "USD";
  version: string;
  images: typeof IMAGE_PRICES;
  videoPerSecond: typeof VIDEO_PRICES;
  textPer1kTokens: typeof TEXT_PRICES;
  avgTokensPerContentPiece: number;
  notes: Record<"images" | "video" | "content", string>;
}

export function getPricingInfo(): PricingInfo {
  return {
    currency: "USD",
    version: PRICE_TABLE_VERSION,
    images: IMAGE_PRICES,
    videoPerSecond: VIDEO_PRICES,
    textPer1kTokens: TEXT_PRICES,
    avgTokensPerContentPiece: AVG_TOKENS_PER_CONTENT_PIECE,
    notes: {
      images: "Per image, 1K or 2K resolution",
      video: "Per second of video, 24fps with audio",
      content: "Per 1K tokens",
    },
  };
}

export interface ModelCatalog {
  imageGeneration: Record<
    string,
    { apiModel: string; resolutions: string[]; aspectRatios: string[]; maxImages: number }
  >;
  videoGeneration: Record<
    string,
    { apiModel: string; durations: number[]; resolutions: string[]; aspectRatios: string[]; fps: number }
  >;
  contentGeneration: Record<string, { model: string; strengths: string[] }>;
}

const ASPECT_RATIOS = ["1:1", "3:4", "4:3", "9:16", "16:9"];

export function getModelCatalog(): ModelCatalog {
  return {
    imageGeneration: {
      "imagen-3.0": {
        apiModel: IMAGE_MODEL_IDS["imagen-3.0"],
        resolutions: ["1K", "2K"],
        aspectRatios: ASPECT_RATIOS,
        maxImages: 4,
      },
      "imagen-4.0": {
        apiModel: IMAGE_MODEL_IDS["imagen-4.0"],
        resolutions: ["1K", "2K"],
        aspectRatios: ASPECT_RATIOS,
        maxImages: 4,
      },
    },
    videoGeneration: {
      "veo-3.0": {
        apiModel: "veo-3.0-generate-001",
        durations: [4, 6, 8],
        resolutions: ["720p", "1080p"],
        aspectRatios: ["16:9", "9:16"],
        fps: 24,
      },
    },
    contentGeneration: {
      [CONTENT_MODEL]: {
        model: CONTENT_MODEL,
        strengths: ["fast generation", "cost-effective", "structured JSON output"],
      },
    },
  };
}
