/**
 * Cost estimation over the fixed price table.
 *
 * Money is summed in integer micro-dollars and only converted back to USD
 * for reporting, so totals never drift or truncate across many items.
 */

import type {
  ContentPiece,
  CostBreakdown,
  ImageArtifact,
  ImageModel,
  ImageTier,
  ResourceCounts,
  VideoModel,
} from "../contracts";
import {
  AVG_TOKENS_PER_CONTENT_PIECE,
  CONTENT_MODEL,
  IMAGE_PRICES,
  PRICE_TABLE_VERSION,
  TEXT_PRICES,
  VIDEO_PRICES,
} from "./priceTable";

const MICROS_PER_USD = 1_000_000;

/** Images whose longest edge is above this are requested at 2K. */
const TIER_1K_MAX_EDGE = 1024;

export class CostCalculationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CostCalculationError";
  }
}

function toMicros(usd: number): number {
  return Math.round(usd * MICROS_PER_USD);
}

/** Micro-dollars to USD rounded to 4 decimals. */
function microsToUsd4(micros: number): number {
  return Math.round(micros / 100) / 10_000;
}

/** Micro-dollars to USD at full (6 decimal) precision. */
function microsToUsd6(micros: number): number {
  return micros / MICROS_PER_USD;
}

function assertCount(value: number, label: string): number {
  if (!Number.isFinite(value) || !Number.isInteger(value) || value < 0) {
    throw new CostCalculationError(
      `${label} must be a non-negative integer, got ${value}`
    );
  }
  return value;
}

/** Sums past 2^53 micro-dollars can no longer be added exactly. */
function assertSafeMicros(micros: number, label: string): number {
  if (!Number.isSafeInteger(micros)) {
    throw new CostCalculationError(`${label} is too large to price exactly`);
  }
  return micros;
}

function assertSeconds(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new CostCalculationError(
      `videoSeconds must be a non-negative number, got ${value}`
    );
  }
  return value;
}

export function imageTierFor(width: number, height: number): ImageTier {
  return Math.max(width, height) > TIER_1K_MAX_EDGE ? "2K" : "1K";
}

export function imagePriceUsd(tier: ImageTier, model: ImageModel): number {
  return IMAGE_PRICES[model][tier];
}

/** Estimated cost of a single content generation request. */
export function contentPieceCostUsd(): number {
  return microsToUsd6(contentPieceMicros());
}

function contentPieceMicros(): number {
  return toMicros((AVG_TOKENS_PER_CONTENT_PIECE / 1000) * TEXT_PRICES.gemini_flash);
}

/**
 * Itemised USD estimate for a set of resource counts.
 * Throws CostCalculationError on negative or non-integer counts, or on
 * counts too large to sum exactly.
 */
export function estimateCost(
  counts: ResourceCounts,
  imageModel: ImageModel = "imagen-3.0",
  videoModel: VideoModel = "veo3"
): CostBreakdown {
  const images1k = assertCount(counts.images1k ?? 0, "images1k");
  const images2k = assertCount(counts.images2k ?? 0, "images2k");
  const contentPieces = assertCount(counts.contentPieces ?? 0, "contentPieces");
  const videoSeconds = assertSeconds(counts.videoSeconds ?? 0);

  const unit1k = imagePriceUsd("1K", imageModel);
  const unit2k = imagePriceUsd("2K", imageModel);
  const unitVideo = VIDEO_PRICES[videoModel];

  const image1kMicros = assertSafeMicros(images1k * toMicros(unit1k), "images1k");
  const image2kMicros = assertSafeMicros(images2k * toMicros(unit2k), "images2k");
  const imageMicros = image1kMicros + image2kMicros;
  const videoMicros = assertSafeMicros(toMicros(videoSeconds * unitVideo), "videoSeconds");
  const contentMicros = assertSafeMicros(contentPieces * contentPieceMicros(), "contentPieces");
  const totalMicros = assertSafeMicros(imageMicros + videoMicros + contentMicros, "Total cost");

  return {
    priceTableVersion: PRICE_TABLE_VERSION,
    images: {
      model: imageModel,
      res1k: { count: images1k, unitUsd: unit1k, costUsd: microsToUsd4(image1kMicros) },
      res2k: { count: images2k, unitUsd: unit2k, costUsd: microsToUsd4(image2kMicros) },
      totalUsd: microsToUsd4(imageMicros),
    },
    video: {
      model: videoModel,
      seconds: videoSeconds,
      unitUsd: unitVideo,
      costUsd: microsToUsd4(videoMicros),
    },
    content: {
      pieces: contentPieces,
      avgTokens: AVG_TOKENS_PER_CONTENT_PIECE,
      model: CONTENT_MODEL,
      costUsd: microsToUsd6(contentMicros),
    },
    totalUsd: microsToUsd4(totalMicros),
  };
}

/**
 * Cost of what a campaign actually produced. Every returned content piece
 * is billed (over-limit pieces still cost a request); failed images are not.
 */
export function summarizeCampaignCost(
  pieces: readonly ContentPiece[],
  images: readonly ImageArtifact[],
  imageModel: ImageModel
): CostBreakdown {
  const delivered = images.filter((image) => image.success);
  return estimateCost(
    {
      contentPieces: pieces.reduce((sum, piece) => sum + piece.attempts, 0),
      images1k: delivered.filter((image) => image.tier === "1K").length,
      images2k: delivered.filter((image) => image.tier === "2K").length,
    },
    imageModel
  );
}
