/**
 * Wire format for campaign results and cost estimates (snake_case JSON).
 */

import type {
  CampaignResult,
  ContentPiece,
  CostBreakdown,
  ImageArtifact,
  PlatformResult,
} from "../contracts";
import { composePost } from "../social/captionWriter";
import type { PlatformSpec } from "../social/types";

export interface SerializeOptions {
  /** Embed image bytes as base64 (large). Off by default. */
  includeBase64?: boolean;
  /** Relative image path per platform, set when images were written to disk. */
  imagePaths?: ReadonlyMap<number, string>;
}

export interface SerializedContent {
  content: string;
  hashtags: string[];
  hashtag_string: string;
  full_text: string;
  character_count: number;
  character_limit: number | null;
  within_character_limit: boolean;
  hashtag_count: number;
  hashtag_limit: number;
  within_hashtag_limit: boolean;
  all_valid: boolean;
  cta: string | null;
  attempts: number;
}

export interface SerializedImage {
  success: boolean;
  dimensions: { width: number; height: number };
  tier: string;
  mime_type: string;
  cost_usd: number;
  base64_data?: string;
  failure_reason?: string;
  error_kind?: string;
  path?: string;
}

export interface SerializedPlatformResult {
  platform: string;
  ready_for_posting: boolean;
  image_requested: boolean;
  error: { kind: string; message: string } | null;
  content: SerializedContent | null;
  image: SerializedImage | null;
}

export interface SerializedCostBreakdown {
  success: true;
  price_table_version: string;
  breakdown: {
    images: {
      "1k_resolution": { count: number; cost_per_image: number; cost_usd: number };
      "2k_resolution": { count: number; cost_per_image: number; cost_usd: number };
      total_cost_usd: number;
      model: string;
    };
    video: { seconds: number; model: string; cost_per_second: number; cost_usd: number };
    content: { pieces: number; avg_tokens: number; model: string; cost_usd: number };
  };
  total_cost_usd: number;
}

export interface SerializedCampaign {
  success: true;
  mode: string;
  platforms_requested: number;
  platforms_generated: number;
  ready_count: number;
  all_ready: boolean;
  estimated_cost_usd: number;
  cost_breakdown: SerializedCostBreakdown;
  generated_at: string;
  results: SerializedPlatformResult[];
}

export interface SerializedPlatformSpec {
  id: string;
  display_name: string;
  max_characters: number | null;
  max_hashtags: number;
  max_hashtag_length: number;
  image: { width: number; height: number };
  caption_style: string;
}

export function serializePlatformSpec(spec: PlatformSpec): SerializedPlatformSpec {
  return {
    id: spec.id,
    display_name: spec.displayName,
    max_characters: Number.isFinite(spec.maxCharacters) ? spec.maxCharacters : null,
    max_hashtags: spec.maxHashtags,
    max_hashtag_length: spec.maxHashtagLength,
    image: { width: spec.imageWidth, height: spec.imageHeight },
    caption_style: spec.captionStyle,
  };
}

function serializeContent(piece: ContentPiece): SerializedContent {
  return {
    content: piece.content,
    hashtags: [...piece.hashtags],
    hashtag_string: piece.hashtagString,
    full_text: composePost(piece.content, piece.hashtags),
    character_count: piece.characterCount,
    // JSON has no Infinity; unlimited targets report null.
    character_limit: Number.isFinite(piece.characterLimit) ? piece.characterLimit : null,
    within_character_limit: piece.withinCharacterLimit,
    hashtag_count: piece.hashtagCount,
    hashtag_limit: piece.hashtagLimit,
    within_hashtag_limit: piece.withinHashtagLimit,
    all_valid: piece.allValid,
    cta: piece.cta,
    attempts: piece.attempts,
  };
}

function serializeImage(image: ImageArtifact, includeBase64: boolean, path?: string): SerializedImage {
  const out: SerializedImage = {
    success: image.success,
    dimensions: { width: image.dimensions.width, height: image.dimensions.height },
    tier: image.tier,
    mime_type: image.mimeType,
    cost_usd: image.costUsd,
  };
  if (image.success) {
    if (includeBase64) out.base64_data = image.encodedData;
    if (path) out.path = path;
  } else {
    out.failure_reason = image.failureReason;
    out.error_kind = image.errorKind;
  }
  return out;
}

export function serializePlatformResult(
  result: PlatformResult,
  opts: SerializeOptions = {}
): SerializedPlatformResult {
  return {
    platform: result.platform,
    ready_for_posting: result.readyForPosting,
    image_requested: result.imageRequested,
    error: result.error ? { kind: result.error.kind, message: result.error.message } : null,
    content: result.content ? serializeContent(result.content) : null,
    image: result.image
      ? serializeImage(result.image, opts.includeBase64 ?? false, opts.imagePaths?.get(result.index))
      : null,
  };
}

export function serializeCostBreakdown(cost: CostBreakdown): SerializedCostBreakdown {
  return {
    success: true,
    price_table_version: cost.priceTableVersion,
    breakdown: {
      images: {
        "1k_resolution": {
          count: cost.images.res1k.count,
          cost_per_image: cost.images.res1k.unitUsd,
          cost_usd: cost.images.res1k.costUsd,
        },
        "2k_resolution": {
          count: cost.images.res2k.count,
          cost_per_image: cost.images.res2k.unitUsd,
          cost_usd: cost.images.res2k.costUsd,
        },
        total_cost_usd: cost.images.totalUsd,
        model: cost.images.model,
      },
      video: {
        seconds: cost.video.seconds,
        model: cost.video.model,
        cost_per_second: cost.video.unitUsd,
        cost_usd: cost.video.costUsd,
      },
      content: {
        pieces: cost.content.pieces,
        avg_tokens: cost.content.avgTokens,
        model: cost.content.model,
        cost_usd: cost.content.costUsd,
      },
    },
    total_cost_usd: cost.totalUsd,
  };
}

export function serializeCampaign(result: CampaignResult, opts: SerializeOptions = {}): SerializedCampaign {
  return {
    success: true,
    mode: result.mode,
    platforms_requested: result.platformsRequested,
    platforms_generated: result.platformsGenerated,
    ready_count: result.readyCount,
    all_ready: result.allReady,
    estimated_cost_usd: result.estimatedCostUsd,
    cost_breakdown: serializeCostBreakdown(result.cost),
    generated_at: result.generatedAt,
    results: result.results.map((r) => serializePlatformResult(r, opts)),
  };
}
