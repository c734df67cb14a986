/**
 * Shared contract types for the campaign pipeline.
 *
 * All pipeline modules import shared types from here.
 * No pipeline module should import types from another pipeline module.
 */

// --- Platforms ---

export type PlatformId = string;

export type CaptionStyle =
  | "short-emoji"
  | "professional-detailed"
  | "concise-inline"
  | "minimal";

// --- Campaign Input ---

export const CONTENT_STYLES = [
  "professional",
  "casual",
  "humorous",
  "educational",
  "promotional",
] as const;
export type ContentStyle = (typeof CONTENT_STYLES)[number];

export const HASHTAG_STRATEGIES = [
  "industry-specific",
  "trending",
  "branded",
  "niche",
] as const;
export type HashtagStrategy = (typeof HASHTAG_STRATEGIES)[number];

export const IMAGE_STYLES = ["photorealistic", "illustrated", "3d", "modern"] as const;
export type ImageStyle = (typeof IMAGE_STYLES)[number];

export interface CampaignBrief {
  readonly brief: string;
  readonly platforms: readonly PlatformId[];
  readonly style: ContentStyle;
  readonly hashtagStrategy: HashtagStrategy;
  readonly targetAudience?: string;
  readonly imageStyle?: ImageStyle;
  readonly includeCta: boolean;
}

// --- Errors ---

export type ErrorKind =
  | "UnknownPlatform"
  | "TextGenerationTimeout"
  | "TextGenerationRejected"
  | "ExternalServiceError"
  | "ImageSafetyRejected"
  | "ImageGenerationTimeout"
  | "Cancelled";

export interface PlatformError {
  readonly kind: ErrorKind;
  readonly message: string;
}

/** Result variant passed across platform boundaries instead of throwing. */
export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PlatformError };

// --- Validation ---

export interface ValidationResult {
  readonly characterCount: number;
  /** Infinity when the platform has no text limit. */
  readonly characterLimit: number;
  readonly withinCharacterLimit: boolean;
  readonly hashtagCount: number;
  readonly hashtagLimit: number;
  readonly withinHashtagLimit: boolean;
  readonly allValid: boolean;
}

// --- Generated Artifacts ---

export interface ContentPiece extends ValidationResult {
  readonly platform: PlatformId;
  readonly content: string;
  /** Distinct tags, stored without the leading "#". */
  readonly hashtags: readonly string[];
  readonly hashtagString: string;
  readonly cta: string | null;
  /** Number of text-generation calls spent on this piece. */
  readonly attempts: number;
}

export type ImageTier = "1K" | "2K";

export interface ImageArtifact {
  readonly platform: PlatformId;
  readonly dimensions: { readonly width: number; readonly height: number };
  readonly tier: ImageTier;
  readonly mimeType: string;
  /** Base64 payload; empty when generation failed. */
  readonly encodedData: string;
  readonly costUsd: number;
  readonly success: boolean;
  readonly failureReason?: string;
  readonly errorKind?: ErrorKind;
}

// --- Results ---

export type CampaignMode = "content-only" | "full";

export interface PlatformResult {
  /** Position of this platform in the request. */
  readonly index: number;
  readonly platform: PlatformId;
  readonly content?: ContentPiece;
  readonly image?: ImageArtifact;
  readonly imageRequested: boolean;
  readonly readyForPosting: boolean;
  readonly error?: PlatformError;
}

export interface CampaignResult {
  readonly mode: CampaignMode;
  readonly platformsRequested: number;
  readonly platformsGenerated: number;
  readonly readyCount: number;
  readonly allReady: boolean;
  readonly estimatedCostUsd: number;
  readonly cost: CostBreakdown;
  readonly results: readonly PlatformResult[];
  readonly generatedAt: string;
}

// --- Cost ---

export type ImageModel = "imagen-3.0" | "imagen-4.0";
export type VideoModel = "veo2" | "veo3" | "veo3_fast";

export interface ResourceCounts {
  images1k?: number;
  images2k?: number;
  videoSeconds?: number;
  contentPieces?: number;
}

export interface CostBreakdown {
  readonly priceTableVersion: string;
  readonly images: {
    readonly model: ImageModel;
    readonly res1k: { readonly count: number; readonly unitUsd: number; readonly costUsd: number };
    readonly res2k: { readonly count: number; readonly unitUsd: number; readonly costUsd: number };
    readonly totalUsd: number;
  };
  readonly video: {
    readonly model: VideoModel;
    readonly seconds: number;
    readonly unitUsd: number;
    readonly costUsd: number;
  };
  readonly content: {
    readonly pieces: number;
    readonly avgTokens: number;
    readonly model: string;
    readonly costUsd: number;
  };
  readonly totalUsd: number;
}
