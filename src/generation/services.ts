/**
 * Collaborator interfaces for the external generation services.
 *
 * The pipeline only talks to these; src/generation/gemini.ts provides the
 * production implementations and tests substitute in-process fakes.
 */

import type { ImageModel, ImageTier } from "../contracts";

export type AspectRatio = "1:1" | "3:4" | "4:3" | "9:16" | "16:9";

export interface TextGenerationRequest {
  prompt: string;
  systemInstruction: string;
  signal: AbortSignal;
}

export interface TextGenerationResponse {
  text: string;
}

export interface TextGenerationService {
  readonly model: string;
  /** Throws on transport failure; the caller classifies the error. */
  generateText(request: TextGenerationRequest): Promise<TextGenerationResponse>;
  /** Resolves when the service is reachable with the configured credentials. */
  ping(signal: AbortSignal): Promise<void>;
}

export interface ImageGenerationRequest {
  prompt: string;
  aspectRatio: AspectRatio;
  /** Output size to ask for; the artifact is billed at this tier. */
  imageSize: ImageTier;
  signal: AbortSignal;
}

/** A content-safety rejection is a result, not an exception. */
export type ImageServiceResult =
  | { status: "ok"; data: Buffer; mimeType: string }
  | { status: "filtered"; reason: string };

export interface ImageGenerationService {
  readonly model: ImageModel;
  generateImage(request: ImageGenerationRequest): Promise<ImageServiceResult>;
  ping(signal: AbortSignal): Promise<void>;
}
