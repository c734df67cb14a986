/**
 * Platform-dimensioned image generation.
 *
 * Requests one image at the closest supported aspect ratio, then fits the
 * returned bytes to the platform's exact size with sharp (cover, centre).
 * Safety rejections, timeouts and transport failures all come back as a
 * failed ImageArtifact with a reason; this module never throws.
 */

import sharp from "sharp";
import type { ErrorKind, ImageArtifact, ImageModel, ImageStyle, ImageTier } from "../contracts";
import type { PlatformSpec } from "../social/types";
import { imagePriceUsd, imageTierFor } from "../pricing/costEstimator";
import { AbortedError, TimeoutError, errorMessage, withTimeout } from "../lib/timeout";
import type { AspectRatio, ImageGenerationService, ImageServiceResult } from "./services";
import { buildImagePrompt } from "./prompts";

export const DEFAULT_IMAGE_TIMEOUT_MS = 10000;
export const DEFAULT_IMAGE_STYLE: ImageStyle = "photorealistic";

const SUPPORTED_RATIOS: ReadonlyArray<{ ratio: AspectRatio; value: number }> = [
  { ratio: "1:1", value: 1 },
  { ratio: "3:4", value: 3 / 4 },
  { ratio: "4:3", value: 4 / 3 },
  { ratio: "9:16", value: 9 / 16 },
  { ratio: "16:9", value: 16 / 9 },
];

export interface ImageRequest {
  brief: string;
  spec: PlatformSpec;
  imageStyle?: ImageStyle;
}

export interface ImageGeneratorDeps {
  image: ImageGenerationService;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Supported aspect ratio closest to width/height (compared in log space). */
export function closestAspectRatio(width: number, height: number): AspectRatio {
  const target = Math.log(width / height);
  let best = SUPPORTED_RATIOS[0];
  for (const candidate of SUPPORTED_RATIOS) {
    if (Math.abs(Math.log(candidate.value) - target) < Math.abs(Math.log(best.value) - target)) {
      best = candidate;
    }
  }
  return best.ratio;
}

function failedArtifact(
  spec: PlatformSpec,
  tier: ImageTier,
  errorKind: ErrorKind,
  failureReason: string
): ImageArtifact {
  console.warn(`[image:${spec.id}] ${errorKind}: ${failureReason}`);
  return {
    platform: spec.id,
    dimensions: { width: spec.imageWidth, height: spec.imageHeight },
    tier,
    mimeType: "image/png",
    encodedData: "",
    costUsd: 0,
    success: false,
    failureReason,
    errorKind,
  };
}

/** Resize/crop to exactly the platform's dimensions and encode as PNG. */
export async function fitToPlatform(
  data: Buffer,
  spec: PlatformSpec
): Promise<{ buffer: Buffer; width: number; height: number }> {
  const { data: buffer, info } = await sharp(data)
    .resize(spec.imageWidth, spec.imageHeight, { fit: "cover", position: "centre" })
    .png()
    .toBuffer({ resolveWithObject: true });
  return { buffer, width: info.width, height: info.height };
}

export async function generateImage(
  request: ImageRequest,
  deps: ImageGeneratorDeps
): Promise<ImageArtifact> {
  const { spec } = request;
  const model: ImageModel = deps.image.model;
  const tier = imageTierFor(spec.imageWidth, spec.imageHeight);
  const aspectRatio = closestAspectRatio(spec.imageWidth, spec.imageHeight);
  const timeoutMs = deps.timeoutMs ?? DEFAULT_IMAGE_TIMEOUT_MS;
  const prompt = buildImagePrompt(request.brief, spec, request.imageStyle ?? DEFAULT_IMAGE_STYLE);

  let result: ImageServiceResult;
  try {
    result = await withTimeout(
      (signal) => deps.image.generateImage({ prompt, aspectRatio, imageSize: tier, signal }),
      timeoutMs,
      deps.signal
    );
  } catch (err) {
    if (err instanceof TimeoutError) {
      return failedArtifact(spec, tier, "ImageGenerationTimeout", `Image generation timed out after ${timeoutMs}ms`);
    }
    if (err instanceof AbortedError) {
      return failedArtifact(spec, tier, "Cancelled", err.message);
    }
    return failedArtifact(spec, tier, "ExternalServiceError", `Image generation failed: ${errorMessage(err)}`);
  }

  if (result.status === "filtered") {
    return failedArtifact(spec, tier, "ImageSafetyRejected", `safety filter triggered: ${result.reason}`);
  }

  let fitted: { buffer: Buffer; width: number; height: number };
  try {
    fitted = await fitToPlatform(result.data, spec);
  } catch (err) {
    return failedArtifact(spec, tier, "ExternalServiceError", `Image payload could not be decoded: ${errorMessage(err)}`);
  }

  return {
    platform: spec.id,
    dimensions: { width: fitted.width, height: fitted.height },
    tier,
    mimeType: "image/png",
    encodedData: fitted.buffer.toString("base64"),
    costUsd: imagePriceUsd(tier, model),
    success: true,
  };
}
