import sharp from "sharp";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type {
  CampaignMode,
  CampaignResult,
  ContentPiece,
  ImageArtifact,
  ImageModel,
  PlatformResult,
} from "../src/contracts";
import { formatHashtags } from "../src/social/captionWriter";
import { lookupPlatform } from "../src/social/registry";
import { validateContent } from "../src/social/validator";
import { estimateCost } from "../src/pricing/costEstimator";
import type {
  ImageGenerationRequest,
  ImageGenerationService,
  ImageServiceResult,
  TextGenerationRequest,
  TextGenerationResponse,
  TextGenerationService,
} from "../src/generation/services";

/** A text-model reply in the JSON shape the content generator asks for. */
export function replyJson(content: string, hashtags: string[] = [], cta: string | null = null): string {
  return JSON.stringify({ content, hashtags, cta });
}

/** True when a content prompt targets the given platform display name. */
export function isContentPromptFor(request: TextGenerationRequest, displayName: string): boolean {
  return request.prompt.startsWith(`Write a ${displayName} post`);
}

/** True when an image prompt targets the given platform display name. */
export function isImagePromptFor(request: ImageGenerationRequest, displayName: string): boolean {
  return request.prompt.startsWith(`Marketing visual for ${displayName} (`);
}

/** Never settles on its own; rejects once the signal aborts. */
export function hangUntilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("request aborted")), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type TextBehavior = (
  request: TextGenerationRequest,
  call: number
) => TextGenerationResponse | Promise<TextGenerationResponse>;

/**
 * In-process stand-in for the text model. Records every request and how
 * many calls were in flight at once.
 */
export class FakeTextService implements TextGenerationService {
  readonly model = "fake-text-model";
  readonly requests: TextGenerationRequest[] = [];
  maxInFlight = 0;
  pingError: Error | null = null;
  private inFlight = 0;

  constructor(private readonly behavior: TextBehavior) {}

  async generateText(request: TextGenerationRequest): Promise<TextGenerationResponse> {
    this.requests.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.behavior(request, this.requests.length);
    } finally {
      this.inFlight--;
    }
  }

  async ping(): Promise<void> {
    if (this.pingError) throw this.pingError;
  }
}

export type ImageBehavior = (
  request: ImageGenerationRequest,
  call: number
) => ImageServiceResult | Promise<ImageServiceResult>;

export class FakeImageService implements ImageGenerationService {
  readonly requests: ImageGenerationRequest[] = [];
  pingError: Error | null = null;

  constructor(
    private readonly behavior: ImageBehavior,
    readonly model: ImageModel = "imagen-3.0"
  ) {}

  async generateImage(request: ImageGenerationRequest): Promise<ImageServiceResult> {
    this.requests.push(request);
    return this.behavior(request, this.requests.length);
  }

  async ping(): Promise<void> {
    if (this.pingError) throw this.pingError;
  }
}

/** Synthetic solid-colour PNG. */
export async function solidPng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 34, g: 139, b: 34 },
    },
  })
    .png()
    .toBuffer();
}

/** Image fake that returns the same synthetic PNG for every request. */
export async function okImageService(model: ImageModel = "imagen-3.0"): Promise<FakeImageService> {
  const data = await solidPng(64, 64);
  return new FakeImageService(() => ({ status: "ok", data, mimeType: "image/png" }), model);
}

/** Temporary directory; caller is responsible for cleanup. */
export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "campaign-test-"));
}

/** A validated content piece for a registry platform, built without a model. */
export function makePiece(
  platform: string,
  content: string,
  hashtags: string[] = [],
  cta: string | null = null
): ContentPiece {
  return {
    platform,
    content,
    hashtags,
    hashtagString: formatHashtags(hashtags),
    cta,
    attempts: 1,
    ...validateContent(content, hashtags, lookupPlatform(platform)),
  };
}

export function makeImage(platform: string, data: Buffer): ImageArtifact {
  const spec = lookupPlatform(platform);
  return {
    platform,
    dimensions: { width: spec.imageWidth, height: spec.imageHeight },
    tier: "2K",
    mimeType: "image/png",
    encodedData: data.toString("base64"),
    costUsd: 0.04,
    success: true,
  };
}

export function makeCampaign(results: PlatformResult[], mode: CampaignMode = "full"): CampaignResult {
  const readyCount = results.filter((r) => r.readyForPosting).length;
  return {
    mode,
    platformsRequested: results.length,
    platformsGenerated: results.filter((r) => !r.error).length,
    readyCount,
    allReady: readyCount === results.length,
    estimatedCostUsd: 0,
    cost: estimateCost({}),
    results,
    generatedAt: "2026-01-01T00:00:00.000Z",
  };
}
