/**
 * Campaign orchestrator: fans one brief out across the requested platforms.
 *
 * Each platform runs content then (optionally) image generation inside its
 * own pipeline; failures stay in that platform's slot and never abort the
 * others. Results are stored by request index, so the output lines up with
 * `brief.platforms` whatever order the pool finishes in.
 */

import type {
  CampaignBrief,
  CampaignMode,
  CampaignResult,
  ContentPiece,
  ImageArtifact,
  PlatformError,
  PlatformId,
  PlatformResult,
} from "../contracts";
import { findPlatform } from "../social/registry";
import type { PlatformSpec } from "../social/types";
import { summarizeCampaignCost } from "../pricing/costEstimator";
import { runWithConcurrency } from "../lib/concurrency";
import { generateContent } from "../generation/contentGenerator";
import { generateImage } from "../generation/imageGenerator";
import type { ImageGenerationService, TextGenerationService } from "../generation/services";

export const DEFAULT_CONCURRENCY = 3;
export const MAX_CONCURRENCY = 10;

export interface OrchestratorDeps {
  text: TextGenerationService;
  image: ImageGenerationService;
  /** Platform pipelines in flight at once (1-10). */
  concurrency?: number;
  textTimeoutMs?: number;
  imageTimeoutMs?: number;
  maxRegenerations?: number;
}

export interface RunOptions {
  /** Aborting cancels in-flight calls; unfinished platforms come back Cancelled. */
  signal?: AbortSignal;
}

export interface CampaignOrchestrator {
  run(brief: CampaignBrief, opts?: RunOptions): Promise<CampaignResult>;
  runContentOnly(brief: CampaignBrief, opts?: RunOptions): Promise<CampaignResult>;
}

const CANCELLED: PlatformError = { kind: "Cancelled", message: "Cancelled by caller" };

function failedSlot(index: number, platform: PlatformId, imageRequested: boolean, error: PlatformError): PlatformResult {
  return { index, platform, imageRequested, readyForPosting: false, error };
}

export function clampConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_CONCURRENCY;
  return Math.max(1, Math.min(MAX_CONCURRENCY, Math.floor(value)));
}

export function createOrchestrator(deps: OrchestratorDeps): CampaignOrchestrator {
  const concurrency = clampConcurrency(deps.concurrency);

  async function runPlatform(
    brief: CampaignBrief,
    platform: PlatformId,
    index: number,
    mode: CampaignMode,
    signal: AbortSignal | undefined
  ): Promise<PlatformResult> {
    const imageRequested = mode === "full";

    const lookup = findPlatform(platform);
    if (!lookup.ok) {
      console.warn(`[campaign] ${lookup.error.message}`);
      return failedSlot(index, platform, imageRequested, lookup.error);
    }
    const spec: PlatformSpec = lookup.value;

    if (signal?.aborted) {
      return failedSlot(index, platform, imageRequested, CANCELLED);
    }

    const content = await generateContent(
      {
        brief: brief.brief,
        spec,
        style: brief.style,
        hashtagStrategy: brief.hashtagStrategy,
        targetAudience: brief.targetAudience,
        includeCta: brief.includeCta,
      },
      {
        text: deps.text,
        timeoutMs: deps.textTimeoutMs,
        maxRegenerations: deps.maxRegenerations,
        signal,
      }
    );
    if (!content.ok) {
      return failedSlot(index, platform, imageRequested, content.error);
    }
    const piece: ContentPiece = content.value;

    if (!imageRequested) {
      return {
        index,
        platform,
        content: piece,
        imageRequested,
        readyForPosting: piece.allValid,
      };
    }

    // A platform whose image step is cut short returns nothing at all.
    if (signal?.aborted) {
      return failedSlot(index, platform, imageRequested, CANCELLED);
    }

    const image: ImageArtifact = await generateImage(
      { brief: brief.brief, spec, imageStyle: brief.imageStyle },
      { image: deps.image, timeoutMs: deps.imageTimeoutMs, signal }
    );
    if (image.errorKind === "Cancelled") {
      return failedSlot(index, platform, imageRequested, CANCELLED);
    }

    return {
      index,
      platform,
      content: piece,
      image,
      imageRequested,
      readyForPosting: piece.allValid && image.success,
    };
  }

  async function execute(brief: CampaignBrief, mode: CampaignMode, opts: RunOptions = {}): Promise<CampaignResult> {
    const { signal } = opts;
    const results: PlatformResult[] = new Array(brief.platforms.length);

    await runWithConcurrency(brief.platforms, concurrency, async (platform, index) => {
      results[index] = await runPlatform(brief, platform, index, mode, signal);
    });

    const pieces: ContentPiece[] = [];
    const images: ImageArtifact[] = [];
    for (const result of results) {
      if (result.content) pieces.push(result.content);
      if (result.image) images.push(result.image);
    }
    const cost = summarizeCampaignCost(pieces, images, deps.image.model);

    const platformsGenerated = results.filter((r) => !r.error).length;
    const readyCount = results.filter((r) => r.readyForPosting).length;

    return {
      mode,
      platformsRequested: brief.platforms.length,
      platformsGenerated,
      readyCount,
      allReady: readyCount === brief.platforms.length,
      estimatedCostUsd: cost.totalUsd,
      cost,
      results,
      generatedAt: new Date().toISOString(),
    };
  }

  return {
    run: (brief, opts) => execute(brief, "full", opts),
    runContentOnly: (brief, opts) => execute(brief, "content-only", opts),
  };
}
