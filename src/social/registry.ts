/**
 * Platform registry. Maps platform ids to their specs.
 *
 * The table is built once when this module loads and frozen; every
 * component receives specs from here and never mutates them.
 *
 * Adding a new platform:
 * 1. Create or extend src/social/platforms/<network>.ts with an adapter
 * 2. Register it here
 */

import type { Outcome, PlatformId } from "../contracts";
import type { PlatformAdapter, PlatformSpec } from "./types";
import {
  createInstagramFeedAdapter,
  createInstagramReelAdapter,
  createInstagramStoryAdapter,
} from "./platforms/instagram";
import { createFacebookPostAdapter } from "./platforms/facebook";
import { createTwitterPostAdapter } from "./platforms/twitter";
import { createLinkedinPostAdapter } from "./platforms/linkedin";
import { createPinterestPinAdapter } from "./platforms/pinterest";
import { createYoutubeThumbnailAdapter } from "./platforms/youtube";
import { createTiktokAdapter } from "./platforms/tiktok";
import {
  createBlogFeaturedAdapter,
  createEmailHeaderAdapter,
  createWebsiteHeroAdapter,
} from "./platforms/web";

type AdapterFactory = () => PlatformAdapter;

const FACTORIES: readonly AdapterFactory[] = [
  createInstagramFeedAdapter,
  createInstagramStoryAdapter,
  createInstagramReelAdapter,
  createFacebookPostAdapter,
  createTwitterPostAdapter,
  createLinkedinPostAdapter,
  createPinterestPinAdapter,
  createYoutubeThumbnailAdapter,
  createTiktokAdapter,
  createEmailHeaderAdapter,
  createWebsiteHeroAdapter,
  createBlogFeaturedAdapter,
];

function buildRegistry(): ReadonlyMap<PlatformId, PlatformSpec> {
  const registry = new Map<PlatformId, PlatformSpec>();
  for (const factory of FACTORIES) {
    const spec = Object.freeze({ ...factory().spec });
    if (registry.has(spec.id)) {
      throw new Error(`Duplicate platform registration: "${spec.id}"`);
    }
    registry.set(spec.id, spec);
  }
  return registry;
}

const REGISTRY = buildRegistry();

export class UnknownPlatformError extends Error {
  constructor(
    readonly platform: string,
    readonly available: readonly PlatformId[]
  ) {
    super(`Unknown platform "${platform}". Available: ${available.join(", ")}`);
    this.name = "UnknownPlatformError";
  }
}

export function lookupPlatform(platform: PlatformId): PlatformSpec {
  const spec = REGISTRY.get(platform);
  if (!spec) {
    throw new UnknownPlatformError(platform, getAvailablePlatforms());
  }
  return spec;
}

/** Non-throwing lookup for callers that report unknown ids per slot. */
export function findPlatform(platform: PlatformId): Outcome<PlatformSpec> {
  const spec = REGISTRY.get(platform);
  if (!spec) {
    return {
      ok: false,
      error: {
        kind: "UnknownPlatform",
        message: new UnknownPlatformError(platform, getAvailablePlatforms()).message,
      },
    };
  }
  return { ok: true, value: spec };
}

export function isKnownPlatform(platform: string): boolean {
  return REGISTRY.has(platform);
}

export function getAvailablePlatforms(): PlatformId[] {
  return [...REGISTRY.keys()];
}

export function getAllPlatformSpecs(): PlatformSpec[] {
  return [...REGISTRY.values()];
}
