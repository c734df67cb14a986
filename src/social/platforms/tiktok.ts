/**
 * TikTok platform adapter.
 *
 * Specs:
 * - Cover: 1080x1920, 9:16
 * - Caption: 2,200 chars, 5 hashtags max
 */

import type { PlatformAdapter, PlatformSpec } from "../types";

const TIKTOK_SPEC: PlatformSpec = {
  id: "tiktok",
  displayName: "TikTok",
  maxCharacters: 2200,
  maxHashtags: 5,
  maxHashtagLength: 30,
  imageWidth: 1080,
  imageHeight: 1920,
  captionStyle: "short-emoji",
};

export function createTiktokAdapter(): PlatformAdapter {
  return { spec: TIKTOK_SPEC };
}
