/**
 * Instagram placement adapters.
 *
 * Specs:
 * - Caption: 2,200 chars on every placement
 * - Hashtags: 30 max on feed and reels; stories keep it to 10 stickers/tags
 * - Feed: 1080x1080 square; story and reel: 1080x1920 vertical
 */

import type { PlatformAdapter, PlatformSpec } from "../types";

const INSTAGRAM_FEED_SPEC: PlatformSpec = {
  id: "instagram_feed",
  displayName: "Instagram Feed",
  maxCharacters: 2200,
  maxHashtags: 30,
  maxHashtagLength: 30,
  imageWidth: 1080,
  imageHeight: 1080,
  captionStyle: "short-emoji",
};

const INSTAGRAM_STORY_SPEC: PlatformSpec = {
  id: "instagram_story",
  displayName: "Instagram Story",
  maxCharacters: 2200,
  maxHashtags: 10,
  maxHashtagLength: 30,
  imageWidth: 1080,
  imageHeight: 1920,
  captionStyle: "minimal",
};

const INSTAGRAM_REEL_SPEC: PlatformSpec = {
  id: "instagram_reel",
  displayName: "Instagram Reel",
  maxCharacters: 2200,
  maxHashtags: 30,
  maxHashtagLength: 30,
  imageWidth: 1080,
  imageHeight: 1920,
  captionStyle: "short-emoji",
};

export function createInstagramFeedAdapter(): PlatformAdapter {
  return { spec: INSTAGRAM_FEED_SPEC };
}

export function createInstagramStoryAdapter(): PlatformAdapter {
  return { spec: INSTAGRAM_STORY_SPEC };
}

export function createInstagramReelAdapter(): PlatformAdapter {
  return { spec: INSTAGRAM_REEL_SPEC };
}
