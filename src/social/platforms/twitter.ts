/**
 * Twitter/X platform adapter.
 *
 * Specs:
 * - Image: 1600x900, 16:9
 * - Text: 280 chars including hashtags, 2 hashtags max, written inline
 */

import type { PlatformAdapter, PlatformSpec } from "../types";

const TWITTER_POST_SPEC: PlatformSpec = {
  id: "twitter_post",
  displayName: "Twitter/X Post",
  maxCharacters: 280,
  maxHashtags: 2,
  maxHashtagLength: 20,
  imageWidth: 1600,
  imageHeight: 900,
  captionStyle: "concise-inline",
};

export function createTwitterPostAdapter(): PlatformAdapter {
  return { spec: TWITTER_POST_SPEC };
}
