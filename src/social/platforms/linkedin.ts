/**
 * LinkedIn platform adapter.
 *
 * Specs:
 * - Image: 1200x627
 * - Post: 3,000 chars, 5 hashtags max
 */

import type { PlatformAdapter, PlatformSpec } from "../types";

const LINKEDIN_POST_SPEC: PlatformSpec = {
  id: "linkedin_post",
  displayName: "LinkedIn Post",
  maxCharacters: 3000,
  maxHashtags: 5,
  maxHashtagLength: 30,
  imageWidth: 1200,
  imageHeight: 627,
  captionStyle: "professional-detailed",
};

export function createLinkedinPostAdapter(): PlatformAdapter {
  return { spec: LINKEDIN_POST_SPEC };
}
