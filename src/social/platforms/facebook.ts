/**
 * Facebook platform adapter.
 *
 * Specs:
 * - Image: 1200x630 (1.91:1 link/feed image)
 * - Caption: 63,206 chars; hashtags work but more than 3 hurts reach
 */

import type { PlatformAdapter, PlatformSpec } from "../types";

const FACEBOOK_POST_SPEC: PlatformSpec = {
  id: "facebook_post",
  displayName: "Facebook Post",
  maxCharacters: 63206,
  maxHashtags: 3,
  maxHashtagLength: 30,
  imageWidth: 1200,
  imageHeight: 630,
  captionStyle: "professional-detailed",
};

export function createFacebookPostAdapter(): PlatformAdapter {
  return { spec: FACEBOOK_POST_SPEC };
}
