/**
 * YouTube thumbnail adapter. The text is the video description.
 *
 * Specs:
 * - Thumbnail: 1280x720, 16:9
 * - Description: 5,000 chars; YouTube ignores all tags past 15
 */

import type { PlatformAdapter, PlatformSpec } from "../types";

const YOUTUBE_THUMBNAIL_SPEC: PlatformSpec = {
  id: "youtube_thumbnail",
  displayName: "YouTube Thumbnail",
  maxCharacters: 5000,
  maxHashtags: 15,
  maxHashtagLength: 30,
  imageWidth: 1280,
  imageHeight: 720,
  captionStyle: "professional-detailed",
};

export function createYoutubeThumbnailAdapter(): PlatformAdapter {
  return { spec: YOUTUBE_THUMBNAIL_SPEC };
}
