/**
 * Owned-media placements (email and website). No text limit, no hashtags.
 */

import { NO_TEXT_LIMIT } from "../types";
import type { PlatformAdapter, PlatformSpec } from "../types";

const EMAIL_HEADER_SPEC: PlatformSpec = {
  id: "email_header",
  displayName: "Email Header",
  maxCharacters: NO_TEXT_LIMIT,
  maxHashtags: 0,
  maxHashtagLength: 30,
  imageWidth: 600,
  imageHeight: 200,
  captionStyle: "minimal",
};

const WEBSITE_HERO_SPEC: PlatformSpec = {
  id: "website_hero",
  displayName: "Website Hero",
  maxCharacters: NO_TEXT_LIMIT,
  maxHashtags: 0,
  maxHashtagLength: 30,
  imageWidth: 1920,
  imageHeight: 1080,
  captionStyle: "minimal",
};

const BLOG_FEATURED_SPEC: PlatformSpec = {
  id: "blog_featured",
  displayName: "Blog Featured Image",
  maxCharacters: NO_TEXT_LIMIT,
  maxHashtags: 0,
  maxHashtagLength: 30,
  imageWidth: 1200,
  imageHeight: 630,
  captionStyle: "professional-detailed",
};

export function createEmailHeaderAdapter(): PlatformAdapter {
  return { spec: EMAIL_HEADER_SPEC };
}

export function createWebsiteHeroAdapter(): PlatformAdapter {
  return { spec: WEBSITE_HERO_SPEC };
}

export function createBlogFeaturedAdapter(): PlatformAdapter {
  return { spec: BLOG_FEATURED_SPEC };
}
