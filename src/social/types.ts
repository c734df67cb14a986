/**
 * Social platform layer types.
 *
 * PlatformAdapter is the pluggable interface; each network module exports
 * one adapter per placement. Adding a placement means adding an adapter and
 * registering it.
 */

import type { CaptionStyle, PlatformId } from "../contracts";

/** Marker for placements with no text limit (email headers, web banners). */
export const NO_TEXT_LIMIT = Number.POSITIVE_INFINITY;

/** Full platform specification. */
export interface PlatformSpec {
  readonly id: PlatformId;
  readonly displayName: string;
  /** Positive integer, or NO_TEXT_LIMIT. */
  readonly maxCharacters: number;
  readonly maxHashtags: number;
  readonly maxHashtagLength: number;
  readonly imageWidth: number;
  readonly imageHeight: number;
  readonly captionStyle: CaptionStyle;
}

/** Adapter interface, one per platform placement. */
export interface PlatformAdapter {
  readonly spec: PlatformSpec;
}
