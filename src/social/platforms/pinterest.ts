/**
 * Pinterest platform adapter.
 *
 * Specs:
 * - Image: 1000x1500, 2:3 portrait
 * - Description: 500 chars, 20 hashtags max
 */

import type { PlatformAdapter, PlatformSpec } from "../types";

const PINTEREST_PIN_SPEC: PlatformSpec = {
  id: "pinterest_pin",
  displayName: "Pinterest Pin",
  maxCharacters: 500,
  maxHashtags: 20,
  maxHashtagLength: 30,
  imageWidth: 1000,
  imageHeight: 1500,
  captionStyle: "short-emoji",
};

export function createPinterestPinAdapter(): PlatformAdapter {
  return { spec: PINTEREST_PIN_SPEC };
}
