import type { ValidationResult } from "../contracts";
import type { PlatformSpec } from "./types";
import { composePost, countCharacters, extractInlineHashtags } from "./captionWriter";

/**
 * Check generated content against a platform's limits.
 *
 * Pure and deterministic. Over-limit content is reported through the
 * within*Limit flags, never thrown and never truncated; callers decide
 * whether to accept or regenerate.
 */
export function validateContent(
  content: string,
  hashtags: readonly string[],
  spec: PlatformSpec
): ValidationResult {
  const characterCount = countCharacters(composePost(content, hashtags));
  // Tags typed into the content are published too, so they count.
  const published = [...hashtags, ...extractInlineHashtags(content)];
  const hashtagCount = new Set(published.map((tag) => tag.toLowerCase())).size;

  const withinCharacterLimit = characterCount <= spec.maxCharacters;
  const withinHashtagLimit = hashtagCount <= spec.maxHashtags;

  return {
    characterCount,
    characterLimit: spec.maxCharacters,
    withinCharacterLimit,
    hashtagCount,
    hashtagLimit: spec.maxHashtags,
    withinHashtagLimit,
    allValid: withinCharacterLimit && withinHashtagLimit,
  };
}
