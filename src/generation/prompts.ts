/**
 * Prompt builders for the text and image models.
 *
 * Content prompts follow the same pattern throughout:
 *   1. State the brief and the destination
 *   2. State the hard limits (characters, hashtags, tag length)
 *   3. Numbered rules for tone, strategy and audience
 *   4. Exact JSON output format
 */

import type {
  CaptionStyle,
  ContentStyle,
  HashtagStrategy,
  ImageStyle,
} from "../contracts";
import type { PlatformSpec } from "../social/types";

export const CONTENT_SYSTEM_INSTRUCTION =
  "You are a senior social media copywriter. You write platform-native marketing copy " +
  "and always answer with a single JSON object and nothing else.";

const CAPTION_STYLE_GUIDE: Record<CaptionStyle, string> = {
  "short-emoji": "Short punchy lines with a few relevant emojis; line breaks are fine.",
  "professional-detailed": "Professional and substantive: a clear hook, 2-4 short paragraphs, no emoji spam.",
  "concise-inline": "One or two tight sentences.",
  minimal: "A single short line or headline. No filler.",
};

const STYLE_GUIDE: Record<ContentStyle, string> = {
  professional: "Professional, credible and clear.",
  casual: "Casual and conversational, like talking to a friend.",
  humorous: "Light and witty without undermining the message.",
  educational: "Teach something useful; lead with the insight.",
  promotional: "Benefit-driven with a clear reason to act now.",
};

const HASHTAG_STRATEGY_GUIDE: Record<HashtagStrategy, string> = {
  "industry-specific": "Use established industry and category tags.",
  trending: "Favour broad, currently popular tags that fit the topic.",
  branded: "Lead with a campaign or brand tag, then supporting tags.",
  niche: "Use specific community tags with smaller, engaged audiences.",
};

const IMAGE_STYLE_GUIDE: Record<ImageStyle, string> = {
  photorealistic: "Professional photography, natural lighting, sharp focus, high detail",
  illustrated: "Clean modern illustration, flat colours, bold shapes",
  "3d": "Polished 3D render, soft studio lighting, subtle depth of field",
  modern: "Modern minimal aesthetic, generous negative space, contemporary colour palette",
};

function describeCharacterLimit(spec: PlatformSpec): string {
  return Number.isFinite(spec.maxCharacters)
    ? `at most ${spec.maxCharacters} characters INCLUDING the hashtags, their "#" signs and the spaces between them`
    : "no hard character limit, but keep it tight";
}

export interface ContentPromptInput {
  brief: string;
  spec: PlatformSpec;
  style: ContentStyle;
  hashtagStrategy: HashtagStrategy;
  targetAudience?: string;
  includeCta: boolean;
}

/** Details of a previous attempt that broke the platform limits. */
export interface Overflow {
  characterCount: number;
  hashtagCount: number;
}

export function buildContentPrompt(input: ContentPromptInput, overflow?: Overflow): string {
  const { brief, spec, style, hashtagStrategy, targetAudience, includeCta } = input;

  const hashtagRule =
    spec.maxHashtags === 0
      ? "Do not use hashtags. Return an empty hashtags array."
      : `Use at most ${spec.maxHashtags} distinct hashtags, each at most ${spec.maxHashtagLength} characters, without spaces. ${HASHTAG_STRATEGY_GUIDE[hashtagStrategy]}`;

  const ctaRule = includeCta
    ? 'End the content with a clear call to action and repeat that call to action in the "cta" field.'
    : 'Do not add a call to action. Set "cta" to null.';

  const audienceRule = targetAudience
    ? `Write for this audience: ${targetAudience}.`
    : "Write for a broad audience interested in the topic.";

  const retryNote = overflow
    ? `\nYour previous draft was rejected: it had ${overflow.characterCount} characters and ${overflow.hashtagCount} hashtags. Write a SHORTER version that fits the limits below.\n`
    : "";

  return `Write a ${spec.displayName} post for this campaign brief:

"${brief}"
${retryNote}
Limits for ${spec.displayName}:
- The published post (content + " " + hashtags) must be ${describeCharacterLimit(spec)}
- ${hashtagRule}

Rules:
1. Tone: ${STYLE_GUIDE[style]}
2. Format: ${CAPTION_STYLE_GUIDE[spec.captionStyle]}
3. ${audienceRule}
4. ${ctaRule}
5. Do not put hashtags inside "content"; list them only in "hashtags", without the "#" sign.

Return ONLY valid JSON in this exact format, no other text:
{
  "content": "the post text",
  "hashtags": ["tag1", "tag2"],
  "cta": "the call to action or null"
}`;
}

export function buildImagePrompt(brief: string, spec: PlatformSpec, imageStyle: ImageStyle): string {
  return (
    `Marketing visual for ${spec.displayName} (${spec.imageWidth}x${spec.imageHeight}). ` +
    `Campaign: ${brief}. ` +
    `Style: ${IMAGE_STYLE_GUIDE[imageStyle]}. ` +
    "Centered composition that survives cropping to the target size, no text or logos in the image, commercial quality."
  );
}
