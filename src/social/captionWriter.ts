/**
 * Published-caption formatting.
 *
 * The validator, the serializer and the output writer all go through
 * composePost so the counted text is the text that gets posted.
 */

/** Count Unicode code points, so an emoji or accented letter counts once. */
export function countCharacters(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

/** Format tags as "#a #b". Tags are stored without the leading "#". */
export function formatHashtags(hashtags: readonly string[]): string {
  return hashtags.map((tag) => `#${tag}`).join(" ");
}

/** The full post: content, one space, then the hashtag block (if any). */
export function composePost(content: string, hashtags: readonly string[]): string {
  if (hashtags.length === 0) return content;
  return `${content} ${formatHashtags(hashtags)}`;
}

/** Tags written into the post text itself, without the leading "#". */
export function extractInlineHashtags(content: string): string[] {
  return Array.from(content.matchAll(/#([\p{L}\p{N}_]+)/gu), (match) => match[1]);
}

export interface NormalizedHashtags {
  hashtags: string[];
  dropped: string[];
}

/**
 * Clean raw tags from the text model: strip "#", remove whitespace,
 * drop empties, overlong tags and case-insensitive duplicates.
 * Order of first appearance is kept.
 */
export function normalizeHashtags(
  raw: readonly string[],
  maxHashtagLength: number
): NormalizedHashtags {
  const seen = new Set<string>();
  const hashtags: string[] = [];
  const dropped: string[] = [];

  for (const entry of raw) {
    const tag = entry.replace(/^#+/, "").replace(/\s+/g, "");
    const key = tag.toLowerCase();
    if (tag.length === 0 || countCharacters(tag) > maxHashtagLength || tag.includes("#")) {
      dropped.push(entry);
      continue;
    }
    if (seen.has(key)) continue;
    seen.add(key);
    hashtags.push(tag);
  }

  return { hashtags, dropped };
}
