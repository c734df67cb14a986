/**
 * Platform-tailored caption generation.
 *
 * One request to the text model per attempt; the reply is parsed into
 * {content, hashtags, cta}, hashtags are cleaned, and the result is run
 * through the validator before it is returned. Nothing here throws across
 * the platform boundary: failures come back as Outcome errors.
 */

import { z } from "zod";
import type {
  ContentPiece,
  ContentStyle,
  ErrorKind,
  HashtagStrategy,
  Outcome,
} from "../contracts";
import type { PlatformSpec } from "../social/types";
import { formatHashtags, normalizeHashtags } from "../social/captionWriter";
import { validateContent } from "../social/validator";
import { AbortedError, TimeoutError, errorMessage, withTimeout } from "../lib/timeout";
import type { TextGenerationService } from "./services";
import { CONTENT_SYSTEM_INSTRUCTION, buildContentPrompt } from "./prompts";
import type { Overflow } from "./prompts";

/** Regeneration attempts after the first call are capped at this. */
export const MAX_REGENERATIONS = 2;

export const DEFAULT_TEXT_TIMEOUT_MS = 8000;

export interface ContentRequest {
  brief: string;
  spec: PlatformSpec;
  style: ContentStyle;
  hashtagStrategy: HashtagStrategy;
  targetAudience?: string;
  includeCta: boolean;
}

export interface ContentGeneratorDeps {
  text: TextGenerationService;
  timeoutMs?: number;
  /** Extra attempts when a reply breaks the platform limits (0-2). */
  maxRegenerations?: number;
  signal?: AbortSignal;
}

// ---------------- JSON contract from the text model ------------------------
const ContentResponse = z.object({
  content: z.string().trim().min(1),
  hashtags: z
    .union([
      z.array(z.string()),
      z.string().transform((s) => s.split(/[\s,]+/).filter((t) => t.length > 0)),
    ])
    .nullish()
    .transform((tags) => tags ?? []),
  cta: z.string().trim().nullish(),
});
export type ContentResponse = z.infer<typeof ContentResponse>;

/**
 * Extract and validate the JSON object in a model reply (the model may wrap
 * it in markdown fences or prose). Returns null when it is unusable.
 */
export function parseContentResponse(text: string): ContentResponse | null {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch {
    return null;
  }

  const parsed = ContentResponse.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function failure(kind: ErrorKind, message: string): Outcome<never> {
  return { ok: false, error: { kind, message } };
}

async function requestContent(
  request: ContentRequest,
  deps: ContentGeneratorDeps,
  overflow?: Overflow
): Promise<Outcome<ContentResponse>> {
  const prompt = buildContentPrompt(request, overflow);
  const timeoutMs = deps.timeoutMs ?? DEFAULT_TEXT_TIMEOUT_MS;

  let replyText: string;
  try {
    const reply = await withTimeout(
      (signal) =>
        deps.text.generateText({
          prompt,
          systemInstruction: CONTENT_SYSTEM_INSTRUCTION,
          signal,
        }),
      timeoutMs,
      deps.signal
    );
    replyText = reply.text;
  } catch (err) {
    if (err instanceof TimeoutError) {
      return failure("TextGenerationTimeout", `Text generation timed out after ${timeoutMs}ms`);
    }
    if (err instanceof AbortedError) {
      return failure("Cancelled", err.message);
    }
    return failure("ExternalServiceError", `Text generation failed: ${errorMessage(err)}`);
  }

  const parsed = parseContentResponse(replyText);
  if (!parsed) {
    return failure(
      "TextGenerationRejected",
      `Text model reply is not a {content, hashtags, cta} object: ${replyText.slice(0, 120)}`
    );
  }
  return { ok: true, value: parsed };
}

function buildPiece(
  response: ContentResponse,
  request: ContentRequest,
  attempts: number
): ContentPiece {
  const { spec } = request;
  const { hashtags, dropped } = normalizeHashtags(response.hashtags, spec.maxHashtagLength);
  if (dropped.length > 0) {
    console.warn(`[content:${spec.id}] Dropped malformed hashtags: ${dropped.join(", ")}`);
  }

  const validation = validateContent(response.content, hashtags, spec);

  return {
    platform: spec.id,
    content: response.content,
    hashtags,
    hashtagString: formatHashtags(hashtags),
    cta: request.includeCta ? response.cta ?? null : null,
    attempts,
    ...validation,
  };
}

/**
 * Generate one platform's caption.
 *
 * Over-limit replies are returned as-is with allValid=false unless
 * regenerations are enabled, in which case the model is asked again with
 * the overflow spelled out. The last piece is returned even if it still
 * does not fit; a failed regeneration never replaces a piece already in hand.
 */
export async function generateContent(
  request: ContentRequest,
  deps: ContentGeneratorDeps
): Promise<Outcome<ContentPiece>> {
  const first = await requestContent(request, deps);
  if (!first.ok) {
    console.warn(`[content:${request.spec.id}] ${first.error.kind}: ${first.error.message}`);
    return first;
  }

  let piece = buildPiece(first.value, request, 1);
  const regenerations = Math.max(0, Math.min(deps.maxRegenerations ?? 0, MAX_REGENERATIONS));

  for (let i = 0; i < regenerations && !piece.allValid; i++) {
    console.warn(
      `[content:${request.spec.id}] Over limit (${piece.characterCount}/${piece.characterLimit} chars, ` +
        `${piece.hashtagCount}/${piece.hashtagLimit} tags), regenerating`
    );
    const retry = await requestContent(request, deps, {
      characterCount: piece.characterCount,
      hashtagCount: piece.hashtagCount,
    });
    if (!retry.ok) {
      console.warn(`[content:${request.spec.id}] Regeneration failed (${retry.error.kind}); keeping previous draft`);
      break;
    }
    piece = buildPiece(retry.value, request, piece.attempts + 1);
  }

  return { ok: true, value: piece };
}
