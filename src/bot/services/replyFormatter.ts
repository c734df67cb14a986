/**
 * Plain-text replies for the Telegram front end. Pure functions so the
 * wording can be tested without the Bot API.
 */

import type { CampaignResult, CostBreakdown, PlatformResult } from "../../contracts";
import type { PlatformSpec } from "../../social/types";
import type { HealthReport, ServiceHealth } from "../../campaign/health";
import { composePost } from "../../social/captionWriter";
import { getTemplate, listTemplates } from "../../campaign/templates";

/** Telegram's limit for a text message. */
export const TELEGRAM_MESSAGE_LIMIT = 4096;
/** Telegram's limit for a photo caption. */
export const TELEGRAM_CAPTION_LIMIT = 1024;

function usd(value: number, decimals = 4): string {
  return `$${value.toFixed(decimals)}`;
}

function limitLabel(limit: number): string {
  return Number.isFinite(limit) ? String(limit) : "no limit";
}

export function formatHelp(): string {
  return (
    "Send me a campaign brief and I'll write platform-ready posts.\n\n" +
    "Commands:\n" +
    "/campaign <targets> <brief> - Captions only\n" +
    "/campaign_full <targets> <brief> - Captions and images\n" +
    "/cancel - Stop the campaign that is running\n" +
    "/cost <images1k> <images2k> [videoSeconds] [contentPieces] - Estimate cost\n" +
    "/platforms - Supported platforms and limits\n" +
    "/templates - Campaign templates\n" +
    "/health - Service status\n" +
    "/help - Show this message\n\n" +
    "<targets> is a template name, \"all\", or platform ids separated by commas " +
    "(e.g. twitter_post,linkedin_post)."
  );
}

export function formatPlatformList(specs: readonly PlatformSpec[]): string {
  const lines = specs.map(
    (s) =>
      `${s.id}: ${limitLabel(s.maxCharacters)} chars, ${s.maxHashtags} hashtags, ` +
      `${s.imageWidth}x${s.imageHeight}`
  );
  return `Supported platforms:\n${lines.join("\n")}`;
}

export function formatTemplateList(): string {
  const lines = listTemplates().map((name) => {
    const t = getTemplate(name);
    return `${name} (${t.campaignType}): ${t.platforms.join(", ")}`;
  });
  return `Campaign templates:\n${lines.join("\n")}`;
}

export function formatCost(cost: CostBreakdown): string {
  const { images, video, content } = cost;
  return [
    `Cost estimate (prices ${cost.priceTableVersion})`,
    `Images (${images.model}): ${images.res1k.count} x 1K + ${images.res2k.count} x 2K = ${usd(images.totalUsd)}`,
    `Video (${video.model}): ${video.seconds}s = ${usd(video.costUsd)}`,
    `Content: ${content.pieces} pieces = ${usd(content.costUsd, 6)}`,
    `Total: ${usd(cost.totalUsd)}`,
  ].join("\n");
}

function statusLine(result: PlatformResult): string {
  if (result.error) {
    return `FAILED ${result.platform}: ${result.error.kind}`;
  }
  if (result.readyForPosting) {
    return `READY ${result.platform}`;
  }
  const problems: string[] = [];
  const content = result.content;
  if (content && !content.withinCharacterLimit) {
    problems.push(`${content.characterCount}/${content.characterLimit} chars`);
  }
  if (content && !content.withinHashtagLimit) {
    problems.push(`${content.hashtagCount}/${content.hashtagLimit} hashtags`);
  }
  if (result.image && !result.image.success) {
    problems.push(`image failed (${result.image.failureReason ?? "unknown"})`);
  }
  return `NOT READY ${result.platform}: ${problems.join(", ")}`;
}

export function formatCampaignSummary(result: CampaignResult): string {
  return [
    `Campaign (${result.mode}): ${result.readyCount}/${result.platformsRequested} ready for posting`,
    `Estimated cost: ${usd(result.estimatedCostUsd)}`,
    "",
    ...result.results.map(statusLine),
  ].join("\n");
}

/** The post text for one platform, headed by its validation figures. */
export function formatPlatformPost(result: PlatformResult): string | null {
  const content = result.content;
  if (!content) return null;

  const header =
    `[${result.platform}] ${content.characterCount}/${limitLabel(content.characterLimit)} chars, ` +
    `${content.hashtagCount}/${content.hashtagLimit} hashtags`;
  const body = composePost(content.content, content.hashtags);
  const cta = content.cta ? `\n\nCTA: ${content.cta}` : "";
  return `${header}\n\n${body}${cta}`;
}

export function formatPhotoCaption(result: PlatformResult): string {
  const image = result.image;
  const size = image ? ` ${image.dimensions.width}x${image.dimensions.height}` : "";
  return truncate(`${result.platform}${size}`, TELEGRAM_CAPTION_LIMIT);
}

function serviceLine(label: string, service: ServiceHealth): string {
  let state: string;
  if (!service.configured) {
    state = "not configured";
  } else if (service.reachable) {
    state = "reachable";
  } else {
    state = service.error ? `unreachable - ${service.error}` : "unreachable";
  }
  return `${label} (${service.model}): ${state}`;
}

export function formatHealth(report: HealthReport): string {
  const lines = [
    `Status: ${report.status}`,
    serviceLine("Text generation", report.services.text_generation),
    serviceLine("Image generation", report.services.image_generation),
    `Output directory writable: ${report.output_directory_writable ? "yes" : "no"}`,
  ];
  for (const err of report.config_errors) {
    lines.push(`Config error: ${err}`);
  }
  return lines.join("\n");
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

/**
 * Split text into chunks that fit one Telegram message, preferring line
 * breaks as cut points.
 */
export function splitMessage(text: string, max = TELEGRAM_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > max) {
    let cut = rest.lastIndexOf("\n", max);
    if (cut <= 0) cut = max;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^\n/, "");
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}
