import type { CampaignBrief, ResourceCounts } from "../../contracts";
import { getAvailablePlatforms } from "../../social/registry";
import { parseCampaignBrief } from "../../campaign/brief";
import { briefFromTemplate, isTemplateName } from "../../campaign/templates";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type CampaignTargets =
  | { kind: "template"; name: string }
  | { kind: "platforms"; platforms: string[] };

export interface CampaignCommand {
  targets: CampaignTargets;
  brief: string;
}

export const CAMPAIGN_USAGE =
  "Usage: /campaign <template | all | platform,platform,...> <brief>\n" +
  "Example: /campaign twitter_post,linkedin_post Spring sale on all garden tools";

export const COST_USAGE =
  "Usage: /cost <images1k> <images2k> [videoSeconds] [contentPieces]\n" +
  "Example: /cost 0 4 0 4";

/**
 * Targets are a template name, "all", or a comma-separated list of
 * platform ids. Unknown ids are kept so the result can report them.
 */
export function parseTargets(raw: string): CampaignTargets {
  const token = raw.trim().toLowerCase();
  if (isTemplateName(token)) {
    return { kind: "template", name: token };
  }
  if (token === "all") {
    return { kind: "platforms", platforms: getAvailablePlatforms() };
  }
  return {
    kind: "platforms",
    platforms: token
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  };
}

/** Parses the text after /campaign or /campaign_full. */
export function parseCampaignCommand(args: string): ParseResult<CampaignCommand> {
  const trimmed = args.trim();
  const match = trimmed.match(/^(\S+)\s+([\s\S]+)$/);
  if (!match) {
    return { ok: false, error: CAMPAIGN_USAGE };
  }

  const targets = parseTargets(match[1]);
  if (targets.kind === "platforms" && targets.platforms.length === 0) {
    return { ok: false, error: CAMPAIGN_USAGE };
  }

  return { ok: true, value: { targets, brief: match[2].trim() } };
}

/** Throws InvalidCampaignError when the brief does not validate. */
export function toCampaignBrief(command: CampaignCommand): CampaignBrief {
  if (command.targets.kind === "template") {
    return briefFromTemplate(command.targets.name, command.brief);
  }
  return parseCampaignBrief({ brief: command.brief, platforms: command.targets.platforms });
}

/** Parses the text after /cost. Range checks are left to the estimator. */
export function parseCostCommand(args: string): ParseResult<ResourceCounts> {
  const parts = args.trim().split(/\s+/).filter((s) => s.length > 0);
  if (parts.length < 2 || parts.length > 4) {
    return { ok: false, error: COST_USAGE };
  }

  const numbers = parts.map(Number);
  if (numbers.some((n) => !Number.isFinite(n))) {
    return { ok: false, error: COST_USAGE };
  }

  const [images1k, images2k, videoSeconds = 0, contentPieces = 0] = numbers;
  return { ok: true, value: { images1k, images2k, videoSeconds, contentPieces } };
}
