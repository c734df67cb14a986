/**
 * Campaign templates: recommended platforms, tone and posting guidance per
 * campaign type. The table lives in templates.json and is validated once
 * at load, including that every platform id is in the registry.
 */

import { z } from "zod";
import templateData from "./templates.json";
import {
  CONTENT_STYLES,
  HASHTAG_STRATEGIES,
  IMAGE_STYLES,
} from "../contracts";
import type {
  CampaignBrief,
  ContentStyle,
  HashtagStrategy,
  ImageStyle,
  PlatformId,
} from "../contracts";
import { isKnownPlatform } from "../social/registry";
import { InvalidCampaignError, parseCampaignBrief } from "./brief";

const TemplateSchema = z.object({
  campaignType: z.string().min(1),
  platforms: z.array(z.string().refine(isKnownPlatform, "not a registered platform")).min(1),
  contentStyle: z.string(),
  visualStyle: z.string(),
  postingFrequency: z.string(),
  optimalTimes: z.array(z.string()),
  hashtagGuidance: z.string(),
  ctaPattern: z.string(),
  defaults: z.object({
    style: z.enum(CONTENT_STYLES),
    hashtagStrategy: z.enum(HASHTAG_STRATEGIES),
    imageStyle: z.enum(IMAGE_STYLES),
  }),
});

export type CampaignTemplate = z.infer<typeof TemplateSchema>;

const TEMPLATES: ReadonlyMap<string, CampaignTemplate> = new Map(
  Object.entries(z.record(TemplateSchema).parse(templateData))
);

export class UnknownTemplateError extends Error {
  constructor(
    readonly template: string,
    readonly available: readonly string[]
  ) {
    super(`Unknown campaign template "${template}". Available: ${available.join(", ")}`);
    this.name = "UnknownTemplateError";
  }
}

export function listTemplates(): string[] {
  return [...TEMPLATES.keys()];
}

export function isTemplateName(name: string): boolean {
  return TEMPLATES.has(name);
}

export function getTemplate(name: string): CampaignTemplate {
  const template = TEMPLATES.get(name);
  if (!template) {
    throw new UnknownTemplateError(name, listTemplates());
  }
  return template;
}

export interface TemplateConfig {
  campaign_type: string;
  recommended_platforms: PlatformId[];
  content_guidelines: {
    style: string;
    posting_frequency: string;
    optimal_times: string[];
  };
  visual_guidelines: { style: string };
  engagement_strategy: {
    hashtags: string;
    call_to_action: string;
  };
}

export function getTemplateConfig(name: string): TemplateConfig {
  const t = getTemplate(name);
  return {
    campaign_type: t.campaignType,
    recommended_platforms: [...t.platforms],
    content_guidelines: {
      style: t.contentStyle,
      posting_frequency: t.postingFrequency,
      optimal_times: [...t.optimalTimes],
    },
    visual_guidelines: { style: t.visualStyle },
    engagement_strategy: {
      hashtags: t.hashtagGuidance,
      call_to_action: t.ctaPattern,
    },
  };
}

export interface TemplateOverrides {
  platforms?: readonly PlatformId[];
  style?: ContentStyle;
  hashtagStrategy?: HashtagStrategy;
  imageStyle?: ImageStyle;
  targetAudience?: string;
  includeCta?: boolean;
}

/**
 * Seed a brief from a template. Explicit overrides win; the template's
 * tone and visual guidance are appended to the brief text.
 */
export function briefFromTemplate(
  name: string,
  brief: string,
  overrides: TemplateOverrides = {}
): CampaignBrief {
  const t = getTemplate(name);
  if (brief.trim().length === 0) {
    throw new InvalidCampaignError(["brief: brief must not be empty"]);
  }
  const platforms = overrides.platforms && overrides.platforms.length > 0 ? overrides.platforms : t.platforms;

  return parseCampaignBrief({
    brief: `${brief.trim()}\n\nCampaign type: ${t.campaignType}. Tone: ${t.contentStyle}. Visuals: ${t.visualStyle}. Suggested calls to action: ${t.ctaPattern}.`,
    platforms: [...platforms],
    style: overrides.style ?? t.defaults.style,
    hashtagStrategy: overrides.hashtagStrategy ?? t.defaults.hashtagStrategy,
    imageStyle: overrides.imageStyle ?? t.defaults.imageStyle,
    targetAudience: overrides.targetAudience,
    includeCta: overrides.includeCta ?? true,
  });
}
