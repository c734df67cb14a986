import { z } from "zod";
import {
  CONTENT_STYLES,
  HASHTAG_STRATEGIES,
  IMAGE_STYLES,
} from "../contracts";
import type { CampaignBrief } from "../contracts";

export class InvalidCampaignError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid campaign request: ${issues.join("; ")}`);
    this.name = "InvalidCampaignError";
  }
}

export const CampaignBriefSchema = z.object({
  brief: z.string().trim().min(1, "brief must not be empty"),
  platforms: z
    .array(z.string().trim().min(1, "platform ids must not be empty"))
    .min(1, "at least one platform is required"),
  style: z.enum(CONTENT_STYLES).default("professional"),
  hashtagStrategy: z.enum(HASHTAG_STRATEGIES).default("industry-specific"),
  targetAudience: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  imageStyle: z.enum(IMAGE_STYLES).optional(),
  includeCta: z.boolean().default(true),
});

export type CampaignBriefInput = z.input<typeof CampaignBriefSchema>;

/**
 * Validate an incoming request before any generation starts. Unknown
 * platform ids pass here; they are reported per slot by the orchestrator.
 */
export function parseCampaignBrief(input: unknown): CampaignBrief {
  const parsed = CampaignBriefSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidCampaignError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}
