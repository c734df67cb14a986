import { describe, it, expect } from "vitest";
import {
  CAMPAIGN_USAGE,
  COST_USAGE,
  parseCampaignCommand,
  parseCostCommand,
  parseTargets,
  toCampaignBrief,
} from "../../src/bot/services/commandParser";
import { getAvailablePlatforms } from "../../src/social/registry";

describe("parseTargets", () => {
  it("recognises templates, all, and platform lists", () => {
    expect(parseTargets("Product_Launch")).toEqual({ kind: "template", name: "product_launch" });
    expect(parseTargets("all")).toEqual({ kind: "platforms", platforms: getAvailablePlatforms() });
    expect(parseTargets("twitter_post, ,LinkedIn_Post")).toEqual({
      kind: "platforms",
      platforms: ["twitter_post", "linkedin_post"],
    });
  });

  it("keeps unknown ids for per-platform reporting", () => {
    expect(parseTargets("snapchat_story")).toEqual({ kind: "platforms", platforms: ["snapchat_story"] });
  });
});

describe("parseCampaignCommand", () => {
  it("splits targets from a multi-line brief", () => {
    expect(parseCampaignCommand("  twitter_post,tiktok   Spring sale\non garden tools ")).toEqual({
      ok: true,
      value: {
        targets: { kind: "platforms", platforms: ["twitter_post", "tiktok"] },
        brief: "Spring sale\non garden tools",
      },
    });
  });

  it("returns usage when the brief is missing", () => {
    expect(parseCampaignCommand("twitter_post")).toEqual({ ok: false, error: CAMPAIGN_USAGE });
    expect(parseCampaignCommand("")).toEqual({ ok: false, error: CAMPAIGN_USAGE });
    expect(parseCampaignCommand(", Spring sale")).toEqual({ ok: false, error: CAMPAIGN_USAGE });
  });
});

describe("toCampaignBrief", () => {
  it("builds a brief from a platform list", () => {
    const brief = toCampaignBrief({
      targets: { kind: "platforms", platforms: ["tiktok"] },
      brief: "Dance challenge",
    });
    expect(brief.platforms).toEqual(["tiktok"]);
    expect(brief.brief).toBe("Dance challenge");
    expect(brief.style).toBe("professional");
  });

  it("builds a brief from a template", () => {
    const brief = toCampaignBrief({
      targets: { kind: "template", name: "job_recruitment" },
      brief: "Hiring",
    });
    expect(brief.platforms).toEqual(["linkedin_post", "twitter_post", "facebook_post"]);
    expect(brief.brief.startsWith("Hiring\n\nCampaign type: Job Recruitment.")).toBe(true);
  });
});

describe("parseCostCommand", () => {
  it("reads two to four counts", () => {
    expect(parseCostCommand("0 4 0 4")).toEqual({
      ok: true,
      value: { images1k: 0, images2k: 4, videoSeconds: 0, contentPieces: 4 },
    });
    expect(parseCostCommand(" 2  1 ")).toEqual({
      ok: true,
      value: { images1k: 2, images2k: 1, videoSeconds: 0, contentPieces: 0 },
    });
  });

  it("leaves range checks to the estimator", () => {
    expect(parseCostCommand("-1 0")).toEqual({
      ok: true,
      value: { images1k: -1, images2k: 0, videoSeconds: 0, contentPieces: 0 },
    });
  });

  it("returns usage for the wrong shape", () => {
    expect(parseCostCommand("3")).toEqual({ ok: false, error: COST_USAGE });
    expect(parseCostCommand("1 2 3 4 5")).toEqual({ ok: false, error: COST_USAGE });
    expect(parseCostCommand("one two")).toEqual({ ok: false, error: COST_USAGE });
  });
});
