import { describe, it, expect } from "vitest";
import { InvalidCampaignError, parseCampaignBrief } from "../../src/campaign/brief";

describe("parseCampaignBrief", () => {
  it("fills defaults and trims text", () => {
    expect(parseCampaignBrief({ brief: "  Spring sale  ", platforms: [" twitter_post "] })).toEqual({
      brief: "Spring sale",
      platforms: ["twitter_post"],
      style: "professional",
      hashtagStrategy: "industry-specific",
      targetAudience: undefined,
      includeCta: true,
    });
  });

  it("drops a blank target audience", () => {
    const brief = parseCampaignBrief({ brief: "x", platforms: ["tiktok"], targetAudience: "   " });
    expect(brief.targetAudience).toBeUndefined();
  });

  it("lets unknown platform ids through for per-slot reporting", () => {
    expect(parseCampaignBrief({ brief: "x", platforms: ["snapchat_story"] }).platforms).toEqual([
      "snapchat_story",
    ]);
  });

  it("rejects an empty brief", () => {
    expect(() => parseCampaignBrief({ brief: "   ", platforms: ["tiktok"] })).toThrow(
      "Invalid campaign request: brief: brief must not be empty"
    );
  });

  it("rejects an empty platform list", () => {
    expect(() => parseCampaignBrief({ brief: "x", platforms: [] })).toThrow(
      "Invalid campaign request: platforms: at least one platform is required"
    );
  });

  it("collects every problem", () => {
    try {
      parseCampaignBrief({ brief: "", platforms: [""], style: "loud" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCampaignError);
      if (!(err instanceof InvalidCampaignError)) return;
      expect(err.issues).toHaveLength(3);
      expect(err.issues[0]).toBe("brief: brief must not be empty");
      expect(err.issues[1]).toBe("platforms.0: platform ids must not be empty");
      expect(err.issues[2]).toMatch(/^style: /);
    }
  });
});
