import { describe, it, expect } from "vitest";
import {
  formatCampaignSummary,
  formatCost,
  formatHealth,
  formatPhotoCaption,
  formatPlatformList,
  formatPlatformPost,
  formatTemplateList,
  splitMessage,
} from "../../src/bot/services/replyFormatter";
import { estimateCost } from "../../src/pricing/costEstimator";
import { lookupPlatform } from "../../src/social/registry";
import type { HealthReport } from "../../src/campaign/health";
import { makeCampaign, makeImage, makePiece } from "../fixtures";

describe("formatCost", () => {
  it("lists each line item and the total", () => {
    expect(formatCost(estimateCost({ images2k: 4, contentPieces: 4 }))).toBe(
      [
        "Cost estimate (prices 2025-11-09)",
        "Images (imagen-3.0): 0 x 1K + 4 x 2K = $0.1600",
        "Video (veo3): 0s = $0.0000",
        "Content: 4 pieces = $0.001500",
        "Total: $0.1615",
      ].join("\n")
    );
  });
});

describe("formatPlatformList", () => {
  it("shows limits and image size", () => {
    const text = formatPlatformList([lookupPlatform("twitter_post"), lookupPlatform("blog_featured")]);
    expect(text).toBe(
      "Supported platforms:\n" +
        "twitter_post: 280 chars, 2 hashtags, 1600x900\n" +
        "blog_featured: no limit chars, 0 hashtags, 1200x630"
    );
  });
});

describe("formatTemplateList", () => {
  it("names each template with its platforms", () => {
    const lines = formatTemplateList().split("\n");
    expect(lines[0]).toBe("Campaign templates:");
    expect(lines[1]).toBe("job_recruitment (Job Recruitment): linkedin_post, twitter_post, facebook_post");
    expect(lines).toHaveLength(7);
  });
});

describe("formatCampaignSummary", () => {
  it("gives one status line per requested platform", () => {
    const campaign = makeCampaign([
      {
        index: 0,
        platform: "linkedin_post",
        content: makePiece("linkedin_post", "Hiring"),
        imageRequested: false,
        readyForPosting: true,
      },
      {
        index: 1,
        platform: "twitter_post",
        content: makePiece("twitter_post", "x".repeat(300)),
        imageRequested: false,
        readyForPosting: false,
      },
      {
        index: 2,
        platform: "snapchat_story",
        imageRequested: false,
        readyForPosting: false,
        error: { kind: "UnknownPlatform", message: "unknown" },
      },
    ]);

    expect(formatCampaignSummary(campaign)).toBe(
      [
        "Campaign (full): 1/3 ready for posting",
        "Estimated cost: $0.0000",
        "",
        "READY linkedin_post",
        "NOT READY twitter_post: 300/280 chars",
        "FAILED snapchat_story: UnknownPlatform",
      ].join("\n")
    );
  });
});

describe("formatPlatformPost", () => {
  it("heads the post with its validation figures", () => {
    const post = formatPlatformPost({
      index: 0,
      platform: "twitter_post",
      content: makePiece("twitter_post", "Spring sale", ["garden"], "Shop now"),
      imageRequested: false,
      readyForPosting: true,
    });
    expect(post).toBe("[twitter_post] 19/280 chars, 1/2 hashtags\n\nSpring sale #garden\n\nCTA: Shop now");
  });

  it("labels unlimited platforms", () => {
    const post = formatPlatformPost({
      index: 0,
      platform: "blog_featured",
      content: makePiece("blog_featured", "Read"),
      imageRequested: false,
      readyForPosting: true,
    });
    expect(post).toBe("[blog_featured] 4/no limit chars, 0/0 hashtags\n\nRead");
  });

  it("returns null for a slot without content", () => {
    expect(
      formatPlatformPost({
        index: 0,
        platform: "tiktok",
        imageRequested: true,
        readyForPosting: false,
        error: { kind: "Cancelled", message: "Cancelled by caller" },
      })
    ).toBeNull();
  });
});

describe("formatPhotoCaption", () => {
  it("names the platform and the image size", () => {
    expect(
      formatPhotoCaption({
        index: 0,
        platform: "twitter_post",
        content: makePiece("twitter_post", "Hi"),
        image: makeImage("twitter_post", Buffer.from("png")),
        imageRequested: true,
        readyForPosting: true,
      })
    ).toBe("twitter_post 1600x900");
  });
});

describe("formatHealth", () => {
  it("describes each service", () => {
    const report: HealthReport = {
      status: "degraded",
      services: {
        text_generation: { configured: true, reachable: true, model: "gemini-2.5-flash" },
        image_generation: { configured: true, reachable: false, model: "imagen-3.0", error: "quota exceeded" },
      },
      output_directory: "/tmp/out",
      output_directory_writable: true,
      config_errors: [],
      timestamp: "2026-01-01T00:00:00.000Z",
    };
    expect(formatHealth(report)).toBe(
      [
        "Status: degraded",
        "Text generation (gemini-2.5-flash): reachable",
        "Image generation (imagen-3.0): unreachable - quota exceeded",
        "Output directory writable: yes",
      ].join("\n")
    );
  });

  it("lists configuration errors", () => {
    const report: HealthReport = {
      status: "unconfigured",
      services: {
        text_generation: { configured: false, reachable: false, model: "gemini-2.5-flash" },
        image_generation: { configured: false, reachable: false, model: "imagen-3.0" },
      },
      output_directory: "/tmp/out",
      output_directory_writable: false,
      config_errors: ["GEMINI_API_KEY is not set."],
      timestamp: "2026-01-01T00:00:00.000Z",
    };
    const lines = formatHealth(report).split("\n");
    expect(lines[1]).toBe("Text generation (gemini-2.5-flash): not configured");
    expect(lines[3]).toBe("Output directory writable: no");
    expect(lines[4]).toBe("Config error: GEMINI_API_KEY is not set.");
  });
});

describe("splitMessage", () => {
  it("cuts at line breaks when it can", () => {
    expect(splitMessage("aaaa\nbbbb\ncccc", 10)).toEqual(["aaaa\nbbbb", "cccc"]);
  });

  it("hard-cuts a line longer than the limit", () => {
    expect(splitMessage("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("returns short text unchanged", () => {
    expect(splitMessage("hello")).toEqual(["hello"]);
  });
});
