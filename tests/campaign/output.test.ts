import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { writeCampaignOutput } from "../../src/campaign/output";
import { makeCampaign, makeImage, makePiece, makeTempDir } from "../fixtures";

describe("writeCampaignOutput", () => {
  let tmp: string;

  afterEach(() => {
    if (tmp) fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("writes a caption per platform, images that succeeded, and campaign.json", () => {
    tmp = makeTempDir();
    const png = Buffer.from("fake-png-bytes");
    const campaign = makeCampaign([
      {
        index: 0,
        platform: "twitter_post",
        content: makePiece("twitter_post", "Spring sale", ["garden"]),
        image: makeImage("twitter_post", png),
        imageRequested: true,
        readyForPosting: true,
      },
      {
        index: 1,
        platform: "snapchat_story",
        imageRequested: true,
        readyForPosting: false,
        error: { kind: "UnknownPlatform", message: "unknown" },
      },
    ]);

    const out = writeCampaignOutput(campaign, path.join(tmp, "run"));

    expect(out.platforms).toHaveLength(1);
    const twitter = out.platforms[0];
    expect(twitter.dir).toBe(path.join(tmp, "run", "twitter_post"));
    expect(fs.readFileSync(twitter.captionPath, "utf-8")).toBe("Spring sale #garden");
    expect(fs.readFileSync(path.join(twitter.dir, "image.png"))).toEqual(png);
    expect(twitter.imageSha256).toBe(crypto.createHash("sha256").update(png).digest("hex"));
    expect(fs.existsSync(path.join(tmp, "run", "snapchat_story"))).toBe(false);

    const json = JSON.parse(fs.readFileSync(out.campaignJsonPath, "utf-8"));
    expect(json.results[0].image.path).toBe("twitter_post/image.png");
    expect(json.results[0].image.base64_data).toBeUndefined();
    expect(json.results[1].error.kind).toBe("UnknownPlatform");
  });

  it("numbers the directories of a platform requested twice", () => {
    tmp = makeTempDir();
    const campaign = makeCampaign(
      [
        {
          index: 0,
          platform: "linkedin_post",
          content: makePiece("linkedin_post", "First"),
          imageRequested: false,
          readyForPosting: true,
        },
        {
          index: 1,
          platform: "linkedin_post",
          content: makePiece("linkedin_post", "Second"),
          imageRequested: false,
          readyForPosting: true,
        },
      ],
      "content-only"
    );

    const out = writeCampaignOutput(campaign, tmp);

    expect(out.platforms.map((p) => path.basename(p.dir))).toEqual(["linkedin_post", "linkedin_post-2"]);
    expect(fs.readFileSync(path.join(tmp, "linkedin_post-2", "caption.txt"), "utf-8")).toBe("Second");
    expect(out.platforms[0].imagePath).toBeUndefined();
  });
});
