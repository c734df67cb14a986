import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import type { CampaignResult } from "../contracts";
import { composePost } from "../social/captionWriter";
import { assertResolvedContainedIn } from "../lib/pathSafety";
import { serializeCampaign } from "./serialize";
import type { SerializedCampaign } from "./serialize";

export interface WrittenPlatform {
  index: number;
  platform: string;
  dir: string;
  captionPath: string;
  imagePath?: string;
  imageSha256?: string;
}

export interface CampaignOutput {
  outputDir: string;
  campaignJsonPath: string;
  platforms: WrittenPlatform[];
}

function toForwardSlash(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * Write a finished campaign to disk:
 *
 *   <outputDir>/<platform>/caption.txt   full post (content + hashtags)
 *   <outputDir>/<platform>/image.png     when the image succeeded
 *   <outputDir>/campaign.json            serialized result, image paths relative
 *
 * Only slots with generated content get a directory, so ids that were not
 * in the registry never become path components. A platform requested twice
 * gets `<platform>-2`, `<platform>-3`, ...
 */
export function writeCampaignOutput(result: CampaignResult, outputDir: string): CampaignOutput {
  const resolvedOutputDir = path.resolve(outputDir);
  fs.mkdirSync(resolvedOutputDir, { recursive: true });

  const written: WrittenPlatform[] = [];
  const imagePaths = new Map<number, string>();
  const seen = new Map<string, number>();

  for (const slot of result.results) {
    if (!slot.content) continue;

    const occurrence = (seen.get(slot.platform) ?? 0) + 1;
    seen.set(slot.platform, occurrence);
    const dirName = occurrence === 1 ? slot.platform : `${slot.platform}-${occurrence}`;

    const platformDir = path.join(resolvedOutputDir, dirName);
    assertResolvedContainedIn(platformDir, resolvedOutputDir, `Platform directory (${slot.platform})`);
    fs.mkdirSync(platformDir, { recursive: true });

    const captionPath = path.join(platformDir, "caption.txt");
    fs.writeFileSync(captionPath, composePost(slot.content.content, slot.content.hashtags), "utf-8");

    const entry: WrittenPlatform = {
      index: slot.index,
      platform: slot.platform,
      dir: platformDir,
      captionPath,
    };

    if (slot.image?.success) {
      const data = Buffer.from(slot.image.encodedData, "base64");
      const imagePath = path.join(platformDir, "image.png");
      fs.writeFileSync(imagePath, data);
      entry.imagePath = imagePath;
      entry.imageSha256 = crypto.createHash("sha256").update(data).digest("hex");
      imagePaths.set(slot.index, toForwardSlash(path.relative(resolvedOutputDir, imagePath)));
    }

    written.push(entry);
  }

  const campaign: SerializedCampaign = serializeCampaign(result, { includeBase64: false, imagePaths });
  const campaignJsonPath = path.join(resolvedOutputDir, "campaign.json");
  fs.writeFileSync(campaignJsonPath, JSON.stringify(campaign, null, 2), "utf-8");

  return { outputDir: resolvedOutputDir, campaignJsonPath, platforms: written };
}
