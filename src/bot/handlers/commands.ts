import { InputFile, type Context } from "grammy";
import type { CampaignBrief, CampaignMode } from "../../contracts";
import { getAllPlatformSpecs } from "../../social/registry";
import { CostCalculationError, estimateCost } from "../../pricing/costEstimator";
import { InvalidCampaignError } from "../../campaign/brief";
import { healthCheck } from "../../campaign/health";
import { parseCampaignCommand, parseCostCommand, toCampaignBrief } from "../services/commandParser";
import {
  formatCampaignSummary,
  formatCost,
  formatHealth,
  formatHelp,
  formatPhotoCaption,
  formatPlatformList,
  formatPlatformPost,
  formatTemplateList,
  splitMessage,
} from "../services/replyFormatter";
import type { CampaignRunner } from "../services/campaignRunner";
import type { BotDeps } from "../types";
import { errorMessage } from "../../lib/timeout";

async function replyLong(ctx: Context, text: string): Promise<void> {
  for (const chunk of splitMessage(text)) {
    await ctx.reply(chunk);
  }
}

/**
 * /start and /help
 */
export async function handleStart(ctx: Context): Promise<void> {
  await ctx.reply(formatHelp());
}

export async function handlePlatforms(ctx: Context): Promise<void> {
  await replyLong(ctx, formatPlatformList(getAllPlatformSpecs()));
}

export async function handleTemplates(ctx: Context): Promise<void> {
  await replyLong(ctx, formatTemplateList());
}

/**
 * /cost <images1k> <images2k> [videoSeconds] [contentPieces]
 */
export async function handleCost(ctx: Context, args: string): Promise<void> {
  const parsed = parseCostCommand(args);
  if (!parsed.ok) {
    await ctx.reply(parsed.error);
    return;
  }

  try {
    await ctx.reply(formatCost(estimateCost(parsed.value)));
  } catch (err) {
    if (err instanceof CostCalculationError) {
      await ctx.reply(`Cannot estimate: ${err.message}`);
      return;
    }
    throw err;
  }
}

/**
 * /campaign and /campaign_full run the pipeline and reply with the
 * summary, then one message (or photo + message) per generated platform.
 */
export async function handleCampaign(
  ctx: Context,
  args: string,
  mode: CampaignMode,
  deps: BotDeps
): Promise<void> {
  const chatId = ctx.chat?.id;
  if (!chatId) return;

  if (!deps.runner) {
    await ctx.reply(
      "Generation is not configured on this bot.\n" + deps.config.configErrors.join("\n")
    );
    return;
  }

  const parsed = parseCampaignCommand(args);
  if (!parsed.ok) {
    await ctx.reply(parsed.error);
    return;
  }

  let brief: CampaignBrief;
  try {
    brief = toCampaignBrief(parsed.value);
  } catch (err) {
    if (err instanceof InvalidCampaignError) {
      await ctx.reply(err.message);
      return;
    }
    throw err;
  }

  if (deps.runner.isBusy(chatId)) {
    await ctx.reply("A campaign is already running. Wait for it or send /cancel.");
    return;
  }

  await ctx.reply(
    `Generating ${mode === "full" ? "posts and images" : "posts"} for ${brief.platforms.length} platform(s)...`
  );

  // Updates are handled one at a time, so the run is not awaited here;
  // otherwise /cancel would queue behind it.
  deliverCampaign(ctx, deps.runner, chatId, brief, mode).catch((err: unknown) => {
    console.error(`[bot] Chat ${chatId}: campaign failed:`, errorMessage(err));
  });
}

async function deliverCampaign(
  ctx: Context,
  runner: CampaignRunner,
  chatId: number,
  brief: CampaignBrief,
  mode: CampaignMode
): Promise<void> {
  const outcome = await runner.run(chatId, brief, mode);
  if (outcome.status === "busy") {
    await ctx.reply("A campaign is already running. Wait for it or send /cancel.");
    return;
  }
  const { result } = outcome;

  await replyLong(ctx, formatCampaignSummary(result));

  for (const platformResult of result.results) {
    const post = formatPlatformPost(platformResult);
    if (!post) continue;

    const image = platformResult.image;
    if (image?.success) {
      await ctx.replyWithPhoto(
        new InputFile(Buffer.from(image.encodedData, "base64"), `${platformResult.platform}.png`),
        { caption: formatPhotoCaption(platformResult) }
      );
    }
    await replyLong(ctx, post);
  }
}

/**
 * /cancel stops the campaign running for this chat.
 */
export async function handleCancel(ctx: Context, deps: BotDeps): Promise<void> {
  const chatId = ctx.chat?.id;
  if (!chatId) return;

  if (!deps.runner || !deps.runner.cancel(chatId)) {
    await ctx.reply("Nothing to cancel.");
    return;
  }
  await ctx.reply("Cancelling. Platforms that were not finished will be reported as cancelled.");
}

export async function handleHealth(ctx: Context, deps: BotDeps): Promise<void> {
  const report = await healthCheck({ config: deps.config, services: deps.services });
  await ctx.reply(formatHealth(report));
}
