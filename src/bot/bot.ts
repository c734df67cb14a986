import { Bot } from "grammy";
import type { BotConfig } from "../config";
import {
  handleCampaign,
  handleCancel,
  handleCost,
  handleHealth,
  handlePlatforms,
  handleStart,
  handleTemplates,
} from "./handlers/commands";
import type { BotDeps } from "./types";

/**
 * Creates and configures the grammY Bot instance with all middleware and handlers.
 */
export function createBot(config: BotConfig, deps: BotDeps): Bot {
  const bot = new Bot(config.botToken);

  // --- Authorization middleware ---
  if (config.authorizedChats.length > 0) {
    bot.use(async (ctx, next) => {
      const chatId = ctx.chat?.id;
      if (chatId && !config.authorizedChats.includes(chatId)) {
        console.log(`[auth] Rejected message from unauthorized chat ${chatId}`);
        return; // Silently drop
      }
      await next();
    });
  }

  // --- Error handler ---
  bot.catch((err) => {
    console.error("[bot] Unhandled error:", err.message);
    console.error(err.stack);
  });

  // --- Commands ---
  bot.command("start", (ctx) => handleStart(ctx));
  bot.command("help", (ctx) => handleStart(ctx));
  bot.command("platforms", (ctx) => handlePlatforms(ctx));
  bot.command("templates", (ctx) => handleTemplates(ctx));
  bot.command("cost", (ctx) => handleCost(ctx, ctx.match));
  bot.command("campaign", (ctx) => handleCampaign(ctx, ctx.match, "content-only", deps));
  bot.command("campaign_full", (ctx) => handleCampaign(ctx, ctx.match, "full", deps));
  bot.command("cancel", (ctx) => handleCancel(ctx, deps));
  bot.command("health", (ctx) => handleHealth(ctx, deps));

  // --- Anything else ---
  bot.on("message:text", (ctx) => {
    if (ctx.message.text.startsWith("/")) {
      return ctx.reply("Unknown command. Send /help for the list.");
    }
    return ctx.reply("Send /campaign <targets> <brief> to generate posts, or /help.");
  });

  return bot;
}
