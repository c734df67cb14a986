import { loadBotConfig, loadConfig, loadEnvFile } from "../config";
import { createGeminiServices } from "../generation/gemini";
import { orchestratorFromConfig } from "../campaign";
import { createBot } from "./bot";
import { CampaignRunner } from "./services/campaignRunner";
import type { BotDeps } from "./types";

async function main(): Promise<void> {
  console.log("[campaign-bot] Starting...");

  // 1. Load configuration
  loadEnvFile();
  const botConfig = loadBotConfig();
  const config = loadConfig();
  console.log("[campaign-bot] Config loaded.");

  // 2. Generation services (the bot still answers catalog commands without them)
  const services = config.geminiApiKey ? createGeminiServices(config) : null;
  if (!services) {
    for (const err of config.configErrors) {
      console.warn(`[config] ${err}`);
    }
  }
  const deps: BotDeps = {
    config,
    services,
    runner: services ? new CampaignRunner(orchestratorFromConfig(config, services)) : null,
  };

  // 3. Create bot
  const bot = createBot(botConfig, deps);

  // 4. Graceful shutdown
  const shutdown = (): void => {
    console.log("\n[campaign-bot] Shutting down...");
    deps.runner?.cancelAll();
    bot.stop().then(
      () => {
        console.log("[campaign-bot] Goodbye.");
        process.exit(0);
      },
      (err: unknown) => {
        console.error("[campaign-bot] Error while stopping:", err);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  // 5. Start polling
  const me = await bot.api.getMe();
  console.log(`[campaign-bot] Logged in as @${me.username}`);
  console.log(
    `[campaign-bot] Models: ${config.textModel} (text), ${config.imageModel} (images); ` +
      `concurrency ${config.concurrency}`
  );
  if (botConfig.authorizedChats.length > 0) {
    console.log(
      `[campaign-bot] Authorized chats: ${botConfig.authorizedChats.join(", ")}`
    );
  } else {
    console.log("[campaign-bot] All chats authorized (no restriction).");
  }

  await bot.start();
}

main().catch((err) => {
  console.error("[campaign-bot] Fatal error:", err);
  process.exit(1);
});
