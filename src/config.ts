import * as dotenv from "dotenv";
import * as path from "path";
import type { ImageModel } from "./contracts";
import { isImageModel } from "./pricing/priceTable";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface CampaignConfig {
  /** Gemini API key for text and image generation (null when missing). */
  geminiApiKey: string | null;
  /** Text model id, e.g. gemini-2.5-flash */
  textModel: string;
  imageModel: ImageModel;
  /** Max platform pipelines running at once (1-10) */
  concurrency: number;
  textTimeoutMs: number;
  imageTimeoutMs: number;
  /** Extra text calls allowed when a caption breaks the platform limits (0-2) */
  maxRegenerations: number;
  /** Where campaign outputs are written when requested */
  outputDir: string;
  /** Startup problems that disable generation; surfaced through the health check */
  configErrors: string[];
}

export interface BotConfig {
  /** Telegram Bot API token */
  botToken: string;
  /** Comma-separated list of authorized Telegram chat IDs (empty = allow all) */
  authorizedChats: number[];
}

type Env = Record<string, string | undefined>;

/**
 * Load .env from the project root without overriding variables that are
 * already set. A missing file is fine.
 */
export function loadEnvFile(): void {
  dotenv.config({ path: path.resolve(__dirname, "../.env"), override: false });
}

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(
      `Invalid ${name}: "${raw}". Must be an integer between ${min} and ${max}.`
    );
  }
  return value;
}

export function loadConfig(env: Env = process.env): CampaignConfig {
  const configErrors: string[] = [];

  const geminiApiKey = env.GEMINI_API_KEY?.trim() || env.GOOGLE_API_KEY?.trim() || null;
  if (!geminiApiKey) {
    configErrors.push(
      "GEMINI_API_KEY is not set. Add it to .env or set it as an environment variable."
    );
  }

  const imageModelRaw = env.CAMPAIGN_IMAGE_MODEL?.trim() || "imagen-3.0";
  if (!isImageModel(imageModelRaw)) {
    throw new ConfigError(
      `Invalid CAMPAIGN_IMAGE_MODEL: "${imageModelRaw}". Must be one of: imagen-3.0, imagen-4.0.`
    );
  }

  return {
    geminiApiKey,
    textModel: env.CAMPAIGN_TEXT_MODEL?.trim() || "gemini-2.5-flash",
    imageModel: imageModelRaw,
    concurrency: readInt(env, "CAMPAIGN_CONCURRENCY", 3, 1, 10),
    textTimeoutMs: readInt(env, "CAMPAIGN_TEXT_TIMEOUT_MS", 8000, 100, 120000),
    imageTimeoutMs: readInt(env, "CAMPAIGN_IMAGE_TIMEOUT_MS", 10000, 100, 300000),
    maxRegenerations: readInt(env, "CAMPAIGN_CONTENT_MAX_REGENERATIONS", 0, 0, 2),
    outputDir: path.resolve(env.CAMPAIGN_OUTPUT_DIR?.trim() || "output"),
    configErrors,
  };
}

export function loadBotConfig(env: Env = process.env): BotConfig {
  const botToken = env.TELEGRAM_BOT_TOKEN;
  if (!botToken) {
    throw new ConfigError(
      "TELEGRAM_BOT_TOKEN is not set. Add it to .env or set it as an environment variable."
    );
  }

  const authorizedChatsRaw = env.TELEGRAM_AUTHORIZED_CHATS ?? "";
  const authorizedChats = authorizedChatsRaw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => {
      const n = Number(s);
      if (!Number.isFinite(n)) {
        throw new ConfigError(
          `Invalid chat ID in TELEGRAM_AUTHORIZED_CHATS: "${s}". Must be a number.`
        );
      }
      return n;
    });

  return { botToken, authorizedChats };
}
