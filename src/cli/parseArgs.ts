import * as path from "path";
import {
  CONTENT_STYLES,
  HASHTAG_STRATEGIES,
  IMAGE_STYLES,
} from "../contracts";
import type {
  ContentStyle,
  HashtagStrategy,
  ImageModel,
  ImageStyle,
  VideoModel,
} from "../contracts";
import { IMAGE_MODELS, VIDEO_MODELS, isImageModel, isVideoModel } from "../pricing/priceTable";

// --- CLI Arg Types ---

interface CampaignArgs {
  brief: string;
  platforms: string[];
  all: boolean;
  template?: string;
  style?: ContentStyle;
  hashtagStrategy?: HashtagStrategy;
  audience?: string;
  includeCta: boolean;
  outDir?: string;
}

export interface ContentArgs extends CampaignArgs {
  command: "content";
}

export interface BatchArgs extends CampaignArgs {
  command: "batch";
  imageStyle?: ImageStyle;
  includeBase64: boolean;
}

export interface CostArgs {
  command: "cost";
  images1k: number;
  images2k: number;
  videoSeconds: number;
  contentPieces: number;
  imageModel: ImageModel;
  videoModel: VideoModel;
}

export interface HealthArgs {
  command: "health";
}

export interface PlatformsArgs {
  command: "platforms";
}

export interface TemplatesArgs {
  command: "templates";
  name?: string;
}

export interface PricingArgs {
  command: "pricing";
}

export type ParsedArgs =
  | ContentArgs
  | BatchArgs
  | CostArgs
  | HealthArgs
  | PlatformsArgs
  | TemplatesArgs
  | PricingArgs;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// --- Usage ---

export const USAGE = [
  "Usage:",
  '  campaign content "<brief>" (--platform <id>... | --all | --template <name>)',
  "           [--style <s>] [--hashtag-strategy <h>] [--audience <a>] [--no-cta] [--out <dir>]",
  '  campaign batch "<brief>" (--platform <id>... | --all | --template <name>)',
  "           [--style <s>] [--hashtag-strategy <h>] [--audience <a>] [--no-cta]",
  "           [--image-style <s>] [--include-base64] [--out <dir>]",
  "  campaign cost [--images-1k <n>] [--images-2k <n>] [--video-seconds <n>] [--content-pieces <n>]",
  "           [--image-model imagen-3.0|imagen-4.0] [--video-model veo2|veo3|veo3_fast]",
  "  campaign health",
  "  campaign platforms",
  "  campaign templates [name]",
  "  campaign pricing",
].join("\n");

// --- Helpers ---

function pick<T extends string>(flag: string, values: readonly T[], raw: string): T {
  const match = values.find((v) => v === raw);
  if (match === undefined) {
    throw new CliUsageError(`${flag} must be one of: ${values.join(", ")}`);
  }
  return match;
}

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} requires a number, got "${raw}"`);
  }
  return value;
}

/** Walks flags after the positional args, handing each one its value on request. */
class FlagReader {
  private i: number;

  constructor(
    private readonly args: string[],
    start: number
  ) {
    this.i = start;
  }

  *flags(): Generator<string> {
    while (this.i < this.args.length) {
      const flag = this.args[this.i++];
      yield flag;
    }
  }

  value(flag: string): string {
    const next = this.args[this.i];
    if (next === undefined || next.startsWith("--")) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    this.i++;
    return next;
  }
}

// --- Command parsers ---

function parseCampaign(command: "content" | "batch", args: string[]): ContentArgs | BatchArgs {
  if (args.length < 2 || args[1].startsWith("--") || args[1].trim() === "") {
    throw new CliUsageError(`'${command}' requires a campaign brief.`);
  }

  const base: CampaignArgs = {
    brief: args[1],
    platforms: [],
    all: false,
    includeCta: true,
  };
  let imageStyle: ImageStyle | undefined;
  let includeBase64 = false;

  const reader = new FlagReader(args, 2);
  for (const flag of reader.flags()) {
    switch (flag) {
      case "--platform":
        base.platforms.push(reader.value(flag));
        break;
      case "--all":
        base.all = true;
        break;
      case "--template":
        base.template = reader.value(flag);
        break;
      case "--style":
        base.style = pick(flag, CONTENT_STYLES, reader.value(flag));
        break;
      case "--hashtag-strategy":
        base.hashtagStrategy = pick(flag, HASHTAG_STRATEGIES, reader.value(flag));
        break;
      case "--audience":
        base.audience = reader.value(flag);
        break;
      case "--no-cta":
        base.includeCta = false;
        break;
      case "--out":
        base.outDir = path.resolve(reader.value(flag));
        break;
      case "--image-style":
        if (command !== "batch") throw new CliUsageError(`Unknown argument "${flag}"`);
        imageStyle = pick(flag, IMAGE_STYLES, reader.value(flag));
        break;
      case "--include-base64":
        if (command !== "batch") throw new CliUsageError(`Unknown argument "${flag}"`);
        includeBase64 = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument "${flag}"`);
    }
  }

  const sources = [base.platforms.length > 0, base.all, base.template !== undefined].filter(Boolean).length;
  if (sources === 0) {
    throw new CliUsageError(`'${command}' requires --platform, --all or --template.`);
  }
  if (base.all && base.template !== undefined) {
    throw new CliUsageError("--all and --template cannot be combined.");
  }
  if (base.all && base.platforms.length > 0) {
    throw new CliUsageError("--all and --platform cannot be combined.");
  }

  if (command === "content") {
    return { command, ...base };
  }
  return { command, ...base, imageStyle, includeBase64 };
}

function parseCost(args: string[]): CostArgs {
  const parsed: CostArgs = {
    command: "cost",
    images1k: 0,
    images2k: 0,
    videoSeconds: 0,
    contentPieces: 0,
    imageModel: "imagen-3.0",
    videoModel: "veo3",
  };

  const reader = new FlagReader(args, 1);
  for (const flag of reader.flags()) {
    switch (flag) {
      case "--images-1k":
        parsed.images1k = parseNumber(flag, reader.value(flag));
        break;
      case "--images-2k":
        parsed.images2k = parseNumber(flag, reader.value(flag));
        break;
      case "--video-seconds":
        parsed.videoSeconds = parseNumber(flag, reader.value(flag));
        break;
      case "--content-pieces":
        parsed.contentPieces = parseNumber(flag, reader.value(flag));
        break;
      case "--image-model": {
        const value = reader.value(flag);
        if (!isImageModel(value)) {
          throw new CliUsageError(`${flag} must be one of: ${IMAGE_MODELS.join(", ")}`);
        }
        parsed.imageModel = value;
        break;
      }
      case "--video-model": {
        const value = reader.value(flag);
        if (!isVideoModel(value)) {
          throw new CliUsageError(`${flag} must be one of: ${VIDEO_MODELS.join(", ")}`);
        }
        parsed.videoModel = value;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument "${flag}"`);
    }
  }

  return parsed;
}

function noExtraArgs(command: string, args: string[], allowed: number): void {
  if (args.length > allowed) {
    throw new CliUsageError(`'${command}' does not accept additional arguments.`);
  }
}

// --- CLI Parsing ---

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.length === 0) {
    throw new CliUsageError("No command provided.");
  }

  const command = args[0];
  switch (command) {
    case "content":
    case "batch":
      return parseCampaign(command, args);
    case "cost":
      return parseCost(args);
    case "health":
      noExtraArgs(command, args, 1);
      return { command };
    case "platforms":
      noExtraArgs(command, args, 1);
      return { command };
    case "pricing":
      noExtraArgs(command, args, 1);
      return { command };
    case "templates":
      noExtraArgs(command, args, 2);
      return args[1] === undefined ? { command } : { command, name: args[1] };
    default:
      throw new CliUsageError(
        command.startsWith("--") ? `Unknown flag "${command}"` : `Unknown command "${command}"`
      );
  }
}
