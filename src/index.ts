#!/usr/bin/env node
import { parseArgs, CliUsageError, USAGE } from "./cli/parseArgs";
import type { BatchArgs, ContentArgs, CostArgs, ParsedArgs } from "./cli/parseArgs";
import { ConfigError, loadConfig, loadEnvFile } from "./config";
import type { CampaignConfig } from "./config";
import { createGeminiServices } from "./generation/gemini";
import { getAllPlatformSpecs, getAvailablePlatforms } from "./social/registry";
import { CostCalculationError, estimateCost } from "./pricing/costEstimator";
import { getModelCatalog, getPricingInfo } from "./pricing/catalog";
import {
  briefFromTemplate,
  getTemplate,
  getTemplateConfig,
  healthCheck,
  InvalidCampaignError,
  listTemplates,
  orchestratorFromConfig,
  parseCampaignBrief,
  serializeCampaign,
  serializeCostBreakdown,
  serializePlatformSpec,
  UnknownTemplateError,
  writeCampaignOutput,
} from "./campaign";
import type { CampaignBrief } from "./contracts";
import { PathEscapeError } from "./lib/pathSafety";
import { errorMessage } from "./lib/timeout";

// Results go to stdout as JSON; everything else goes to stderr.
function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- Campaign Commands ---

function resolveBrief(args: ContentArgs | BatchArgs): CampaignBrief {
  const imageStyle = args.command === "batch" ? args.imageStyle : undefined;

  if (args.template !== undefined) {
    return briefFromTemplate(args.template, args.brief, {
      platforms: args.platforms,
      style: args.style,
      hashtagStrategy: args.hashtagStrategy,
      imageStyle,
      targetAudience: args.audience,
      includeCta: args.includeCta,
    });
  }

  return parseCampaignBrief({
    brief: args.brief,
    platforms: args.all ? getAvailablePlatforms() : args.platforms,
    style: args.style,
    hashtagStrategy: args.hashtagStrategy,
    targetAudience: args.audience,
    imageStyle,
    includeCta: args.includeCta,
  });
}

async function runCampaignCommand(args: ContentArgs | BatchArgs, config: CampaignConfig): Promise<void> {
  const brief = resolveBrief(args);
  const services = createGeminiServices(config);
  const orchestrator = orchestratorFromConfig(config, services);

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error("[campaign] Interrupted, cancelling unfinished platforms...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  console.error(
    `[campaign] Generating ${args.command === "batch" ? "content and images" : "content"} ` +
      `for ${brief.platforms.length} platform(s)...`
  );

  try {
    const result =
      args.command === "batch"
        ? await orchestrator.run(brief, { signal: controller.signal })
        : await orchestrator.runContentOnly(brief, { signal: controller.signal });

    console.error(
      `[campaign] ${result.readyCount}/${result.platformsRequested} ready for posting, ` +
        `estimated cost $${result.estimatedCostUsd.toFixed(4)}`
    );

    if (args.outDir !== undefined) {
      const written = writeCampaignOutput(result, args.outDir);
      for (const platform of written.platforms) {
        console.error(`Wrote ${platform.captionPath}`);
        if (platform.imagePath) console.error(`Wrote ${platform.imagePath} (sha256 ${platform.imageSha256})`);
      }
      console.error(`Wrote ${written.campaignJsonPath}`);
    }

    printJson(serializeCampaign(result, { includeBase64: args.command === "batch" && args.includeBase64 }));
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

// --- Cost Command ---

function runCostCommand(args: CostArgs): void {
  const breakdown = estimateCost(
    {
      images1k: args.images1k,
      images2k: args.images2k,
      videoSeconds: args.videoSeconds,
      contentPieces: args.contentPieces,
    },
    args.imageModel,
    args.videoModel
  );
  printJson({ ...serializeCostBreakdown(breakdown), timestamp: new Date().toISOString() });
}

// --- Health Command ---

async function runHealthCommand(config: CampaignConfig): Promise<void> {
  const services = config.geminiApiKey ? createGeminiServices(config) : null;
  const report = await healthCheck({ config, services });
  printJson(report);
  if (report.status !== "healthy") {
    process.exitCode = 1;
  }
}

// --- Catalog Commands ---

function runTemplatesCommand(name: string | undefined): void {
  if (name !== undefined) {
    printJson(getTemplateConfig(name));
    return;
  }
  printJson(
    listTemplates().map((template) => {
      const t = getTemplate(template);
      return { name: template, campaign_type: t.campaignType, platforms: t.platforms };
    })
  );
}

// --- Main ---

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

async function main(): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }

  switch (parsed.command) {
    case "platforms":
      printJson(getAllPlatformSpecs().map(serializePlatformSpec));
      return;
    case "templates":
      runTemplatesCommand(parsed.name);
      return;
    case "pricing":
      printJson({ pricing: getPricingInfo(), models: getModelCatalog() });
      return;
    case "cost":
      runCostCommand(parsed);
      return;
  }

  // Remaining commands talk to the generation services.
  loadEnvFile();
  const config = loadConfig();

  if (parsed.command === "health") {
    await runHealthCommand(config);
    return;
  }

  await runCampaignCommand(parsed, config);
}

main().catch((err: unknown) => {
  if (
    err instanceof ConfigError ||
    err instanceof InvalidCampaignError ||
    err instanceof UnknownTemplateError ||
    err instanceof CostCalculationError ||
    err instanceof PathEscapeError
  ) {
    fail(err.message);
  }
  console.error(`Unexpected error: ${errorMessage(err)}`);
  process.exit(1);
});
