import type { CampaignConfig } from "../config";
import type { GenerationServices } from "../generation/gemini";
import { createOrchestrator } from "./orchestrator";
import type { CampaignOrchestrator } from "./orchestrator";

export { createOrchestrator, clampConcurrency, DEFAULT_CONCURRENCY, MAX_CONCURRENCY } from "./orchestrator";
export type { CampaignOrchestrator, OrchestratorDeps, RunOptions } from "./orchestrator";
export { parseCampaignBrief, InvalidCampaignError } from "./brief";
export type { CampaignBriefInput } from "./brief";
export {
  serializeCampaign,
  serializeCostBreakdown,
  serializePlatformResult,
  serializePlatformSpec,
} from "./serialize";
export { writeCampaignOutput } from "./output";
export { healthCheck } from "./health";
export type { HealthReport } from "./health";
export {
  briefFromTemplate,
  getTemplate,
  getTemplateConfig,
  isTemplateName,
  listTemplates,
  UnknownTemplateError,
} from "./templates";

/** Orchestrator wired with the configured limits and timeouts. */
export function orchestratorFromConfig(
  config: CampaignConfig,
  services: GenerationServices
): CampaignOrchestrator {
  return createOrchestrator({
    text: services.text,
    image: services.image,
    concurrency: config.concurrency,
    textTimeoutMs: config.textTimeoutMs,
    imageTimeoutMs: config.imageTimeoutMs,
    maxRegenerations: config.maxRegenerations,
  });
}
