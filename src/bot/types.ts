import type { CampaignConfig } from "../config";
import type { GenerationServices } from "../generation/gemini";
import type { CampaignRunner } from "./services/campaignRunner";

/** What the handlers need besides the grammY context. */
export interface BotDeps {
  config: CampaignConfig;
  /** null when the generation services are not configured. */
  services: GenerationServices | null;
  runner: CampaignRunner | null;
}
