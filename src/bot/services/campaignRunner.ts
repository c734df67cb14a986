import type { CampaignBrief, CampaignMode, CampaignResult } from "../../contracts";
import type { CampaignOrchestrator } from "../../campaign/orchestrator";

export type RunOutcome =
  | { status: "done"; result: CampaignResult }
  | { status: "busy" };

/**
 * One campaign at a time per chat. The in-flight run can be cancelled
 * from /cancel; its unfinished platforms come back as Cancelled.
 */
export class CampaignRunner {
  private readonly inFlight = new Map<number, AbortController>();

  constructor(private readonly orchestrator: CampaignOrchestrator) {}

  isBusy(chatId: number): boolean {
    return this.inFlight.has(chatId);
  }

  async run(chatId: number, brief: CampaignBrief, mode: CampaignMode): Promise<RunOutcome> {
    if (this.inFlight.has(chatId)) {
      return { status: "busy" };
    }

    const controller = new AbortController();
    this.inFlight.set(chatId, controller);
    console.log(`[bot] Chat ${chatId}: ${mode} campaign for ${brief.platforms.join(", ")}`);

    try {
      const opts = { signal: controller.signal };
      const result =
        mode === "full"
          ? await this.orchestrator.run(brief, opts)
          : await this.orchestrator.runContentOnly(brief, opts);
      console.log(
        `[bot] Chat ${chatId}: ${result.readyCount}/${result.platformsRequested} ready, ` +
          `$${result.estimatedCostUsd.toFixed(4)}`
      );
      return { status: "done", result };
    } finally {
      this.inFlight.delete(chatId);
    }
  }

  /** Returns false when nothing was running for the chat. */
  cancel(chatId: number): boolean {
    const controller = this.inFlight.get(chatId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  cancelAll(): void {
    for (const controller of this.inFlight.values()) {
      controller.abort();
    }
  }
}
