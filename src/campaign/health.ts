import * as fs from "fs";
import * as path from "path";
import type { CampaignConfig } from "../config";
import type { GenerationServices } from "../generation/gemini";
import { errorMessage, withTimeout } from "../lib/timeout";

export type HealthStatus = "healthy" | "degraded" | "unconfigured";

export interface ServiceHealth {
  configured: boolean;
  reachable: boolean;
  model: string;
  error?: string;
}

export interface HealthReport {
  status: HealthStatus;
  services: {
    text_generation: ServiceHealth;
    image_generation: ServiceHealth;
  };
  output_directory: string;
  output_directory_writable: boolean;
  config_errors: string[];
  timestamp: string;
}

export interface HealthCheckInput {
  config: CampaignConfig;
  /** null when the collaborators could not be built (missing credentials). */
  services: GenerationServices | null;
  probeTimeoutMs?: number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 5000;

async function probe(
  ping: (signal: AbortSignal) => Promise<void>,
  model: string,
  timeoutMs: number
): Promise<ServiceHealth> {
  try {
    await withTimeout(ping, timeoutMs);
    return { configured: true, reachable: true, model };
  } catch (err) {
    return { configured: true, reachable: false, model, error: errorMessage(err) };
  }
}

/**
 * Whether files can be created under dir. Walks up to the nearest existing
 * ancestor so the probe itself creates nothing.
 */
export function isDirectoryWritable(dir: string): boolean {
  let current = path.resolve(dir);
  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) return false;
    current = parent;
  }
  try {
    if (!fs.statSync(current).isDirectory()) return false;
    fs.accessSync(current, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/** Liveness probe. Never throws; every problem is reported in the result. */
export async function healthCheck(input: HealthCheckInput): Promise<HealthReport> {
  const { config, services } = input;
  const timeoutMs = input.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;

  const [text, image] = services
    ? await Promise.all([
        probe((signal) => services.text.ping(signal), services.text.model, timeoutMs),
        probe((signal) => services.image.ping(signal), services.image.model, timeoutMs),
      ])
    : [
        { configured: false, reachable: false, model: config.textModel },
        { configured: false, reachable: false, model: config.imageModel },
      ];

  const writable = isDirectoryWritable(config.outputDir);

  let status: HealthStatus;
  if (config.configErrors.length > 0 || !services) {
    status = "unconfigured";
  } else if (text.reachable && image.reachable && writable) {
    status = "healthy";
  } else {
    status = "degraded";
  }

  return {
    status,
    services: { text_generation: text, image_generation: image },
    output_directory: config.outputDir,
    output_directory_writable: writable,
    config_errors: [...config.configErrors],
    timestamp: new Date().toISOString(),
  };
}
