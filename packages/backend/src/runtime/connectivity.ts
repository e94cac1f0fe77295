import type { ServiceConnectionStatus } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { describeError } from "../errors.js";
import type { EmbeddingGatewayLike, GeneratorLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";

const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export function isGenerationConfigured(): boolean {
  return appConfig.LLM_BASE_URL.trim().length > 0 && appConfig.GENERATION_MODEL.trim().length > 0;
}

export function isEmbeddingConfigured(): boolean {
  const baseURL = appConfig.EMBEDDING_BASE_URL || appConfig.LLM_BASE_URL;
  return baseURL.trim().length > 0 && appConfig.EMBEDDING_MODEL.trim().length > 0;
}

interface ProbeOptions {
  timeoutMs?: number;
  configured?: boolean;
}

export async function checkEmbeddingConnection(
  gateway: Pick<EmbeddingGatewayLike, "ping">,
  options: ProbeOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!(options.configured ?? isEmbeddingConfigured())) {
    return "not_configured";
  }

  return probe(() => gateway.ping({ signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS) }));
}

export async function checkGenerationConnection(
  generator: Pick<GeneratorLike, "ping">,
  options: ProbeOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!(options.configured ?? isGenerationConfigured())) {
    return "not_configured";
  }

  return probe(() => generator.ping({ signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS) }));
}

async function probe(call: () => Promise<void>): Promise<ServiceConnectionStatus> {
  try {
    await call();
    return "ok";
  } catch (error) {
    logger.debug({ error: describeError(error) }, "Service probe failed");
    return "failed";
  }
}
