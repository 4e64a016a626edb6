// services/pipelineDeps.ts
import type { ImporterConfig } from "./config.js";
import { DigiKeyAdapter, createDigiKeyTokenIssuer } from "./digikeyService.js";
import { FetchLike, defaultFetch } from "./http.js";
import { InvenTreeClient } from "./inventreeService.js";
import { MouserAdapter } from "./mouserService.js";
import type { PipelineDeps } from "./previewBuilder.js";
import { TokenCache } from "./tokenCache.js";

/**
 * Wires the production adapters. The Digi-Key token cache created here is
 * the one process-wide cache; every request goes through the same adapter.
 */
export function buildPipelineDeps(config: ImporterConfig, fetchImpl: FetchLike = defaultFetch): PipelineDeps {
  const tokens = new TokenCache(createDigiKeyTokenIssuer(config, fetchImpl));

  return {
    config,
    suppliers: {
      mouser: new MouserAdapter(config, fetchImpl),
      digikey: new DigiKeyAdapter(config, tokens, fetchImpl)
    },
    destination: new InvenTreeClient(config.destination, config.requestTimeoutMs, fetchImpl)
  };
}
