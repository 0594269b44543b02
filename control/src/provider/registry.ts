// provider/registry.ts - Price list provider registry & dispatch

import { ProviderError, type CloudProvider } from "@offerdesk/contracts";
import type { PriceListProvider } from "./types";

const providers = new Map<CloudProvider, PriceListProvider>();

export function registerPriceListProvider(provider: PriceListProvider): void {
  providers.set(provider.name, provider);
  console.log(`[providers] Registered price list provider: ${provider.name}`);
}

export function getPriceListProvider(name: CloudProvider): PriceListProvider {
  const provider = providers.get(name);
  if (!provider) {
    throw new ProviderError(name, `Price list provider '${name}' not found in registry`, {
      code: "UNSUPPORTED_PROVIDER",
    });
  }
  return provider;
}

export function getRegisteredProviders(): CloudProvider[] {
  return [...providers.keys()];
}

/** Drop every registration. Test-only. */
export function clearPriceListProviders(): void {
  providers.clear();
}
