// provider/config.ts - Read ~/.offerdesk/providers.toml provider configuration
//
// One [section] per provider with credentials and pricing settings.
// Environment variables fill in whatever the file leaves out.

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// =============================================================================
// Provider Config Types
// =============================================================================

const AWSConfigSchema = Type.Object({
  enabled: Type.Optional(Type.Boolean()),
  /** Region hosting the Price List API endpoint. */
  pricing_region: Type.Optional(Type.String()),
  access_key_id: Type.Optional(Type.String()),
  secret_access_key: Type.Optional(Type.String()),
  /** Product description used for spot price history lookups. */
  spot_product_description: Type.Optional(Type.String()),
});

export type AWSConfig = Static<typeof AWSConfigSchema>;

export interface ProviderConfig {
  aws?: AWSConfig;
}

// =============================================================================
// Config File Path
// =============================================================================

function getConfigPath(): string {
  return process.env.OFFERDESK_PROVIDERS_CONFIG ?? join(homedir(), ".offerdesk", "providers.toml");
}

// =============================================================================
// providers.toml
// =============================================================================

type TomlScalar = string | number | boolean;
export type ProviderSections = Record<string, Record<string, TomlScalar>>;

const SECTION_LINE = /^\[([\w.-]+)\]$/;
const ENTRY_LINE = /^([\w.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^#\s]+))\s*(?:#.*)?$/;

/**
 * Parse the `[provider]` sections of providers.toml: one `key = value` per
 * line, with quoted strings, booleans and numbers. Entries before the first
 * section and lines that do not parse are skipped.
 */
export function parseProvidersToml(content: string): ProviderSections {
  const sections: ProviderSections = {};
  let current: Record<string, TomlScalar> | null = null;

  for (const line of content.split(/\r?\n/).map(l => l.trim())) {
    if (line === "" || line.startsWith("#")) continue;

    const header = SECTION_LINE.exec(line);
    if (header?.[1]) {
      current = sections[header[1]] ??= {};
      continue;
    }

    const entry = ENTRY_LINE.exec(line);
    if (!current || !entry?.[1]) continue;
    const quoted = entry[2] ?? entry[3];
    current[entry[1]] = quoted ?? toScalar(entry[4] ?? "");
  }
  return sections;
}

function toScalar(bare: string): TomlScalar {
  if (bare === "true" || bare === "false") return bare === "true";
  const n = Number(bare);
  return bare !== "" && Number.isFinite(n) ? n : bare;
}

// =============================================================================
// Load Config
// =============================================================================

let _cachedConfig: ProviderConfig | null = null;

/**
 * Load provider configuration from ~/.offerdesk/providers.toml.
 * Falls back to empty config if the file doesn't exist or a section is malformed.
 * Cached after first load.
 */
export function loadProviderConfig(): ProviderConfig {
  if (_cachedConfig) return _cachedConfig;

  const configPath = getConfigPath();
  if (!existsSync(configPath)) {
    _cachedConfig = {};
    return _cachedConfig;
  }

  try {
    const raw = parseProvidersToml(readFileSync(configPath, "utf-8"));
    _cachedConfig = mapToProviderConfig(raw, configPath);
  } catch (err) {
    console.warn(`[config] Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    _cachedConfig = {};
  }

  return _cachedConfig;
}

/** Clear the cached config. Test-only. */
export function clearConfigCache(): void {
  _cachedConfig = null;
}

function mapToProviderConfig(raw: ProviderSections, path: string): ProviderConfig {
  const config: ProviderConfig = {};
  const aws = raw["aws"];
  if (aws) {
    if (Value.Check(AWSConfigSchema, aws)) {
      config.aws = aws;
    } else {
      const first = Value.Errors(AWSConfigSchema, aws).First();
      console.warn(`[config] Ignoring [aws] in ${path}: ${first?.path ?? ""} ${first?.message ?? "invalid"}`);
    }
  }
  return config;
}

// =============================================================================
// Config Merge: TOML → env vars → defaults
// =============================================================================

export interface EffectiveAWSConfig {
  enabled: boolean;
  pricing_region: string;
  access_key_id?: string;
  secret_access_key?: string;
  spot_product_description: string;
}

/**
 * Get effective AWS config: providers.toml > env vars > defaults.
 */
export function getEffectiveAWSConfig(): EffectiveAWSConfig {
  const file = loadProviderConfig().aws ?? {};
  return {
    enabled: file.enabled ?? (!!process.env.AWS_ACCESS_KEY_ID || !!process.env.AWS_PROFILE),
    // The Price List API is only served from a handful of regions
    pricing_region: file.pricing_region ?? process.env.AWS_PRICING_REGION ?? "us-east-1",
    access_key_id: file.access_key_id ?? process.env.AWS_ACCESS_KEY_ID,
    secret_access_key: file.secret_access_key ?? process.env.AWS_SECRET_ACCESS_KEY,
    spot_product_description: file.spot_product_description ?? "Linux/UNIX",
  };
}
