import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseProvidersToml, loadProviderConfig, getEffectiveAWSConfig, clearConfigCache } from "./config";

const ENV_KEYS = [
  "OFFERDESK_PROVIDERS_CONFIG",
  "AWS_ACCESS_KEY_ID",
  "AWS_SECRET_ACCESS_KEY",
  "AWS_PROFILE",
  "AWS_PRICING_REGION",
] as const;

let tempDir: string;
const savedEnv: Record<string, string | undefined> = {};

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), "offerdesk-config-test-"));
  for (const key of ENV_KEYS) {
    savedEnv[key] = process.env[key];
    delete process.env[key];
  }
  process.env.OFFERDESK_PROVIDERS_CONFIG = join(tempDir, "providers.toml");
  clearConfigCache();
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  clearConfigCache();
  rmSync(tempDir, { recursive: true });
  vi.restoreAllMocks();
});

function writeConfig(content: string): void {
  writeFileSync(join(tempDir, "providers.toml"), content);
}

describe("parseProvidersToml", () => {
  test("reads sections with strings, booleans and numbers", () => {
    const parsed = parseProvidersToml(
      [
        "# provider settings",
        "debug = true",
        "[aws]",
        'pricing_region = "eu-central-1" # Frankfurt',
        "enabled = false",
        "retries = 3",
        "spot_product_description = 'Linux/UNIX'",
        "not an entry",
      ].join("\n")
    );

    expect(parsed).toEqual({
      aws: {
        pricing_region: "eu-central-1",
        enabled: false,
        retries: 3,
        spot_product_description: "Linux/UNIX",
      },
    });
  });

  test("a # inside quotes is kept", () => {
    expect(parseProvidersToml('[aws]\nname = "a#b"')["aws"]).toEqual({ name: "a#b" });
  });

  test("a repeated section header merges its entries", () => {
    expect(parseProvidersToml("[aws]\na = 1\n[gcp]\nb = 2\n[aws]\nc = x")).toEqual({
      aws: { a: 1, c: "x" },
      gcp: { b: 2 },
    });
  });
});

describe("getEffectiveAWSConfig", () => {
  test("defaults when no file and no env", () => {
    expect(getEffectiveAWSConfig()).toEqual({
      enabled: false,
      pricing_region: "us-east-1",
      access_key_id: undefined,
      secret_access_key: undefined,
      spot_product_description: "Linux/UNIX",
    });
  });

  test("env credentials enable the provider", () => {
    process.env.AWS_ACCESS_KEY_ID = "test-key-id";
    process.env.AWS_SECRET_ACCESS_KEY = "test-secret";
    const config = getEffectiveAWSConfig();
    expect(config.enabled).toBe(true);
    expect(config.access_key_id).toBe("test-key-id");
    expect(config.secret_access_key).toBe("test-secret");
  });

  test("file values take precedence over env", () => {
    process.env.AWS_PRICING_REGION = "ap-south-1";
    writeConfig('[aws]\nenabled = true\npricing_region = "eu-central-1"\nspot_product_description = "SUSE Linux"');
    const config = getEffectiveAWSConfig();
    expect(config.enabled).toBe(true);
    expect(config.pricing_region).toBe("eu-central-1");
    expect(config.spot_product_description).toBe("SUSE Linux");
  });

  test("a malformed [aws] section is ignored with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeConfig("[aws]\nenabled = 1");
    expect(loadProviderConfig()).toEqual({});
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test("config is cached until cleared", () => {
    writeConfig("[aws]\nenabled = true");
    expect(loadProviderConfig().aws?.enabled).toBe(true);
    writeConfig("[aws]\nenabled = false");
    expect(loadProviderConfig().aws?.enabled).toBe(true);
    clearConfigCache();
    expect(loadProviderConfig().aws?.enabled).toBe(false);
  });
});
