// provider/pricing/aws.ts - AWS price list provider
//
// Offers come from the Price List API (GetProducts, AmazonEC2, one region at a
// time). The API carries no spot terms, so every hourly compute offer is
// mirrored as a Spot offer; the real spot rate is looked up on demand from
// EC2 spot price history.

import {
  PricingClient,
  GetProductsCommand,
  type GetProductsCommandInput,
  type GetProductsCommandOutput,
} from "@aws-sdk/client-pricing";
import {
  EC2Client,
  DescribeSpotPriceHistoryCommand,
  type DescribeSpotPriceHistoryCommandInput,
  type DescribeSpotPriceHistoryCommandOutput,
} from "@aws-sdk/client-ec2";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  GB_MONTH_UNIT,
  HOURS_PER_MONTH,
  INSTANCE_PRODUCT_FAMILY,
  ProviderError,
  STORAGE_PRODUCT_FAMILY,
  TIMING,
  TermType,
  type CloudRegion,
  type InstanceOffer,
} from "@offerdesk/contracts";
import type { PriceListProvider } from "../types";
import { getEffectiveAWSConfig, type EffectiveAWSConfig } from "../config";

// =============================================================================
// Price List Item Schema
// =============================================================================

const PriceDimensionSchema = Type.Object({
  unit: Type.String(),
  pricePerUnit: Type.Object({ USD: Type.Optional(Type.String()) }),
});

const PriceListItemSchema = Type.Object({
  product: Type.Object({
    sku: Type.String(),
    productFamily: Type.Optional(Type.String()),
    attributes: Type.Record(Type.String(), Type.String()),
  }),
  terms: Type.Object({
    OnDemand: Type.Optional(
      Type.Record(
        Type.String(),
        Type.Object({ priceDimensions: Type.Record(Type.String(), PriceDimensionSchema) })
      )
    ),
  }),
  publicationDate: Type.Optional(Type.String()),
});

type PriceListItem = Static<typeof PriceListItemSchema>;

const SUPPORTED_FAMILIES = new Set([INSTANCE_PRODUCT_FAMILY, STORAGE_PRODUCT_FAMILY]);

// Compute SKUs also come with bundled software (SQL Server) and capacity
// reservation variants that share the instance type; only the plain one is priced.
const PLAIN_SOFTWARE = "NA";
const USED_CAPACITY = "Used";

// =============================================================================
// AWS Error Handling
// =============================================================================

export function getAwsErrorCode(err: unknown): string {
  return err instanceof Error ? err.name : "Unknown";
}

export function mapAwsError(err: unknown, operation: string): ProviderError {
  const code = getAwsErrorCode(err);
  const message = `${operation} failed: ${err instanceof Error ? err.message : String(err)}`;
  switch (code) {
    case "ThrottlingException":
    case "Throttling":
    case "RequestLimitExceeded":
      return new ProviderError("AWS", message, { code: "RATE_LIMIT_ERROR", retryable: true, cause: err });
    case "AccessDeniedException":
    case "AuthFailure":
    case "UnauthorizedOperation":
    case "UnrecognizedClientException":
      return new ProviderError("AWS", message, { code: "AUTH_ERROR", cause: err });
    case "InvalidParameterException":
    case "InvalidParameterValue":
      return new ProviderError("AWS", message, { code: "INVALID_REQUEST", cause: err });
    default:
      return new ProviderError("AWS", message, { code: "PROVIDER_INTERNAL", cause: err });
  }
}

// =============================================================================
// Parsing
// =============================================================================

function numberAttr(value: string | undefined): number {
  if (!value) return 0;
  const n = parseFloat(value.replace(/,/g, ""));
  return isNaN(n) ? 0 : n;
}

/** Translate one Price List API document into on-demand offers for the region. */
export function parsePriceListItem(raw: string, region: CloudRegion): InstanceOffer[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    console.warn(`[aws-pricing] Skipping malformed price list entry in ${region.regionCode}`);
    return [];
  }
  if (!Value.Check(PriceListItemSchema, parsed)) {
    return [];
  }
  return toOffers(parsed, region);
}

function toOffers(item: PriceListItem, region: CloudRegion): InstanceOffer[] {
  const family = item.product.productFamily ?? "";
  if (!SUPPORTED_FAMILIES.has(family)) return [];

  const attrs = item.product.attributes;
  const isCompute = family === INSTANCE_PRODUCT_FAMILY;
  if (isCompute && (attrs["preInstalledSw"] !== PLAIN_SOFTWARE || attrs["capacitystatus"] !== USED_CAPACITY)) {
    return [];
  }
  const publishDate = item.publicationDate ? Date.parse(item.publicationDate) : NaN;
  const offers: InstanceOffer[] = [];

  for (const term of Object.values(item.terms.OnDemand ?? {})) {
    for (const dimension of Object.values(term.priceDimensions)) {
      const price = parseFloat(dimension.pricePerUnit.USD ?? "");
      if (isNaN(price) || price < 0) continue;
      offers.push({
        sku: item.product.sku,
        instanceType: (isCompute ? attrs["instanceType"] : attrs["volumeApiName"]) ?? "",
        regionId: region.id,
        cloudProvider: "AWS",
        termType: TermType.ON_DEMAND,
        pricePerUnit: price,
        currency: "USD",
        unit: dimension.unit,
        productFamily: family,
        operatingSystem: attrs["operatingSystem"] ?? "",
        tenancy: attrs["tenancy"] ?? "",
        volumeType: attrs["volumeType"] ?? "",
        vCPU: numberAttr(attrs["vcpu"]),
        memoryGb: numberAttr(attrs["memory"]),
        gpu: numberAttr(attrs["gpu"]),
        priceListPublishDate: isNaN(publishDate) ? 0 : publishDate,
      });
    }
  }
  return offers;
}

/** Spot mirrors of hourly compute offers, so spot availability can be checked against the catalog. */
export function withSpotMirrors(offers: InstanceOffer[]): InstanceOffer[] {
  const spot = offers
    .filter(o => o.productFamily === INSTANCE_PRODUCT_FAMILY && o.termType === TermType.ON_DEMAND)
    .map(o => ({ ...o, termType: TermType.SPOT }));
  return [...offers, ...spot];
}

/** Highest of the most recent quote in each availability zone. */
export function latestSpotPrice(output: DescribeSpotPriceHistoryCommandOutput): number {
  const latestByZone = new Map<string, { at: number; price: number }>();
  for (const entry of output.SpotPriceHistory ?? []) {
    const zone = entry.AvailabilityZone ?? "";
    const at = entry.Timestamp?.getTime() ?? 0;
    const price = parseFloat(entry.SpotPrice ?? "");
    if (isNaN(price)) continue;
    const current = latestByZone.get(zone);
    if (!current || at > current.at) latestByZone.set(zone, { at, price });
  }
  let max = 0;
  for (const { price } of latestByZone.values()) max = Math.max(max, price);
  return max;
}

// =============================================================================
// Provider
// =============================================================================

export interface AwsPriceListDeps {
  config?: EffectiveAWSConfig;
  fetchProducts?: (input: GetProductsCommandInput) => Promise<GetProductsCommandOutput>;
  fetchSpotHistory?: (
    regionCode: string,
    input: DescribeSpotPriceHistoryCommandInput
  ) => Promise<DescribeSpotPriceHistoryCommandOutput>;
  now?: () => number;
}

export function createAwsPriceListProvider(deps: AwsPriceListDeps = {}): PriceListProvider {
  const config = deps.config ?? getEffectiveAWSConfig();
  const credentials =
    config.access_key_id && config.secret_access_key
      ? { accessKeyId: config.access_key_id, secretAccessKey: config.secret_access_key }
      : undefined;
  const now = deps.now ?? Date.now;

  let pricingClient: PricingClient | null = null;
  const fetchProducts =
    deps.fetchProducts ??
    ((input: GetProductsCommandInput) => {
      pricingClient ??= new PricingClient({ region: config.pricing_region, credentials });
      return pricingClient.send(new GetProductsCommand(input));
    });

  const ec2Clients = new Map<string, EC2Client>();
  const fetchSpotHistory =
    deps.fetchSpotHistory ??
    ((regionCode: string, input: DescribeSpotPriceHistoryCommandInput) => {
      let client = ec2Clients.get(regionCode);
      if (!client) {
        client = new EC2Client({ region: regionCode, credentials });
        ec2Clients.set(regionCode, client);
      }
      return client.send(new DescribeSpotPriceHistoryCommand(input));
    });

  return {
    name: "AWS",

    async refreshPriceList(region) {
      const offers: InstanceOffer[] = [];
      let nextToken: string | undefined;
      let pages = 0;
      do {
        let page: GetProductsCommandOutput;
        try {
          page = await fetchProducts({
            ServiceCode: "AmazonEC2",
            FormatVersion: "aws_v1",
            Filters: [{ Type: "TERM_MATCH", Field: "regionCode", Value: region.regionCode }],
            NextToken: nextToken,
            MaxResults: 100,
          });
        } catch (err) {
          throw mapAwsError(err, `GetProducts(${region.regionCode})`);
        }
        for (const entry of page.PriceList ?? []) {
          offers.push(...parsePriceListItem(String(entry), region));
        }
        nextToken = page.NextToken;
        pages++;
      } while (nextToken);

      console.debug(`[aws-pricing] ${region.regionCode}: ${offers.length} on-demand offers from ${pages} pages`);
      return withSpotMirrors(offers);
    },

    async getSpotPrice(region, instanceType) {
      try {
        const output = await fetchSpotHistory(region.regionCode, {
          Filters: [{ Name: "instance-type", Values: [instanceType] }],
          ProductDescriptions: [config.spot_product_description],
          StartTime: new Date(now() - TIMING.SPOT_PRICE_LOOKBACK_MS),
        });
        return latestSpotPrice(output);
      } catch (err) {
        throw mapAwsError(err, `DescribeSpotPriceHistory(${region.regionCode}, ${instanceType})`);
      }
    },

    getPriceForDisk(_region, offers, diskGb) {
      if (diskGb <= 0) return 0;
      const perGbMonth = offers
        .filter(o => o.unit === GB_MONTH_UNIT)
        .map(o => o.pricePerUnit)
        .filter(price => price > 0);
      if (perGbMonth.length === 0) return 0;
      return (Math.min(...perGbMonth) / HOURS_PER_MONTH) * diskGb;
    },

    adjustOfferRequest(_region, criteria) {
      return { ...criteria, unit: GB_MONTH_UNIT };
    },
  };
}
