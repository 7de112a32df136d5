// 역할: 환경변수를 검증해서 마켓플레이스/재고 파일/HTTP 설정으로 변환한다.

import { z } from "zod";
import { ConfigError } from "../utils/errors";

type Env = Record<string, string | undefined>;

const DEFAULT_REMNANTS_URL = "https://timeworld.ru/upload/files/ostatki.zip";
const DEFAULT_OZON_BASE_URL = "https://api-seller.ozon.ru";
const DEFAULT_MARKET_BASE_URL = "https://api.partner.market.yandex.ru";

const required = z.string().trim().min(1);

// 역할: 비어 있는 값은 미설정으로 취급하고 기본값을 적용한다.
function optionalInt(defaultValue: number, min: number, max: number) {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.coerce.number().int().min(min).max(max).default(defaultValue));
}

function optionalUrl(defaultValue: string) {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : defaultValue))
    .pipe(z.string().url());
}

const httpSchema = z.object({
  HTTP_TIMEOUT_MS: optionalInt(60_000, 1, 600_000),
  HTTP_MIN_TIME_MS: optionalInt(0, 0, 60_000),
});

const feedSchema = z.object({
  REMNANTS_URL: optionalUrl(DEFAULT_REMNANTS_URL),
});

const ozonSchema = z.object({
  CLIENT_ID: required,
  SELLER_TOKEN: required,
  OZON_BASE_URL: optionalUrl(DEFAULT_OZON_BASE_URL),
  OZON_STOCK_BATCH_SIZE: optionalInt(100, 1, 100),
  OZON_PRICE_BATCH_SIZE: optionalInt(900, 1, 1000),
});

const marketSchema = z.object({
  MARKET_TOKEN: required,
  FBS_ID: required,
  DBS_ID: required,
  WAREHOUSE_FBS_ID: z.coerce.number().int().positive(),
  WAREHOUSE_DBS_ID: z.coerce.number().int().positive(),
  MARKET_BASE_URL: optionalUrl(DEFAULT_MARKET_BASE_URL),
  MARKET_STOCK_BATCH_SIZE: optionalInt(2000, 1, 2000),
  MARKET_PRICE_BATCH_SIZE: optionalInt(500, 1, 500),
});

export type HttpConfig = {
  timeoutMs: number;
  minTimeMs: number;
};

export type FeedConfig = {
  url: string;
};

export type OzonConfig = {
  clientId: string;
  sellerToken: string;
  baseUrl: string;
  stockBatchSize: number;
  priceBatchSize: number;
};

export type MarketCampaignConfig = {
  label: "fbs" | "dbs";
  campaignId: string;
  warehouseId: number;
};

export type MarketConfig = {
  token: string;
  baseUrl: string;
  campaigns: MarketCampaignConfig[];
  stockBatchSize: number;
  priceBatchSize: number;
};

// 역할: zod 스키마로 환경변수를 파싱하고 실패 시 ConfigError로 감싼다.
function parseEnv<S extends z.ZodTypeAny>(
  schema: S,
  env: Env,
  scope: string,
): z.output<S> {
  const parsed = schema.safeParse(env);
  if (parsed.success) {
    return parsed.data;
  }
  const variables = Array.from(
    new Set(parsed.error.issues.map((issue) => String(issue.path[0] ?? "?"))),
  );
  throw new ConfigError(
    `invalid ${scope} configuration: ${variables.join(", ")}`,
    variables,
  );
}

export function loadHttpConfig(env: Env = process.env): HttpConfig {
  const parsed = parseEnv(httpSchema, env, "http");
  return {
    timeoutMs: parsed.HTTP_TIMEOUT_MS,
    minTimeMs: parsed.HTTP_MIN_TIME_MS,
  };
}

export function loadFeedConfig(env: Env = process.env): FeedConfig {
  const parsed = parseEnv(feedSchema, env, "remnant feed");
  return { url: parsed.REMNANTS_URL };
}

export function loadOzonConfig(env: Env = process.env): OzonConfig {
  const parsed = parseEnv(ozonSchema, env, "ozon");
  return {
    clientId: parsed.CLIENT_ID,
    sellerToken: parsed.SELLER_TOKEN,
    baseUrl: parsed.OZON_BASE_URL,
    stockBatchSize: parsed.OZON_STOCK_BATCH_SIZE,
    priceBatchSize: parsed.OZON_PRICE_BATCH_SIZE,
  };
}

export function loadMarketConfig(env: Env = process.env): MarketConfig {
  const parsed = parseEnv(marketSchema, env, "yandex market");
  return {
    token: parsed.MARKET_TOKEN,
    baseUrl: parsed.MARKET_BASE_URL,
    campaigns: [
      {
        label: "fbs",
        campaignId: parsed.FBS_ID,
        warehouseId: parsed.WAREHOUSE_FBS_ID,
      },
      {
        label: "dbs",
        campaignId: parsed.DBS_ID,
        warehouseId: parsed.WAREHOUSE_DBS_ID,
      },
    ],
    stockBatchSize: parsed.MARKET_STOCK_BATCH_SIZE,
    priceBatchSize: parsed.MARKET_PRICE_BATCH_SIZE,
  };
}
