// 역할: Ozon Seller API 연동(상품 목록, 재고/가격 업데이트)과 Ozon용 타깃 구성.

import { z } from "zod";
import type { OzonConfig } from "../config/env";
import { HttpClient, type FetchLike } from "../http/client";
import { collectOfferIds, type CursorPage } from "../pipeline/offerCatalog";
import type { OfferId, UploadResponse } from "../types";
import type { MarketplaceTarget } from "./types";

const PRODUCT_LIST_PATH = "/v2/product/list";
const STOCKS_PATH = "/v1/product/import/stocks";
const PRICES_PATH = "/v1/product/import/prices";
const PAGE_SIZE = 1000;

export type OzonStock = {
  offer_id: string;
  stock: number;
};

export type OzonPrice = {
  auto_action_enabled: "UNKNOWN";
  currency_code: "RUB";
  offer_id: string;
  old_price: string;
  price: string;
};

const productListSchema = z.object({
  result: z.object({
    items: z.array(z.object({ offer_id: z.string() }).passthrough()),
    total: z.number().int().nonnegative(),
    last_id: z.string(),
  }),
});

const importResultSchema = z.object({
  result: z.array(
    z
      .object({
        offer_id: z.string().optional(),
        updated: z.boolean(),
        errors: z.array(z.unknown()).default([]),
      })
      .passthrough(),
  ),
});

type ImportResult = z.output<typeof importResultSchema>;

// 역할: Client-Id/Api-Key 헤더를 가진 Ozon 클라이언트를 만든다.
export function createOzonClient(
  config: Pick<OzonConfig, "baseUrl" | "clientId" | "sellerToken">,
  options: { timeoutMs: number; minTimeMs?: number; fetch?: FetchLike },
): HttpClient {
  return new HttpClient({
    baseUrl: config.baseUrl,
    headers: {
      "Client-Id": config.clientId,
      "Api-Key": config.sellerToken,
    },
    ...options,
  });
}

// 역할: 상품 목록 한 페이지를 last_id 커서로 가져온다.
export async function fetchOzonProductPage(
  client: HttpClient,
  lastId: string,
): Promise<CursorPage> {
  const response = await client.postJson(PRODUCT_LIST_PATH, productListSchema, {
    body: {
      filter: { visibility: "ALL" },
      last_id: lastId,
      limit: PAGE_SIZE,
    },
  });
  return {
    items: response.result.items.map((item) => item.offer_id),
    total: response.result.total,
    lastId: response.result.last_id,
  };
}

export async function fetchOzonOfferIds(client: HttpClient): Promise<OfferId[]> {
  return collectOfferIds({
    style: "cursor",
    fetchPage: (cursor) => fetchOzonProductPage(client, cursor),
  });
}

export async function updateOzonStocks(
  client: HttpClient,
  stocks: OzonStock[],
): Promise<UploadResponse> {
  const body = await client.postJson(STOCKS_PATH, importResultSchema, {
    body: { stocks },
  });
  return { status: importStatus(body), body };
}

export async function updateOzonPrices(
  client: HttpClient,
  prices: OzonPrice[],
): Promise<UploadResponse> {
  const body = await client.postJson(PRICES_PATH, importResultSchema, {
    body: { prices },
  });
  return { status: importStatus(body), body };
}

// 역할: 모든 항목이 updated면 OK, 하나라도 실패하면 ERROR.
function importStatus(body: ImportResult): UploadResponse["status"] {
  const rejected = body.result.filter(
    (item) => !item.updated || item.errors.length > 0,
  );
  return rejected.length === 0 ? "OK" : "ERROR";
}

export function createOzonTarget(
  client: HttpClient,
  config: Pick<OzonConfig, "stockBatchSize" | "priceBatchSize">,
): MarketplaceTarget<OzonStock, OzonPrice> {
  return {
    label: "ozon",
    stockBatchSize: config.stockBatchSize,
    priceBatchSize: config.priceBatchSize,
    fetchOfferIds: () => fetchOzonOfferIds(client),
    buildStock: (offerId, count) => ({ offer_id: offerId, stock: count }),
    buildPrice: (offerId, price) => ({
      auto_action_enabled: "UNKNOWN",
      currency_code: "RUB",
      offer_id: offerId,
      old_price: "0",
      price: String(price),
    }),
    stockCount: (record) => record.stock,
    sendStocks: (batch) => updateOzonStocks(client, batch),
    sendPrices: (batch) => updateOzonPrices(client, batch),
  };
}
