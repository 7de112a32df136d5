// 역할: Yandex Market Partner API 연동(offer 매핑 목록, 재고/가격 업데이트)과 캠페인별 타깃 구성.

import { z } from "zod";
import type { MarketCampaignConfig, MarketConfig } from "../config/env";
import { HttpClient, type FetchLike } from "../http/client";
import { collectOfferIds, type TokenPage } from "../pipeline/offerCatalog";
import type { OfferId, UploadResponse } from "../types";
import type { MarketplaceTarget } from "./types";

const PAGE_SIZE = 200;

export type MarketStock = {
  sku: string;
  warehouseId: number;
  items: Array<{
    count: number;
    type: "FIT";
    updatedAt: string;
  }>;
};

export type MarketPrice = {
  id: string;
  price: {
    value: number;
    currencyId: "RUR";
  };
};

const offerMappingSchema = z.object({
  result: z.object({
    paging: z
      .object({ nextPageToken: z.string().nullish() })
      .passthrough()
      .optional(),
    offerMappingEntries: z.array(
      z.object({ offer: z.object({ shopSku: z.string() }).passthrough() }).passthrough(),
    ),
  }),
});

const statusSchema = z
  .object({ status: z.enum(["OK", "ERROR"]) })
  .passthrough();

// 역할: Bearer 토큰을 가진 Yandex Market 클라이언트를 만든다.
export function createMarketClient(
  config: Pick<MarketConfig, "baseUrl" | "token">,
  options: { timeoutMs: number; minTimeMs?: number; fetch?: FetchLike },
): HttpClient {
  return new HttpClient({
    baseUrl: config.baseUrl,
    headers: {
      Authorization: `Bearer ${config.token}`,
    },
    ...options,
  });
}

function campaignPath(campaignId: string, suffix: string): string {
  return `/campaigns/${encodeURIComponent(campaignId)}/${suffix}`;
}

// 역할: offer 매핑 목록 한 페이지를 page_token으로 가져온다.
export async function fetchMarketOfferPage(
  client: HttpClient,
  campaignId: string,
  pageToken: string,
): Promise<TokenPage> {
  const response = await client.getJson(
    campaignPath(campaignId, "offer-mapping-entries"),
    offerMappingSchema,
    { query: { page_token: pageToken, limit: PAGE_SIZE } },
  );
  return {
    items: response.result.offerMappingEntries.map((entry) => entry.offer.shopSku),
    nextPageToken: response.result.paging?.nextPageToken,
  };
}

export async function fetchMarketOfferIds(
  client: HttpClient,
  campaignId: string,
): Promise<OfferId[]> {
  return collectOfferIds({
    style: "token",
    fetchPage: (pageToken) => fetchMarketOfferPage(client, campaignId, pageToken),
  });
}

export async function updateMarketStocks(
  client: HttpClient,
  campaignId: string,
  stocks: MarketStock[],
): Promise<UploadResponse> {
  const body = await client.putJson(
    campaignPath(campaignId, "offers/stocks"),
    statusSchema,
    { body: { skus: stocks } },
  );
  return { status: body.status, body };
}

export async function updateMarketPrices(
  client: HttpClient,
  campaignId: string,
  prices: MarketPrice[],
): Promise<UploadResponse> {
  const body = await client.postJson(
    campaignPath(campaignId, "offer-prices/updates"),
    statusSchema,
    { body: { offers: prices } },
  );
  return { status: body.status, body };
}

export function createMarketTarget(
  client: HttpClient,
  campaign: MarketCampaignConfig,
  config: Pick<MarketConfig, "stockBatchSize" | "priceBatchSize">,
): MarketplaceTarget<MarketStock, MarketPrice> {
  return {
    label: `market:${campaign.label}`,
    stockBatchSize: config.stockBatchSize,
    priceBatchSize: config.priceBatchSize,
    fetchOfferIds: () => fetchMarketOfferIds(client, campaign.campaignId),
    buildStock: (offerId, count, context) => ({
      sku: offerId,
      warehouseId: campaign.warehouseId,
      items: [{ count, type: "FIT", updatedAt: context.updatedAt }],
    }),
    buildPrice: (offerId, price) => ({
      id: offerId,
      price: { value: price, currencyId: "RUR" },
    }),
    stockCount: (record) => record.items[0]?.count ?? 0,
    sendStocks: (batch) => updateMarketStocks(client, campaign.campaignId, batch),
    sendPrices: (batch) => updateMarketPrices(client, campaign.campaignId, batch),
  };
}
