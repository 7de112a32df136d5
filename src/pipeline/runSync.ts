// 역할: 재고 파일 한 번 다운로드 후 타깃별로 카탈로그 조회 → 재고 업로드 → 가격 업로드를 순서대로 실행한다.

import pino from "pino";
import type { AnyMarketplaceTarget, MarketplaceTarget } from "../marketplaces/types";
import type {
  OfferId,
  RemnantRecord,
  SyncOutcome,
  TargetSummary,
  UploadResponse,
} from "../types";
import { classifyFailure, formatError } from "../utils/errors";
import { mapPrices, mapStocks } from "./mapper";
import { uploadInBatches } from "./uploader";

const logger = pino({ level: process.env.LOG_LEVEL ?? "info" });

export type RunSyncInput = {
  loadRemnants: () => Promise<RemnantRecord[]>;
  targets: AnyMarketplaceTarget[];
  now?: () => Date;
};

export type RunSyncResult = {
  outcome: SyncOutcome;
  summaries: TargetSummary[];
  error?: unknown;
};

export type StockSyncResult<TStock> = {
  stocks: TStock[];
  nonEmpty: TStock[];
  responses: UploadResponse[];
};

export type PriceSyncResult<TPrice> = {
  prices: TPrice[];
  responses: UploadResponse[];
};

// 역할: 재고를 매핑해서 업로드한다. offerIds가 없으면 카탈로그를 직접 조회한다.
export async function syncStocks<TStock, TPrice>(
  target: MarketplaceTarget<TStock, TPrice>,
  remnants: readonly RemnantRecord[],
  offerIds?: readonly OfferId[],
  now: Date = new Date(),
): Promise<StockSyncResult<TStock>> {
  const catalog = offerIds ?? (await target.fetchOfferIds());
  const stocks = mapStocks(remnants, catalog, target, now);
  const responses = await uploadInBatches(stocks, target.stockBatchSize, (batch) =>
    target.sendStocks(batch),
  );
  const nonEmpty = stocks.filter((stock) => target.stockCount(stock) !== 0);
  logger.info(
    {
      job: "sync",
      stage: "stocks",
      target: target.label,
      uploaded: stocks.length,
      nonEmpty: nonEmpty.length,
      batches: responses.length,
    },
    "uploaded stocks",
  );
  return { stocks, nonEmpty, responses };
}

// 역할: 가격을 매핑해서 업로드한다. offerIds가 없으면 카탈로그를 직접 조회한다.
export async function syncPrices<TStock, TPrice>(
  target: MarketplaceTarget<TStock, TPrice>,
  remnants: readonly RemnantRecord[],
  offerIds?: readonly OfferId[],
): Promise<PriceSyncResult<TPrice>> {
  const catalog = offerIds ?? (await target.fetchOfferIds());
  const prices = mapPrices(remnants, catalog, target);
  const responses = await uploadInBatches(prices, target.priceBatchSize, (batch) =>
    target.sendPrices(batch),
  );
  logger.info(
    {
      job: "sync",
      stage: "prices",
      target: target.label,
      uploaded: prices.length,
      batches: responses.length,
    },
    "uploaded prices",
  );
  return { prices, responses };
}

// 역할: 한 타깃의 세 단계를 실행하고 요약을 만든다.
export async function syncTarget<TStock, TPrice>(
  target: MarketplaceTarget<TStock, TPrice>,
  remnants: readonly RemnantRecord[],
  now: Date = new Date(),
): Promise<TargetSummary> {
  const offerIds = await target.fetchOfferIds();
  logger.info(
    { job: "sync", stage: "catalog", target: target.label, offers: offerIds.length },
    "fetched offer catalog",
  );

  const stockResult = await syncStocks(target, remnants, offerIds, now);
  const priceResult = await syncPrices(target, remnants, offerIds);

  const rejected = [...stockResult.responses, ...priceResult.responses].filter(
    (response) => response.status !== "OK",
  );
  if (rejected.length > 0) {
    logger.warn(
      { job: "sync", target: target.label, rejectedBatches: rejected.length },
      "marketplace reported errors for some batches",
    );
  }

  return {
    target: target.label,
    offers: offerIds.length,
    stocksUploaded: stockResult.stocks.length,
    nonEmptyStocks: stockResult.nonEmpty.length,
    pricesUploaded: priceResult.prices.length,
    rejectedBatches: rejected.length,
  };
}

// 역할: 전체 동기화를 실행한다. 첫 실패에서 나머지를 중단하고 결과 분류를 돌려준다(롤백 없음).
export async function runSync(input: RunSyncInput): Promise<RunSyncResult> {
  const now = input.now ?? (() => new Date());
  const summaries: TargetSummary[] = [];

  try {
    const remnants = await input.loadRemnants();
    for (const target of input.targets) {
      summaries.push(await syncTarget(target, remnants, now()));
    }
  } catch (error) {
    const outcome = classifyFailure(error);
    const completed = summaries.map((summary) => summary.target);
    if (outcome === "timeout") {
      logger.error({ job: "sync", error, completed }, "request timed out, sync aborted");
    } else if (outcome === "connection") {
      logger.error(
        { job: "sync", error, completed },
        `connection failed, sync aborted: ${formatError(error)}`,
      );
    } else {
      logger.error({ job: "sync", error, completed }, "sync failed unexpectedly");
    }
    return { outcome, summaries, error };
  }

  return { outcome: "success", summaries };
}
