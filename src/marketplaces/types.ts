// 역할: 마켓플레이스별 차이(엔드포인트, 페이로드 형태, 배치 크기)를 담는 전략 인터페이스.

import type { OfferId, UploadResponse } from "../types";

export type StockContext = {
  // 한 번의 매핑 호출 동안 모든 레코드가 공유하는 UTC 시각.
  updatedAt: string;
};

export type MarketplaceTarget<TStock, TPrice> = {
  readonly label: string;
  readonly stockBatchSize: number;
  readonly priceBatchSize: number;
  fetchOfferIds(): Promise<OfferId[]>;
  buildStock(offerId: OfferId, count: number, context: StockContext): TStock;
  buildPrice(offerId: OfferId, price: number): TPrice;
  stockCount(record: TStock): number;
  sendStocks(batch: TStock[]): Promise<UploadResponse>;
  sendPrices(batch: TPrice[]): Promise<UploadResponse>;
};

// 오케스트레이터는 페이로드 타입이 서로 다른 타깃을 한 목록으로 다룬다.
export type AnyMarketplaceTarget = MarketplaceTarget<unknown, unknown>;
