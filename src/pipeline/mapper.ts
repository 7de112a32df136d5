// 역할: 재고 파일 레코드를 마켓플레이스 offer id와 맞춰 재고/가격 페이로드로 변환한다.

import type { MarketplaceTarget } from "../marketplaces/types";
import type { OfferId, RemnantRecord } from "../types";
import { InvalidDataError } from "../utils/errors";
import { parsePriceValue } from "../utils/price";

// 공급사 파일의 특수 표기: ">10"은 넉넉한 재고, "1"은 판매하지 않는 마지막 1개.
const PLENTY_MARKER = ">10";
const PLENTY_COUNT = 100;
const LAST_ITEM_MARKER = "1";

type StockShape<TStock> = Pick<MarketplaceTarget<TStock, unknown>, "buildStock">;
type PriceShape<TPrice> = Pick<MarketplaceTarget<unknown, TPrice>, "buildPrice">;

// 역할: 재고 파일의 수량 문자열을 업로드할 재고 수로 변환한다.
export function resolveStockCount(quantity: string): number {
  if (quantity === PLENTY_MARKER) return PLENTY_COUNT;
  if (quantity === LAST_ITEM_MARKER) return 0;
  if (!/^\s*[+-]?\d+\s*$/.test(quantity)) {
    throw new InvalidDataError(`quantity is not an integer: "${quantity}"`);
  }
  return Number.parseInt(quantity.trim(), 10);
}

// 역할: 초 단위까지 자른 UTC ISO 시각("2025-01-18T00:00:00Z").
export function formatUpdatedAt(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, "Z");
}

// 역할: 재고 레코드를 만든다. 파일에 있는 offer는 파일 순서대로, 파일에 없는 offer는 0으로 뒤에 붙인다.
// offerIds는 복사본으로만 다루므로 호출자의 목록은 바뀌지 않는다.
export function mapStocks<TStock>(
  remnants: readonly RemnantRecord[],
  offerIds: readonly OfferId[],
  shape: StockShape<TStock>,
  now: Date = new Date(),
): TStock[] {
  const context = { updatedAt: formatUpdatedAt(now) };
  const remaining = countOccurrences(offerIds);
  const matched = new Map<OfferId, number>();
  const stocks: TStock[] = [];

  for (const remnant of remnants) {
    const offerId = remnant.code;
    const left = remaining.get(offerId) ?? 0;
    if (left === 0) continue;
    remaining.set(offerId, left - 1);
    matched.set(offerId, (matched.get(offerId) ?? 0) + 1);
    stocks.push(shape.buildStock(offerId, resolveStockCount(remnant.quantity), context));
  }

  // 매칭된 건 각 id의 앞쪽 항목부터 빠진 것으로 본다.
  for (const offerId of offerIds) {
    const skip = matched.get(offerId) ?? 0;
    if (skip > 0) {
      matched.set(offerId, skip - 1);
      continue;
    }
    stocks.push(shape.buildStock(offerId, 0, context));
  }

  return stocks;
}

// 역할: 파일과 마켓플레이스 양쪽에 있는 offer만 가격 레코드로 만든다(0 채움 없음).
export function mapPrices<TPrice>(
  remnants: readonly RemnantRecord[],
  offerIds: readonly OfferId[],
  shape: PriceShape<TPrice>,
): TPrice[] {
  const known = new Set(offerIds);
  const prices: TPrice[] = [];
  for (const remnant of remnants) {
    if (!known.has(remnant.code)) continue;
    prices.push(shape.buildPrice(remnant.code, parsePriceValue(remnant.price)));
  }
  return prices;
}

function countOccurrences(offerIds: readonly OfferId[]): Map<OfferId, number> {
  const counts = new Map<OfferId, number>();
  for (const offerId of offerIds) {
    counts.set(offerId, (counts.get(offerId) ?? 0) + 1);
  }
  return counts;
}
