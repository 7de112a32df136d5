// 역할: 마켓플레이스 상품 목록 API를 끝까지 페이지네이션해서 offer id 전체를 모은다.

import pino from "pino";
import type { OfferId } from "../types";

const logger = pino({ level: process.env.LOG_LEVEL ?? "info" });

export type CursorPage = {
  items: OfferId[];
  total: number;
  lastId: string;
};

export type TokenPage = {
  items: OfferId[];
  nextPageToken?: string | null;
};

// total/last_id 방식(Ozon)과 nextPageToken 방식(Yandex Market).
export type OfferPager =
  | { style: "cursor"; fetchPage: (cursor: string) => Promise<CursorPage> }
  | { style: "token"; fetchPage: (pageToken: string) => Promise<TokenPage> };

// 역할: 페이지 방식에 맞춰 offer id를 순서대로 누적한다. 중복은 제거하지 않는다.
export async function collectOfferIds(pager: OfferPager): Promise<OfferId[]> {
  if (pager.style === "cursor") {
    return collectByCursor(pager.fetchPage);
  }
  return collectByToken(pager.fetchPage);
}

async function collectByCursor(
  fetchPage: (cursor: string) => Promise<CursorPage>,
): Promise<OfferId[]> {
  const offerIds: OfferId[] = [];
  let cursor = "";
  while (true) {
    const page = await fetchPage(cursor);
    offerIds.push(...page.items);
    if (offerIds.length >= page.total) break;
    if (page.items.length === 0) {
      logger.warn(
        { stage: "catalog", collected: offerIds.length, total: page.total },
        "catalog page came back empty before total was reached",
      );
      break;
    }
    cursor = page.lastId;
  }
  return offerIds;
}

async function collectByToken(
  fetchPage: (pageToken: string) => Promise<TokenPage>,
): Promise<OfferId[]> {
  const offerIds: OfferId[] = [];
  let pageToken = "";
  while (true) {
    const page = await fetchPage(pageToken);
    offerIds.push(...page.items);
    if (!page.nextPageToken) break;
    pageToken = page.nextPageToken;
  }
  return offerIds;
}
