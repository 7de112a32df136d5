// 역할: 환경 설정으로 HTTP 클라이언트와 동기화 타깃, 재고 파일 로더를 구성한다.

import {
  loadFeedConfig,
  loadMarketConfig,
  loadOzonConfig,
  type HttpConfig,
} from "../config/env";
import { HttpClient } from "../http/client";
import { createMarketClient, createMarketTarget } from "../marketplaces/market";
import { createOzonClient, createOzonTarget } from "../marketplaces/ozon";
import type { AnyMarketplaceTarget } from "../marketplaces/types";
import { downloadRemnants } from "../sources/remnants";
import type { RemnantRecord } from "../types";

type Env = Record<string, string | undefined>;

export function buildRemnantLoader(
  http: HttpConfig,
  env: Env = process.env,
): () => Promise<RemnantRecord[]> {
  const feed = loadFeedConfig(env);
  const client = new HttpClient({
    baseUrl: feed.url,
    headers: { Accept: "*/*" },
    timeoutMs: http.timeoutMs,
  });
  return () => downloadRemnants({ client, url: feed.url });
}

export function buildOzonTargets(
  http: HttpConfig,
  env: Env = process.env,
): AnyMarketplaceTarget[] {
  const config = loadOzonConfig(env);
  const client = createOzonClient(config, http);
  return [createOzonTarget(client, config)];
}

// 역할: FBS, DBS 순서로 캠페인별 타깃을 만든다(클라이언트는 공유).
export function buildMarketTargets(
  http: HttpConfig,
  env: Env = process.env,
): AnyMarketplaceTarget[] {
  const config = loadMarketConfig(env);
  const client = createMarketClient(config, http);
  return config.campaigns.map((campaign) =>
    createMarketTarget(client, campaign, config),
  );
}
