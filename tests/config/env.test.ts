import { describe, it, expect } from "vitest";
import {
  loadFeedConfig,
  loadHttpConfig,
  loadMarketConfig,
  loadOzonConfig,
} from "../../src/config/env";
import { ConfigError } from "../../src/utils/errors";

const marketEnv = {
  MARKET_TOKEN: "test-token",
  FBS_ID: "111",
  DBS_ID: "222",
  WAREHOUSE_FBS_ID: "31",
  WAREHOUSE_DBS_ID: "32",
};

describe("loadOzonConfig", () => {
  it("applies defaults for optional settings", () => {
    expect(loadOzonConfig({ CLIENT_ID: "client-1", SELLER_TOKEN: "test-secret" })).toEqual({
      clientId: "client-1",
      sellerToken: "test-secret",
      baseUrl: "https://api-seller.ozon.ru",
      stockBatchSize: 100,
      priceBatchSize: 900,
    });
  });

  it("reads batch size overrides", () => {
    const config = loadOzonConfig({
      CLIENT_ID: "client-1",
      SELLER_TOKEN: "test-secret",
      OZON_STOCK_BATCH_SIZE: "50",
      OZON_PRICE_BATCH_SIZE: "",
    });
    expect(config.stockBatchSize).toBe(50);
    expect(config.priceBatchSize).toBe(900);
  });

  it("names every missing variable", () => {
    const error = (() => {
      try {
        loadOzonConfig({ SELLER_TOKEN: " " });
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ variables: ["CLIENT_ID", "SELLER_TOKEN"] });
  });

  it("rejects a batch size above the API limit", () => {
    expect(() =>
      loadOzonConfig({ CLIENT_ID: "c", SELLER_TOKEN: "t", OZON_STOCK_BATCH_SIZE: "101" }),
    ).toThrow(ConfigError);
  });
});

describe("loadMarketConfig", () => {
  it("builds FBS and DBS campaigns with numeric warehouses", () => {
    expect(loadMarketConfig(marketEnv)).toEqual({
      token: "test-token",
      baseUrl: "https://api.partner.market.yandex.ru",
      campaigns: [
        { label: "fbs", campaignId: "111", warehouseId: 31 },
        { label: "dbs", campaignId: "222", warehouseId: 32 },
      ],
      stockBatchSize: 2000,
      priceBatchSize: 500,
    });
  });

  it("fails when a warehouse id is missing", () => {
    const { WAREHOUSE_DBS_ID: _omitted, ...env } = marketEnv;
    expect(() => loadMarketConfig(env)).toThrow(/WAREHOUSE_DBS_ID/);
  });
});

describe("shared settings", () => {
  it("defaults the feed url and http settings", () => {
    expect(loadFeedConfig({})).toEqual({
      url: "https://timeworld.ru/upload/files/ostatki.zip",
    });
    expect(loadHttpConfig({})).toEqual({ timeoutMs: 60_000, minTimeMs: 0 });
  });

  it("reads http overrides", () => {
    expect(loadHttpConfig({ HTTP_TIMEOUT_MS: "5000", HTTP_MIN_TIME_MS: "250" })).toEqual({
      timeoutMs: 5000,
      minTimeMs: 250,
    });
  });

  it("rejects an invalid feed url", () => {
    expect(() => loadFeedConfig({ REMNANTS_URL: "not a url" })).toThrow(ConfigError);
  });
});
