import { describe, it, expect } from "vitest";
import { buildMarketTargets, buildOzonTargets } from "../../src/jobs/targets";
import { ConfigError } from "../../src/utils/errors";

const http = { timeoutMs: 1000, minTimeMs: 0 };

describe("job targets", () => {
  it("builds one target per market campaign, FBS first", () => {
    const targets = buildMarketTargets(http, {
      MARKET_TOKEN: "test-token",
      FBS_ID: "1",
      DBS_ID: "2",
      WAREHOUSE_FBS_ID: "10",
      WAREHOUSE_DBS_ID: "20",
      MARKET_PRICE_BATCH_SIZE: "250",
    });

    expect(targets.map((t) => t.label)).toEqual(["market:fbs", "market:dbs"]);
    expect(targets.map((t) => t.priceBatchSize)).toEqual([250, 250]);
    expect(targets.map((t) => t.stockBatchSize)).toEqual([2000, 2000]);
  });

  it("builds the ozon target", () => {
    const [target] = buildOzonTargets(http, { CLIENT_ID: "c", SELLER_TOKEN: "test-secret" });
    expect(target.label).toBe("ozon");
  });

  it("fails before any request when credentials are missing", () => {
    expect(() => buildOzonTargets(http, {})).toThrow(ConfigError);
  });
});
