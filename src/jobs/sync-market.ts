// 역할: Yandex Market(FBS, DBS) 전용 동기화 엔트리.
import "dotenv/config";
import pino from "pino";

import { runSync } from "../pipeline/runSync";
import { loadHttpConfig } from "../config/env";
import { buildMarketTargets, buildRemnantLoader } from "./targets";

console.log("[BOOT] sync-market.ts loaded", new Date().toISOString());

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const logger = pino({ level: LOG_LEVEL });

async function main() {
  const http = loadHttpConfig();
  const result = await runSync({
    loadRemnants: buildRemnantLoader(http),
    targets: buildMarketTargets(http),
  });
  logger.info({ job: "sync:market", outcome: result.outcome }, "sync market job finished");
  console.log("[DONE]", result.outcome, result.summaries);
}

main().catch((error) => {
  logger.error({ job: "sync:market", error }, "sync market job failed to start");
  console.log("[FATAL] sync market job failed", error);
  process.exitCode = 1;
});
