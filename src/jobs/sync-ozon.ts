// 역할: Ozon 전용 동기화 엔트리.
import "dotenv/config";
import pino from "pino";

import { runSync } from "../pipeline/runSync";
import { loadHttpConfig } from "../config/env";
import { buildOzonTargets, buildRemnantLoader } from "./targets";

console.log("[BOOT] sync-ozon.ts loaded", new Date().toISOString());

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const logger = pino({ level: LOG_LEVEL });

async function main() {
  const http = loadHttpConfig();
  const result = await runSync({
    loadRemnants: buildRemnantLoader(http),
    targets: buildOzonTargets(http),
  });
  logger.info({ job: "sync:ozon", outcome: result.outcome }, "sync ozon job finished");
  console.log("[DONE]", result.outcome, result.summaries);
}

main().catch((error) => {
  logger.error({ job: "sync:ozon", error }, "sync ozon job failed to start");
  console.log("[FATAL] sync ozon job failed", error);
  process.exitCode = 1;
});
