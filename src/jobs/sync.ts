// 역할: Ozon + Yandex Market 전체 동기화 엔트리.
// src/jobs/sync.ts
import "dotenv/config";
import pino from "pino";

import { runSync } from "../pipeline/runSync";
import { loadHttpConfig } from "../config/env";
import {
  buildMarketTargets,
  buildOzonTargets,
  buildRemnantLoader,
} from "./targets";

console.log("[BOOT] sync.ts loaded", new Date().toISOString());

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const logger = pino({ level: LOG_LEVEL });

async function main() {
  // 설정 오류는 실행 전에 던져서 프로세스를 실패로 끝낸다.
  const http = loadHttpConfig();
  const loadRemnants = buildRemnantLoader(http);
  const targets = [...buildOzonTargets(http), ...buildMarketTargets(http)];

  logger.info(
    { job: "sync", targets: targets.map((target) => target.label) },
    "sync job started",
  );

  const result = await runSync({ loadRemnants, targets });

  logger.info(
    { job: "sync", outcome: result.outcome, summaries: result.summaries },
    "sync job finished",
  );
  console.log("[DONE]", result.outcome, result.summaries);
}

main().catch((error) => {
  logger.error({ job: "sync", error }, "sync job failed to start");
  console.log("[FATAL] sync job failed", error);
  process.exitCode = 1;
});
