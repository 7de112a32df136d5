// 역할: 업로드 레코드를 배치 크기로 잘라 한 배치씩 순서대로 전송한다.

import type { UploadResponse } from "../types";
import { chunk } from "../utils/chunk";

// 역할: 각 배치 응답을 그대로 돌려준다. status 확인은 호출자의 몫이고, 전송 에러는 나머지 배치를 중단시킨다.
export async function uploadInBatches<T>(
  records: readonly T[],
  batchSize: number,
  send: (batch: T[]) => Promise<UploadResponse>,
): Promise<UploadResponse[]> {
  const responses: UploadResponse[] = [];
  for (const batch of chunk(records, batchSize)) {
    responses.push(await send(batch));
  }
  return responses;
}
