// 역할: 동기화 파이프라인 전반에서 사용하는 공통 타입 정의.

// 역할: 재고 파일의 한 행. 파이프라인이 쓰지 않는 열은 extra에 그대로 남긴다.
export type RemnantRecord = {
  code: string;
  quantity: string;
  price: string;
  extra: Record<string, string>;
};

export type OfferId = string;

export type UploadStatus = "OK" | "ERROR";

export type UploadResponse = {
  status: UploadStatus;
  body: unknown;
};

export type SyncOutcome = "success" | "timeout" | "connection" | "failed";

export type TargetSummary = {
  target: string;
  offers: number;
  stocksUploaded: number;
  nonEmptyStocks: number;
  pricesUploaded: number;
  rejectedBatches: number;
};
