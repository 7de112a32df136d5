// 역할: 동기화 작업의 에러 분류 체계.

import type { SyncOutcome } from "../types";

export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SyncError";
  }
}

export class InvalidArgumentError extends SyncError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

// 역할: 정수를 기대한 자리에 숫자가 아닌 값 등, 입력 데이터가 잘못된 경우.
export class InvalidDataError extends SyncError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "InvalidDataError";
  }
}

export class ConfigError extends SyncError {
  constructor(
    message: string,
    public readonly variables: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class HttpStatusError extends SyncError {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly responseText: string,
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

export class RequestTimeoutError extends SyncError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export class ConnectionFailureError extends SyncError {
  constructor(
    public readonly url: string,
    cause: unknown,
  ) {
    super(`could not connect to ${url}: ${formatError(cause)}`, { cause });
    this.name = "ConnectionFailureError";
  }
}

// 역할: 최상위에서 잡힌 에러를 실행 결과 분류로 변환한다.
export function classifyFailure(error: unknown): Exclude<SyncOutcome, "success"> {
  if (error instanceof RequestTimeoutError) return "timeout";
  if (error instanceof ConnectionFailureError) return "connection";
  return "failed";
}

// 역할: 에러를 로그용 문자열로 정리한다.
export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}
