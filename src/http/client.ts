// 역할: 마켓플레이스 API 호출용 HTTP 클라이언트(타임아웃, 순차 실행, 응답 검증).

import Bottleneck from "bottleneck";
import type { z } from "zod";
import {
  ConnectionFailureError,
  HttpStatusError,
  InvalidDataError,
  RequestTimeoutError,
} from "../utils/errors";

type QueryValue = string | number | boolean | undefined;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  minTimeMs?: number;
  fetch?: FetchLike;
};

type RequestOptions = {
  query?: Record<string, QueryValue>;
  body?: unknown;
};

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: "application/json",
};

export class HttpClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  // 한 클라이언트의 요청은 항상 하나씩만 나간다.
  private readonly limiter: Bottleneck;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl;
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: options.minTimeMs ?? 0,
    });
  }

  async getJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    options: RequestOptions = {},
  ): Promise<z.output<S>> {
    return this.send("GET", path, options, (response, url) =>
      this.readJson(response, url, schema),
    );
  }

  async postJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    options: RequestOptions = {},
  ): Promise<z.output<S>> {
    return this.send("POST", path, options, (response, url) =>
      this.readJson(response, url, schema),
    );
  }

  async putJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    options: RequestOptions = {},
  ): Promise<z.output<S>> {
    return this.send("PUT", path, options, (response, url) =>
      this.readJson(response, url, schema),
    );
  }

  // 역할: 응답 본문을 바이트 그대로 받는다(압축 파일 다운로드용).
  async getBytes(path: string, options: RequestOptions = {}): Promise<Buffer> {
    return this.send("GET", path, options, async (response, url) => {
      try {
        return Buffer.from(await response.arrayBuffer());
      } catch (error) {
        throw this.transportError(url, error);
      }
    });
  }

  // 역할: base URL과 쿼리 파라미터로 요청 URL을 만든다.
  private buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  // 역할: 요청부터 본문 읽기까지 한 작업으로 실행한다. 타임아웃은 본문 읽기에도 적용된다.
  private async send<T>(
    method: "GET" | "POST" | "PUT",
    path: string,
    options: RequestOptions,
    read: (response: Response, url: string) => Promise<T>,
  ): Promise<T> {
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = { ...this.headers };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    return this.limiter.schedule(async () => {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers,
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        throw this.transportError(url, error);
      }

      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new HttpStatusError(response.status, url, text);
      }
      return read(response, url);
    });
  }

  private async readJson<S extends z.ZodTypeAny>(
    response: Response,
    url: string,
    schema: S,
  ): Promise<z.output<S>> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw this.transportError(url, error);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new InvalidDataError(`response from ${url} is not valid JSON`, [
        error instanceof Error ? error.message : String(error),
      ]);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidDataError(
        `unexpected response shape from ${url}`,
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      );
    }
    return parsed.data;
  }

  private transportError(url: string, error: unknown): Error {
    if (isTimeout(error)) {
      return new RequestTimeoutError(url, this.timeoutMs);
    }
    return new ConnectionFailureError(url, error);
  }
}

// 역할: AbortSignal.timeout에 의한 중단인지 판별한다.
function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}
