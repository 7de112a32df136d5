import { vi } from "vitest";
import type { FetchLike } from "../../src/http/client";

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
};

type Reply = Response | Error | ((request: RecordedRequest) => Response);

// 역할: 응답 큐를 순서대로 돌려주고 요청을 기록하는 fetch 대역.
export function createFakeFetch(replies: Reply[]) {
  const requests: RecordedRequest[] = [];
  const queue = [...replies];

  const fetch = vi.fn<Parameters<FetchLike>, ReturnType<FetchLike>>(
    async (input, init) => {
      const request: RecordedRequest = {
        url: input,
        method: init.method ?? "GET",
        headers: toHeaderRecord(init.headers),
        body: typeof init.body === "string" ? JSON.parse(init.body) : undefined,
      };
      requests.push(request);
      const reply = queue.shift();
      if (!reply) {
        throw new Error(`unexpected request: ${request.method} ${request.url}`);
      }
      if (reply instanceof Error) throw reply;
      if (typeof reply === "function") return reply(request);
      return reply;
    },
  );

  return { fetch, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

// 헤더 이름은 소문자로 정규화된다.
function toHeaderRecord(headers: RequestInit["headers"]): Record<string, string> {
  return Object.fromEntries(new Headers(headers).entries());
}
