// 역할: 배열을 고정 크기의 연속 구간으로 나눈다.

import { InvalidArgumentError } from "./errors";

// 역할: size개씩 잘라서 순서대로 내보낸다(마지막 구간은 나머지).
export function* chunk<T>(
  items: readonly T[],
  size: number,
): Generator<T[], void, undefined> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidArgumentError(`chunk size must be a positive integer, got ${size}`);
  }
  for (let start = 0; start < items.length; start += size) {
    yield items.slice(start, start + size);
  }
}
