// 역할: 재고 파일의 가격 문자열을 정수 문자열로 변환한다.

import { InvalidDataError } from "./errors";

// 역할: 첫 "." 이후를 버리고 숫자가 아닌 문자를 모두 제거한다. 반올림은 하지 않는다.
export function normalizePrice(raw: string): string {
  const [integerPart] = raw.split(".");
  return integerPart.replace(/[^0-9]/g, "");
}

// 역할: 정규화된 가격을 정수로 파싱한다(숫자가 없으면 실패).
export function parsePriceValue(raw: string): number {
  const digits = normalizePrice(raw);
  if (!digits) {
    throw new InvalidDataError(`price has no digits: "${raw}"`);
  }
  return Number.parseInt(digits, 10);
}
