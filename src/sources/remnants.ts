// 역할: 공급사 재고 파일(zip 안의 엑셀)을 내려받아 RemnantRecord 목록으로 변환한다.

import JSZip from "jszip";
import pino from "pino";
import * as XLSX from "xlsx";
import type { HttpClient } from "../http/client";
import type { RemnantRecord } from "../types";
import { InvalidDataError } from "../utils/errors";

const logger = pino({ level: process.env.LOG_LEVEL ?? "info" });

// 엑셀 18번째 행이 헤더다(위쪽은 공급사 안내 문구).
const HEADER_ROW_INDEX = 17;
const SPREADSHEET_PATTERN = /\.xlsx?$/i;

const COLUMN_CODE = "Код";
const COLUMN_QUANTITY = "Количество";
const COLUMN_PRICE = "Цена";
const KNOWN_COLUMNS = new Set([COLUMN_CODE, COLUMN_QUANTITY, COLUMN_PRICE]);

export type DownloadRemnantsOptions = {
  client: HttpClient;
  url: string;
};

// 역할: 재고 압축 파일을 받아 엑셀을 파싱한다.
export async function downloadRemnants(
  options: DownloadRemnantsOptions,
): Promise<RemnantRecord[]> {
  logger.info({ job: "sync", stage: "remnants", url: options.url }, "downloading remnant feed");
  const archive = await options.client.getBytes(options.url);
  const { name, data } = await extractSpreadsheet(archive);
  const remnants = parseRemnantSheet(data);
  logger.info(
    { job: "sync", stage: "remnants", file: name, rows: remnants.length },
    "parsed remnant feed",
  );
  return remnants;
}

// 역할: zip에서 첫 번째 엑셀 파일을 꺼낸다.
export async function extractSpreadsheet(
  archive: Buffer,
): Promise<{ name: string; data: Buffer }> {
  const zip = await JSZip.loadAsync(archive);
  const entry = Object.values(zip.files).find(
    (file) => !file.dir && SPREADSHEET_PATTERN.test(file.name),
  );
  if (!entry) {
    throw new InvalidDataError("remnant archive contains no spreadsheet", [
      `entries: ${Object.keys(zip.files).join(", ") || "(none)"}`,
    ]);
  }
  return { name: entry.name, data: await entry.async("nodebuffer") };
}

// 역할: 첫 번째 시트를 헤더 행부터 읽어 레코드로 만든다. 셀 값은 표시 형식이 아닌 원본 값으로 읽는다.
export function parseRemnantSheet(data: Buffer): RemnantRecord[] {
  const workbook = XLSX.read(data, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new InvalidDataError("remnant spreadsheet has no sheets");
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
    range: HEADER_ROW_INDEX,
    defval: "",
    raw: true,
  });
  return rows.map(toRemnantRecord);
}

function toRemnantRecord(row: Record<string, unknown>): RemnantRecord {
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    if (KNOWN_COLUMNS.has(key)) continue;
    extra[key] = cellText(value);
  }
  return {
    code: cellText(row[COLUMN_CODE]),
    quantity: cellText(row[COLUMN_QUANTITY]),
    price: cellText(row[COLUMN_PRICE]),
    extra,
  };
}

// 숫자 셀은 String()으로 바꿔 12자리 이상 코드도 지수 표기 없이 그대로 남긴다.
function cellText(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  return String(value);
}
