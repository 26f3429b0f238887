/**
 * 遷移先URLからクリック識別子（gclid / gbraid）を取り出す
 */

import { ClickIdentifier, ClickIdentifierKind } from "./types";

/** 優先順位順 */
const IDENTIFIER_PARAMS: readonly ClickIdentifierKind[] = ["gclid", "gbraid"];

/** スキーム・ホストのない相対URLを読むための仮ベース */
const PLACEHOLDER_BASE_URL = "http://placeholder.invalid";

export interface ExtractedClickIdentifier {
  kind: ClickIdentifierKind;
  value: ClickIdentifier;
}

/**
 * URLから識別子を種別付きで取り出す
 *
 * - gclid があれば gclid、なければ gbraid
 * - 同じパラメータが複数ある場合は最初の空でない値
 * - パースできないURLは「識別子なし」
 */
export function detectClickIdentifier(url: string): ExtractedClickIdentifier | null {
  let params: URLSearchParams;
  try {
    params = new URL(url, PLACEHOLDER_BASE_URL).searchParams;
  } catch {
    return null;
  }

  for (const kind of IDENTIFIER_PARAMS) {
    const value = params.getAll(kind).find((candidate) => candidate.length > 0);
    if (value !== undefined) {
      return { kind, value };
    }
  }
  return null;
}

/**
 * URLからクリック識別子の値を取り出す（見つからなければ null）
 */
export function extractClickIdentifier(url: string): ClickIdentifier | null {
  return detectClickIdentifier(url)?.value ?? null;
}

/**
 * クリック日時を指定タイムゾーンの日付（YYYY-MM-DD）にする
 *
 * 日時がない・不正な場合は null
 */
export function formatClickDate(timestamp: Date | null, timeZone: string): string | null {
  if (timestamp === null || Number.isNaN(timestamp.getTime())) {
    return null;
  }
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(timestamp);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((candidate) => candidate.type === type)?.value ?? "";
  return `${part("year")}-${part("month")}-${part("day")}`;
}
