/**
 * adGroupAd リソース名パーサー
 *
 * 文法: `<prefix>/adGroupAds/<digits>~<digits>`
 *   例: `customers/1234567890/adGroupAds/111~222`
 *   - prefix: 1文字以上（通常は `customers/<customerId>`）
 *   - 1つ目の数字列: 広告グループID
 *   - 2つ目の数字列: 広告ID
 */

export interface AdGroupAdRef {
  prefix: string;
  adGroupId: string;
  adId: string;
}

export type ResourceNameParseFailureReason = "EMPTY" | "PATTERN_MISMATCH";

export type ResourceNameParseResult =
  | { ok: true; value: AdGroupAdRef }
  | { ok: false; error: { reason: ResourceNameParseFailureReason; input: string } };

const AD_GROUP_AD_PATTERN = /^(.+)\/adGroupAds\/(\d+)~(\d+)$/;

export function parseAdGroupAdResourceName(resourceName: string): ResourceNameParseResult {
  const input = resourceName.trim();
  if (input.length === 0) {
    return { ok: false, error: { reason: "EMPTY", input: resourceName } };
  }

  const match = AD_GROUP_AD_PATTERN.exec(input);
  if (!match) {
    return { ok: false, error: { reason: "PATTERN_MISMATCH", input: resourceName } };
  }

  const [, prefix, adGroupId, adId] = match;
  return { ok: true, value: { prefix, adGroupId, adId } };
}
