/**
 * KeywordAggregator - トラフィックレコードをキーワード単位の統計に集計
 *
 * 処理フロー:
 * 1. 有料チャネル以外のレコードを除外
 * 2. 遷移先URLから識別子を取り出し、IdentityMapping でキーワードに解決
 *    - 識別子なし → "unknown"
 *    - マッピングにない識別子 → Unmapped(<識別子>)
 * 3. clicks / cost を加算、コンバージョン対象なら conversionCount / conversionValue も加算
 * 4. 全レコード処理後に averageCostPerClick を計算
 * 5. トラフィックのない有効キーワードをゼロ値で追加
 */

import { ATTRIBUTION_LABELS } from "../constants";
import { extractClickIdentifier, formatClickDate } from "./click-identifier";
import {
  AggregationOptions,
  ClickIdentifier,
  ClickOccurrence,
  IdentityMapping,
  KeywordAggregationResult,
  KeywordStats,
  KeywordStatsMap,
  ResolvedKeyword,
  TrafficRecord,
  unmappedLabel,
} from "./types";

// =============================================================================
// 統計アクセサ
// =============================================================================

export function createEmptyStats(): KeywordStats {
  return {
    clicks: 0,
    cost: 0,
    conversionCount: 0,
    conversionValue: 0,
    averageCostPerClick: 0,
  };
}

/**
 * キーワードの統計を取得（なければゼロ値で作成して登録）
 */
export function getOrCreateStats(stats: KeywordStatsMap, keyword: ResolvedKeyword): KeywordStats {
  const existing = stats.get(keyword);
  if (existing) {
    return existing;
  }
  const created = createEmptyStats();
  stats.set(keyword, created);
  return created;
}

/**
 * 欠損・不正なコストは 0 として扱う
 */
export function normalizeCost(cost: number | null | undefined): number {
  if (cost === null || cost === undefined || !Number.isFinite(cost) || cost < 0) {
    return 0;
  }
  return cost;
}

/**
 * averageCostPerClick（ゼロ除算しない）
 */
export function computeAverageCostPerClick(cost: number, clicks: number): number {
  return clicks > 0 ? cost / clicks : 0;
}

// =============================================================================
// 識別子収集
// =============================================================================

/**
 * 解決対象のクリックを出現順・識別子の重複なしで収集
 *
 * 同じ識別子が複数回現れた場合は最初のレコードのクリック日を使う
 */
export function collectClickIdentifiers(
  records: readonly TrafficRecord[],
  timeZone = "UTC"
): ClickOccurrence[] {
  const seen = new Set<ClickIdentifier>();
  const clicks: ClickOccurrence[] = [];
  for (const record of records) {
    if (!record.sourceFlag) {
      continue;
    }
    const identifier = extractClickIdentifier(record.destinationUrl);
    if (identifier === null || seen.has(identifier)) {
      continue;
    }
    seen.add(identifier);
    clicks.push({ identifier, clickDate: formatClickDate(record.timestamp, timeZone) });
  }
  return clicks;
}

/**
 * レコードの集計先キーワードを決定
 */
export function resolveRecordKeyword(
  record: TrafficRecord,
  mapping: IdentityMapping
): ResolvedKeyword {
  const identifier = extractClickIdentifier(record.destinationUrl);
  if (identifier === null) {
    return ATTRIBUTION_LABELS.UNKNOWN_KEYWORD;
  }
  return mapping.get(identifier) ?? unmappedLabel(identifier);
}

// =============================================================================
// 集計
// =============================================================================

/**
 * キーワード単位の統計を集計
 *
 * 同じレコード集合とマッピングからは常に同じ結果を返す（入力は変更しない）
 */
export function aggregateKeywordStats(
  records: readonly TrafficRecord[],
  mapping: IdentityMapping,
  options: AggregationOptions
): KeywordAggregationResult {
  const conversionKinds = new Set(options.conversionKinds);
  const stats: KeywordStatsMap = new Map();

  let processedRecordCount = 0;
  let skippedRecordCount = 0;
  let unidentifiedRecordCount = 0;

  for (const record of records) {
    if (!record.sourceFlag) {
      skippedRecordCount++;
      continue;
    }

    const keyword = resolveRecordKeyword(record, mapping);
    if (keyword === ATTRIBUTION_LABELS.UNKNOWN_KEYWORD) {
      unidentifiedRecordCount++;
    }

    const cost = normalizeCost(record.cost);
    const entry = getOrCreateStats(stats, keyword);
    entry.clicks += 1;
    entry.cost += cost;

    if (record.conversionKind !== null && conversionKinds.has(record.conversionKind)) {
      entry.conversionCount += 1;
      entry.conversionValue += cost;
    }
    processedRecordCount++;
  }

  // トラフィックのない有効キーワードもゼロ値で含める
  for (const keyword of options.enabledKeywords ?? []) {
    getOrCreateStats(stats, keyword);
  }

  for (const entry of stats.values()) {
    entry.averageCostPerClick = computeAverageCostPerClick(entry.cost, entry.clicks);
  }

  return {
    stats,
    processedRecordCount,
    skippedRecordCount,
    unidentifiedRecordCount,
  };
}
