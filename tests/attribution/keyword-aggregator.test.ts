/**
 * キーワード集計のテスト
 */

import {
  aggregateKeywordStats,
  collectClickIdentifiers,
  computeAverageCostPerClick,
  normalizeCost,
  resolveRecordKeyword,
} from "../../src/attribution/keyword-aggregator";
import { TrafficRecord } from "../../src/attribution/types";
import { DEFAULT_CONVERSION_KINDS } from "../../src/constants";

function record(overrides: Partial<TrafficRecord>): TrafficRecord {
  return {
    destinationUrl: "https://example.com/",
    cost: 0,
    conversionKind: null,
    sourceFlag: true,
    timestamp: null,
    ...overrides,
  };
}

const OPTIONS = { conversionKinds: DEFAULT_CONVERSION_KINDS };

describe("aggregateKeywordStats", () => {
  it("同じキーワードのクリックを合算し、コンバージョンのコストを conversionValue に加える", () => {
    const records = [
      record({ destinationUrl: "https://example.com/?gclid=A", cost: 10, conversionKind: "registr" }),
      record({ destinationUrl: "https://example.com/?gclid=B", cost: 5, conversionKind: "visit" }),
    ];
    const mapping = new Map([
      ["A", "kw1"],
      ["B", "kw1"],
    ]);

    const result = aggregateKeywordStats(records, mapping, OPTIONS);

    expect(result.stats.get("kw1")).toEqual({
      clicks: 2,
      cost: 15,
      conversionCount: 1,
      conversionValue: 10,
      averageCostPerClick: 7.5,
    });
    expect(result.processedRecordCount).toBe(2);
  });

  it("識別子のないレコードは unknown、マッピングにない識別子は Unmapped", () => {
    const records = [
      record({ destinationUrl: "https://example.com/landing", cost: 3 }),
      record({ destinationUrl: "https://example.com/?gbraid=Z", cost: 4 }),
    ];

    const result = aggregateKeywordStats(records, new Map(), OPTIONS);

    expect(result.stats.get("unknown")?.clicks).toBe(1);
    expect(result.stats.get("Unmapped(Z)")?.cost).toBe(4);
    expect(result.unidentifiedRecordCount).toBe(1);
  });

  it("有料チャネル以外のレコードは数えない", () => {
    const records = [
      record({ destinationUrl: "https://example.com/?gclid=A", cost: 10, sourceFlag: false }),
      record({ destinationUrl: "https://example.com/?gclid=A", cost: 2 }),
    ];

    const result = aggregateKeywordStats(records, new Map([["A", "kw1"]]), OPTIONS);

    expect(result.stats.get("kw1")?.clicks).toBe(1);
    expect(result.stats.get("kw1")?.cost).toBe(2);
    expect(result.skippedRecordCount).toBe(1);
    expect(result.processedRecordCount).toBe(1);
  });

  it("欠損したコストは 0 として数える", () => {
    const records = [record({ destinationUrl: "https://example.com/?gclid=A", cost: null, conversionKind: "deposit" })];

    const result = aggregateKeywordStats(records, new Map([["A", "kw1"]]), OPTIONS);

    expect(result.stats.get("kw1")).toEqual({
      clicks: 1,
      cost: 0,
      conversionCount: 1,
      conversionValue: 0,
      averageCostPerClick: 0,
    });
  });

  it("コンバージョン種別は完全一致で判定する", () => {
    const records = [
      record({ destinationUrl: "https://example.com/?gclid=A", cost: 1, conversionKind: "registration" }),
      record({ destinationUrl: "https://example.com/?gclid=A", cost: 1, conversionKind: "Deposit" }),
    ];

    const result = aggregateKeywordStats(records, new Map([["A", "kw1"]]), OPTIONS);

    expect(result.stats.get("kw1")?.conversionCount).toBe(0);
  });

  it("トラフィックのない有効キーワードもゼロ値で含める", () => {
    const result = aggregateKeywordStats([], new Map(), {
      ...OPTIONS,
      enabledKeywords: ["idle keyword"],
    });

    expect(result.stats.get("idle keyword")).toEqual({
      clicks: 0,
      cost: 0,
      conversionCount: 0,
      conversionValue: 0,
      averageCostPerClick: 0,
    });
  });

  it("全キーワードで conversionCount <= clicks かつ conversionValue <= cost", () => {
    const records = [
      record({ destinationUrl: "https://example.com/?gclid=A", cost: 4, conversionKind: "registr" }),
      record({ destinationUrl: "https://example.com/?gclid=A", cost: 6 }),
      record({ destinationUrl: "https://example.com/?gclid=B", cost: 2, conversionKind: "deposit" }),
      record({ destinationUrl: "/no-identifier", cost: 1, conversionKind: "registr" }),
    ];
    const mapping = new Map([
      ["A", "kw1"],
      ["B", "kw2"],
    ]);

    const result = aggregateKeywordStats(records, mapping, OPTIONS);

    let totalClicks = 0;
    for (const stats of result.stats.values()) {
      expect(stats.conversionCount).toBeLessThanOrEqual(stats.clicks);
      expect(stats.conversionValue).toBeLessThanOrEqual(stats.cost);
      totalClicks += stats.clicks;
    }
    // 有料チャネルのレコードはちょうど1回ずつ数える
    expect(totalClicks).toBe(records.length);
  });

  it("同じ入力からは同じ結果を返し、入力を変更しない", () => {
    const records = [record({ destinationUrl: "https://example.com/?gclid=A", cost: 5, conversionKind: "registr" })];
    const mapping = new Map([["A", "kw1"]]);
    const before = JSON.stringify(records);

    const first = aggregateKeywordStats(records, mapping, OPTIONS);
    const second = aggregateKeywordStats(records, mapping, OPTIONS);

    expect([...second.stats.entries()]).toEqual([...first.stats.entries()]);
    expect(JSON.stringify(records)).toBe(before);
    expect(mapping.size).toBe(1);
  });
});

describe("collectClickIdentifiers", () => {
  it("有料チャネルの識別子を出現順・重複なしで集める", () => {
    const records = [
      record({ destinationUrl: "https://example.com/?gclid=B" }),
      record({ destinationUrl: "https://example.com/?gclid=A" }),
      record({ destinationUrl: "https://example.com/?gclid=B" }),
      record({ destinationUrl: "https://example.com/?gclid=C", sourceFlag: false }),
      record({ destinationUrl: "https://example.com/" }),
    ];

    expect(collectClickIdentifiers(records).map((click) => click.identifier)).toEqual(["B", "A"]);
  });

  it("最初のレコードのクリック日を指定タイムゾーンで付ける", () => {
    const records = [
      record({ destinationUrl: "?gclid=A", timestamp: new Date("2026-01-04T23:30:00.000Z") }),
      record({ destinationUrl: "?gclid=A", timestamp: new Date("2026-01-06T10:00:00.000Z") }),
      record({ destinationUrl: "?gclid=B" }),
    ];

    expect(collectClickIdentifiers(records)).toEqual([
      { identifier: "A", clickDate: "2026-01-04" },
      { identifier: "B", clickDate: null },
    ]);
    expect(collectClickIdentifiers(records, "Asia/Tokyo")[0]).toEqual({
      identifier: "A",
      clickDate: "2026-01-05",
    });
  });
});

describe("resolveRecordKeyword", () => {
  it("マッピングの値を返す", () => {
    expect(
      resolveRecordKeyword(record({ destinationUrl: "?gclid=A" }), new Map([["A", "kw1"]]))
    ).toBe("kw1");
  });
});

describe("normalizeCost / computeAverageCostPerClick", () => {
  it("不正なコストは 0", () => {
    expect(normalizeCost(null)).toBe(0);
    expect(normalizeCost(Number.NaN)).toBe(0);
    expect(normalizeCost(-3)).toBe(0);
    expect(normalizeCost(2.5)).toBe(2.5);
  });

  it("クリック 0 件の平均は 0", () => {
    expect(computeAverageCostPerClick(10, 0)).toBe(0);
    expect(computeAverageCostPerClick(9, 3)).toBe(3);
  });
});
