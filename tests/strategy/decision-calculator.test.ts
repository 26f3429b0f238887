/**
 * 判定ロジックのテスト
 */

import { KeywordStats } from "../../src/attribution/types";
import {
  computeAverageCpa,
  computeConversionRate,
  computeDecisions,
  countDecisionActions,
  decideKeyword,
} from "../../src/strategy/decision-calculator";
import { OptimizationStrategy, StrategyThresholds } from "../../src/strategy/types";

function stats(overrides: Partial<KeywordStats>): KeywordStats {
  return {
    clicks: 10,
    cost: 20,
    conversionCount: 2,
    conversionValue: 8,
    averageCostPerClick: 2,
    ...overrides,
  };
}

const THRESHOLDS: StrategyThresholds = { maxCpa: 5, minConversionRate: 0.1 };

describe("decideKeyword", () => {
  describe("優先順位", () => {
    it.each<OptimizationStrategy>(["ROAS", "CPA", "MANUAL"])(
      "クリック 0 件は戦略に関係なく SKIP (%s)",
      (strategy) => {
        const decision = decideKeyword("kw", stats({ clicks: 0, conversionCount: 0 }), strategy, THRESHOLDS);
        expect(decision.action).toBe("SKIP");
        expect(decision.reasonCode).toBe("NO_TRAFFIC");
        expect(decision.reason).toBe("no traffic");
      }
    );

    it.each<OptimizationStrategy>(["ROAS", "CPA", "MANUAL"])(
      "コンバージョン 0 件は戦略に関係なく PAUSE_OR_LOWER (%s)",
      (strategy) => {
        const decision = decideKeyword(
          "kw",
          stats({ conversionCount: 0, conversionValue: 0 }),
          strategy,
          THRESHOLDS
        );
        expect(decision.action).toBe("PAUSE_OR_LOWER");
        expect(decision.reason).toBe("no conversions");
      }
    );

    it("ROAS でコンバージョン価値があれば INCREASE", () => {
      const decision = decideKeyword("kw", stats({}), "ROAS", THRESHOLDS);
      expect(decision.action).toBe("INCREASE");
      expect(decision.reasonCode).toBe("FAVORABLE_RETURN");
    });

    it("ROAS でもコンバージョン価値が 0 なら NO_CHANGE", () => {
      const decision = decideKeyword("kw", stats({ conversionValue: 0 }), "ROAS", THRESHOLDS);
      expect(decision.action).toBe("NO_CHANGE");
      expect(decision.reason).toBe("ROAS thresholds satisfied");
    });

    it("CPA で平均CPAが上限を超えれば DECREASE", () => {
      const decision = decideKeyword(
        "kw",
        stats({ clicks: 10, cost: 20, conversionCount: 2, conversionValue: 20 }),
        "CPA",
        THRESHOLDS
      );
      expect(decision.action).toBe("DECREASE");
      expect(decision.reasonCode).toBe("CPA_ABOVE_MAX");
      expect(decision.reason).toBe("average CPA 10.00 exceeds max CPA 5");
    });

    it("CPA でコンバージョン率が下限未満なら DECREASE", () => {
      const decision = decideKeyword(
        "kw",
        stats({ clicks: 40, conversionCount: 2, conversionValue: 8 }),
        "CPA",
        THRESHOLDS
      );
      expect(decision.action).toBe("DECREASE");
      expect(decision.reasonCode).toBe("CONVERSION_RATE_BELOW_MIN");
      expect(decision.reason).toBe("conversion rate 5.00% below minimum 10.00%");
    });

    it("CPA でしきい値内なら NO_CHANGE", () => {
      const decision = decideKeyword("kw", stats({}), "CPA", THRESHOLDS);
      expect(decision.action).toBe("NO_CHANGE");
      expect(decision.reason).toBe("CPA thresholds satisfied");
    });

    it("MANUAL は REVIEW", () => {
      const decision = decideKeyword("kw", stats({}), "MANUAL", THRESHOLDS);
      expect(decision.action).toBe("REVIEW");
      expect(decision.reason).toBe("manual strategy selected");
    });
  });

  it("判定は統計のスナップショットを持つ", () => {
    const input = stats({});
    const decision = decideKeyword("kw", input, "CPA", THRESHOLDS);
    input.clicks = 999;
    expect(decision.stats.clicks).toBe(10);
  });
});

describe("computeDecisions", () => {
  it("統計のキー1つにつき判定を1つ返す", () => {
    const input = new Map([
      ["kw1", stats({})],
      ["kw2", stats({ clicks: 0, conversionCount: 0, conversionValue: 0 })],
    ]);

    const decisions = computeDecisions(input, "ROAS", THRESHOLDS);

    expect([...decisions.keys()]).toEqual(["kw1", "kw2"]);
    expect(decisions.get("kw1")?.action).toBe("INCREASE");
    expect(decisions.get("kw2")?.action).toBe("SKIP");
  });

  it("アクション別件数を数える", () => {
    const decisions = computeDecisions(
      new Map([
        ["a", stats({})],
        ["b", stats({})],
        ["c", stats({ conversionCount: 0, conversionValue: 0 })],
      ]),
      "ROAS",
      THRESHOLDS
    );

    expect(countDecisionActions(decisions.values())).toEqual({
      INCREASE: 2,
      DECREASE: 0,
      PAUSE_OR_LOWER: 1,
      REVIEW: 0,
      SKIP: 0,
      NO_CHANGE: 0,
    });
  });
});

describe("computeAverageCpa / computeConversionRate", () => {
  it("分母が 0 なら null", () => {
    expect(computeAverageCpa(stats({ conversionCount: 0 }))).toBeNull();
    expect(computeConversionRate(stats({ clicks: 0 }))).toBeNull();
  });

  it("比率を計算する", () => {
    expect(computeAverageCpa(stats({ conversionCount: 2, conversionValue: 8 }))).toBe(4);
    expect(computeConversionRate(stats({ clicks: 10, conversionCount: 2 }))).toBe(0.2);
  });
});
