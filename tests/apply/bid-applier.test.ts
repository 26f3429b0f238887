/**
 * 入札変更の実行テスト
 */

import { executeBidChanges, summarizeBidChangeResults } from "../../src/apply/bid-applier";
import { ApplySafetyConfig, BidChange, ChangeApplier } from "../../src/apply/types";

const CONFIG: ApplySafetyConfig = {
  maxApplyChangesPerRun: 10,
  minApplyChangeAmount: 0.01,
  minApplyChangeRatio: 0.01,
};

function change(criterionId: string, oldBid: number, newBid: number): BidChange {
  return {
    criterionId,
    adGroupId: "501",
    keywordText: `kw-${criterionId}`,
    oldBid,
    newBid,
    reason: "favorable return",
  };
}

function createApplier(failFor?: string): ChangeApplier & { apply: jest.Mock } {
  return {
    apply: jest.fn().mockImplementation(async (bidChange: BidChange) => {
      if (bidChange.criterionId === failFor) {
        throw new Error("mutate rejected");
      }
    }),
  };
}

describe("executeBidChanges", () => {
  it("APPLY モードでは有意な変更だけを適用する", async () => {
    const applier = createApplier();
    const changes = [change("1", 10, 11), change("2", 10, 10), change("3", 4, 3.6)];

    const { results, stats } = await executeBidChanges(changes, applier, "APPLY", CONFIG);

    expect(applier.apply).toHaveBeenCalledTimes(2);
    expect(results.map((result) => result.status)).toEqual(["APPLIED", "SKIPPED", "APPLIED"]);
    expect(results[1].skipReason).toBe("NO_SIGNIFICANT_CHANGE");
    expect(stats.totalApplied).toBe(2);
    expect(stats.skipReasonCounts.NO_SIGNIFICANT_CHANGE).toBe(1);
  });

  it("SHADOW モードでは API を呼ばない", async () => {
    const applier = createApplier();

    const { results, stats } = await executeBidChanges([change("1", 10, 11)], applier, "SHADOW", CONFIG);

    expect(applier.apply).not.toHaveBeenCalled();
    expect(results[0].status).toBe("SHADOW");
    expect(stats.totalShadow).toBe(1);
  });

  it("1件の失敗は他の変更を止めない", async () => {
    const applier = createApplier("1");

    const { results, stats } = await executeBidChanges(
      [change("1", 10, 11), change("2", 10, 9)],
      applier,
      "APPLY",
      CONFIG
    );

    expect(results[0]).toEqual({ ...change("1", 10, 11), status: "FAILED", error: "mutate rejected" });
    expect(results[1].status).toBe("APPLIED");
    expect(stats.totalFailed).toBe(1);
    expect(stats.totalApplied).toBe(1);
  });

  it("上限を超えた変更は APPLY_LIMIT_REACHED で入力順を保つ", async () => {
    const applier = createApplier();

    const { results } = await executeBidChanges(
      [change("1", 10, 11), change("2", 10, 11), change("3", 10, 11)],
      applier,
      "APPLY",
      { ...CONFIG, maxApplyChangesPerRun: 1 }
    );

    expect(results.map((result) => [result.criterionId, result.status, result.skipReason])).toEqual([
      ["1", "APPLIED", undefined],
      ["2", "SKIPPED", "APPLY_LIMIT_REACHED"],
      ["3", "SKIPPED", "APPLY_LIMIT_REACHED"],
    ]);
  });
});

describe("summarizeBidChangeResults", () => {
  it("状態別に数える", () => {
    const stats = summarizeBidChangeResults([
      { ...change("1", 1, 2), status: "APPLIED" },
      { ...change("2", 1, 2), status: "SKIPPED", skipReason: "APPLY_LIMIT_REACHED" },
      { ...change("3", 1, 2), status: "SHADOW" },
    ]);

    expect(stats).toEqual({
      totalChanges: 3,
      totalApplied: 1,
      totalShadow: 1,
      totalSkipped: 1,
      totalFailed: 0,
      skipReasonCounts: { APPLY_LIMIT_REACHED: 1, NO_SIGNIFICANT_CHANGE: 0 },
    });
  });
});
