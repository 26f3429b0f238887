/**
 * リクエストスキーマのテスト
 */

import { CampaignIdSchema, OptimizationRequestInput, OptimizationRequestSchema } from "../src/schemas";

describe("OptimizationRequestSchema", () => {
  it("省略された項目にデフォルトを入れる", () => {
    const input: OptimizationRequestInput = { campaignId: "123", strategy: "CPA", maxCpa: 5 };

    const result = OptimizationRequestSchema.safeParse(input);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        campaignId: "123",
        strategy: "CPA",
        maxCpa: 5,
        minConversionRate: 0,
        attributionWindowDays: 30,
        triggerSource: "API",
      });
    }
  });

  it("不正な値をまとめて報告する", () => {
    const result = OptimizationRequestSchema.safeParse({
      campaignId: "12a",
      strategy: "CPC",
      maxCpa: -1,
      attributionWindowDays: 120,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      const paths = result.error.issues.map((issue) => issue.path.join("."));
      expect(paths).toEqual(["campaignId", "strategy", "maxCpa", "attributionWindowDays"]);
      const messages = result.error.issues.map((issue) => issue.message);
      expect(messages).toContain("campaignId must contain digits only");
      expect(messages).toContain("maxCpa must be positive");
      expect(messages).toContain("attributionWindowDays must be at most 90");
    }
  });

  it("resolutionStrategy を受け付ける", () => {
    const result = OptimizationRequestSchema.safeParse({
      campaignId: "1",
      strategy: "ROAS",
      maxCpa: 1,
      resolutionStrategy: "DIRECT",
    });
    expect(result.success && result.data.resolutionStrategy).toBe("DIRECT");
  });
});

describe("CampaignIdSchema", () => {
  it("数値を文字列に揃える", () => {
    expect(CampaignIdSchema.parse(4567)).toBe("4567");
    expect(CampaignIdSchema.parse(" 89 ")).toBe("89");
  });

  it("数字以外を拒否する", () => {
    expect(CampaignIdSchema.safeParse("").success).toBe(false);
    expect(CampaignIdSchema.safeParse(-1).success).toBe(false);
    expect(CampaignIdSchema.safeParse("1; DROP").success).toBe(false);
  });
});
