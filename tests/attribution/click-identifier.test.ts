/**
 * クリック識別子抽出のテスト
 */

import {
  detectClickIdentifier,
  extractClickIdentifier,
  formatClickDate,
} from "../../src/attribution/click-identifier";

describe("extractClickIdentifier", () => {
  describe("識別子の優先順位", () => {
    it("gclid を取り出す", () => {
      expect(extractClickIdentifier("https://example.com/landing?gclid=abc123")).toBe("abc123");
    });

    it("gclid がなければ gbraid を取り出す", () => {
      expect(extractClickIdentifier("https://example.com/landing?gbraid=xyz789")).toBe("xyz789");
    });

    it("両方ある場合は順序に関係なく gclid を優先", () => {
      expect(
        extractClickIdentifier("https://example.com/?gbraid=braid-1&gclid=click-1")
      ).toBe("click-1");
    });

    it("どちらもなければ null", () => {
      expect(extractClickIdentifier("https://example.com/landing?utm_source=google")).toBeNull();
    });
  });

  describe("境界ケース", () => {
    it("同じパラメータが複数あれば最初の値", () => {
      expect(extractClickIdentifier("https://example.com/?gclid=first&gclid=second")).toBe("first");
    });

    it("空の値は無いものとして扱う", () => {
      expect(extractClickIdentifier("https://example.com/?gclid=&gclid=second")).toBe("second");
      expect(extractClickIdentifier("https://example.com/?gclid=&gbraid=braid-2")).toBe("braid-2");
    });

    it("スキーム・ホストのない相対URLのクエリも読む", () => {
      expect(extractClickIdentifier("/signup?gclid=relative-1")).toBe("relative-1");
      expect(extractClickIdentifier("?gbraid=query-only")).toBe("query-only");
    });

    it("パースできないURLは例外を投げず null", () => {
      expect(extractClickIdentifier("http://[invalid-host/?gclid=abc")).toBeNull();
    });

    it("空文字は null", () => {
      expect(extractClickIdentifier("")).toBeNull();
    });

    it("パーセントエンコードはデコードされる", () => {
      expect(extractClickIdentifier("https://example.com/?gclid=a%2Fb")).toBe("a/b");
    });
  });
});

describe("detectClickIdentifier", () => {
  it("種別付きで返す", () => {
    expect(detectClickIdentifier("https://example.com/?gbraid=b-1")).toEqual({
      kind: "gbraid",
      value: "b-1",
    });
  });
});

describe("formatClickDate", () => {
  it("指定タイムゾーンの日付を YYYY-MM-DD で返す", () => {
    const clickedAt = new Date("2026-03-09T16:30:00.000Z");
    expect(formatClickDate(clickedAt, "UTC")).toBe("2026-03-09");
    expect(formatClickDate(clickedAt, "Asia/Tokyo")).toBe("2026-03-10");
    expect(formatClickDate(clickedAt, "America/Los_Angeles")).toBe("2026-03-09");
  });

  it("日時がない・不正な場合は null", () => {
    expect(formatClickDate(null, "UTC")).toBeNull();
    expect(formatClickDate(new Date("not a date"), "UTC")).toBeNull();
  });
});
