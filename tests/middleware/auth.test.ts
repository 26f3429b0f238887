import { AuthRequest, authorizeApiKey, extractBearerToken } from "../../src/middleware/auth";

function request(headers: Record<string, string> = {}): AuthRequest {
  return {
    header: (name: string) => headers[name.toLowerCase()],
    ip: "127.0.0.1",
    path: "/cron/run-optimization",
  };
}

function response(locals: Record<string, unknown> = {}) {
  const json = jest.fn();
  const status = jest.fn((_code: number) => ({ json }));
  return { res: { locals, status }, status, json };
}

describe("extractBearerToken", () => {
  it("Bearer トークンを取り出す", () => {
    expect(extractBearerToken("Bearer test-api-key")).toBe("test-api-key");
  });

  it("形式が違えば undefined", () => {
    expect(extractBearerToken(undefined)).toBeUndefined();
    expect(extractBearerToken("Basic dXNlcg==")).toBeUndefined();
    expect(extractBearerToken("Bearer   ")).toBeUndefined();
  });
});

describe("authorizeApiKey", () => {
  it("API_KEY 未設定なら認証せずに通す", () => {
    const { res, status } = response();
    const next = jest.fn();

    authorizeApiKey(undefined, request(), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(status).not.toHaveBeenCalled();
  });

  it("X-API-Key が一致すれば通す", () => {
    const { res, status } = response();
    const next = jest.fn();

    authorizeApiKey("test-api-key", request({ "x-api-key": "test-api-key" }), res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(status).not.toHaveBeenCalled();
  });

  it("Authorization: Bearer でも通す", () => {
    const { res } = response();
    const next = jest.fn();

    authorizeApiKey("test-api-key", request({ authorization: "Bearer test-api-key" }), res, next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it("キーがなければ 401", () => {
    const { res, status, json } = response({ traceId: "trace-1" });
    const next = jest.fn();

    authorizeApiKey("test-api-key", request(), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: false,
        statusCode: 401,
        error: {
          code: "UNAUTHORIZED",
          message: "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>",
          retryable: false,
        },
        meta: expect.objectContaining({ requestId: "trace-1" }),
      })
    );
  });

  it("キーが違えば 401", () => {
    const { res, status, json } = response();
    const next = jest.fn();

    authorizeApiKey("test-api-key", request({ "x-api-key": "wrong-key" }), res, next);

    expect(next).not.toHaveBeenCalled();
    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 401,
        error: { code: "UNAUTHORIZED", message: "Invalid API key", retryable: false },
      })
    );
  });
});
