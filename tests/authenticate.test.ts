import { describe, it, expect, vi } from "vitest";
import { HeaderSet } from "../src/domain/headerSet.js";
import { ServerCall, singleRequest, success, type CallHandler } from "../src/domain/pipeline.js";
import { BearerTokenAuthenticator, createAuthenticationStage } from "../src/domain/usecases/authenticate.js";

describe("BearerTokenAuthenticator", () => {
  const authenticator = new BearerTokenAuthenticator("test-realm");

  it("challenges a call without an authorization header", async () => {
    const sink = new HeaderSet();
    const result = await authenticator.authenticate(new HeaderSet(), sink);

    expect(result).toEqual({ ok: false, message: "Missing Authorization header" });
    expect(sink.toRecord()).toEqual({
      "x-custom-test": ["authentication-failed"],
      "www-authenticate": ['Bearer realm="test-realm"'],
    });
  });

  it("rejects a token without the valid- prefix", async () => {
    const sink = new HeaderSet();
    const result = await authenticator.authenticate(HeaderSet.from({ Authorization: "Bearer nope" }), sink);

    expect(result).toEqual({ ok: false, message: "Invalid token" });
    expect(sink.get("x-custom-test")).toEqual(["invalid-token"]);
    expect(sink.get("www-authenticate")).toEqual(['Bearer realm="test-realm", error="invalid_token"']);
  });

  it("accepts a valid token regardless of scheme casing", async () => {
    const sink = new HeaderSet();
    const result = await authenticator.authenticate(HeaderSet.from({ authorization: "bearer VALID-token" }), sink);

    expect(result).toEqual({ ok: true, principal: { id: "123", name: "testuser" } });
    expect(sink.toRecord()).toEqual({ "x-custom-test": ["authentication-success"] });
  });

  it("challenges with the realm unless a challenge is already attached", async () => {
    const bare = new HeaderSet();
    await authenticator.challenge(bare);
    expect(bare.toRecord()).toEqual({
      "x-custom-test": ["challenge-initiated"],
      "www-authenticate": ['Bearer realm="test-realm"'],
    });

    const challenged = HeaderSet.from({ "www-authenticate": 'Bearer realm="test-realm", error="invalid_token"' });
    await authenticator.challenge(challenged);
    expect(challenged.get("www-authenticate")).toEqual(['Bearer realm="test-realm", error="invalid_token"']);
  });

  it("defaults the realm", async () => {
    const sink = new HeaderSet();
    await new BearerTokenAuthenticator().authenticate(new HeaderSet(), sink);
    expect(sink.get("www-authenticate")).toEqual(['Bearer realm="GrpcService"']);
  });
});

describe("createAuthenticationStage", () => {
  const stage = createAuthenticationStage<unknown, unknown>(new BearerTokenAuthenticator());

  function makeCall(metadata: Record<string, string>) {
    return new ServerCall<unknown, unknown>({
      service: "auth.AuthService",
      method: "GetUserInfo",
      kind: "unary",
      requests: singleRequest({}),
      requestMetadata: HeaderSet.from(metadata),
    });
  }

  it("short-circuits with UNAUTHENTICATED and leaves its headers on the call", async () => {
    const next = vi.fn<CallHandler>(async () => success({}));
    const call = makeCall({});

    const outcome = await stage(call, next);

    expect(outcome).toEqual({ ok: false, status: { code: "UNAUTHENTICATED", message: "Missing Authorization header" } });
    expect(next).not.toHaveBeenCalled();
    expect(call.headers.toRecord()).toEqual({
      "x-custom-test": ["authentication-failed", "challenge-initiated"],
      "www-authenticate": ['Bearer realm="GrpcService"'],
    });
    expect(call.principal).toBeUndefined();
  });

  it("sets the principal and continues on success", async () => {
    const next = vi.fn<CallHandler>(async () => success({ done: true }));
    const call = makeCall({ authorization: "Bearer valid-test-secret" });

    const outcome = await stage(call, next);

    expect(outcome).toEqual({ ok: true, response: { done: true } });
    expect(next).toHaveBeenCalledWith(call);
    expect(call.principal).toEqual({ id: "123", name: "testuser" });
    expect(call.headers.get("x-custom-test")).toEqual(["authentication-success"]);
  });
});
