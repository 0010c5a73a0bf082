import type { HeaderSet, HeaderSink } from "../headerSet.js";
import { failure, type CallStage } from "../pipeline.js";
import type { Principal } from "../types.js";

export type AuthResult =
  | { ok: true; principal: Principal }
  | { ok: false; message: string };

/**
 * Decides whether a call may proceed. Implementations may attach response
 * headers through `sink` at any point, including right before failing.
 */
export interface Authenticator {
  authenticate(metadata: HeaderSet, sink: HeaderSink): Promise<AuthResult>;
  /** Runs after a rejection, with the headers attached so far. */
  challenge?(headers: HeaderSet): Promise<void>;
}

const VALID_TOKEN_PREFIX = "bearer valid-";

/** Accepts any `authorization: Bearer valid-*` token. Demo policy only. */
export class BearerTokenAuthenticator implements Authenticator {
  constructor(private readonly realm = "GrpcService") {}

  async authenticate(metadata: HeaderSet, sink: HeaderSink): Promise<AuthResult> {
    const [token] = metadata.get("authorization");
    if (token === undefined) {
      sink.append("x-custom-test", "authentication-failed");
      sink.append("www-authenticate", `Bearer realm="${this.realm}"`);
      return { ok: false, message: "Missing Authorization header" };
    }

    if (!token.toLowerCase().startsWith(VALID_TOKEN_PREFIX)) {
      sink.append("x-custom-test", "invalid-token");
      sink.append("www-authenticate", `Bearer realm="${this.realm}", error="invalid_token"`);
      return { ok: false, message: "Invalid token" };
    }

    sink.append("x-custom-test", "authentication-success");
    return { ok: true, principal: { id: "123", name: "testuser" } };
  }

  async challenge(headers: HeaderSet): Promise<void> {
    headers.append("x-custom-test", "challenge-initiated");
    if (!headers.has("www-authenticate")) headers.append("www-authenticate", `Bearer realm="${this.realm}"`);
  }
}

export function createAuthenticationStage<Req, Res>(authenticator: Authenticator): CallStage<Req, Res> {
  return async (call, next) => {
    const result = await authenticator.authenticate(call.requestMetadata, call.headers);
    if (!result.ok) {
      await authenticator.challenge?.(call.headers);
      return failure<Res>("UNAUTHENTICATED", result.message);
    }
    call.principal = result.principal;
    return next(call);
  };
}
