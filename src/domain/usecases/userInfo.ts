import { z } from "zod";
import { failure, success, type CallHandler, type ServerCall } from "../pipeline.js";

export const GetUserInfoRequestSchema = z.object({
  user_id: z.string().default(""),
});

export const GetUserInfoResponseSchema = z.object({
  user_id: z.string(),
  username: z.string(),
  email: z.string(),
});

export type GetUserInfoRequest = z.infer<typeof GetUserInfoRequestSchema>;
export type GetUserInfoResponse = z.infer<typeof GetUserInfoResponseSchema>;

function describeUser(call: ServerCall<unknown, GetUserInfoResponse>, request: GetUserInfoRequest): GetUserInfoResponse {
  const username = call.principal?.name ?? "unknown";
  return {
    user_id: call.principal?.id ?? request.user_id,
    username,
    email: `${username}@example.com`,
  };
}

async function readRequest(call: ServerCall<unknown, GetUserInfoResponse>) {
  const parsed = GetUserInfoRequestSchema.safeParse((await call.request()) ?? {});
  if (parsed.success) return { ok: true as const, request: parsed.data };
  const message = parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`).join("; ");
  return { ok: false as const, outcome: failure<GetUserInfoResponse>("INVALID_ARGUMENT", message) };
}

/** auth.AuthService/GetUserInfo: answers with the authenticated principal. */
export const getUserInfo: CallHandler<unknown, GetUserInfoResponse> = async (call) => {
  const read = await readRequest(call);
  if (!read.ok) return read.outcome;
  return success(describeUser(call, read.request));
};

/** auth.AuthService/WatchUserInfo: same record, delivered on a response stream. */
export const watchUserInfo: CallHandler<unknown, GetUserInfoResponse> = async (call) => {
  const read = await readRequest(call);
  if (!read.ok) return read.outcome;
  call.send(describeUser(call, read.request));
  return success<GetUserInfoResponse>();
};
