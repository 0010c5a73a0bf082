/**
 * Demo client: one call without credentials, showing the challenge headers
 * that arrive in trailing metadata, then one call with a valid token.
 *
 *   GRPC_ADDRESS=localhost:5000 npm run demo
 */

import path from "path";
import { fileURLToPath } from "url";
import { loadService } from "../infrastructure/protoLoader.js";
import { AuthServiceClient, type CallResult } from "./authClient.js";
import type { GetUserInfoResponse } from "../domain/usecases/userInfo.js";

const ADDRESS = process.env.GRPC_ADDRESS || "localhost:5000";
const PROTO_PATH = path.resolve(process.env.PROTO_PATH || "protos/auth.proto");
const RULE = "=".repeat(70);

export function describeUnauthenticated(result: CallResult<GetUserInfoResponse>): string[] {
  if (result.ok) return [`Unexpected success: ${JSON.stringify(result.response)}`];
  const lines = [
    "Expected failure occurred",
    `  Status Code: ${result.codeName}`,
    `  Status Message: ${result.details}`,
    "",
    "Trailing metadata:",
  ];
  const entries = Object.entries(result.trailers);
  if (entries.length === 0) {
    lines.push("  (none) - header-to-trailer propagation is not configured");
    return lines;
  }
  for (const [key, values] of entries) {
    for (const value of values) lines.push(`  ${key}: ${value}`);
  }
  for (const key of ["www-authenticate", "x-custom-test"]) {
    const value = result.trailers[key]?.join(", ");
    lines.push(value ? `  found ${key}: ${value}` : `  missing ${key}`);
  }
  return lines;
}

export function describeAuthenticated(result: CallResult<GetUserInfoResponse>): string[] {
  if (!result.ok) return [`Unexpected failure: ${result.codeName} - ${result.details}`];
  return [
    "Success",
    `  User ID: ${result.response.user_id}`,
    `  Username: ${result.response.username}`,
    `  Email: ${result.response.email}`,
  ];
}

async function main() {
  const client = new AuthServiceClient(ADDRESS, loadService(PROTO_PATH, "auth.AuthService"));
  try {
    console.log(`${RULE}\nUNAUTHENTICATED call (expecting failure)\n${RULE}`);
    const rejected = await client.getUserInfo({ user_id: "123" });
    console.log(describeUnauthenticated(rejected).join("\n"));

    console.log(`\n${RULE}\nAUTHENTICATED call (expecting success)\n${RULE}`);
    const accepted = await client.getUserInfo({ user_id: "123" }, { token: "Bearer valid-token-12345" });
    console.log(describeAuthenticated(accepted).join("\n"));
  } finally {
    client.close();
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    console.error("[trailerbridge] demo failed:", e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
