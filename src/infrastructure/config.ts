import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";
import type { PropagationRuleConfig } from "../domain/types.js";

// Headers the bearer-token authenticator sets and clients look for.
export const DEFAULT_PROPAGATED_HEADERS = ["www-authenticate", "x-custom-test"];

const HeaderListSchema = z.array(z.string().min(1));

const PropagationSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("all") }).strict(),
  z.object({ mode: z.literal("allow"), headers: HeaderListSchema }).strict(),
  z.object({ mode: z.literal("deny"), headers: HeaderListSchema.default([]) }).strict(),
]);

const ConfigFileSchema = z
  .object({
    propagation: PropagationSchema.optional(),
    auth: z.object({ realm: z.string().min(1).optional() }).strict().optional(),
  })
  .strict();

const PortSchema = z.coerce.number().int().min(0).max(65535);

export interface AppConfig {
  grpcPort: number;
  httpPort: number;
  authRealm: string;
  protoPath: string;
  configPath: string;
  propagation: PropagationRuleConfig;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

function parsePort(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const parsed = PortSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigurationError(`${name} must be a port number, got ${JSON.stringify(raw)}`);
  return parsed.data;
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? "").split(",").map((s) => s.trim()).filter(Boolean);
}

export function readConfigFile(configPath: string): z.infer<typeof ConfigFileSchema> {
  if (!fs.existsSync(configPath)) return {};
  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = configPath.endsWith(".json") ? JSON.parse(raw) : yaml.load(raw);
  } catch (e) {
    throw new ConfigurationError(`cannot parse ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = ConfigFileSchema.safeParse(doc ?? {});
  if (!parsed.success) throw new ConfigurationError(`invalid ${configPath}: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

/**
 * Environment variables win over the YAML file, which wins over the built-in
 * allow-list. TRAILER_HEADERS alone is an allow-list.
 */
function resolvePropagation(env: Env, fromFile: PropagationRuleConfig | undefined): PropagationRuleConfig {
  const mode = env.TRAILER_MODE?.trim().toLowerCase();
  if (!mode) {
    const headers = splitList(env.TRAILER_HEADERS);
    if (headers.length) return { mode: "allow", headers };
    return fromFile ?? { mode: "allow", headers: [...DEFAULT_PROPAGATED_HEADERS] };
  }
  const parsed = PropagationSchema.safeParse({
    mode,
    ...(mode === "all" ? {} : { headers: splitList(env.TRAILER_HEADERS) }),
  });
  if (!parsed.success) throw new ConfigurationError(`invalid TRAILER_MODE/TRAILER_HEADERS: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const configPath = path.resolve(cwd, env.TRAILER_CONFIG || "config/propagation.yaml");
  const file = readConfigFile(configPath);
  return {
    grpcPort: parsePort("GRPC_PORT", env.GRPC_PORT, 5000),
    httpPort: parsePort("HTTP_PORT", env.HTTP_PORT, 4320),
    authRealm: env.AUTH_REALM || file.auth?.realm || "GrpcService",
    protoPath: path.resolve(cwd, env.PROTO_PATH || "protos/auth.proto"),
    configPath,
    propagation: resolvePropagation(env, file.propagation),
    debug: env.DEBUG_TRAILERS === "1",
  };
}
