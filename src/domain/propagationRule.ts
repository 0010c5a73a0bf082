import { ConfigurationError } from "./errors.js";
import { HeaderSet, canonicalKey } from "./headerSet.js";
import type { PropagationMode, PropagationRuleConfig } from "./types.js";

// Names the HTTP/2 transport or the gRPC framing own. Copying any of them into
// trailing metadata would corrupt the response.
export const RESERVED_KEYS: ReadonlySet<string> = new Set([
  "content-type",
  "content-length",
  "te",
  "trailer",
  "transfer-encoding",
  "connection",
  "keep-alive",
  "upgrade",
  "proxy-connection",
  "host",
  "user-agent",
  "http2-settings",
]);

const LEGAL_KEY = /^[0-9a-z_.-]+$/;

export function isReservedKey(key: string): boolean {
  const k = canonicalKey(key);
  return k.startsWith("grpc-") || k.startsWith(":") || k.endsWith("-bin") || RESERVED_KEYS.has(k);
}

export function isLegalMetadataKey(key: string): boolean {
  return LEGAL_KEY.test(canonicalKey(key));
}

/**
 * Decides which response headers may be copied into trailing metadata.
 *
 * Built once per middleware and never mutated, so concurrent calls read it
 * without coordination.
 */
export class PropagationRule {
  readonly mode: PropagationMode;
  private readonly listed: ReadonlySet<string>;

  constructor(config: PropagationRuleConfig) {
    switch (config.mode) {
      case "all":
        this.mode = "all";
        this.listed = new Set();
        break;
      case "allow":
        this.mode = "allow";
        this.listed = PropagationRule.checkAllowList(config.headers);
        break;
      case "deny":
        this.mode = "deny";
        this.listed = new Set(config.headers.map(canonicalKey));
        break;
      default: {
        const unknownConfig: never = config;
        throw new ConfigurationError(`unknown propagation mode in ${JSON.stringify(unknownConfig)}`);
      }
    }
    Object.freeze(this);
  }

  private static checkAllowList(headers: string[]): ReadonlySet<string> {
    if (headers.length === 0) {
      throw new ConfigurationError("allow-list must name at least one header");
    }
    const keys = new Set<string>();
    for (const header of headers) {
      const key = canonicalKey(header);
      if (isReservedKey(key)) {
        throw new ConfigurationError(`reserved header cannot be propagated: ${key}`);
      }
      if (!isLegalMetadataKey(key)) {
        throw new ConfigurationError(`not a valid metadata key: ${JSON.stringify(header)}`);
      }
      keys.add(key);
    }
    return keys;
  }

  /** Listed keys in configuration order; empty for mode "all". */
  get headers(): string[] {
    return [...this.listed];
  }

  allows(key: string): boolean {
    const k = canonicalKey(key);
    if (isReservedKey(k) || !isLegalMetadataKey(k)) return false;
    if (this.mode === "allow") return this.listed.has(k);
    if (this.mode === "deny") return !this.listed.has(k);
    return true;
  }

  /** Returns the eligible subset of `headers`, values kept in order. */
  filter(headers: HeaderSet): HeaderSet {
    const selected = new HeaderSet();
    for (const [key, value] of headers.entries()) {
      if (this.allows(key)) selected.append(key, value);
    }
    return selected;
  }

  toJSON(): PropagationRuleConfig {
    if (this.mode === "all") return { mode: "all" };
    return { mode: this.mode, headers: this.headers };
  }
}
