import * as grpc from "@grpc/grpc-js";
import { errorMessage } from "../domain/errors.js";
import { HeaderSet } from "../domain/headerSet.js";
import { isLegalMetadataKey, isReservedKey } from "../domain/propagationRule.js";
import type { LogFn } from "../domain/types.js";

const LEGAL_VALUE = /^[ -~]*$/;

/** Text entries of incoming metadata; binary (-bin) entries are left out. */
export function headerSetFromMetadata(metadata: grpc.Metadata | undefined): HeaderSet {
  const set = new HeaderSet();
  if (!metadata) return set;
  for (const [key, values] of Object.entries(metadata.toJSON())) {
    for (const value of values) {
      if (typeof value === "string") set.append(key, value);
    }
  }
  return set;
}

/**
 * Builds grpc.Metadata from a HeaderSet. Reserved names and entries grpc-js
 * would reject (illegal key characters, non-printable values) are skipped.
 */
export function toGrpcMetadata(set: HeaderSet, warn?: LogFn): grpc.Metadata {
  const metadata = new grpc.Metadata();
  for (const [key, value] of set.entries()) {
    if (isReservedKey(key) || !isLegalMetadataKey(key) || !LEGAL_VALUE.test(value)) {
      warn?.(`(warn) skipping metadata entry ${JSON.stringify(key)}: reserved or not representable as text metadata`);
      continue;
    }
    try {
      metadata.add(key, value);
    } catch (e) {
      warn?.(`(warn) skipping metadata entry ${JSON.stringify(key)}: ${errorMessage(e, "rejected")}`);
    }
  }
  return metadata;
}

export function metadataToRecord(metadata: grpc.Metadata): Record<string, string[]> {
  return headerSetFromMetadata(metadata).toRecord();
}
