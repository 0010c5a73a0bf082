import * as grpc from "@grpc/grpc-js";
import { describe, it, expect, vi } from "vitest";
import { HeaderSet } from "../src/domain/headerSet.js";
import { headerSetFromMetadata, metadataToRecord, toGrpcMetadata } from "../src/infrastructure/metadata.js";

describe("headerSetFromMetadata", () => {
  it("keeps text entries and skips binary ones", () => {
    const md = new grpc.Metadata();
    md.add("Authorization", "Bearer valid-test-secret");
    md.add("x-multi", "a");
    md.add("x-multi", "b");
    md.add("trace-bin", Buffer.from([1, 2, 3]));

    expect(headerSetFromMetadata(md).toRecord()).toEqual({
      authorization: ["Bearer valid-test-secret"],
      "x-multi": ["a", "b"],
    });
  });

  it("treats missing metadata as empty", () => {
    expect(headerSetFromMetadata(undefined).isEmpty()).toBe(true);
  });
});

describe("toGrpcMetadata", () => {
  it("copies every legal entry in order", () => {
    const set = HeaderSet.from({ "www-authenticate": 'Bearer realm="api"', "x-custom-test": ["1", "2"] });
    const md = toGrpcMetadata(set);

    expect(md.get("www-authenticate")).toEqual(['Bearer realm="api"']);
    expect(md.get("x-custom-test")).toEqual(["1", "2"]);
  });

  it("skips reserved keys and values grpc-js cannot carry", () => {
    const warn = vi.fn();
    const set = HeaderSet.from({ "grpc-status": "0", "x-newline": "a\nb", "x-ok": "fine" });

    const md = toGrpcMetadata(set, warn);

    expect(metadataToRecord(md)).toEqual({ "x-ok": ["fine"] });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith(
      '(warn) skipping metadata entry "grpc-status": reserved or not representable as text metadata'
    );
  });
});
