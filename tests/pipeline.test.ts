import { describe, it, expect } from "vitest";
import { ServerCall, composeStages, singleRequest, success, type CallStage } from "../src/domain/pipeline.js";

// Async iterable over `items` that counts how often an iterator was closed.
function trackedRequests<T>(items: T[]) {
  const state = { closed: 0 };
  let index = 0;
  const requests: AsyncIterable<T> = {
    [Symbol.asyncIterator]() {
      return {
        async next(): Promise<IteratorResult<T>> {
          if (index < items.length) return { done: false, value: items[index++] };
          return { done: true, value: undefined };
        },
        async return(): Promise<IteratorResult<T>> {
          state.closed++;
          return { done: true, value: undefined };
        },
      };
    },
  };
  return { requests, state };
}

function makeCall<Req>(requests: AsyncIterable<Req>) {
  return new ServerCall<Req, unknown>({
    service: "auth.AuthService",
    method: "UploadUserInfo",
    kind: "clientStream",
    requests,
  });
}

describe("ServerCall.request", () => {
  it("reads the first message without closing the request stream", async () => {
    const { requests, state } = trackedRequests(["first", "second"]);
    const call = makeCall(requests);

    expect(await call.request()).toBe("first");
    expect(state.closed).toBe(0);

    const rest: string[] = [];
    for await (const message of call.requests) rest.push(message);
    expect(rest).toEqual(["second"]);
  });

  it("returns undefined when the client sent nothing", async () => {
    const { requests } = trackedRequests<string>([]);
    expect(await makeCall(requests).request()).toBeUndefined();
  });

  it("reads a single request", async () => {
    expect(await makeCall(singleRequest({ user_id: "123" })).request()).toEqual({ user_id: "123" });
  });
});

describe("composeStages", () => {
  it("runs the first stage outermost", async () => {
    const order: string[] = [];
    const stage =
      (name: string): CallStage =>
      async (call, next) => {
        order.push(`${name}:in`);
        const outcome = await next(call);
        order.push(`${name}:out`);
        return outcome;
      };
    const pipeline = composeStages([stage("outer"), stage("inner")], async () => {
      order.push("handler");
      return success({});
    });

    await pipeline(makeCall(singleRequest({})));

    expect(order).toEqual(["outer:in", "inner:in", "handler", "inner:out", "outer:out"]);
  });
});
