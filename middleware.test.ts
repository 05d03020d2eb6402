// Copyright 2018-2024 the oak authors. All rights reserved.

import assert from "node:assert/strict";
import { test } from "node:test";

import { compose, excludeMiddleware, type Middleware } from "./middleware.ts";

type Calls = string[];

function tracing(name: string): Middleware<Calls> {
  return async (calls, next) => {
    calls.push(`${name} before`);
    const response = await next();
    calls.push(`${name} after`);
    return response;
  };
}

test("compose - the first middleware is the outermost layer", async () => {
  const calls: Calls = [];
  const dispatch = compose<Calls>(
    [tracing("A"), tracing("B"), tracing("C")],
    (calls) => {
      calls.push("handler");
      return Promise.resolve(new Response("ok"));
    },
  );
  const response = await dispatch(calls);
  assert.equal(await response.text(), "ok");
  assert.deepEqual(calls, [
    "A before",
    "B before",
    "C before",
    "handler",
    "C after",
    "B after",
    "A after",
  ]);
});

test("compose - middleware can respond without calling next", async () => {
  const calls: Calls = [];
  const dispatch = compose<Calls>(
    [tracing("A"), () => new Response("denied", { status: 403 })],
    (calls) => {
      calls.push("handler");
      return Promise.resolve(new Response("ok"));
    },
  );
  const response = await dispatch(calls);
  assert.equal(response.status, 403);
  assert.deepEqual(calls, ["A before", "A after"]);
});

test("compose - calling next twice rejects", async () => {
  const dispatch = compose<Calls>(
    [async (_calls, next) => {
      await next();
      return next();
    }],
    () => Promise.resolve(new Response("ok")),
  );
  await assert.rejects(dispatch([]), {
    message: "next() called multiple times by the same middleware.",
  });
});

test("compose - errors propagate to outer middleware", async () => {
  const dispatch = compose<Calls>(
    [async (_calls, next) => {
      try {
        return await next();
      } catch (error) {
        return new Response(
          error instanceof Error ? error.message : "unknown",
          { status: 500 },
        );
      }
    }],
    () => Promise.reject(new Error("boom")),
  );
  const response = await dispatch([]);
  assert.equal(response.status, 500);
  assert.equal(await response.text(), "boom");
});

test("excludeMiddleware - removes middleware by reference or name", () => {
  const auth: Middleware = function auth(_ctx, next) {
    return next();
  };
  const cors: Middleware = function cors(_ctx, next) {
    return next();
  };
  const timing: Middleware = (_ctx, next) => next();
  const all = [auth, cors, timing];
  assert.deepEqual(excludeMiddleware(all, [auth]), [cors, timing]);
  assert.deepEqual(excludeMiddleware(all, ["cors"]), [auth, timing]);
  assert.deepEqual(excludeMiddleware(all, ["timing", auth]), [cors]);
  assert.deepEqual(excludeMiddleware(all, [""]), all);
  assert.deepEqual(excludeMiddleware(all, []), all);
});
