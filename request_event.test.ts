// Copyright 2018-2024 the oak authors. All rights reserved.

import createHttpError from "http-errors";
import assert from "node:assert/strict";
import { test } from "node:test";

import { FetchRequestEvent } from "./request_event.ts";

test("FetchRequestEvent - resolves the response once", async () => {
  const requestEvent = new FetchRequestEvent(
    new Request("http://localhost/path?a=1"),
    {
      id: "request-1",
      addr: { hostname: "10.0.0.1", port: 4000, transport: "tcp" },
    },
  );
  assert.equal(requestEvent.id, "request-1");
  assert.equal(requestEvent.addr.hostname, "10.0.0.1");
  assert.equal(requestEvent.url.pathname, "/path");
  assert.equal(requestEvent.responded, false);
  requestEvent.respond(new Response("ok"));
  assert.equal(requestEvent.responded, true);
  assert.equal(await (await requestEvent.response).text(), "ok");
  assert.throws(
    () => requestEvent.respond(new Response("again")),
    (error) => createHttpError.isHttpError(error) && error.status === 500,
  );
});

test("FetchRequestEvent - error rejects the response", async () => {
  const requestEvent = new FetchRequestEvent(new Request("http://localhost/"));
  assert.equal(typeof requestEvent.id, "string");
  assert.equal(requestEvent.signal.aborted, false);
  requestEvent.error(new Error("failed"));
  await assert.rejects(requestEvent.response, { message: "failed" });
  assert.throws(() => requestEvent.error(), (error) =>
    createHttpError.isHttpError(error) && error.status === 500);
});
