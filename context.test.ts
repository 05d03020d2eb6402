// Copyright 2018-2024 the oak authors. All rights reserved.

import createHttpError from "http-errors";
import assert from "node:assert/strict";
import { test } from "node:test";
import * as v from "valibot";

import { Context } from "./context.ts";
import { BoundParams } from "./params.ts";
import { Schema } from "./schema.ts";
import { MockRequestEvent } from "./testing_utils.ts";

function createRequestEvent() {
  return new MockRequestEvent("http://localhost/item/123?a=1&b=2&b=3", {
    method: "POST",
    body: JSON.stringify({ c: 3 }),
    headers: { "content-type": "application/json" },
  });
}

test("Context - should be able to create a new context", async () => {
  const requestEvent = createRequestEvent();
  const context = new Context(requestEvent, {
    params: new BoundParams([
      ["item", { type: "int", value: 123, raw: "123" }],
    ]),
  });
  assert.deepEqual(context.addr, {
    hostname: "localhost",
    port: 80,
    transport: "tcp",
  });
  assert.deepEqual(context.params, { item: 123 });
  assert.equal(context.param("item"), "123");
  assert.equal(context.boundParams.int("item"), 123);
  assert.equal(context.url.href, "http://localhost/item/123?a=1&b=2&b=3");
  assert.equal(context.request, requestEvent.request);
  assert.equal(context.id, requestEvent.id);
  assert.equal(context.route, undefined);
  assert.deepEqual(await context.body(), { c: 3 });
  assert.deepEqual(await context.queryParams(), { a: "1", b: ["2", "3"] });
  assert.equal(context.query("b"), "2");
  assert.equal(context.query("missing"), undefined);
  assert.equal(requestEvent.responded, false);
});

test("Context - body is read once", async () => {
  const context = new Context(createRequestEvent());
  assert.deepEqual(await context.body(), { c: 3 });
  assert.deepEqual(await context.body(), { c: 3 });
  assert.deepEqual(
    await context.bind(v.object({ c: v.number() })),
    { c: 3 },
  );
});

test("Context - body is validated by the schema", async () => {
  const context = new Context(createRequestEvent(), {
    schema: new Schema({ body: v.object({ c: v.string() }) }),
  });
  await assert.rejects(
    context.body(),
    (error) => createHttpError.isHttpError(error) && error.status === 400,
  );
});

test("Context - invalid handler responds to the request", async () => {
  const requestEvent = createRequestEvent();
  const context = new Context(requestEvent, {
    schema: new Schema({
      body: v.object({ c: v.string() }),
      invalidHandler: () => new Response("invalid", { status: 422 }),
    }),
  });
  assert.equal(await context.body(), undefined);
  assert.equal(requestEvent.responded, true);
  assert.equal((await requestEvent.response).status, 422);
});

test("Context - bind rejects invalid bodies with 400", async () => {
  const context = new Context(createRequestEvent());
  await assert.rejects(
    context.bind(v.object({ c: v.string() })),
    (error) => createHttpError.isHttpError(error) && error.status === 400,
  );
});

test("Context - attributes can be shared", () => {
  const context = new Context(createRequestEvent());
  assert.equal(context.has("user"), false);
  assert.equal(context.get("user"), undefined);
  assert.throws(() => context.mustGet("user"), {
    message: 'Context attribute "user" has not been set.',
  });
  context.set("user", { name: "ada" });
  assert.equal(context.has("user"), true);
  assert.deepEqual(context.mustGet("user"), { name: "ada" });
});

test("Context - builds responses", async () => {
  const context = new Context(createRequestEvent());
  const json = context.json({ a: 1 });
  assert.equal(json.status, 200);
  assert.equal(json.statusText, "OK");
  assert.equal(
    json.headers.get("content-type"),
    "application/json; charset=utf-8",
  );
  assert.equal(await json.text(), '{"a":1}');

  const text = context.string("hello", { headers: { "x-a": "1" } });
  assert.equal(text.headers.get("content-type"), "text/plain; charset=utf-8");
  assert.equal(text.headers.get("x-a"), "1");
  assert.equal(await text.text(), "hello");

  const html = context.status(202).html("<p>hi</p>");
  assert.equal(html.status, 202);
  assert.equal(html.headers.get("content-type"), "text/html; charset=utf-8");
  assert.equal(context.pendingStatus, 202);

  const teapot = context.json({}, { status: 418 });
  assert.equal(teapot.status, 418);
});

test("Context - redirect substitutes parameters", () => {
  const context = new Context(createRequestEvent());
  const found = context.redirect("/login");
  assert.equal(found.status, 302);
  assert.equal(found.headers.get("location"), "/login");
  const seeOther = context.redirect("/users/{id:int}", {
    params: { id: 5 },
    status: 303,
  });
  assert.equal(seeOther.status, 303);
  assert.equal(seeOther.headers.get("location"), "/users/5");
});

test("Context - created sets the location", async () => {
  const context = new Context(createRequestEvent());
  const response = context.created({ id: 1 }, {
    location: "/items/{id:int}",
    params: { id: 1 },
  });
  assert.equal(response.status, 201);
  assert.equal(response.headers.get("location"), "/items/1");
  assert.deepEqual(await response.json(), { id: 1 });
});

test("Context - response headers are collected", () => {
  const context = new Context(createRequestEvent());
  context.setHeader("x-request-id", "abc");
  assert.equal(context.responseHeaders.get("x-request-id"), "abc");
});

test("Context - throw raises HTTP errors", () => {
  const context = new Context(createRequestEvent());
  assert.throws(
    () => context.throw(418, "I'm a teapot"),
    (error) =>
      createHttpError.isHttpError(error) && error.status === 418 &&
      error.message === "I'm a teapot",
  );
  assert.throws(
    () => context.notFound(),
    (error) =>
      createHttpError.isHttpError(error) && error.status === 404 &&
      error.message === "Resource not found",
  );
  assert.throws(
    () => context.conflict("Already exists"),
    (error) => createHttpError.isHttpError(error) && error.status === 409,
  );
});

test("Context - urlFor delegates to the router", () => {
  const bare = new Context(createRequestEvent());
  assert.throws(() => bare.urlFor("home"), TypeError);
  const context = new Context(createRequestEvent(), {
    urlFor: (name, params) => `/${name}/${String(params?.id)}`,
  });
  assert.equal(context.urlFor("user", { id: 1 }), "/user/1");
});

test("Context - signal follows the request event", () => {
  const requestEvent = createRequestEvent();
  const context = new Context(requestEvent);
  assert.equal(context.signal.aborted, false);
  requestEvent.abort();
  assert.equal(context.signal.aborted, true);
});
