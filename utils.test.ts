// Copyright 2018-2024 the oak authors. All rights reserved.

import createHttpError from "http-errors";
import assert from "node:assert/strict";
import { test } from "node:test";

import {
  appendHeaders,
  createPromiseWithResolvers,
  decodeComponent,
  joinPaths,
  responseFromHttpError,
  statusText,
} from "./utils.ts";

test("joinPaths - joins with a single slash", () => {
  assert.equal(joinPaths("/api", "/users"), "/api/users");
  assert.equal(joinPaths("/api/", "/users/"), "/api/users/");
  assert.equal(joinPaths("api"), "/api");
  assert.equal(joinPaths("/", ""), "/");
  assert.equal(joinPaths(), "/");
});

test("decodeComponent - returns the text when it cannot be decoded", () => {
  assert.equal(decodeComponent("a%20b"), "a b");
  assert.equal(decodeComponent("%E0%A4%A"), "%E0%A4%A");
});

test("statusText - returns the reason phrase", () => {
  assert.equal(statusText(404), "Not Found");
  assert.equal(statusText(599), "Unknown");
});

test("createPromiseWithResolvers - resolves the promise", async () => {
  const { promise, resolve } = createPromiseWithResolvers<string>();
  resolve("done");
  assert.equal(await promise, "done");
});

test("appendHeaders - appends to the response headers", () => {
  const response = new Response(null, { headers: { "x-a": "1" } });
  appendHeaders(response, new Headers({ "x-a": "2", "x-b": "3" }));
  assert.equal(response.headers.get("x-a"), "1, 2");
  assert.equal(response.headers.get("x-b"), "3");
});

test("responseFromHttpError - defaults to a JSON body", async () => {
  const response = responseFromHttpError(
    createHttpError(404, "No such user"),
  );
  assert.equal(response.status, 404);
  assert.equal(response.statusText, "Not Found");
  assert.equal(
    response.headers.get("content-type"),
    "application/json; charset=utf-8",
  );
  assert.deepEqual(await response.json(), {
    status: 404,
    statusText: "Not Found",
    message: "No such user",
  });
});

test("responseFromHttpError - hides the message of server errors", async () => {
  const error = createHttpError(500, "connection string leaked");
  assert.deepEqual(await responseFromHttpError(error).json(), {
    status: 500,
    statusText: "Internal Server Error",
    message: "Internal Server Error",
  });
  const debug = await responseFromHttpError(error, { debug: true }).json();
  assert.equal(debug.message, "connection string leaked");
  assert.equal(typeof debug.stack, "string");
});

test("responseFromHttpError - negotiates HTML and text bodies", async () => {
  const error = createHttpError(404, "No such user");
  const html = responseFromHttpError(error, {
    request: new Request("http://localhost/", {
      headers: { accept: "text/html" },
    }),
  });
  assert.equal(html.headers.get("content-type"), "text/html; charset=utf-8");
  assert.equal(
    await html.text(),
    "<!DOCTYPE html><html><head><title>Not Found</title></head><body><h1>404 - Not Found</h1><h2>No such user</h2></body></html>",
  );
  const text = responseFromHttpError(error, {
    request: new Request("http://localhost/", {
      headers: { accept: "text/plain" },
    }),
  });
  assert.equal(text.headers.get("content-type"), "text/plain; charset=utf-8");
  assert.equal(await text.text(), "404 Not Found: No such user");
  const preferred = responseFromHttpError(error, { prefer: "html" });
  assert.equal(
    preferred.headers.get("content-type"),
    "text/html; charset=utf-8",
  );
});

test("responseFromHttpError - copies the headers of the error", () => {
  const response = responseFromHttpError(
    createHttpError(405, "Method Not Allowed", {
      headers: { allow: "GET, HEAD" },
    }),
    { headers: { "x-request-id": "abc" } },
  );
  assert.equal(response.headers.get("allow"), "GET, HEAD");
  assert.equal(response.headers.get("x-request-id"), "abc");
});
