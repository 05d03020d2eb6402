// Copyright 2018-2024 the oak authors. All rights reserved.

import assert from "node:assert/strict";
import { test } from "node:test";

import { ParamTypeError } from "./errors.ts";
import { BoundParams } from "./params.ts";

function createParams(): BoundParams {
  return new BoundParams([
    ["id", { type: "int", value: 42, raw: "42" }],
    ["slug", { type: "string", value: "a b", raw: "a b" }],
    ["price", { type: "double", value: 9.5, raw: "9.50" }],
  ]);
}

test("BoundParams - typed accessors return the converted value", () => {
  const params = createParams();
  assert.equal(params.size, 3);
  assert.equal(params.int("id"), 42);
  assert.equal(params.string("slug"), "a b");
  assert.equal(params.double("price"), 9.5);
  assert.equal(params.raw("price"), "9.50");
  assert.equal(params.value("id"), 42);
});

test("BoundParams - accessors of another type throw", () => {
  const params = createParams();
  assert.throws(
    () => params.string("id"),
    (error) =>
      error instanceof ParamTypeError &&
      error.message === 'Parameter "id" is of type "int", not "string".',
  );
  assert.throws(() => params.int("slug"), ParamTypeError);
  assert.throws(() => params.double("id"), ParamTypeError);
});

test("BoundParams - missing parameters are undefined", () => {
  const params = createParams();
  assert.equal(params.has("missing"), false);
  assert.equal(params.get("missing"), undefined);
  assert.equal(params.int("missing"), undefined);
  assert.equal(params.raw("missing"), undefined);
});

test("BoundParams - can be converted to plain objects", () => {
  const params = createParams();
  assert.deepEqual(params.toObject(), { id: 42, slug: "a b", price: 9.5 });
  assert.deepEqual(params.toRaw(), { id: "42", slug: "a b", price: "9.50" });
  assert.deepEqual([...params.keys()], ["id", "slug", "price"]);
  assert.deepEqual([...params].map(([name]) => name), ["id", "slug", "price"]);
});

test("BoundParams - is frozen", () => {
  assert.ok(Object.isFrozen(createParams()));
  assert.equal(new BoundParams().size, 0);
});
