// Copyright 2018-2024 the oak authors. All rights reserved.

import assert from "node:assert/strict";
import { test } from "node:test";

import { PatternError } from "./errors.ts";
import { RouteGroup } from "./group.ts";
import type { Middleware } from "./middleware.ts";
import { Router } from "./router.ts";

function tag(calls: string[], name: string): Middleware {
  return (_ctx, next) => {
    calls.push(name);
    return next();
  };
}

test("RouteGroup - prefixes are joined to their parents", () => {
  const router = new Router();
  const outer = router.group("/orgs/{org}/", (orgs) => {
    orgs.group("repos/{repo}", (repos) => {
      repos.get("/issues", () => {});
    });
  }).group;
  const [inner] = outer.entries;
  assert.ok(inner instanceof RouteGroup);
  assert.equal(router.prefix, "/");
  assert.equal(router.depth, 0);
  assert.equal(outer.prefix, "/orgs/{org}");
  assert.equal(outer.depth, 1);
  assert.equal(outer.parent, router);
  assert.equal(inner.prefix, "/orgs/{org}/repos/{repo}");
  assert.equal(inner.depth, 2);
  assert.equal(inner.parent, outer);
  assert.deepEqual(router.routes().map(({ path }) => path), [
    "/orgs/{org}/repos/{repo}/issues",
  ]);
});

test("RouteGroup - prefixes cannot contain optional or wildcard segments", () => {
  const router = new Router();
  assert.throws(() => router.group("/{page?}", () => {}), PatternError);
  assert.throws(() => router.group("/{*rest}", () => {}), PatternError);
});

test("RouteGroup - middleware applies to the group and its descendants", async () => {
  const calls: string[] = [];
  const router = new Router();
  router.group("/a", { middlewares: [tag(calls, "a")] }, (a) => {
    a.get("/", () => {});
    a.group("/b", [tag(calls, "b")], (b) => {
      b.get("/", () => {});
    });
  });
  router.get("/c", () => {});
  await router.handle(new Request("http://localhost/a/b"));
  assert.deepEqual(calls, ["a", "b"]);
  calls.length = 0;
  await router.handle(new Request("http://localhost/a"));
  assert.deepEqual(calls, ["a"]);
  calls.length = 0;
  await router.handle(new Request("http://localhost/c"));
  assert.deepEqual(calls, []);
});

test("RouteGroup - the last fallback registered wins", async () => {
  const router = new Router();
  router.group("/api", (api) => {
    api.fallback(() => new Response("first"));
    api.fallback(() => new Response("second"));
  });
  const response = await router.handle(new Request("http://localhost/api/x"));
  assert.equal(await response.text(), "second");
});

test("RouteGroup - fallback middleware runs after group middleware", async () => {
  const calls: string[] = [];
  const router = new Router();
  router.group("/api", [tag(calls, "group")], (api) => {
    api.fallback(() => new Response(null, { status: 404 }), {
      middlewares: [tag(calls, "fallback")],
    });
  });
  const response = await router.handle(new Request("http://localhost/api/x"));
  assert.equal(response.status, 404);
  assert.deepEqual(calls, ["group", "fallback"]);
});

test("RouteGroup - route constraints are checked", async () => {
  const router = new Router();
  router.group("/users", (users) => {
    users.get("/{name}", (ctx) => ({ name: ctx.params.name }), {
      constraints: { name: "[a-z]+" },
    });
  });
  const valid = await router.handle(new Request("http://localhost/users/ada"));
  assert.deepEqual(await valid.json(), { name: "ada" });
  const invalid = await router.handle(
    new Request("http://localhost/users/Ada"),
  );
  assert.equal(invalid.status, 404);
});

test("RouteGroup - domain constraints use the host of the request", async () => {
  const router = new Router();
  router.get("/", () => ({ site: "api" }), { domain: "api.example.com" });
  router.get("/", () => ({ site: "default" }));
  const api = await router.handle(
    new Request("http://api.example.com:8080/"),
  );
  assert.deepEqual(await api.json(), { site: "api" });
  const other = await router.handle(new Request("http://example.com/"));
  assert.deepEqual(await other.json(), { site: "default" });
});
