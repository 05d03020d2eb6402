// Copyright 2018-2024 the oak authors. All rights reserved.

import assert from "node:assert/strict";
import { test } from "node:test";
import * as v from "valibot";

import { ConfigurationError, DuplicateRouteNameError } from "./errors.ts";
import type { Middleware } from "./middleware.ts";
import { Router } from "./router.ts";
import type { BodySchema } from "./schema.ts";
import { MockRequestEvent } from "./testing_utils.ts";

function request(path: string, init?: RequestInit): Request {
  return new Request(`http://localhost${path}`, init);
}

function tracing(calls: string[], name: string): Middleware {
  return async (_ctx, next) => {
    calls.push(`${name} before`);
    const response = await next();
    calls.push(`${name} after`);
    return response;
  };
}

test("Router - register route - get - path and handler", () => {
  const router = new Router();
  router.get("/", () => {
    return { hello: "world" };
  });
  const result = router.match("GET", "/");
  assert.equal(result.kind, "matched");
  assert.equal(result.kind === "matched" && result.route.path, "/");
});

test("Router - register route - shorthands register their method", () => {
  const router = new Router();
  const noop = () => {};
  router.get("/r", noop);
  router.head("/r", noop);
  router.options("/r", noop);
  router.post("/r", noop);
  router.put("/r", noop);
  router.patch("/r", noop);
  router.delete("/r", noop);
  router.route(["get", "post"], "/multi", noop);
  router.handle("PURGE", "/cache", noop);
  router.all("/any", noop);
  router.get({ path: "/descriptor", handler: noop });
  router.route({ method: "put", path: "/descriptor", handler: noop });
  assert.deepEqual(
    router.routes().map(({ methods, path }) => [methods.join(","), path]),
    [
      ["GET", "/r"],
      ["HEAD", "/r"],
      ["OPTIONS", "/r"],
      ["POST", "/r"],
      ["PUT", "/r"],
      ["PATCH", "/r"],
      ["DELETE", "/r"],
      ["GET,POST", "/multi"],
      ["PURGE", "/cache"],
      ["GET,HEAD,OPTIONS,POST,PUT,PATCH,DELETE", "/any"],
      ["GET", "/descriptor"],
      ["PUT", "/descriptor"],
    ],
  );
});

test("Router - a literal route is preferred over a typed parameter", async () => {
  const router = new Router();
  router.get("/users/{id:int}", (ctx) => ({ id: ctx.params.id }));
  router.get("/users/new", () => ({ form: true }));
  const created = await router.handle(request("/users/new"));
  assert.deepEqual(await created.json(), { form: true });
  const user = await router.handle(request("/users/42"));
  assert.equal(user.status, 200);
  assert.deepEqual(await user.json(), { id: 42 });
});

test("Router - an unmatched typed parameter is not found, another method is not allowed", async () => {
  const router = new Router();
  router.get("/users/{id:int}", (ctx) => ({ id: ctx.params.id }));
  const notFound = await router.handle(request("/users/abc"));
  assert.equal(notFound.status, 404);
  assert.deepEqual(await notFound.json(), {
    status: 404,
    statusText: "Not Found",
    message: "Not Found",
  });
  const notAllowed = await router.handle(
    request("/users/1", { method: "POST" }),
  );
  assert.equal(notAllowed.status, 405);
  assert.equal(notAllowed.headers.get("allow"), "GET");
});

test("Router - redirects to the path with the trailing slash toggled", async () => {
  const router = new Router();
  router.get("/docs", () => ({ docs: true }));
  const response = await router.handle(request("/docs/?page=2"));
  assert.equal(response.status, 301);
  assert.equal(response.headers.get("location"), "/docs?page=2");

  const disabled = new Router({ redirectTrailingSlash: false });
  disabled.get("/docs", () => ({ docs: true }));
  assert.equal((await disabled.handle(request("/docs/"))).status, 404);
});

test("Router - middleware runs from global to group to route", async () => {
  const calls: string[] = [];
  const router = new Router();
  router.use(tracing(calls, "A"));
  router.group("/api", [tracing(calls, "B")], (api) => {
    api.get("/items", () => {
      calls.push("handler");
      return { ok: true };
    }, { middlewares: [tracing(calls, "C")] });
  });
  const response = await router.handle(request("/api/items"));
  assert.equal(response.status, 200);
  assert.deepEqual(calls, [
    "A before",
    "B before",
    "C before",
    "handler",
    "C after",
    "B after",
    "A after",
  ]);
  const [info] = router.routes();
  assert.equal(info.middlewares, 3);
});

test("Router - withoutMiddleware excludes inherited middleware", async () => {
  const auth: Middleware = function auth(ctx, next) {
    if (ctx.request.headers.get("authorization") !== "Bearer test-secret") {
      return new Response(null, { status: 401 });
    }
    return next();
  };
  const router = new Router();
  router.group("/admin", [auth], (admin) => {
    admin.get("/health", () => ({ ok: true })).withoutMiddleware("auth");
    admin.get("/secret", () => ({ secret: true }));
  });
  assert.equal((await router.handle(request("/admin/health"))).status, 200);
  assert.equal((await router.handle(request("/admin/secret"))).status, 401);
  const authorized = await router.handle(
    request("/admin/secret", {
      headers: { authorization: "Bearer test-secret" },
    }),
  );
  assert.equal(authorized.status, 200);
});

test("Router - urlFor round trips with match", () => {
  const router = new Router();
  router.get("/users/{id:int}/posts/{slug}", () => {}).name("post");
  const url = router.urlFor("post", { id: 42, slug: "hello world" }, {
    tab: "comments",
  });
  assert.equal(url, "/users/42/posts/hello%20world?tab=comments");
  const result = router.match("GET", url);
  assert.equal(result.kind, "matched");
  assert.deepEqual(
    result.kind === "matched" ? result.params.toObject() : undefined,
    { id: 42, slug: "hello world" },
  );
  assert.throws(() => router.urlFor("missing"), {
    name: "UrlGenerationError",
    message: 'No route named "missing".',
  });
});

test("Router - route names are prefixed by group names", () => {
  const router = new Router();
  router.group("/admin", { name: "admin" }, (admin) => {
    admin.get("/users", () => {}).name("users");
    admin.group("/reports", (reports) => {
      reports.get("/{year:int}", () => {}, { name: "year" });
    }).name("reports");
  });
  router.group("/api", (api) => {
    api.get("/status", () => {}).name("status");
  });
  assert.equal(router.urlFor("admin.users"), "/admin/users");
  assert.equal(
    router.urlFor("admin.reports.year", { year: 2024 }),
    "/admin/reports/2024",
  );
  assert.equal(router.urlFor("status"), "/api/status");
});

test("Router - duplicate route names are rejected when built", () => {
  const router = new Router();
  router.get("/a", () => {}).name("same");
  router.get("/b", () => {}).name("same");
  assert.throws(
    () => router.build(),
    (error) =>
      error instanceof DuplicateRouteNameError && error.routeName === "same",
  );
});

test("Router - routes cannot be registered once built", () => {
  const router = new Router();
  const handle = router.get("/a", () => {});
  router.build();
  assert.throws(() => router.get("/b", () => {}), ConfigurationError);
  assert.throws(() => router.use((_ctx, next) => next()), ConfigurationError);
  assert.throws(() => handle.name("late"), ConfigurationError);
  assert.throws(() => handle.remove(), ConfigurationError);
});

test("Router - removed routes are not matched", () => {
  const router = new Router();
  router.get("/a", () => {}).remove();
  assert.equal(router.match("GET", "/a").kind, "not-found");
});

test("Router - a group route of / resolves to the group prefix", () => {
  const router = new Router();
  router.group("/books", (books) => {
    books.get("/", () => {});
    books.get("/{id:int}", () => {});
    books.group("/", (nested) => {
      nested.post("", () => {});
    });
  });
  assert.deepEqual(router.routes().map(({ path }) => path), [
    "/books",
    "/books/{id:int}",
    "/books",
  ]);
});

test("Router - handler results become responses", async () => {
  const router = new Router();
  router.get("/value", () => ({ n: 1 }));
  router.get("/empty", () => {});
  router.post("/created", (ctx) => {
    ctx.status(201);
    return { ok: true };
  });
  router.get("/accepted", (ctx) => {
    ctx.status(202);
  });
  router.get("/text", (ctx) => ctx.string("plain"));
  const value = await router.handle(request("/value"));
  assert.equal(value.status, 200);
  assert.deepEqual(await value.json(), { n: 1 });
  assert.equal((await router.handle(request("/empty"))).status, 204);
  const created = await router.handle(request("/created", { method: "POST" }));
  assert.equal(created.status, 201);
  assert.deepEqual(await created.json(), { ok: true });
  assert.equal((await router.handle(request("/accepted"))).status, 202);
  assert.equal(await (await router.handle(request("/text"))).text(), "plain");
});

test("Router - response headers set on the context are appended", async () => {
  const router = new Router();
  router.use((ctx, next) => {
    ctx.setHeader("x-powered-by", "trellis");
    return next();
  });
  router.get("/", () => ({}));
  const found = await router.handle(request("/"));
  assert.equal(found.headers.get("x-powered-by"), "trellis");
  const notFound = await router.handle(request("/missing"));
  assert.equal(notFound.status, 404);
  assert.equal(notFound.headers.get("x-powered-by"), "trellis");
});

test("Router - the nearest fallback handles unmatched requests", async () => {
  const router = new Router();
  router.group("/orgs/{org}", (orgs) => {
    orgs.get("/members", () => []);
    orgs.fallback((ctx) =>
      ctx.json({ org: ctx.params.org, path: ctx.url.pathname }, {
        status: 404,
      })
    );
  });
  router.fallback(() => new Response("root fallback", { status: 404 }));
  const org = await router.handle(request("/orgs/acme/missing"));
  assert.equal(org.status, 404);
  assert.deepEqual(await org.json(), {
    org: "acme",
    path: "/orgs/acme/missing",
  });
  const root = await router.handle(request("/nowhere"));
  assert.equal(await root.text(), "root fallback");
  assert.deepEqual(
    router.routes().map(({ path, isFallback }) => [path, isFallback]),
    [
      ["/orgs/{org}/members", false],
      ["/orgs/{org}", true],
      ["/", true],
    ],
  );
});

test("Router - handlers can generate URLs", async () => {
  const router = new Router();
  router.get("/a", (ctx) => ({ link: ctx.urlFor("b", { id: 3 }) }));
  router.get("/b/{id:int}", () => {}).name("b");
  const response = await router.handle(request("/a"));
  assert.deepEqual(await response.json(), { link: "/b/3" });
});

test("Router - validates the querystring, body and response", async () => {
  const router = new Router();
  router.get("/search", (ctx) => ctx.queryParams(), {
    schema: { querystring: v.object({ q: v.string() }) },
  });
  router.post("/items", async (ctx) => {
    const body = await ctx.body();
    return ctx.created(body, { location: "/items/1" });
  }, { schema: { body: v.object({ name: v.string() }) } });
  const numeric: BodySchema = v.object({ n: v.number() });
  router.get("/bad", () => ({ n: "x" }), { schema: { response: numeric } });
  const search = await router.handle(request("/search?q=trellis"));
  assert.deepEqual(await search.json(), { q: "trellis" });
  assert.equal((await router.handle(request("/search"))).status, 400);
  const created = await router.handle(request("/items", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ name: "widget" }),
  }));
  assert.equal(created.status, 201);
  assert.equal(created.headers.get("location"), "/items/1");
  assert.deepEqual(await created.json(), { name: "widget" });
  const invalid = await router.handle(request("/items", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ name: 1 }),
  }));
  assert.equal(invalid.status, 400);
  assert.equal((await router.handle(request("/bad"))).status, 500);
});

test("Router - errors become error responses", async () => {
  const router = new Router();
  router.get("/forbidden", (ctx) => ctx.throw(403, "Forbidden zone"));
  router.get("/boom", () => {
    throw new Error("boom");
  });
  const forbidden = await router.handle(request("/forbidden"));
  assert.equal(forbidden.status, 403);
  assert.deepEqual(await forbidden.json(), {
    status: 403,
    statusText: "Forbidden",
    message: "Forbidden zone",
  });
  const boom = await router.handle(request("/boom"));
  assert.equal(boom.status, 500);
  assert.deepEqual(await boom.json(), {
    status: 500,
    statusText: "Internal Server Error",
    message: "Internal Server Error",
  });
  assert.equal(typeof boom.headers.get("x-request-id"), "string");

  const debug = new Router({ debug: true });
  debug.get("/boom", () => {
    throw new Error("boom");
  });
  const body = await (await debug.handle(request("/boom"))).json();
  assert.equal(body.message, "boom");
  assert.equal(typeof body.stack, "string");
});

test("Router - onError can provide the response", async () => {
  const details: [string, boolean][] = [];
  const router = new Router({
    onError({ message, respondable }) {
      details.push([message, respondable]);
      return new Response(`handled: ${message}`, { status: 503 });
    },
  });
  router.get("/boom", () => {
    throw new Error("boom");
  });
  const response = await router.handle(request("/boom"));
  assert.equal(response.status, 503);
  assert.equal(await response.text(), "handled: boom");
  assert.deepEqual(details, [["boom", true]]);

  const failing = new Router({
    onError() {
      throw new Error("onError failed");
    },
  });
  failing.get("/boom", () => {
    throw new Error("boom");
  });
  assert.equal((await failing.handle(request("/boom"))).status, 500);
});

test("Router - lifecycle events are published", async () => {
  const router = new Router();
  const events: string[] = [];
  router.onBeforeRouting(({ requestEvent }) => {
    events.push(`before ${requestEvent.url.pathname}`);
  });
  router.onRouteMatched(({ route, params }) => {
    events.push(`matched ${route.path} ${JSON.stringify(params.toObject())}`);
  });
  router.onRouteNotFound(({ requestEvent }) => {
    events.push(`not found ${requestEvent.url.pathname}`);
  });
  router.onRoutingError(({ error, route }) => {
    events.push(
      `error ${error instanceof Error ? error.message : ""} ${route?.path}`,
    );
  });
  router.onAfterRouting(({ response, route, aborted, duration }) => {
    assert.equal(typeof duration, "number");
    events.push(
      `after ${response?.status} ${route?.path ?? "-"} ${aborted}`,
    );
  });
  router.get("/items/{id:int}", () => ({}));
  router.get("/boom", () => {
    throw new Error("boom");
  });
  await router.handle(request("/items/1"));
  await router.handle(request("/missing"));
  await router.handle(request("/boom"));
  assert.deepEqual(events, [
    "before /items/1",
    'matched /items/{id:int} {"id":1}',
    "after 200 /items/{id:int} false",
    "before /missing",
    "not found /missing",
    "after 404 - false",
    "before /boom",
    "matched /boom {}",
    "error boom /boom",
    "after 500 /boom false",
  ]);
});

test("Router - failing listeners do not affect the response", async () => {
  const router = new Router();
  router.on("before-routing", () => {
    throw new Error("listener failed");
  });
  router.on("after-routing", () => Promise.reject(new Error("async failure")));
  router.get("/", () => ({ ok: true }));
  const response = await router.handle(request("/"));
  assert.equal(response.status, 200);
});

test("Router - after routing reports aborted requests", async () => {
  const router = new Router();
  const aborted: boolean[] = [];
  router.onAfterRouting((event) => {
    aborted.push(event.aborted);
  });
  router.get("/slow", (ctx) => ({ aborted: ctx.signal.aborted }));
  const requestEvent = new MockRequestEvent("http://localhost/slow");
  requestEvent.abort();
  const response = await router.handleEvent(requestEvent);
  assert.deepEqual(await response.json(), { aborted: true });
  assert.deepEqual(aborted, [true]);
});

test("Router - mounts the routes of another router", async () => {
  const api = new Router();
  api.use((ctx, next) => {
    ctx.setHeader("x-api", "1");
    return next();
  });
  api.get("/ping", () => ({ pong: true })).name("ping");
  api.group("/users", (users) => {
    users.get("/{id:int}", (ctx) => ({ id: ctx.params.id }));
  });
  const router = new Router();
  assert.throws(() => router.use(router), TypeError);
  router.use(api, { prefix: "/v1" }).name("v1");
  router.get("/", () => ({ root: true }));
  const ping = await router.handle(request("/v1/ping"));
  assert.deepEqual(await ping.json(), { pong: true });
  assert.equal(ping.headers.get("x-api"), "1");
  const user = await router.handle(request("/v1/users/7"));
  assert.deepEqual(await user.json(), { id: 7 });
  const root = await router.handle(request("/"));
  assert.equal(root.headers.get("x-api"), null);
  assert.equal((await router.handle(request("/ping"))).status, 404);
  assert.equal(router.urlFor("v1.ping"), "/v1/ping");
});

test("Router - printRoutes lists the route table", () => {
  const router = new Router();
  router.get("/users/{id:int}", () => {}).name("user");
  router.route(["GET", "POST"], "/forms", () => {});
  router.fallback(() => {});
  assert.equal(
    router.printRoutes(),
    [
      `${"GET".padEnd(12)} /users/{id:int} (user)`,
      `${"GET|POST".padEnd(12)} /forms`,
      `${"*".padEnd(12)} /`,
    ].join("\n"),
  );
});
