// Copyright 2018-2024 the oak authors. All rights reserved.

import {
  loadRouterOptions,
  type Middleware,
  Router,
  StatusCodes,
  v,
} from "../mod.ts";

declare module "../context.ts" {
  interface ContextState {
    token: string;
  }
}

const router = new Router(loadRouterOptions(process.env, {
  logger: { console: { level: "info" } },
}));

const book = v.object({
  author: v.string(),
  title: v.string(),
});

const bookList = v.array(book);

type Book = v.InferOutput<typeof book>;

const bookPatch = v.object({
  author: v.optional(v.string()),
  title: v.optional(v.string()),
});

const books = new Map<number, Book>();
let nextId = 1;

const timing: Middleware = async (ctx, next) => {
  const start = performance.now();
  const response = await next();
  const elapsed = performance.now() - start;
  ctx.setHeader("x-response-time", `${elapsed.toFixed(2)}ms`);
  return response;
};

const auth: Middleware = function auth(ctx, next) {
  const token = ctx.request.headers.get("authorization");
  if (!token) {
    return ctx.throw(StatusCodes.UNAUTHORIZED, "Authorization required");
  }
  ctx.set("token", token);
  return next();
};

router.use(timing);

router.get("/", () => ({ hello: "world" })).name("home");

router.get("/redirect", (ctx) =>
  ctx.redirect("/books/{id:int}", {
    params: { id: 1 },
    status: StatusCodes.TEMPORARY_REDIRECT,
  }));

router.group("/books", (group) => {
  group.get("/", () => [...books.values()], {
    schema: { response: bookList },
  }).name("list");

  group.get("/{id:int}", (ctx) => {
    const maybeBook = books.get(ctx.params.id);
    if (!maybeBook) {
      return ctx.notFound("Book not found");
    }
    return maybeBook;
  }, { schema: { response: book } }).name("show");

  group.group("/", [auth], (admin) => {
    admin.post("/", async (ctx) => {
      const body = await ctx.body();
      if (!body) {
        return;
      }
      const id = nextId++;
      books.set(id, body);
      return ctx.created(body, {
        location: "/books/{id:int}",
        params: { id },
      });
    }, { schema: { body: book, response: book } });

    admin.patch("/{id:int}", async (ctx) => {
      const existing = books.get(ctx.params.id);
      if (!existing) {
        return ctx.notFound("Book not found");
      }
      const body = await ctx.body();
      const updated = { ...existing, ...body };
      books.set(ctx.params.id, updated);
      return updated;
    }, { schema: { body: bookPatch, response: book } });

    admin.delete("/{id:int}", (ctx) => {
      books.delete(ctx.params.id);
    });
  });

  group.fallback((ctx) =>
    ctx.json({ message: `No book route for ${ctx.url.pathname}` }, {
      status: StatusCodes.NOT_FOUND,
    })
  );
}).name("books");

router.onAfterRouting(({ requestEvent, response, duration }) => {
  console.log(
    `${requestEvent.request.method} ${requestEvent.url.pathname} ${
      response?.status ?? "-"
    } ${duration.toFixed(2)}ms`,
  );
});

router.printRoutes();
await router.listen({ port: 3000 });
