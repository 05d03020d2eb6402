// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Composition of middleware into a single continuation chain.
 *
 * @module
 */

import type { Context } from "./context.ts";

/** Invokes the remainder of a middleware chain. */
export type Next = () => Promise<Response>;

/**
 * A function which wraps the handling of a request. It can act before and
 * after calling `next()`, or not call it at all and return a response of its
 * own.
 *
 * @example
 *
 * ```ts
 * const timing: Middleware = async (ctx, next) => {
 *   const start = performance.now();
 *   const response = await next();
 *   response.headers.set("x-response-time", `${performance.now() - start}`);
 *   return response;
 * };
 * ```
 */
export interface Middleware<C = Context> {
  (context: C, next: Next): Response | Promise<Response>;
}

/**
 * A reference to middleware to exclude from a route, either the middleware
 * function itself or its name.
 */
export type MiddlewareRef = Middleware | string;

/** A composed middleware chain. */
export type Dispatch<C = Context> = (context: C) => Promise<Response>;

/**
 * Remove the middleware referred to by `refs` from a list, matching either by
 * reference or by the name of the function.
 */
export function excludeMiddleware(
  middlewares: readonly Middleware[],
  refs: readonly MiddlewareRef[],
): Middleware[] {
  if (!refs.length) {
    return [...middlewares];
  }
  return middlewares.filter((middleware) =>
    !refs.some((ref) =>
      typeof ref === "string"
        ? ref !== "" && middleware.name === ref
        : ref === middleware
    )
  );
}

/**
 * Reduce a list of middleware from right to left around a terminal handler,
 * producing a single function which runs the whole chain. The first
 * middleware in the list is the outermost layer.
 *
 * Calling `next()` more than once from the same middleware rejects.
 */
export function compose<C>(
  middlewares: readonly Middleware<C>[],
  terminal: Dispatch<C>,
): Dispatch<C> {
  return middlewares.reduceRight<Dispatch<C>>(
    (next, middleware) => async (context) => {
      let called = false;
      return await middleware(context, () => {
        if (called) {
          return Promise.reject(
            new Error("next() called multiple times by the same middleware."),
          );
        }
        called = true;
        return next(context);
      });
    },
    terminal,
  );
}
