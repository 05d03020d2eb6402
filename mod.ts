// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * trellis is a request routing and middleware dispatch core for Node.js.
 *
 * Given the method, path and host of a request it locates the handler among
 * the registered routes, binds and converts the parameters of the path, runs
 * the chain of global, group and route middleware and produces a
 * {@linkcode Response}. Trailing slashes, disallowed methods and fallbacks are
 * handled along the way.
 *
 * ## Basic usage
 *
 * ```ts
 * import { Router } from "trellis";
 *
 * const router = new Router();
 * router.get("/", () => ({ hello: "world" }));
 * router.listen({ port: 3000 });
 * ```
 *
 * ## Route templates
 *
 * Templates are made of `/` separated segments, where a segment is either
 * literal text or a parameter:
 *
 * - `{name}` a required parameter
 * - `{name:type}` a required parameter which must match a registered type
 *   (`int`, `double`, `uuid`, `slug`, `email`, `url`, `ip`, `word`, `string`
 *   or one registered with {@linkcode ParamTypeRegistry.register})
 * - `{name?}` an optional parameter, only allowed in a trailing run
 * - `{*name}` a wildcard which takes the rest of the path, only allowed last
 *
 * When several routes match a path, literal segments are preferred over typed
 * parameters, typed over untyped, untyped over optional and optional over
 * wildcards, segment by segment from the left.
 *
 * ```ts
 * router.get("/users/new", () => ({ form: true }));
 * router.get("/users/{id:int}", (ctx) => ({ id: ctx.params.id }));
 * router.get("/files/{*path}", (ctx) => ({ path: ctx.params.path }));
 * ```
 *
 * ## Groups and middleware
 *
 * Groups share a prefix and middleware, and can have a fallback which handles
 * anything under the prefix that no route matches. Middleware wraps the rest of
 * the chain, running global middleware first, then the middleware of each
 * group from the root, then the middleware of the route:
 *
 * ```ts
 * router.use(async (ctx, next) => {
 *   const response = await next();
 *   response.headers.set("x-request-id", ctx.id);
 *   return response;
 * });
 *
 * router.group("/api", [auth], (api) => {
 *   api.get("/health", () => ({ ok: true })).withoutMiddleware(auth);
 *   api.fallback((ctx) => ctx.json({ missing: ctx.url.pathname }, {
 *     status: 404,
 *   }));
 * }).name("api");
 * ```
 *
 * ## Context
 *
 * The {@linkcode Context} is passed to middleware and handlers. It provides
 * the bound parameters (`params`, `param()`, `boundParams`), the query
 * (`query()`, `queryParams()`), the validated body (`body()`, `bind()`), an
 * attribute bag to share values along the chain (`set()`, `get()`, `has()`,
 * `mustGet()`) and response builders (`json()`, `string()`, `html()`,
 * `redirect()`, `created()`, `status()`, `setHeader()`, `throw()`).
 *
 * Handlers can return a {@linkcode Response}, a value which is serialized as
 * JSON, or `undefined` for a `204 No Content` response.
 *
 * ## Lifecycle events
 *
 * ```ts
 * router.onAfterRouting(({ requestEvent, response, duration }) => {
 *   console.log(requestEvent.id, response?.status, duration);
 * });
 * ```
 *
 * @module
 */

export * as v from "valibot";
export { loadRouterOptions, RouterConfigSchema } from "./config.ts";
export type { RouterConfig } from "./config.ts";
export {
  Context,
  type ContextInit,
  type ContextState,
  type CreatedInit,
  type RedirectInit,
  type RespondInit,
  type UrlFor,
} from "./context.ts";
export {
  ConfigurationError,
  DuplicateRouteNameError,
  ParamTypeError,
  PatternError,
  UnknownParamTypeError,
  UrlGenerationError,
} from "./errors.ts";
export {
  type AfterRoutingEvent,
  type BeforeRoutingEvent,
  EventBus,
  type Listener,
  type RouteMatchedEvent,
  type RouteNotFoundEvent,
  type RouterEventMap,
  type RouterEventType,
  type RoutingErrorEvent,
} from "./events.ts";
export {
  type Constraint,
  type FallbackInit,
  type GroupBuilder,
  type GroupHandle,
  type GroupInit,
  type MountInit,
  type RouteDescriptor,
  type RouteDescriptorWithMethod,
  RouteGroup,
  type RouteHandle,
  type RouteInit,
} from "./group.ts";
export { configure, type LoggerOptions } from "./logger.ts";
export {
  type MatchedResult,
  Matcher,
  type MatchResult,
  type MethodNotAllowedResult,
  type NotFoundResult,
  type RedirectResult,
} from "./matcher.ts";
export type { Middleware, MiddlewareRef, Next } from "./middleware.ts";
export { BoundParams } from "./params.ts";
export {
  type CastFunction,
  type ParamType,
  ParamTypeRegistry,
  paramTypes,
  type TypedValue,
} from "./param_types.ts";
export {
  buildPath,
  type CompiledPattern,
  compilePattern,
} from "./pattern.ts";
export { FetchRequestEvent } from "./request_event.ts";
export type {
  ConstraintPredicate,
  PathRoute,
  Route,
  RouteHandler,
} from "./route.ts";
export {
  type ErrorDetails,
  type ListenOptions,
  type RouteInfo,
  Router,
  type RouterOptions,
} from "./router.ts";
export type {
  BodySchema,
  InvalidHandler,
  QueryStringSchema,
  SchemaDescriptor,
} from "./schema.ts";
export type {
  Addr,
  MatchTarget,
  Removeable,
  RequestEvent,
  RequestServer,
  RequestServerConstructor,
  RequestServerOptions,
  RouteParameters,
} from "./types.ts";
export { StatusCodes } from "http-status-codes";
