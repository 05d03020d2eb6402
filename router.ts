// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The main module of trellis that contains the core {@linkcode Router}, which
 * resolves requests to routes and runs their middleware chains.
 *
 * @module
 */

import createHttpError, { type HttpError } from "http-errors";
import { StatusCodes } from "http-status-codes";
import type { InspectOptionsStylized } from "node:util";
import type { InferOutput } from "valibot";

import { Context } from "./context.ts";
import { DuplicateRouteNameError, UrlGenerationError } from "./errors.ts";
import {
  type AfterRoutingEvent,
  type BeforeRoutingEvent,
  EventBus,
  type Listener,
  type RouteMatchedEvent,
  type RouteNotFoundEvent,
  type RouterEventType,
  type RoutingErrorEvent,
} from "./events.ts";
import {
  type AnyRouteHandler,
  type GroupHandle,
  type MountInit,
  type QueryParamsOf,
  type RouteHandle,
  RouteGroup,
  type RouteInit,
} from "./group.ts";
import {
  configure,
  getLogger,
  type Logger,
  type LoggerOptions,
} from "./logger.ts";
import { type MatchResult, Matcher } from "./matcher.ts";
import { compose, type Middleware } from "./middleware.ts";
import { paramTypes, type ParamTypeRegistry } from "./param_types.ts";
import { buildPath } from "./pattern.ts";
import {
  FetchRequestEvent,
  type FetchRequestEventInit,
} from "./request_event.ts";
import NodeRequestServer from "./request_server_node.ts";
import type { Route, RouteHandler } from "./route.ts";
import type { BodySchema, QueryStringSchema } from "./schema.ts";
import type {
  Addr,
  Removeable,
  RequestEvent,
  RequestServerConstructor,
  RouteParameters,
} from "./types.ts";
import {
  appendHeaders,
  responseFromHttpError,
  statusText,
} from "./utils.ts";

/**
 * Details provided an `onError` hook.
 */
export interface ErrorDetails {
  /**
   * The error message which was generated.
   */
  message: string;
  /**
   * The cause of the error. This is typically an `Error` instance, but can be
   * any value.
   */
  cause: unknown;
  /**
   * The request event which was being processed when the error occurred.
   */
  requestEvent: RequestEvent;
  /**
   * If the error occurred before a response was returned to the client, this
   * will be `true`. This indicates that the error hook can return a response
   * which will be sent to the client instead of the default response.
   */
  respondable: boolean;
  /**
   * If a route was matched, this will be the route that was matched.
   */
  route?: Route;
}

/**
 * Options which can be specified when listening for requests.
 */
export interface ListenOptions {
  /**
   * The server constructor to use when listening for requests. This is not
   * commonly used, but can be used to provide a custom server implementation.
   *
   * When not provided, a server built on `node:http` is used.
   */
  server?: RequestServerConstructor;
  /**
   * The port to listen on.
   */
  port?: number;
  /**
   * The hostname to listen on.
   */
  hostname?: string;
  /**
   * The signal to use to stop listening for requests. When this signal is
   * aborted, the server will stop listening for requests and finish processing
   * any requests that are currently being handled.
   */
  signal?: AbortSignal;
  /**
   * A callback which is invoked when the server starts listening for requests.
   *
   * The address that the server is listening on is provided.
   */
  onListen?(addr: Addr): void;
}

/**
 * Options which can be specified when creating an instance of
 * {@linkcode Router}.
 */
export interface RouterOptions {
  /**
   * When no route matches a path, but one would with a trailing slash added
   * or removed, redirect to that path. `GET` and `HEAD` requests are
   * redirected with `301 Moved Permanently`, other methods with
   * `307 Temporary Redirect`.
   *
   * @default true
   */
  redirectTrailingSlash?: boolean;
  /**
   * When routes match a path, but none of them for the method of the request,
   * respond with `405 Method Not Allowed` and an `Allow` header.
   *
   * @default true
   */
  handleMethodNotAllowed?: boolean;
  /**
   * Collapse repeated slashes in the path of a request before matching.
   *
   * @default false
   */
  removeExtraSlash?: boolean;
  /**
   * Include the message and stack of unexposed errors in error responses.
   *
   * @default false
   */
  debug?: boolean;
  /**
   * When providing default responses like internal server errors or not found
   * requests, the router uses content negotiation to determine the appropriate
   * response. This option determines if JSON or HTML will be preferred for
   * these responses.
   *
   * @default true
   */
  preferJson?: boolean;
  /**
   * The registry of parameter types used to compile the route templates of
   * the router. Defaults to the process wide registry.
   */
  paramTypes?: ParamTypeRegistry;
  /**
   * An optional logger configuration which can be used to configure the
   * integrated logger. There are three ways to output logs:
   *
   * - output logs to the console
   * - output logs to a file
   * - output logs to a {@linkcode WritableStream}
   *
   * If the value of the option is `true`, logs will be output to the console at
   * the `"warning"` level. If you provide an object, you can choose the level
   * and other configuration options for each log sink of `console`, `file`, and
   * `stream`.
   *
   * @default false
   *
   * @example Output debug logs to the console
   *
   * ```ts
   * import { Router } from "trellis";
   *
   * const router = new Router({
   *   logger: {
   *     console: { level: "debug" },
   *   },
   * });
   * ```
   */
  logger?: boolean | LoggerOptions;
  /**
   * An optional handler when an error is encountered by the router.
   *
   * If a response has not yet been returned to the client, the handler can
   * return a {@linkcode Response} which will be sent to the client.
   *
   * If there is no handler or if the handler does not return a response, a
   * default response will be returned to the client.
   */
  onError?(
    details: ErrorDetails,
  ): Promise<Response | undefined | void> | Response | undefined | void;
}

/** A row of the route table of a router. */
export interface RouteInfo {
  methods: string[];
  path: string;
  name?: string;
  isFallback: boolean;
  /** The number of middleware in the effective chain of the route. */
  middlewares: number;
}

function hostOf(request: Request, url: URL): string {
  const host = request.headers.get("host") ?? url.host;
  return host.replace(/:\d+$/, "").toLowerCase();
}

/**
 * The main class of trellis, which provides the functionality of receiving
 * requests and routing them to specific handlers. A router is the root group
 * of its tree of routes.
 *
 * The tree is built, and then immutable, the first time a request is handled
 * or {@linkcode Router.build} is called.
 *
 * @example
 *
 * ```ts
 * import { Router } from "trellis";
 *
 * const router = new Router();
 *
 * router.get("/users/{id:int}", (ctx) => ({ id: ctx.params.id }))
 *   .name("user");
 *
 * router.listen({ port: 8080 });
 * ```
 */
export class Router extends RouteGroup {
  #abortController = new AbortController();
  #debug: boolean;
  #events = new EventBus();
  #globalMiddlewares: Middleware[] = [];
  #handling = new Set<Promise<Response>>();
  #logger: Logger;
  #matcher?: Matcher;
  #named = new Map<string, Route>();
  #onError?: (
    details: ErrorDetails,
  ) => Promise<Response | undefined | void> | Response | undefined | void;
  #options: RouterOptions;
  #preferJson: boolean;
  #ready: Promise<void>;
  #routes: Route[] = [];

  /** The global middleware of the router. */
  get globalMiddlewares(): Middleware[] {
    return [...this.#globalMiddlewares];
  }

  /** The registry of parameter types of the router. */
  get paramTypes(): ParamTypeRegistry {
    return this.state.registry;
  }

  constructor(options: RouterOptions = {}) {
    const {
      debug = false,
      logger,
      onError,
      paramTypes: registry = paramTypes,
      preferJson = true,
    } = options;
    super("/", { built: false, registry, sequence: 0 });
    this.#debug = debug;
    this.#onError = onError;
    this.#options = options;
    this.#preferJson = preferJson;
    this.#ready = logger
      ? configure(typeof logger === "object" ? logger : undefined)
      : Promise.resolve();
    this.#logger = getLogger("router");
  }

  #errorResponse(requestEvent: RequestEvent, error: HttpError): Response {
    return responseFromHttpError(error, {
      request: requestEvent.request,
      prefer: this.#preferJson ? "json" : "html",
      debug: this.#debug,
      headers: { "x-request-id": requestEvent.id },
    });
  }

  async #error(
    message: string,
    cause: unknown,
    requestEvent: RequestEvent,
    route?: Route,
  ): Promise<Response> {
    this.#logger.error("{id} error handling request: {message}", {
      id: requestEvent.id,
      message,
    });
    if (this.#onError) {
      this.#logger.debug("{id} calling onError for request", {
        id: requestEvent.id,
      });
      try {
        const maybeResponse = await this.#onError({
          message,
          cause,
          requestEvent,
          respondable: !requestEvent.responded,
          route,
        });
        if (maybeResponse) {
          return maybeResponse;
        }
      } catch (error) {
        this.#logger.error("{id} onError failed: {error}", {
          id: requestEvent.id,
          error,
        });
      }
    }
    this.#logger.debug("{id} responding with default error response", {
      id: requestEvent.id,
    });
    return this.#errorResponse(
      requestEvent,
      createHttpError.isHttpError(cause) ? cause : createHttpError(
        StatusCodes.INTERNAL_SERVER_ERROR,
        message,
        { cause },
      ),
    );
  }

  /**
   * Run the global middleware around a response which did not come from a
   * route, like a `404 Not Found`.
   */
  async #terminal(
    requestEvent: RequestEvent,
    respond: () => Response,
  ): Promise<Response> {
    const context = new Context(requestEvent, {
      registry: this.state.registry,
      urlFor: (name, params, query) => this.urlFor(name, params, query),
    });
    const response = await compose(
      this.#globalMiddlewares,
      async () => respond(),
    )(context);
    return appendHeaders(response, context.responseHeaders);
  }

  async #dispatch(
    requestEvent: RequestEvent,
    result: MatchResult,
  ): Promise<Response> {
    const { id, url } = requestEvent;
    switch (result.kind) {
      case "matched":
        this.#events.publish("route-matched", {
          requestEvent,
          route: result.route,
          params: result.params,
        });
        return result.route.handle(requestEvent, result.params);
      case "redirect": {
        const location = `${result.location}${url.search}`;
        this.#logger.debug("{id} redirecting to {location}", { id, location });
        return this.#terminal(requestEvent, () =>
          new Response(null, {
            status: result.status,
            statusText: statusText(result.status),
            headers: { location },
          }));
      }
      case "method-not-allowed": {
        const allow = [...result.allowedMethods].join(", ");
        this.#logger.debug("{id} method not allowed, allowed: {allow}", {
          id,
          allow,
        });
        return this.#terminal(requestEvent, () =>
          this.#errorResponse(
            requestEvent,
            createHttpError(
              StatusCodes.METHOD_NOT_ALLOWED,
              "Method Not Allowed",
              { headers: { allow } },
            ),
          ));
      }
      case "not-found":
        this.#logger.debug("{id} not found", { id });
        this.#events.publish("route-not-found", { requestEvent });
        return this.#terminal(requestEvent, () =>
          this.#errorResponse(
            requestEvent,
            createHttpError(StatusCodes.NOT_FOUND, "Not Found"),
          ));
    }
  }

  async #handle(requestEvent: RequestEvent): Promise<void> {
    const id = requestEvent.id;
    this.#logger.info("{id} handling request: {url}", {
      id,
      url: requestEvent.url.toString(),
    });
    const start = performance.now();
    this.#handling.add(requestEvent.response);
    requestEvent.response
      .catch((cause: unknown) => {
        this.#logger.error("{id} response rejected: {cause}", { id, cause });
      })
      .finally(() => this.#handling.delete(requestEvent.response));
    this.#events.publish("before-routing", { requestEvent });
    let route: Route | undefined;
    let response: Response | undefined;
    try {
      const matcher = this.#build();
      const { request, url } = requestEvent;
      const result = matcher.match({
        method: request.method.toUpperCase(),
        path: url.pathname,
        host: hostOf(request, url),
        headers: request.headers,
        request,
      });
      route = result.kind === "matched" ? result.route : undefined;
      response = await this.#dispatch(requestEvent, result);
    } catch (cause) {
      this.#logger.error("{id} error during handling request", { id });
      this.#events.publish("routing-error", {
        requestEvent,
        error: cause,
        route,
      });
      response = await this.#error(
        cause instanceof Error ? cause.message : "Error during handling.",
        cause,
        requestEvent,
        route,
      );
    }
    if (!requestEvent.responded) {
      try {
        await requestEvent.respond(response);
      } catch (cause) {
        this.#logger.error("{id} error responding: {cause}", { id, cause });
      }
    } else {
      this.#logger.debug("{id} responded to outside of the router", { id });
    }
    const duration = performance.now() - start;
    this.#logger.info("{id} handled in {duration}ms", {
      id,
      duration: parseFloat(duration.toFixed(2)),
    });
    this.#events.publish("after-routing", {
      requestEvent,
      duration,
      aborted: requestEvent.signal.aborted,
      response,
      route,
    });
  }

  #build(): Matcher {
    if (this.#matcher) {
      return this.#matcher;
    }
    const named = new Map<string, Route>();
    const routes: Route[] = [];
    this.buildRoutes({
      inherited: this.#globalMiddlewares,
      names: [],
      urlFor: (name, params, query) => this.urlFor(name, params, query),
      register: (route) => {
        if (route.name) {
          if (named.has(route.name)) {
            throw new DuplicateRouteNameError(route.name);
          }
          named.set(route.name, route);
        }
        routes.push(route);
      },
    });
    this.state.built = true;
    this.#named = named;
    this.#routes = routes;
    this.#matcher = new Matcher(this, this.#options);
    this.#logger.debug("built {count} routes", { count: routes.length });
    return this.#matcher;
  }

  /**
   * Build the tree of routes, composing the middleware chains of the routes
   * and checking the uniqueness of their names. After the router is built,
   * routes and middleware can no longer be registered.
   *
   * Building happens on demand, but calling this at startup surfaces any
   * configuration errors immediately.
   */
  build(): this {
    this.#build();
    return this;
  }

  /**
   * Register global middleware, which runs for every request, including those
   * that do not match a route.
   */
  use(middleware: Middleware, ...middlewares: Middleware[]): this;
  /**
   * Mount the routes of another router, optionally under a prefix. The global
   * middleware of the other router applies to the mounted routes only.
   */
  use(router: Router, init?: MountInit): GroupHandle;
  use(
    middlewareOrRouter: Middleware | Router,
    ...rest: (Middleware | MountInit | undefined)[]
  ): this | GroupHandle {
    this.assertMutable();
    if (middlewareOrRouter instanceof Router) {
      if (middlewareOrRouter === this) {
        throw new TypeError("A router cannot be mounted on itself.");
      }
      const [init] = rest;
      return this.mount(
        middlewareOrRouter,
        typeof init === "object" ? init : {},
        middlewareOrRouter.#globalMiddlewares,
      );
    }
    this.#globalMiddlewares.push(
      middlewareOrRouter,
      ...rest.filter((value): value is Middleware =>
        typeof value === "function"
      ),
    );
    return this;
  }

  /**
   * Resolve a method and path to a {@linkcode MatchResult}, without handling
   * it. Any querystring in the path is ignored.
   */
  match(method: string, path: string, host?: string): MatchResult {
    const [pathname] = path.split("?");
    return this.#build().match({
      method: method.toUpperCase(),
      path: pathname,
      host: host?.toLowerCase(),
      headers: new Headers(host ? { host } : undefined),
    });
  }

  /**
   * Generate the URL (path and querystring) of a named route. Parameter values
   * are percent-encoded and validated against the pattern of the route.
   *
   * @example
   *
   * ```ts
   * router.get("/users/{id:int}", handler).name("user");
   * router.urlFor("user", { id: 42 }, { tab: "posts" });
   * // "/users/42?tab=posts"
   * ```
   */
  urlFor(
    name: string,
    params?: Record<string, unknown>,
    query?: Record<string, string>,
  ): string {
    this.#build();
    const route = this.#named.get(name);
    if (!route) {
      throw new UrlGenerationError(`No route named "${name}".`);
    }
    const path = buildPath(route.pattern, params);
    const search = new URLSearchParams(query).toString();
    return search ? `${path}?${search}` : path;
  }

  /** The table of routes of the router, in declaration order. */
  routes(): RouteInfo[] {
    this.#build();
    return this.#routes.map((route) => ({
      methods: route.methods,
      path: route.path,
      name: route.name,
      isFallback: route.isFallback,
      middlewares: route.middlewares.length,
    }));
  }

  /** Log the table of routes at the info level, and return it. */
  printRoutes(): string {
    const lines = this.routes().map(({ methods, path, name, isFallback }) =>
      `${(isFallback ? "*" : methods.join("|")).padEnd(12)} ${path}${
        name ? ` (${name})` : ""
      }`
    );
    for (const line of lines) {
      this.#logger.info("{line}", { line });
    }
    return lines.join("\n");
  }

  /** Register a listener for a lifecycle event. */
  on<K extends RouterEventType>(type: K, listener: Listener<K>): Removeable {
    return this.#events.on(type, listener);
  }

  onBeforeRouting(
    listener: (event: BeforeRoutingEvent) => void | Promise<void>,
  ): Removeable {
    return this.#events.on("before-routing", listener);
  }

  onRouteMatched(
    listener: (event: RouteMatchedEvent) => void | Promise<void>,
  ): Removeable {
    return this.#events.on("route-matched", listener);
  }

  onRouteNotFound(
    listener: (event: RouteNotFoundEvent) => void | Promise<void>,
  ): Removeable {
    return this.#events.on("route-not-found", listener);
  }

  onRoutingError(
    listener: (event: RoutingErrorEvent) => void | Promise<void>,
  ): Removeable {
    return this.#events.on("routing-error", listener);
  }

  onAfterRouting(
    listener: (event: AfterRoutingEvent) => void | Promise<void>,
  ): Removeable {
    return this.#events.on("after-routing", listener);
  }

  /**
   * Handle a request event presented by a request server, resolving with the
   * response once it has been finalized.
   */
  async handleEvent(requestEvent: RequestEvent): Promise<Response> {
    await this.#ready;
    await this.#handle(requestEvent);
    return requestEvent.response;
  }

  /**
   * Handle a fetch {@linkcode Request}, resolving with the response.
   *
   * @example
   *
   * ```ts
   * const response = await router.handle(
   *   new Request("http://localhost/users/42"),
   * );
   * ```
   */
  handle(request: Request, init?: FetchRequestEventInit): Promise<Response>;
  /**
   * Register a route for a single method. An alias of
   * {@linkcode RouteGroup.route}.
   */
  handle<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    method: string,
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  handle(
    requestOrMethod: Request | string,
    pathOrInit?: string | FetchRequestEventInit,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): Promise<Response> | RouteHandle {
    if (typeof requestOrMethod === "string") {
      if (typeof pathOrInit !== "string" || !handler) {
        throw new TypeError("Invalid arguments.");
      }
      return this.route(requestOrMethod, pathOrInit, handler, init);
    }
    return this.handleEvent(
      new FetchRequestEvent(
        requestOrMethod,
        typeof pathOrInit === "object" ? pathOrInit : undefined,
      ),
    );
  }

  async #close(): Promise<void> {
    this.#logger.debug("closing server");
    await Promise.allSettled(this.#handling);
    this.#handling.clear();
    this.#abortController.abort();
  }

  /**
   * Start listening for requests on the provided port and hostname. The
   * router is built and its registry of parameter types frozen first.
   */
  async listen(options: ListenOptions = {}): Promise<void> {
    const {
      server: Server = NodeRequestServer,
      port = 0,
      hostname,
      signal,
      onListen,
    } = options;
    this.#build();
    this.state.registry.freeze();
    await this.#ready;
    signal?.addEventListener("abort", () => {
      this.#close().catch((cause: unknown) => {
        this.#logger.error("error closing server: {cause}", { cause });
      });
    });
    const server = new Server({
      port,
      hostname,
      signal: this.#abortController.signal,
    });
    const addr = await server.listen();
    this.#logger.info("listening on: {hostname}:{port}", {
      hostname: addr.hostname,
      port: addr.port,
    });
    onListen?.(addr);
    for await (const requestEvent of server) {
      this.#handle(requestEvent).catch((cause: unknown) => {
        this.#logger.error("{id} internal error when handling: {cause}", {
          id: requestEvent.id,
          cause,
        });
      });
    }
    await Promise.allSettled(this.#handling);
  }

  [Symbol.for("nodejs.util.inspect.custom")](
    depth: number,
    options: InspectOptionsStylized,
    inspect: (value: unknown, options?: InspectOptionsStylized) => string,
  ): string {
    if (depth < 0) {
      return options.stylize(`[${this.constructor.name}]`, "special");
    }

    const newOptions = {
      ...options,
      depth: options.depth == null ? options.depth : options.depth - 1,
    };
    return `${options.stylize(this.constructor.name, "special")} ${
      inspect({
        built: this.state.built,
        middlewares: this.#globalMiddlewares.length,
        routes: this.#matcher ? this.routes() : undefined,
      }, newOptions)
    }`;
  }
}
