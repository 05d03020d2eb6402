// Copyright 2018-2024 the oak authors. All rights reserved.

import { StatusCodes } from "http-status-codes";
import type { InspectOptionsStylized } from "node:util";

import { Context, type UrlFor } from "./context.ts";
import { ConfigurationError } from "./errors.ts";
import { getLogger, type Logger } from "./logger.ts";
import {
  compose,
  type Dispatch,
  excludeMiddleware,
  type Middleware,
  type MiddlewareRef,
} from "./middleware.ts";
import { BoundParams } from "./params.ts";
import type { ParamTypeRegistry } from "./param_types.ts";
import {
  type CompiledPattern,
  matchSegments,
  type RawBinding,
} from "./pattern.ts";
import { Schema } from "./schema.ts";
import type { MatchTarget, RequestEvent } from "./types.ts";
import { appendHeaders, statusText } from "./utils.ts";

/**
 * A function that handles a route. The handler is provided a
 * {@linkcode Context} object which provides information about the request
 * being handled as well as other methods for interacting with the request.
 * A handler can return a {@linkcode Response} object, a value that can be
 * serialized to JSON, or `undefined`. If a value is returned, it will be
 * validated against the response schema of the route. If `undefined` is
 * returned, the response will be handled as a `204 No Content` response,
 * unless a status was set on the context.
 *
 * The handler can also return a promise that resolves to any of the above
 * values.
 */
export interface RouteHandler<
  Params = Record<string, unknown>,
  QueryParams = Record<string, unknown>,
  RequestBody = unknown,
  ResponseBody = unknown,
> {
  (
    context: Context<Params, QueryParams, RequestBody, ResponseBody>,
  ):
    | Promise<Response | ResponseBody | undefined>
    | Response
    | ResponseBody
    | undefined;
}

/**
 * A predicate constraint, which is passed the decoded text of the parameter
 * with the same name as the constraint (if there is one) and what is known of
 * the request being matched.
 */
export type ConstraintPredicate = (
  value: string | undefined,
  target: MatchTarget,
) => boolean;

export interface PathRouteInit<
  Params,
  QueryParams,
  RequestBody,
  ResponseBody,
> {
  methods: string[];
  /** The full template of the route, including any group prefixes. */
  path: string;
  pattern: CompiledPattern;
  handler: RouteHandler<Params, QueryParams, RequestBody, ResponseBody>;
  registry: ParamTypeRegistry;
  /** The position of the route in declaration order across the tree. */
  order: number;
  schema?: Schema;
  middlewares?: Middleware[];
  name?: string;
  domain?: RegExp;
  predicates?: Map<string, ConstraintPredicate>;
  isFallback?: boolean;
}

/** What a route needs from the router when the tree is built. */
export interface RouteBuildInit {
  /** Global and group middleware, outermost first. */
  inherited: Middleware[];
  /** The hierarchical name of the route. */
  name?: string;
  urlFor: UrlFor;
}

/**
 * A registered route, as seen by the group tree, the matcher and the router.
 */
export interface Route {
  readonly domain: RegExp | undefined;
  readonly isFallback: boolean;
  readonly localName: string | undefined;
  readonly methods: string[];
  readonly middlewares: Middleware[];
  readonly name: string | undefined;
  readonly order: number;
  readonly path: string;
  readonly pattern: CompiledPattern;
  readonly schema: Schema;
  setName(name: string): void;
  exclude(refs: MiddlewareRef[]): void;
  build(init: RouteBuildInit): void;
  allows(method: string): boolean;
  acceptsHost(host: string | undefined): boolean;
  matches(
    segments: readonly string[],
    trailingSlash: boolean,
  ): RawBinding[] | undefined;
  satisfies(bindings: readonly RawBinding[], target: MatchTarget): boolean;
  bind(bindings: readonly RawBinding[]): BoundParams;
  handle(requestEvent: RequestEvent, params: BoundParams): Promise<Response>;
}

/**
 * Encapsulation of logic for a registered route handler.
 *
 * A route can be named and have inherited middleware excluded until the
 * router is built. After that it is immutable.
 */
export class PathRoute<
  Params extends Record<string, unknown> = Record<string, unknown>,
  QueryParams extends Record<string, unknown> = Record<string, unknown>,
  RequestBody = unknown,
  ResponseBody = unknown,
> implements Route {
  #dispatch?: Dispatch<Context<Params, QueryParams, RequestBody, ResponseBody>>;
  #domain?: RegExp;
  #excluded: MiddlewareRef[] = [];
  #frozen = false;
  #handler: RouteHandler<Params, QueryParams, RequestBody, ResponseBody>;
  #isFallback: boolean;
  #localName?: string;
  #logger: Logger;
  #methods: string[];
  #middlewares: Middleware[];
  #name?: string;
  #effective: Middleware[] = [];
  #order: number;
  #path: string;
  #pattern: CompiledPattern;
  #predicates: Map<string, ConstraintPredicate>;
  #registry: ParamTypeRegistry;
  #schema: Schema;
  #urlFor?: UrlFor;

  /** The domain constraint of the route, tested against the request host. */
  get domain(): RegExp | undefined {
    return this.#domain;
  }

  /** If the route is the fallback of a group. */
  get isFallback(): boolean {
    return this.#isFallback;
  }

  /** The name given to the route itself, before any group names. */
  get localName(): string | undefined {
    return this.#localName;
  }

  /**
   * The methods that this route is registered to handle.
   */
  get methods(): string[] {
    return [...this.#methods];
  }

  /**
   * The effective middleware of the route, once the router is built.
   */
  get middlewares(): Middleware[] {
    return [...this.#effective];
  }

  /**
   * The hierarchical name of the route, with the names of its groups joined by
   * `.`. Only available once the router is built.
   */
  get name(): string | undefined {
    return this.#name;
  }

  /** The position of the route in declaration order. */
  get order(): number {
    return this.#order;
  }

  /**
   * The full template of the route, including any group prefixes.
   */
  get path(): string {
    return this.#path;
  }

  get pattern(): CompiledPattern {
    return this.#pattern;
  }

  /**
   * The validation schema which is applied to the querystring, body and
   * response.
   */
  get schema(): Schema {
    return this.#schema;
  }

  constructor(
    init: PathRouteInit<Params, QueryParams, RequestBody, ResponseBody>,
  ) {
    this.#methods = init.methods;
    this.#path = init.path;
    this.#pattern = init.pattern;
    this.#handler = init.handler;
    this.#registry = init.registry;
    this.#order = init.order;
    this.#schema = init.schema ?? new Schema();
    this.#middlewares = init.middlewares ?? [];
    this.#localName = init.name;
    this.#domain = init.domain;
    this.#predicates = init.predicates ?? new Map();
    this.#isFallback = init.isFallback ?? false;
    this.#logger = getLogger("route");
    this.#logger.debug(
      "created route with path: {path} and methods: {methods}",
      { path: this.#path, methods: this.#methods },
    );
  }

  #assertMutable(): void {
    if (this.#frozen) {
      throw new ConfigurationError(
        `The route "${this.#path}" cannot be modified once built.`,
      );
    }
  }

  async #invoke(
    context: Context<Params, QueryParams, RequestBody, ResponseBody>,
  ): Promise<Response> {
    const id = context.id;
    this.#logger.debug("[{path}] {id} calling handler", {
      path: this.#path,
      id,
    });
    const result = await this.#handler(context);
    if (result instanceof Response) {
      this.#logger.debug("[{path}] {id} handler returned a Response object", {
        path: this.#path,
        id,
      });
      return result;
    }
    if (result !== undefined) {
      this.#logger.debug(
        "[{path}] {id} handler returned a value, validating response",
        { path: this.#path, id },
      );
      const maybeValid = await this.#schema.validateResponse(id, result);
      if (maybeValid.invalidResponse) {
        this.#logger.error("[{path}] {id} response is invalid", {
          path: this.#path,
          id,
        });
        return maybeValid.invalidResponse;
      }
      const status = context.pendingStatus ?? StatusCodes.OK;
      return Response.json(maybeValid.output, {
        status,
        statusText: statusText(status),
      });
    }
    this.#logger.debug("[{path}] {id} handler returned no value", {
      path: this.#path,
      id,
    });
    const status = context.pendingStatus ?? StatusCodes.NO_CONTENT;
    return new Response(null, { status, statusText: statusText(status) });
  }

  /** Set the name of the route. */
  setName(name: string): void {
    this.#assertMutable();
    this.#localName = name;
  }

  /**
   * Exclude inherited middleware from the chain of the route, by reference or
   * by function name.
   */
  exclude(refs: MiddlewareRef[]): void {
    this.#assertMutable();
    this.#excluded.push(...refs);
  }

  /**
   * Compose the middleware chain of the route and freeze it.
   */
  build({ inherited, name, urlFor }: RouteBuildInit): void {
    this.#effective = excludeMiddleware(
      [...inherited, ...this.#middlewares],
      this.#excluded,
    );
    this.#name = name;
    this.#urlFor = urlFor;
    this.#dispatch = compose<
      Context<Params, QueryParams, RequestBody, ResponseBody>
    >(this.#effective, (context) => this.#invoke(context));
    this.#frozen = true;
  }

  /** Determines if the route handles the method. */
  allows(method: string): boolean {
    return this.#isFallback || this.#methods.includes(method);
  }

  /** Determines if the route accepts the host of the request. */
  acceptsHost(host: string | undefined): boolean {
    if (!this.#domain) {
      return true;
    }
    return host !== undefined && this.#domain.test(host);
  }

  /**
   * Match the segments of a request path against the pattern of the route,
   * returning the decoded bindings.
   */
  matches(
    segments: readonly string[],
    trailingSlash: boolean,
  ): RawBinding[] | undefined {
    return matchSegments(this.#pattern, segments, trailingSlash);
  }

  /** Evaluate the predicate constraints of the route. */
  satisfies(bindings: readonly RawBinding[], target: MatchTarget): boolean {
    for (const [name, predicate] of this.#predicates) {
      const binding = bindings.find(({ param }) => param.name === name);
      if (!predicate(binding?.text, target)) {
        return false;
      }
    }
    return true;
  }

  /** Convert raw bindings into {@linkcode BoundParams}. */
  bind(bindings: readonly RawBinding[]): BoundParams {
    return new BoundParams(
      bindings.map(({ param, text }) => [
        param.name,
        this.#registry.convert(param.type, text),
      ]),
    );
  }

  /**
   * Run the middleware chain and handler of the route for a request, returning
   * the response with any response headers set on the context appended.
   */
  async handle(
    requestEvent: RequestEvent,
    params: BoundParams,
  ): Promise<Response> {
    if (!this.#dispatch) {
      throw new ConfigurationError(
        `The route "${this.#path}" has not been built.`,
      );
    }
    this.#logger.debug("[{path}] {id} route.handle()", {
      path: this.#path,
      id: requestEvent.id,
    });
    const context = new Context<
      Params,
      QueryParams,
      RequestBody,
      ResponseBody
    >(requestEvent, {
      params,
      route: this,
      registry: this.#registry,
      schema: this.#schema,
      urlFor: this.#urlFor,
    });
    const response = await this.#dispatch(context);
    return appendHeaders(response, context.responseHeaders);
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
        methods: this.#methods,
        name: this.#name ?? this.#localName,
        path: this.#path,
        isFallback: this.#isFallback,
      }, newOptions)
    }`;
  }
}
