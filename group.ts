// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The tree of route groups, which is how routes are registered. A
 * {@linkcode Router} is the root group of its tree.
 *
 * @module
 */

import type { InferOutput } from "valibot";

import { COMMON_METHODS, FALLBACK_METHOD } from "./constants.ts";
import { ConfigurationError } from "./errors.ts";
import { getLogger, type Logger } from "./logger.ts";
import type { Middleware, MiddlewareRef } from "./middleware.ts";
import { anchor, type ParamTypeRegistry } from "./param_types.ts";
import { type CompiledPattern, compilePattern } from "./pattern.ts";
import {
  type ConstraintPredicate,
  PathRoute,
  type Route,
  type RouteBuildInit,
  type RouteHandler,
} from "./route.ts";
import {
  type BodySchema,
  type QueryStringSchema,
  Schema,
  type SchemaDescriptor,
} from "./schema.ts";
import type { Removeable, RouteParameters } from "./types.ts";
import { joinPaths } from "./utils.ts";

/** A constraint on a route parameter, or a predicate on the request. */
export type Constraint = string | RegExp | ConstraintPredicate;

/** The validated query parameters for a querystring schema. */
export type QueryParamsOf<QSSchema extends QueryStringSchema> = Extract<
  InferOutput<QSSchema>,
  Record<string, unknown>
>;

/**
 * Options which can be set when registering a route.
 */
export interface RouteInit<
  QSSchema extends QueryStringSchema = QueryStringSchema,
  BSchema extends BodySchema = BodySchema,
  ResSchema extends BodySchema = BodySchema,
> {
  /** Middleware which only applies to this route, run after inherited ones. */
  middlewares?: Middleware[];
  /**
   * Constraints keyed by parameter name. Strings and regular expressions must
   * match the decoded text of the parameter in addition to its type. Functions
   * are predicates which can also examine the request, and can be keyed by
   * any name.
   */
  constraints?: Record<string, Constraint>;
  /** The name of the route, prefixed by the names of its groups. */
  name?: string;
  /**
   * A pattern the host of the request (without the port) must match. Strings
   * are compiled as case insensitive regular expressions matching the whole
   * host.
   */
  domain?: string | RegExp;
  /** Validation schemas for the querystring, body and response. */
  schema?: SchemaDescriptor<QSSchema, BSchema, ResSchema>;
}

/**
 * A route described by a single object, including its path and handler.
 */
export interface RouteDescriptor<
  Path extends string,
  QSSchema extends QueryStringSchema = QueryStringSchema,
  BSchema extends BodySchema = BodySchema,
  ResSchema extends BodySchema = BodySchema,
> extends RouteInit<QSSchema, BSchema, ResSchema> {
  path: Path;
  handler: RouteHandler<
    RouteParameters<Path>,
    QueryParamsOf<QSSchema>,
    InferOutput<BSchema>,
    InferOutput<ResSchema>
  >;
}

/** A route descriptor which also names the method or methods to handle. */
export interface RouteDescriptorWithMethod<
  Path extends string,
  QSSchema extends QueryStringSchema = QueryStringSchema,
  BSchema extends BodySchema = BodySchema,
  ResSchema extends BodySchema = BodySchema,
> extends RouteDescriptor<Path, QSSchema, BSchema, ResSchema> {
  method: string | string[];
}

export interface GroupInit {
  /** Middleware applied to every route of the group and its descendants. */
  middlewares?: Middleware[];
  /** The name of the group, which prefixes the names of its routes. */
  name?: string;
}

export interface FallbackInit {
  middlewares?: Middleware[];
  name?: string;
}

export interface MountInit {
  /** The prefix the mounted routes are registered under. */
  prefix?: string;
  /** Middleware applied to all the mounted routes. */
  middlewares?: Middleware[];
}

/**
 * Returned when registering a route, allowing it to be named, have inherited
 * middleware excluded or be removed, until the router is built.
 */
export interface RouteHandle extends Removeable {
  readonly route: Route;
  name(name: string): RouteHandle;
  /**
   * Remove inherited (global or group) middleware from the chain of this route
   * only, by reference or by function name.
   */
  withoutMiddleware(...refs: MiddlewareRef[]): RouteHandle;
}

/** Returned when registering a group, allowing it to be named. */
export interface GroupHandle {
  readonly group: RouteGroup;
  name(name: string): GroupHandle;
}

/** A builder callback for the routes of a group. */
export type GroupBuilder = (group: RouteGroup) => void;

/** State shared by every group of a tree. */
export interface TreeState {
  built: boolean;
  registry: ParamTypeRegistry;
  sequence: number;
}

export interface GroupBuildInit extends Omit<RouteBuildInit, "name"> {
  names: string[];
  /** Called with every route of the tree, in declaration order. */
  register(route: Route): void;
}

/** A route handler with no inferred types. */
export type AnyRouteHandler = RouteHandler<
  Record<string, unknown>,
  Record<string, unknown>,
  unknown,
  unknown
>;

interface RouteRecord {
  methods: string[];
  path: string;
  handler: AnyRouteHandler;
  init: RouteInit;
  excluded: MiddlewareRef[];
  route: Route;
}

interface FallbackRecord {
  handler: AnyRouteHandler;
  init: FallbackInit;
  excluded: MiddlewareRef[];
  route: Route;
}

function toDomain(domain: string | RegExp | undefined): RegExp | undefined {
  if (domain === undefined) {
    return undefined;
  }
  return typeof domain === "string" ? new RegExp(anchor(domain), "i") : domain;
}

/**
 * A group of routes sharing a path prefix, middleware and an optional
 * fallback. Groups are created with {@linkcode RouteGroup.group} and are
 * read-only once the router is built.
 */
export class RouteGroup {
  #depth: number;
  #entries: (RouteRecord | RouteGroup)[] = [];
  #fallback?: FallbackRecord;
  #localName?: string;
  #logger: Logger;
  #middlewares: Middleware[];
  #parent?: RouteGroup;
  #prefix: string;
  #prefixPattern: CompiledPattern;
  #relativePrefix: string;
  #state: TreeState;

  /** The nesting depth of the group, where the root is `0`. */
  get depth(): number {
    return this.#depth;
  }

  /** The route used when nothing else in the group matches, if any. */
  get fallbackRoute(): Route | undefined {
    return this.#fallback?.route;
  }

  /** The child groups and routes of the group, in declaration order. */
  get entries(): (Route | RouteGroup)[] {
    return this.#entries.map((entry) =>
      entry instanceof RouteGroup ? entry : entry.route
    );
  }

  /** The middleware of the group itself. */
  get middlewares(): Middleware[] {
    return [...this.#middlewares];
  }

  get parent(): RouteGroup | undefined {
    return this.#parent;
  }

  /** The full prefix of the group, including the prefixes of its ancestors. */
  get prefix(): string {
    return this.#prefix;
  }

  get prefixPattern(): CompiledPattern {
    return this.#prefixPattern;
  }

  constructor(
    prefix: string,
    state: TreeState,
    init: GroupInit = {},
    parent?: RouteGroup,
  ) {
    this.#relativePrefix = prefix;
    this.#parent = parent;
    this.#depth = parent ? parent.#depth + 1 : 0;
    const full = parent ? joinPaths(parent.#prefix, prefix) : joinPaths(prefix);
    // a group prefix never carries a trailing slash, its routes decide
    this.#prefix = full.length > 1 ? full.replace(/\/$/, "") : full;
    this.#state = state;
    this.#middlewares = init.middlewares ?? [];
    this.#localName = init.name;
    this.#prefixPattern = compilePattern(this.#prefix, {
      registry: state.registry,
      prefixOnly: true,
    });
    this.#logger = getLogger("group");
  }

  protected get state(): TreeState {
    return this.#state;
  }

  protected assertMutable(): void {
    if (this.#state.built) {
      throw new ConfigurationError(
        "Routes cannot be registered once the router is built.",
      );
    }
  }

  #fullPath(path: string): string {
    if ((path === "/" || path === "") && this.#prefix !== "/") {
      return this.#prefix;
    }
    return joinPaths(this.#prefix, path);
  }

  #routeHandle(record: RouteRecord | FallbackRecord, remove: () => void) {
    const handle: RouteHandle = {
      route: record.route,
      name: (name) => {
        record.route.setName(name);
        record.init = { ...record.init, name };
        return handle;
      },
      withoutMiddleware: (...refs) => {
        record.route.exclude(refs);
        record.excluded.push(...refs);
        return handle;
      },
      remove: () => {
        this.assertMutable();
        remove();
      },
    };
    return handle;
  }

  #addRoute(
    methods: string[],
    path: string,
    handler: AnyRouteHandler,
    init: RouteInit = {},
  ): RouteHandle {
    this.assertMutable();
    const fullPath = this.#fullPath(path);
    const patternConstraints: Record<string, string | RegExp> = {};
    const predicates = new Map<string, ConstraintPredicate>();
    for (const [name, constraint] of Object.entries(init.constraints ?? {})) {
      if (typeof constraint === "function") {
        predicates.set(name, constraint);
      } else {
        patternConstraints[name] = constraint;
      }
    }
    const pattern = compilePattern(fullPath, {
      registry: this.#state.registry,
      constraints: patternConstraints,
    });
    const route = new PathRoute({
      methods: methods.map((method) => method.toUpperCase()),
      path: pattern.template,
      pattern,
      handler,
      registry: this.#state.registry,
      order: this.#state.sequence++,
      schema: new Schema(init.schema),
      middlewares: init.middlewares,
      name: init.name,
      domain: toDomain(init.domain),
      predicates,
    });
    const record: RouteRecord = {
      methods,
      path,
      handler,
      init,
      excluded: [],
      route,
    };
    this.#entries.push(record);
    this.#logger.debug("adding route for {methods} {path}", {
      methods,
      path: pattern.template,
    });
    return this.#routeHandle(record, () => {
      this.#logger.debug("removing route for {methods} {path}", {
        methods,
        path: pattern.template,
      });
      this.#entries = this.#entries.filter((entry) => entry !== record);
    });
  }

  #register(
    methods: string[],
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    if (typeof pathOrDescriptor === "string") {
      if (!handler) {
        throw new TypeError("Handler not provided.");
      }
      return this.#addRoute(methods, pathOrDescriptor, handler, init);
    }
    if (handler || init) {
      throw new TypeError("Invalid arguments.");
    }
    const { path, handler: h, ...i } = pathOrDescriptor;
    return this.#addRoute(methods, path, h, i);
  }

  #createChild(prefix: string, init: GroupInit): RouteGroup {
    const child = new RouteGroup(prefix, this.#state, init, this);
    this.#entries.push(child);
    return child;
  }

  #copyFrom(source: RouteGroup): void {
    for (const entry of source.#entries) {
      if (entry instanceof RouteGroup) {
        const child = this.#createChild(entry.#relativePrefix, {
          middlewares: entry.#middlewares,
          name: entry.#localName,
        });
        child.#copyFrom(entry);
      } else {
        const handle = this.#addRoute(
          entry.methods,
          entry.path,
          entry.handler,
          entry.init,
        );
        handle.withoutMiddleware(...entry.excluded);
      }
    }
    if (source.#fallback) {
      this.fallback(source.#fallback.handler, source.#fallback.init)
        .withoutMiddleware(...source.#fallback.excluded);
    }
  }

  /**
   * Copy the routes of another tree into a new child group of this group.
   * Changes made to the other tree afterwards are not reflected.
   */
  protected mount(
    source: RouteGroup,
    init: MountInit,
    middlewares: Middleware[],
  ): GroupHandle {
    this.assertMutable();
    const { prefix = "/", middlewares: own = [] } = init;
    this.#logger.debug("mounting routes under {prefix}", { prefix });
    const child = this.#createChild(prefix, {
      middlewares: [...own, ...middlewares],
    });
    child.#copyFrom(source);
    return this.#groupHandle(child);
  }

  #groupHandle(group: RouteGroup): GroupHandle {
    const handle: GroupHandle = {
      group,
      name: (name) => {
        this.assertMutable();
        group.#localName = name;
        return handle;
      },
    };
    return handle;
  }

  /**
   * Create a child group whose routes share the prefix, which is joined to the
   * prefix of this group. The builder is called immediately with the child
   * group to register its routes.
   *
   * @example
   *
   * ```ts
   * router.group("/api", [auth], (api) => {
   *   api.get("/users/{id:int}", (ctx) => ({ id: ctx.params.id }));
   *   api.group("/admin", (admin) => {
   *     admin.fallback(() => new Response("admin", { status: 404 }));
   *   });
   * });
   * ```
   */
  group(prefix: string, builder: GroupBuilder): GroupHandle;
  group(
    prefix: string,
    middlewares: Middleware[],
    builder: GroupBuilder,
  ): GroupHandle;
  group(prefix: string, init: GroupInit, builder: GroupBuilder): GroupHandle;
  group(
    prefix: string,
    middlewaresOrInitOrBuilder: Middleware[] | GroupInit | GroupBuilder,
    maybeBuilder?: GroupBuilder,
  ): GroupHandle {
    this.assertMutable();
    let init: GroupInit = {};
    let builder: GroupBuilder;
    if (typeof middlewaresOrInitOrBuilder === "function") {
      builder = middlewaresOrInitOrBuilder;
    } else {
      if (!maybeBuilder) {
        throw new TypeError("Group builder not provided.");
      }
      builder = maybeBuilder;
      init = Array.isArray(middlewaresOrInitOrBuilder)
        ? { middlewares: middlewaresOrInitOrBuilder }
        : middlewaresOrInitOrBuilder;
    }
    const child = this.#createChild(prefix, init);
    this.#logger.debug("adding group {prefix}", { prefix: child.#prefix });
    builder(child);
    return this.#groupHandle(child);
  }

  /**
   * Register a route for one or more methods.
   */
  route<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    method: string | string[],
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  route<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptorWithMethod<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  route(
    methodOrDescriptor: string | string[] | RouteDescriptorWithMethod<string>,
    path?: string,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    if (
      typeof methodOrDescriptor === "string" ||
      Array.isArray(methodOrDescriptor)
    ) {
      if (path === undefined) {
        throw new TypeError("Path not provided.");
      }
      const methods = Array.isArray(methodOrDescriptor)
        ? methodOrDescriptor
        : [methodOrDescriptor];
      return this.#register(methods, path, handler, init);
    }
    const { method, ...descriptor } = methodOrDescriptor;
    return this.#register(
      Array.isArray(method) ? method : [method],
      descriptor,
    );
  }

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
  ): RouteHandle {
    return this.route(method, path, handler, init);
  }

  /** Register a route for the `GET` method. */
  get<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  get<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  get(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register(["GET"], pathOrDescriptor, handler, init);
  }

  /** Register a route for the `HEAD` method. */
  head<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  head<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  head(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register(["HEAD"], pathOrDescriptor, handler, init);
  }

  /** Register a route for the `OPTIONS` method. */
  options<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  options<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  options(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register(["OPTIONS"], pathOrDescriptor, handler, init);
  }

  /** Register a route for the `POST` method. */
  post<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  post<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  post(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register(["POST"], pathOrDescriptor, handler, init);
  }

  /** Register a route for the `PUT` method. */
  put<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  put<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  put(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register(["PUT"], pathOrDescriptor, handler, init);
  }

  /** Register a route for the `PATCH` method. */
  patch<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  patch<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  patch(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register(["PATCH"], pathOrDescriptor, handler, init);
  }

  /** Register a route for the `DELETE` method. */
  delete<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  delete<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  delete(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register(["DELETE"], pathOrDescriptor, handler, init);
  }

  /**
   * Register a route for all the common methods (`GET`, `HEAD`, `OPTIONS`,
   * `POST`, `PUT`, `PATCH` and `DELETE`).
   */
  all<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    path: Path,
    handler: RouteHandler<
      RouteParameters<Path>,
      QueryParamsOf<QSSchema>,
      InferOutput<BSchema>,
      InferOutput<ResSchema>
    >,
    init?: RouteInit<QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  all<
    Path extends string,
    QSSchema extends QueryStringSchema = QueryStringSchema,
    BSchema extends BodySchema = BodySchema,
    ResSchema extends BodySchema = BodySchema,
  >(
    descriptor: RouteDescriptor<Path, QSSchema, BSchema, ResSchema>,
  ): RouteHandle;
  all(
    pathOrDescriptor: string | RouteDescriptor<string>,
    handler?: AnyRouteHandler,
    init?: RouteInit,
  ): RouteHandle {
    return this.#register([...COMMON_METHODS], pathOrDescriptor, handler, init);
  }

  /**
   * Set the fallback of the group, which handles requests of any method that
   * fall within the prefix of the group and match no route. Setting a fallback
   * replaces any previous fallback of the group.
   */
  fallback(handler: AnyRouteHandler, init: FallbackInit = {}): RouteHandle {
    this.assertMutable();
    const route = new PathRoute({
      methods: [FALLBACK_METHOD],
      path: this.#prefixPattern.template,
      pattern: this.#prefixPattern,
      handler,
      registry: this.#state.registry,
      order: this.#state.sequence++,
      middlewares: init.middlewares,
      name: init.name,
      isFallback: true,
    });
    if (this.#fallback) {
      this.#logger.debug("replacing fallback of {prefix}", {
        prefix: this.#prefix,
      });
    }
    const record: FallbackRecord = { handler, init, excluded: [], route };
    this.#fallback = record;
    return this.#routeHandle(record, () => {
      if (this.#fallback === record) {
        this.#fallback = undefined;
      }
    });
  }

  /**
   * Build the routes of the group and its descendants, composing their
   * middleware chains and resolving their names.
   */
  protected buildRoutes(init: GroupBuildInit): void {
    const { inherited, names, register, urlFor } = init;
    const effective = [...inherited, ...this.#middlewares];
    const groupNames = this.#localName ? [...names, this.#localName] : names;
    const nameOf = (route: Route) =>
      route.localName ? [...groupNames, route.localName].join(".") : undefined;
    for (const entry of this.#entries) {
      if (entry instanceof RouteGroup) {
        entry.buildRoutes({
          ...init,
          inherited: effective,
          names: groupNames,
        });
      } else {
        entry.route.build({
          inherited: effective,
          name: nameOf(entry.route),
          urlFor,
        });
        register(entry.route);
      }
    }
    if (this.#fallback) {
      const route = this.#fallback.route;
      route.build({ inherited: effective, name: nameOf(route), urlFor });
      register(route);
    }
  }
}
