// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Provides the {@linkcode Context} class which is passed to middleware and
 * route handlers.
 *
 * @module
 */

import createHttpError from "http-errors";
import { StatusCodes } from "http-status-codes";
import type { InspectOptionsStylized } from "node:util";
import type { InferOutput } from "valibot";

import {
  CONTENT_TYPE_HTML,
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_TEXT,
} from "./constants.ts";
import { getLogger, type Logger } from "./logger.ts";
import { BoundParams } from "./params.ts";
import { buildPath, compilePattern } from "./pattern.ts";
import { paramTypes, type ParamTypeRegistry } from "./param_types.ts";
import type { Route } from "./route.ts";
import {
  bindSchema,
  type BodySchema,
  readBody,
  Schema,
  type ValidationOptions,
} from "./schema.ts";
import type { Addr, RequestEvent } from "./types.ts";
import { statusText } from "./utils.ts";

/**
 * The shape of the attribute bag of a context. Applications can declare the
 * attributes their middleware provide by augmenting this interface:
 *
 * ```ts
 * declare module "trellis" {
 *   interface ContextState {
 *     user: { id: number; name: string };
 *   }
 * }
 * ```
 */
export interface ContextState {
  [key: string]: unknown;
}

/** Generates a URL for a named route. */
export type UrlFor = (
  name: string,
  params?: Record<string, unknown>,
  query?: Record<string, string>,
) => string;

export interface ContextInit {
  /** The parameters which were bound when the route matched. */
  params?: BoundParams;
  /** The route which matched, if any. */
  route?: Route;
  /** The registry used when compiling redirect locations. */
  registry?: ParamTypeRegistry;
  schema?: Schema;
  urlFor?: UrlFor;
}

export interface RedirectInit {
  /**
   * When provided, the location is treated as a route template and the
   * parameters are substituted into it.
   */
  params?: Record<string, unknown>;
  /** @default {302} */
  status?: 301 | 302 | 303 | 307 | 308;
}

export interface RespondInit {
  headers?: HeadersInit;
  status?: number;
}

export interface CreatedInit extends RespondInit {
  location?: string;
  params?: Record<string, unknown>;
}

/**
 * Provides an API for understanding information about the request being
 * processed by the router, along with building responses and sharing state
 * between middleware and the handler.
 *
 * A context is created once per request and is only ever accessed by the
 * middleware or handler which currently holds control of the chain.
 *
 * @template Params the converted parameters bound from the path, as inferred
 * from the route template
 * @template QueryParams the shape of the validated query parameters
 * @template RequestBody the shape of the validated request body
 * @template ResponseBody the shape of the response body
 */
export class Context<
  Params = Record<string, unknown>,
  QueryParams = Record<string, unknown>,
  RequestBody = unknown,
  ResponseBody = unknown,
> {
  #attributes: Partial<ContextState> = {};
  #body?: RequestBody;
  #bodySet = false;
  #boundParams: BoundParams;
  #logger: Logger;
  #queryParams?: QueryParams;
  #rawBody?: Promise<unknown>;
  #registry: ParamTypeRegistry;
  #requestEvent: RequestEvent;
  #responseHeaders = new Headers();
  #route?: Route;
  #schema: Schema;
  #status?: number;
  #url: URL;
  #urlFor?: UrlFor;

  /** The address information of the remote connection making the request. */
  get addr(): Addr {
    return this.#requestEvent.addr;
  }

  /** The parameters bound from the path, with their type tags. */
  get boundParams(): BoundParams {
    return this.#boundParams;
  }

  /** A unique identifier for the request. */
  get id(): string {
    return this.#requestEvent.id;
  }

  /**
   * The converted parameters bound from the path. Parameters declared as
   * `{name:int}` or `{name:double}` are numbers.
   */
  get params(): Params {
    return this.#boundParams.toObject() as Params;
  }

  /** The {@linkcode Request} being handled. */
  get request(): Request {
    return this.#requestEvent.request;
  }

  /**
   * Headers which will be appended to the response returned from the
   * middleware chain.
   */
  get responseHeaders(): Headers {
    return this.#responseHeaders;
  }

  /** The route which matched the request, if any. */
  get route(): Route | undefined {
    return this.#route;
  }

  /**
   * Aborted when the client goes away before the response has been written.
   * Long running work should observe it.
   */
  get signal(): AbortSignal {
    return this.#requestEvent.signal;
  }

  /** The status set by {@linkcode Context.status}, if any. */
  get pendingStatus(): number | undefined {
    return this.#status;
  }

  /** The parsed {@linkcode URL} of the request. */
  get url(): URL {
    return this.#url;
  }

  constructor(requestEvent: RequestEvent, init: ContextInit = {}) {
    const {
      params = new BoundParams(),
      route,
      registry = paramTypes,
      schema = new Schema(),
      urlFor,
    } = init;
    this.#requestEvent = requestEvent;
    this.#boundParams = params;
    this.#route = route;
    this.#registry = registry;
    this.#schema = schema;
    this.#urlFor = urlFor;
    this.#url = requestEvent.url;
    this.#logger = getLogger("context");
  }

  #readBody(): Promise<unknown> {
    if (!this.#rawBody) {
      this.#rawBody = readBody(this.#requestEvent.request);
    }
    return this.#rawBody;
  }

  #resolveLocation(
    location: string,
    params?: Record<string, unknown>,
  ): string {
    if (!params) {
      return location;
    }
    const pattern = compilePattern(location, { registry: this.#registry });
    return buildPath(pattern, params);
  }

  /** The decoded text of a path parameter. */
  param(name: string): string | undefined {
    return this.#boundParams.raw(name);
  }

  /** The first value of a query parameter. */
  query(name: string): string | undefined {
    return this.#url.searchParams.get(name) ?? undefined;
  }

  /**
   * The request body, parsed based on its content type and validated against
   * the body schema of the route.
   *
   * If the body is invalid and the route has an invalid handler, the response
   * of the invalid handler is sent and `undefined` is returned.
   */
  async body(): Promise<RequestBody | undefined> {
    if (!this.#bodySet) {
      this.#bodySet = true;
      this.#logger.debug("{id} validating body", { id: this.id });
      const result = await this.#schema.validateBody(
        this.#requestEvent,
        await this.#readBody(),
      );
      if (result.invalidResponse) {
        this.#requestEvent.respond(result.invalidResponse);
        return undefined;
      }
      this.#body = result.output as RequestBody;
    }
    return this.#body;
  }

  /**
   * Validate the request body against an ad-hoc schema, throwing a
   * `BadRequest` HTTP error when it is invalid.
   */
  async bind<S extends BodySchema>(
    schema: S,
    options?: ValidationOptions,
  ): Promise<InferOutput<S>> {
    this.#logger.debug("{id} binding body", { id: this.id });
    return bindSchema(schema, await this.#readBody(), options);
  }

  /**
   * The query parameters of the request, parsed with `qs` and validated
   * against the querystring schema of the route.
   */
  async queryParams(): Promise<QueryParams | undefined> {
    if (!this.#queryParams) {
      this.#logger.debug("{id} validating query parameters", { id: this.id });
      const result = await this.#schema.validateQueryString(
        this.#requestEvent,
      );
      if (result.invalidResponse) {
        this.#requestEvent.respond(result.invalidResponse);
        return undefined;
      }
      this.#queryParams = result.output as QueryParams;
    }
    return this.#queryParams;
  }

  /** Set an attribute, to be read by later middleware or the handler. */
  set<K extends keyof ContextState & string>(
    key: K,
    value: ContextState[K],
  ): this {
    this.#attributes[key] = value;
    return this;
  }

  get<K extends keyof ContextState & string>(
    key: K,
  ): ContextState[K] | undefined {
    return this.#attributes[key];
  }

  has(key: keyof ContextState & string): boolean {
    return Object.hasOwn(this.#attributes, key);
  }

  /** Get an attribute, throwing if it has not been set. */
  mustGet<K extends keyof ContextState & string>(key: K): ContextState[K] {
    const value: ContextState[K] | undefined = this.#attributes[key];
    if (value === undefined) {
      throw new Error(`Context attribute "${key}" has not been set.`);
    }
    return value;
  }

  /**
   * Set the status used when the handler returns a value or `undefined`, and
   * by the response builders when no status is passed.
   */
  status(status: number): this {
    this.#status = status;
    return this;
  }

  /** Set a header which will be added to the response. */
  setHeader(name: string, value: string): this {
    this.#responseHeaders.set(name, value);
    return this;
  }

  #respond(
    body: BodyInit | null,
    contentType: string,
    init: RespondInit,
  ): Response {
    const status = init.status ?? this.#status ?? StatusCodes.OK;
    const headers = new Headers(init.headers);
    if (!headers.has("content-type")) {
      headers.set("content-type", contentType);
    }
    return new Response(body, {
      status,
      statusText: statusText(status),
      headers,
    });
  }

  /** A JSON response. */
  json(value: ResponseBody, init: RespondInit = {}): Response {
    return this.#respond(JSON.stringify(value), CONTENT_TYPE_JSON, init);
  }

  /** A plain text response. */
  string(text: string, init: RespondInit = {}): Response {
    return this.#respond(text, CONTENT_TYPE_TEXT, init);
  }

  /** An HTML response. */
  html(html: string, init: RespondInit = {}): Response {
    return this.#respond(html, CONTENT_TYPE_HTML, init);
  }

  /** A `201 Created` JSON response, optionally with a `location` header. */
  created(body: ResponseBody, init: CreatedInit = {}): Response {
    const { location, params, ...respondInit } = init;
    const response = this.#respond(JSON.stringify(body), CONTENT_TYPE_JSON, {
      ...respondInit,
      status: StatusCodes.CREATED,
    });
    if (location) {
      response.headers.set(
        "location",
        this.#resolveLocation(location, params),
      );
    }
    return response;
  }

  /**
   * A redirect response. When `params` are provided, the location is treated
   * as a route template.
   *
   * @example
   *
   * ```ts
   * ctx.redirect("/users/{id:int}", { params: { id: 1 }, status: 303 });
   * ```
   */
  redirect(
    location: string,
    init: RedirectInit = {},
  ): Response {
    const { status = StatusCodes.MOVED_TEMPORARILY, params } = init;
    return new Response(null, {
      status,
      statusText: statusText(status),
      headers: { location: this.#resolveLocation(location, params) },
    });
  }

  /** Generate the URL of a named route. */
  urlFor(
    name: string,
    params?: Record<string, unknown>,
    query?: Record<string, string>,
  ): string {
    if (!this.#urlFor) {
      throw new TypeError("URL generation is not available for the context.");
    }
    return this.#urlFor(name, params, query);
  }

  /** Throw an HTTP error. */
  throw(
    status: number = StatusCodes.INTERNAL_SERVER_ERROR,
    message?: string,
    props?: Record<string, unknown>,
  ): never {
    throw message === undefined
      ? createHttpError(status, props ?? {})
      : createHttpError(status, message, props ?? {});
  }

  /** Throw a `404 Not Found` HTTP error. */
  notFound(message = "Resource not found", cause?: unknown): never {
    throw createHttpError(StatusCodes.NOT_FOUND, message, { cause });
  }

  /** Throw a `409 Conflict` HTTP error. */
  conflict(message = "Resource conflict", cause?: unknown): never {
    throw createHttpError(StatusCodes.CONFLICT, message, { cause });
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
        addr: this.#requestEvent.addr,
        id: this.#requestEvent.id,
        params: this.#boundParams.toObject(),
        request: this.#requestEvent.request,
        responseHeaders: this.#responseHeaders,
        url: this.#url,
      }, newOptions)
    }`;
  }
}
