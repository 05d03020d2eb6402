// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Shared interfaces which are used across the modules of trellis.
 *
 * @module
 */

/**
 * Returned from APIs which register something that can later be
 * unregistered.
 */
export interface Removeable {
  remove(): void;
}

/** The raw (decoded) text of the parameters bound from a path. */
export interface ParamsDictionary {
  [key: string]: string;
}

export interface Addr {
  transport: "tcp" | "udp";
  hostname: string;
  port: number;
}

/**
 * The abstraction of a request, as presented by a request server, which the
 * router handles.
 */
export interface RequestEvent {
  readonly addr: Addr;
  readonly id: string;
  readonly request: Request;
  readonly response: Promise<Response>;
  readonly responded: boolean;
  /**
   * Aborted when the underlying connection closes before a response has been
   * fully written.
   */
  readonly signal: AbortSignal;
  readonly url: URL;
  error(reason?: unknown): void;
  respond(response: Response): void | Promise<void>;
}

export interface RequestServerOptions {
  hostname?: string;
  port?: number;
  signal: AbortSignal;
}

export interface RequestServer {
  readonly closed: boolean;
  listen(): Promise<Addr> | Addr;
  [Symbol.asyncIterator](): AsyncIterableIterator<RequestEvent>;
}

export interface RequestServerConstructor {
  new (options: RequestServerOptions): RequestServer;
  prototype: RequestServer;
}

type ParamValueOf<Type extends string> = Type extends "int" | "double"
  ? number
  : Type extends
    "email" | "ip" | "slug" | "string" | "url" | "uuid" | "word" ? string
  : unknown;

type SegmentParameter<S extends string> = S extends `{*${infer Name}}`
  ? { [K in Name]: string }
  : S extends `{${infer Name}?}` ? { [K in Name]?: string }
  : S extends `{${infer Name}:${infer Type}}`
    ? { [K in Name]: ParamValueOf<Type> }
  : S extends `{${infer Name}}` ? { [K in Name]: string }
  : Record<never, never>;

type PathParameters<Path extends string> = Path extends
  `${infer Head}/${infer Rest}`
  ? SegmentParameter<Head> & PathParameters<Rest>
  : SegmentParameter<Path>;

type Flatten<T> = { [K in keyof T]: T[K] };

/**
 * The shape of the converted parameter values which will be bound when a
 * route template matches, inferred from the template. `{id:int}` and
 * `{amount:double}` produce numbers, optional parameters are optional, the
 * built-in string types are strings and parameters of other registered types
 * are `unknown`.
 */
export type RouteParameters<Path extends string> = Extract<
  string extends Path ? Record<string, unknown>
    : Flatten<PathParameters<Path>>,
  Record<string, unknown>
>;

/** What the matcher knows about the request being matched. */
export interface MatchTarget {
  method: string;
  path: string;
  /** The host of the request, without any port. */
  host?: string;
  headers: Headers;
  /** The request, when matching on behalf of a request being handled. */
  request?: Request;
}
