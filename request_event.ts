// Copyright 2018-2024 the oak authors. All rights reserved.

import createHttpError from "http-errors";
import { StatusCodes } from "http-status-codes";
import hyperid from "hyperid";
import type { InspectOptionsStylized } from "node:util";

import type { Addr, RequestEvent } from "./types.ts";
import { createPromiseWithResolvers } from "./utils.ts";

const instance = hyperid({ urlSafe: true });

export interface FetchRequestEventInit {
  /** The remote address of the request. Defaults to `localhost:80`. */
  addr?: Addr;
  /** An identifier for the request. Defaults to a generated id. */
  id?: string;
  /**
   * A signal which indicates the client has gone away. Defaults to the signal
   * of the request.
   */
  signal?: AbortSignal;
}

/**
 * A {@linkcode RequestEvent} for a fetch style {@linkcode Request}, where the
 * response is provided back to the caller as a promise.
 */
export class FetchRequestEvent implements RequestEvent {
  #addr: Addr;
  #id: string;
  #reject: (reason?: unknown) => void;
  #request: Request;
  #resolve: (value: Response | PromiseLike<Response>) => void;
  #responded = false;
  #response: Promise<Response>;
  #signal: AbortSignal;
  #url: URL;

  get addr(): Addr {
    return this.#addr;
  }

  get id(): string {
    return this.#id;
  }

  get request(): Request {
    return this.#request;
  }

  get responded(): boolean {
    return this.#responded;
  }

  get response(): Promise<Response> {
    return this.#response;
  }

  get signal(): AbortSignal {
    return this.#signal;
  }

  get url(): URL {
    return this.#url;
  }

  constructor(request: Request, init: FetchRequestEventInit = {}) {
    const {
      addr = { hostname: "localhost", port: 80, transport: "tcp" },
      id = instance(),
      signal = request.signal,
    } = init;
    this.#request = request;
    this.#addr = addr;
    this.#id = id;
    this.#signal = signal;
    const { resolve, reject, promise } = createPromiseWithResolvers<Response>();
    this.#resolve = resolve;
    this.#reject = reject;
    this.#response = promise;
    this.#url = new URL(request.url);
  }

  error(reason?: unknown): void {
    if (this.#responded) {
      throw createHttpError(
        StatusCodes.INTERNAL_SERVER_ERROR,
        "Request already responded to.",
      );
    }
    this.#responded = true;
    this.#reject(reason);
  }

  respond(response: Response): void {
    if (this.#responded) {
      throw createHttpError(
        StatusCodes.INTERNAL_SERVER_ERROR,
        "Request already responded to.",
      );
    }
    this.#responded = true;
    this.#resolve(response);
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
        addr: this.#addr,
        id: this.#id,
        request: this.#request,
        responded: this.#responded,
        url: this.#url,
      }, newOptions)
    }`;
  }
}
