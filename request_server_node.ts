// Copyright 2018-2024 the oak authors. All rights reserved.

import createHttpError from "http-errors";
import { StatusCodes } from "http-status-codes";
import hyperid from "hyperid";
import {
  createServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import type { InspectOptionsStylized } from "node:util";

import { BODYLESS_METHODS } from "./constants.ts";
import { getLogger } from "./logger.ts";
import type {
  Addr,
  RequestEvent,
  RequestServer,
  RequestServerOptions,
} from "./types.ts";
import { createPromiseWithResolvers } from "./utils.ts";

const instance = hyperid({ urlSafe: true });
const logger = getLogger("request_server_node");

function toHeaders(rawHeaders: string[]): Headers {
  const headers = new Headers();
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    headers.append(rawHeaders[i], rawHeaders[i + 1]);
  }
  return headers;
}

function toBody(
  incomingMessage: IncomingMessage,
): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start: (controller) => {
      let done = false;
      incomingMessage.on("data", (chunk: Buffer) => {
        if (!done) {
          controller.enqueue(new Uint8Array(chunk));
        }
      });
      incomingMessage.on("error", (err) => {
        if (!done) {
          done = true;
          controller.error(err);
        }
      });
      incomingMessage.on("end", () => {
        if (!done) {
          done = true;
          controller.close();
        }
      });
    },
  });
}

class NodeRequestEvent implements RequestEvent {
  #abortController = new AbortController();
  #id = instance();
  #incomingMessage: IncomingMessage;
  #promise: Promise<Response>;
  #reject: (reason?: unknown) => void;
  #request: Request;
  #resolve: (value: Response | PromiseLike<Response>) => void;
  #responded = false;
  #serverResponse: ServerResponse<IncomingMessage>;
  #url: URL;

  get addr(): Addr {
    const { socket } = this.#incomingMessage;
    return {
      transport: "tcp",
      hostname: socket.remoteAddress ?? "",
      port: socket.remotePort ?? 0,
    };
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
    return this.#promise;
  }

  get signal(): AbortSignal {
    return this.#abortController.signal;
  }

  get url(): URL {
    return this.#url;
  }

  constructor(
    incomingMessage: IncomingMessage,
    serverResponse: ServerResponse<IncomingMessage>,
    host: string,
  ) {
    this.#incomingMessage = incomingMessage;
    this.#serverResponse = serverResponse;
    const { promise, resolve, reject } = createPromiseWithResolvers<Response>();
    this.#promise = promise;
    this.#resolve = resolve;
    this.#reject = reject;
    const headers = toHeaders(incomingMessage.rawHeaders);
    const method = incomingMessage.method ?? "GET";
    const url = this.#url = new URL(
      incomingMessage.url ?? "/",
      `http://${headers.get("host") ?? host}/`,
    );
    // the connection closing before the response is finished means the
    // client went away
    serverResponse.on("close", () => {
      if (!serverResponse.writableFinished) {
        logger.debug("{id} connection closed early", { id: this.#id });
        this.#abortController.abort();
      }
    });
    const init: RequestInit & { duplex?: "half" } = {
      headers,
      method,
      signal: this.#abortController.signal,
    };
    if (!BODYLESS_METHODS.includes(method)) {
      init.body = toBody(incomingMessage);
      init.duplex = "half";
    }
    this.#request = new Request(url, init);
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

  async #write(chunk: Uint8Array): Promise<void> {
    const { promise, resolve, reject } = createPromiseWithResolvers<void>();
    this.#serverResponse.write(chunk, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
    await promise;
  }

  async respond(response: Response): Promise<void> {
    if (this.#responded) {
      throw createHttpError(
        StatusCodes.INTERNAL_SERVER_ERROR,
        "Request already responded to.",
      );
    }
    this.#responded = true;
    this.#resolve(response);
    const signal = this.#abortController.signal;
    if (signal.aborted) {
      logger.debug("{id} not writing to closed connection", { id: this.#id });
      await response.body?.cancel();
      return;
    }
    const headers = new Map<string, string[]>();
    for (const [key, value] of response.headers) {
      const values = headers.get(key) ?? [];
      values.push(value);
      headers.set(key, values);
    }
    this.#serverResponse.statusCode = response.status;
    if (response.statusText) {
      this.#serverResponse.statusMessage = response.statusText;
    }
    for (const [key, value] of headers) {
      this.#serverResponse.setHeader(key, value);
    }
    if (response.body) {
      const reader = response.body.getReader();
      while (true) {
        if (signal.aborted) {
          logger.debug("{id} stopped writing to closed connection", {
            id: this.#id,
          });
          await reader.cancel();
          return;
        }
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        await this.#write(value);
      }
    }
    const { promise, resolve } = createPromiseWithResolvers<void>();
    this.#serverResponse.end(resolve);
    await promise;
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
        addr: this.addr,
        id: this.#id,
        request: this.#request,
        responded: this.#responded,
        response: this.#promise,
        url: this.#url,
      }, newOptions)
    }`;
  }
}

/**
 * A request server built on `node:http`, which presents requests as an async
 * iterable of request events.
 */
export default class NodeRequestServer implements RequestServer {
  #closed = true;
  #hostname: string;
  #port: number;
  #signal: AbortSignal;
  #stream?: ReadableStream<RequestEvent>;

  get closed(): boolean {
    return this.#closed;
  }

  constructor(options: RequestServerOptions) {
    const { hostname, port, signal } = options;
    this.#hostname = hostname ?? "127.0.0.1";
    this.#port = port ?? 80;
    this.#signal = signal;
  }

  listen(): Promise<Addr> {
    const { resolve, reject, promise } = createPromiseWithResolvers<Addr>();
    this.#stream = new ReadableStream<RequestEvent>({
      start: (controller) => {
        const server = createServer((incomingMessage, serverResponse) => {
          if (this.#closed) {
            serverResponse.statusCode = StatusCodes.SERVICE_UNAVAILABLE;
            serverResponse.end();
            return;
          }
          controller.enqueue(
            new NodeRequestEvent(
              incomingMessage,
              serverResponse,
              `${this.#hostname}:${this.#port}`,
            ),
          );
        });
        server.on("error", reject);
        this.#signal.addEventListener("abort", () => {
          if (!this.#closed) {
            this.#closed = true;
            controller.close();
          }
        });
        server.listen(
          { port: this.#port, host: this.#hostname, signal: this.#signal },
          () => {
            this.#closed = false;
            const address = server.address();
            if (address && typeof address === "object") {
              this.#port = address.port;
            }
            logger.debug("listening on {hostname}:{port}", {
              hostname: this.#hostname,
              port: this.#port,
            });
            resolve({
              port: this.#port,
              hostname: this.#hostname,
              transport: "tcp",
            });
          },
        );
      },
    });
    return promise;
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<RequestEvent> {
    if (!this.#stream) {
      throw new TypeError("Server hasn't started listening.");
    }
    const reader = this.#stream.getReader();
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      yield value;
    }
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
      inspect({ closed: this.#closed }, newOptions)
    }`;
  }
}
