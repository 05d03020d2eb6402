// Copyright 2018-2024 the oak authors. All rights reserved.

import { FetchRequestEvent } from "./request_event.ts";
import type { Addr } from "./types.ts";

/**
 * A request event for tests, which can simulate the client going away by
 * calling {@linkcode MockRequestEvent.abort}.
 */
export class MockRequestEvent extends FetchRequestEvent {
  #controller: AbortController;

  constructor(
    input: URL | string,
    init?: RequestInit,
    addr: Addr = { hostname: "localhost", port: 80, transport: "tcp" },
  ) {
    const controller = new AbortController();
    super(new Request(input, init), { addr, signal: controller.signal });
    this.#controller = controller;
  }

  /** Abort the signal of the request event. */
  abort(reason?: unknown): void {
    this.#controller.abort(reason);
  }
}
