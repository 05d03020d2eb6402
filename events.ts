// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The lifecycle events of routing a request, and the bus which publishes
 * them to listeners.
 *
 * @module
 */

import { getLogger, type Logger } from "./logger.ts";
import type { BoundParams } from "./params.ts";
import type { Route } from "./route.ts";
import type { RequestEvent, Removeable } from "./types.ts";

/** Published when a request is presented to the router, before matching. */
export interface BeforeRoutingEvent {
  requestEvent: RequestEvent;
}

/** Published when a route (or a fallback) is matched. */
export interface RouteMatchedEvent {
  requestEvent: RequestEvent;
  route: Route;
  params: BoundParams;
}

/** Published when no route or fallback matched the request. */
export interface RouteNotFoundEvent {
  requestEvent: RequestEvent;
}

/** Published when the middleware chain raised an error which was not handled. */
export interface RoutingErrorEvent {
  requestEvent: RequestEvent;
  error: unknown;
  route?: Route;
}

/**
 * Published once the response is finalized, including when the request was
 * aborted or an error occurred.
 */
export interface AfterRoutingEvent {
  requestEvent: RequestEvent;
  /** The time taken to handle the request in milliseconds. */
  duration: number;
  /** If the client went away before the response was finalized. */
  aborted: boolean;
  response?: Response;
  route?: Route;
}

export interface RouterEventMap {
  "before-routing": BeforeRoutingEvent;
  "route-matched": RouteMatchedEvent;
  "route-not-found": RouteNotFoundEvent;
  "routing-error": RoutingErrorEvent;
  "after-routing": AfterRoutingEvent;
}

export type RouterEventType = keyof RouterEventMap;

export type Listener<K extends RouterEventType> = (
  event: RouterEventMap[K],
) => void | Promise<void>;

type Listeners = { [K in RouterEventType]: Set<Listener<K>> };

/**
 * A bus of lifecycle events. Listeners are invoked synchronously in the order
 * they were registered. Errors thrown by listeners, or promises they return
 * which reject, are logged and never reach the publisher.
 */
export class EventBus {
  #listeners: Listeners = {
    "before-routing": new Set(),
    "route-matched": new Set(),
    "route-not-found": new Set(),
    "routing-error": new Set(),
    "after-routing": new Set(),
  };
  #logger: Logger = getLogger("events");

  /** Register a listener for an event type. */
  on<K extends RouterEventType>(type: K, listener: Listener<K>): Removeable {
    const listeners: Set<Listener<K>> = this.#listeners[type];
    listeners.add(listener);
    return {
      remove: () => {
        listeners.delete(listener);
      },
    };
  }

  /** The number of listeners registered for an event type. */
  listenerCount(type: RouterEventType): number {
    return this.#listeners[type].size;
  }

  /** Invoke the listeners of an event type. */
  publish<K extends RouterEventType>(type: K, event: RouterEventMap[K]): void {
    const listeners: Set<Listener<K>> = this.#listeners[type];
    for (const listener of [...listeners]) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.#failed(type, error));
        }
      } catch (error) {
        this.#failed(type, error);
      }
    }
  }

  #failed(type: RouterEventType, error: unknown): void {
    this.#logger.error("{type} listener failed: {error}", { type, error });
  }
}
