// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Resolution of a request to a route of a group tree.
 *
 * @module
 */

import { RouteGroup } from "./group.ts";
import { getLogger, type Logger } from "./logger.ts";
import type { BoundParams } from "./params.ts";
import {
  compareSpecificity,
  matchPrefix,
  matchSegments,
  type RawBinding,
  splitPath,
} from "./pattern.ts";
import type { Route } from "./route.ts";
import type { MatchTarget } from "./types.ts";

/** A route matched the request, or the nearest fallback is used. */
export interface MatchedResult {
  kind: "matched";
  route: Route;
  params: BoundParams;
}

/** Routes match the path of the request, but not its method. */
export interface MethodNotAllowedResult {
  kind: "method-not-allowed";
  allowedMethods: ReadonlySet<string>;
}

/**
 * No route matches the path, but one would with the trailing slash toggled.
 * The location is a path, without the querystring of the request.
 */
export interface RedirectResult {
  kind: "redirect";
  location: string;
  status: 301 | 307;
}

export interface NotFoundResult {
  kind: "not-found";
}

/** The outcome of resolving a request. */
export type MatchResult =
  | MatchedResult
  | MethodNotAllowedResult
  | RedirectResult
  | NotFoundResult;

export interface MatcherOptions {
  /**
   * Redirect to the path with the trailing slash toggled when only that path
   * matches a route for the method.
   *
   * @default {true}
   */
  redirectTrailingSlash?: boolean;
  /**
   * Resolve to `method-not-allowed` when routes match the path, but none of
   * them handle the method.
   *
   * @default {true}
   */
  handleMethodNotAllowed?: boolean;
  /**
   * Collapse repeated slashes in the path before matching.
   *
   * @default {false}
   */
  removeExtraSlash?: boolean;
}

interface Candidate {
  route: Route;
  bindings: RawBinding[];
}

interface FallbackCandidate {
  group: RouteGroup;
  route: Route;
  consumed: number;
}

interface Collected {
  candidates: Candidate[];
  fallbacks: FallbackCandidate[];
}

function collect(
  group: RouteGroup,
  segments: readonly string[],
  trailingSlash: boolean,
  collected: Collected,
): void {
  const consumed = matchPrefix(group.prefixPattern, segments);
  if (consumed < 0) {
    return;
  }
  const fallback = group.fallbackRoute;
  if (fallback) {
    collected.fallbacks.push({ group, route: fallback, consumed });
  }
  for (const entry of group.entries) {
    if (entry instanceof RouteGroup) {
      collect(entry, segments, trailingSlash, collected);
      continue;
    }
    const bindings = entry.matches(segments, trailingSlash);
    if (bindings) {
      collected.candidates.push({ route: entry, bindings });
    }
  }
}

function bySpecificity(a: Candidate, b: Candidate): number {
  return compareSpecificity(a.route.pattern, b.route.pattern) ||
    a.route.order - b.route.order;
}

function byNearest(a: FallbackCandidate, b: FallbackCandidate): number {
  return b.group.depth - a.group.depth || b.consumed - a.consumed ||
    a.route.order - b.route.order;
}

/**
 * Resolves requests against a built group tree. The tree is only read, so a
 * matcher can be shared by any number of concurrent requests.
 */
export class Matcher {
  #handleMethodNotAllowed: boolean;
  #logger: Logger;
  #redirectTrailingSlash: boolean;
  #removeExtraSlash: boolean;
  #root: RouteGroup;

  constructor(root: RouteGroup, options: MatcherOptions = {}) {
    const {
      redirectTrailingSlash = true,
      handleMethodNotAllowed = true,
      removeExtraSlash = false,
    } = options;
    this.#root = root;
    this.#redirectTrailingSlash = redirectTrailingSlash;
    this.#handleMethodNotAllowed = handleMethodNotAllowed;
    this.#removeExtraSlash = removeExtraSlash;
    this.#logger = getLogger("matcher");
  }

  #find(
    target: MatchTarget,
    segments: readonly string[],
    trailingSlash: boolean,
  ): { collected: Collected; winner?: MatchedResult; allowed: Set<string> } {
    const collected: Collected = { candidates: [], fallbacks: [] };
    collect(this.#root, segments, trailingSlash, collected);
    collected.candidates.sort(bySpecificity);
    const allowed = new Set<string>();
    for (const { route, bindings } of collected.candidates) {
      if (!route.acceptsHost(target.host)) {
        this.#logger.debug("{path} rejected by domain of {route}", {
          path: target.path,
          route: route.path,
        });
        continue;
      }
      if (!route.allows(target.method)) {
        for (const method of route.methods) {
          allowed.add(method);
        }
        continue;
      }
      if (!route.satisfies(bindings, target)) {
        this.#logger.debug("{path} rejected by constraints of {route}", {
          path: target.path,
          route: route.path,
        });
        continue;
      }
      return {
        collected,
        allowed,
        winner: { kind: "matched", route, params: route.bind(bindings) },
      };
    }
    return { collected, allowed };
  }

  /**
   * Resolve a request. Matching routes are tried from the most specific, with
   * precedence given to:
   *
   * 1. a route which handles the method and whose constraints pass
   * 2. a redirect, when the path with its trailing slash toggled matches
   * 3. `method-not-allowed`, when routes for other methods match
   * 4. the fallback of the deepest group whose prefix matches
   * 5. `not-found`
   */
  match(target: MatchTarget): MatchResult {
    const path = this.#removeExtraSlash
      ? target.path.replace(/\/{2,}/g, "/")
      : target.path;
    const { segments, trailingSlash } = splitPath(path);
    const { collected, winner, allowed } = this.#find(
      target,
      segments,
      trailingSlash,
    );
    if (winner) {
      this.#logger.debug("{method} {path} matched {route}", {
        method: target.method,
        path,
        route: winner.route.path,
      });
      return winner;
    }
    if (this.#redirectTrailingSlash && segments.length) {
      const toggled = this.#find(target, segments, !trailingSlash);
      if (toggled.winner) {
        const location = trailingSlash ? path.slice(0, -1) : `${path}/`;
        const status = target.method === "GET" || target.method === "HEAD"
          ? 301
          : 307;
        this.#logger.debug("{path} redirecting to {location}", {
          path,
          location,
        });
        return { kind: "redirect", location, status };
      }
    }
    if (this.#handleMethodNotAllowed && allowed.size) {
      return { kind: "method-not-allowed", allowedMethods: allowed };
    }
    const [nearest] = collected.fallbacks.sort(byNearest);
    if (nearest) {
      const { group, route, consumed } = nearest;
      const bindings = matchSegments(
        group.prefixPattern,
        segments.slice(0, consumed),
        group.prefixPattern.trailingSlash,
      ) ?? [];
      this.#logger.debug("{path} handled by fallback of {prefix}", {
        path,
        prefix: group.prefix,
      });
      return { kind: "matched", route, params: route.bind(bindings) };
    }
    return { kind: "not-found" };
  }
}
