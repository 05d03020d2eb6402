// Copyright 2018-2024 the oak authors. All rights reserved.

import { ParamTypeError } from "./errors.ts";
import type { TypedValue, ValueTag } from "./param_types.ts";
import type { ParamsDictionary } from "./types.ts";

/**
 * The read-only set of parameters which were bound from the path of a request
 * when a route matched.
 *
 * Each value is stored as a {@linkcode TypedValue}, tagged with the type it was
 * converted to. The typed accessors throw a {@linkcode ParamTypeError} when the
 * stored tag disagrees with the requested type, so the type declared in the
 * route template always wins.
 *
 * @example
 *
 * ```ts
 * router.get("/items/{id:int}", (ctx) => {
 *   const id = ctx.boundParams.int("id"); // number
 *   ctx.boundParams.string("id"); // throws ParamTypeError
 * });
 * ```
 */
export class BoundParams implements Iterable<[string, TypedValue]> {
  #values: Map<string, TypedValue>;

  /** The number of bound parameters. */
  get size(): number {
    return this.#values.size;
  }

  constructor(values: Iterable<[string, TypedValue]> = []) {
    this.#values = new Map(values);
    Object.freeze(this);
  }

  #typed(name: string, tag: ValueTag): TypedValue | undefined {
    const value = this.#values.get(name);
    if (value && value.type !== tag) {
      throw new ParamTypeError(
        `Parameter "${name}" is of type "${value.type}", not "${tag}".`,
      );
    }
    return value;
  }

  /** The tagged value bound to `name`. */
  get(name: string): TypedValue | undefined {
    return this.#values.get(name);
  }

  has(name: string): boolean {
    return this.#values.has(name);
  }

  keys(): IterableIterator<string> {
    return this.#values.keys();
  }

  entries(): IterableIterator<[string, TypedValue]> {
    return this.#values.entries();
  }

  /** The value of a parameter bound as a string. */
  string(name: string): string | undefined {
    const value = this.#typed(name, "string");
    return value?.type === "string" ? value.value : undefined;
  }

  /** The value of a parameter declared as `int`. */
  int(name: string): number | undefined {
    const value = this.#typed(name, "int");
    return value?.type === "int" ? value.value : undefined;
  }

  /** The value of a parameter declared as `double`. */
  double(name: string): number | undefined {
    const value = this.#typed(name, "double");
    return value?.type === "double" ? value.value : undefined;
  }

  /** The decoded text a parameter was converted from. */
  raw(name: string): string | undefined {
    return this.#values.get(name)?.raw;
  }

  /** The converted value of a parameter, whatever its type. */
  value(name: string): unknown {
    return this.#values.get(name)?.value;
  }

  /** A plain object of the converted values. */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, { value }] of this.#values) {
      result[name] = value;
    }
    return result;
  }

  /** A plain object of the decoded text of each parameter. */
  toRaw(): ParamsDictionary {
    const result: ParamsDictionary = {};
    for (const [name, { raw }] of this.#values) {
      result[name] = raw;
    }
    return result;
  }

  [Symbol.iterator](): IterableIterator<[string, TypedValue]> {
    return this.#values.entries();
  }
}
