// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * The registry of parameter types which can be referred to in route templates
 * (e.g. `{id:int}`), along with the global parameter name patterns and the
 * casts that convert the matched text into a value.
 *
 * @module
 */

import { ConfigurationError, UnknownParamTypeError } from "./errors.ts";

/** A function which converts the decoded text of a segment into a value. */
export type CastFunction = (text: string) => unknown;

/**
 * The tag of a converted parameter value. Values converted by a user supplied
 * cast are tagged as `"raw"`.
 */
export type ValueTag = "string" | "int" | "double" | "raw";

/** A converted parameter value along with the text it was converted from. */
export type TypedValue =
  | { type: "string"; value: string; raw: string }
  | { type: "int"; value: number; raw: string }
  | { type: "double"; value: number; raw: string }
  | { type: "raw"; value: unknown; raw: string };

export interface ParamType {
  readonly name: string;
  /** The regular expression source the segment text must fully match. */
  readonly source: string;
  /** The anchored validator compiled from the source. */
  readonly pattern: RegExp;
  readonly tag: ValueTag;
  readonly cast?: CastFunction;
}

export interface ParamTypeRegistryOptions {
  /**
   * Register the built-in types (`int`, `double`, `uuid`, `slug`, `email`,
   * `url`, `ip`, `word` and `string`).
   *
   * @default true
   */
  builtins?: boolean;
}

const OCTET = "(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)";
const HEX = "[0-9a-fA-F]";

const BUILTINS: [name: string, source: string, tag: ValueTag][] = [
  ["int", "\\d+", "int"],
  ["double", "\\d+\\.\\d+", "double"],
  [
    "uuid",
    `${HEX}{8}-${HEX}{4}-${HEX}{4}-${HEX}{4}-${HEX}{12}`,
    "string",
  ],
  ["slug", "[a-z0-9]+(?:-[a-z0-9]+)*", "string"],
  ["email", "[^\\s@/]+@[^\\s@/]+\\.[^\\s@/]+", "string"],
  ["url", "https?:\\/\\/[^\\s/$.?#][^\\s]*", "string"],
  ["ip", `(?:${OCTET}\\.){3}${OCTET}`, "string"],
  ["word", "\\w+", "string"],
  ["string", "[^/]+", "string"],
];

/**
 * Compile a regular expression source so it must match the whole text. The
 * stateful `g` and `y` flags are dropped.
 */
export function anchor(source: string, flags = ""): RegExp {
  return new RegExp(`^(?:${source})$`, flags.replace(/[gy]/g, ""));
}

function compile(
  pattern: RegExp | string,
  what: string,
): { source: string; pattern: RegExp } {
  const [source, flags] = typeof pattern === "string"
    ? [pattern, ""]
    : [pattern.source, pattern.flags];
  try {
    return { source, pattern: anchor(source, flags) };
  } catch (cause) {
    throw new ConfigurationError(
      `Invalid regular expression for ${what}: ${source}`,
      { cause },
    );
  }
}

/**
 * A lookup table from type tags to validating regular expressions.
 *
 * Re-registering a name overwrites the previous registration, so built-in
 * types can be replaced by an application. Once the registry is frozen, which
 * happens when a router starts listening, any further registration throws a
 * {@linkcode ConfigurationError}.
 *
 * @example
 *
 * ```ts
 * import { paramTypes } from "trellis";
 *
 * paramTypes.register("hex", /[0-9a-f]+/, (text) => parseInt(text, 16));
 * ```
 */
export class ParamTypeRegistry {
  #castings = new Map<string, CastFunction>();
  #frozen = false;
  #paramPatterns = new Map<string, { source: string; pattern: RegExp }>();
  #types = new Map<string, ParamType>();

  /** Whether the registry has been frozen. */
  get frozen(): boolean {
    return this.#frozen;
  }

  constructor(options: ParamTypeRegistryOptions = {}) {
    const { builtins = true } = options;
    if (builtins) {
      for (const [name, source, tag] of BUILTINS) {
        this.#types.set(name, {
          name,
          source,
          pattern: anchor(source),
          tag,
          cast: tag === "int"
            ? (text) => parseInt(text, 10)
            : tag === "double"
            ? (text) => parseFloat(text)
            : undefined,
        });
      }
    }
  }

  #assertMutable(): void {
    if (this.#frozen) {
      throw new ConfigurationError(
        "The parameter type registry is frozen and cannot be modified.",
      );
    }
  }

  /**
   * Register a type under `name`. When a `cast` is provided, values bound to
   * parameters of this type are converted by it and tagged as `"raw"`.
   */
  register(name: string, pattern: RegExp | string, cast?: CastFunction): void {
    this.#assertMutable();
    const { source, pattern: validator } = compile(pattern, `type "${name}"`);
    this.#types.set(name, {
      name,
      source,
      pattern: validator,
      tag: cast ? "raw" : "string",
      cast,
    });
  }

  /** Returns `true` if a type with `name` is registered. */
  has(name: string): boolean {
    return this.#types.has(name);
  }

  /**
   * Returns the type registered under `name`, throwing an
   * {@linkcode UnknownParamTypeError} when there is none.
   */
  lookup(name: string): ParamType {
    const type = this.#types.get(name);
    if (!type) {
      throw new UnknownParamTypeError(name);
    }
    return type;
  }

  /** The names of all registered types. */
  names(): string[] {
    return [...this.#types.keys()];
  }

  /**
   * Register a pattern which applies to every untyped parameter with the name
   * `paramName`. A route `/users/{id}` then only matches when the segment
   * matches the pattern registered for `id`.
   */
  registerParamPattern(paramName: string, pattern: RegExp | string): void {
    this.#assertMutable();
    this.#paramPatterns.set(
      paramName,
      compile(pattern, `parameter "${paramName}"`),
    );
  }

  /** The global pattern registered for a parameter name, if any. */
  paramPattern(
    paramName: string,
  ): { source: string; pattern: RegExp } | undefined {
    return this.#paramPatterns.get(paramName);
  }

  /**
   * Register a cast for the type `type`, which takes precedence over any cast
   * provided when the type was registered.
   */
  registerCasting(type: string, cast: CastFunction): void {
    this.#assertMutable();
    this.#castings.set(type, cast);
  }

  /** Remove a cast previously set by {@linkcode registerCasting}. */
  unregisterCasting(type: string): boolean {
    this.#assertMutable();
    return this.#castings.delete(type);
  }

  /**
   * Convert the decoded text of a segment into a {@linkcode TypedValue}
   * according to the type the parameter was declared with.
   */
  convert(type: string | undefined, text: string): TypedValue {
    if (type === undefined) {
      return { type: "string", value: text, raw: text };
    }
    const casting = this.#castings.get(type);
    if (casting) {
      return { type: "raw", value: casting(text), raw: text };
    }
    const paramType = this.#types.get(type);
    if (!paramType?.cast) {
      return { type: "string", value: text, raw: text };
    }
    switch (paramType.tag) {
      case "int":
        return { type: "int", value: parseInt(text, 10), raw: text };
      case "double":
        return { type: "double", value: parseFloat(text), raw: text };
      default:
        return { type: "raw", value: paramType.cast(text), raw: text };
    }
  }

  /** Prevent any further registrations. */
  freeze(): void {
    this.#frozen = true;
  }
}

/** The process wide registry used by routers which are not given one. */
export const paramTypes = new ParamTypeRegistry();
