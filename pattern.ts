// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Compiles route templates such as `/users/{id:int}/posts/{slug?}/{*rest}`
 * into an ordered list of segment matchers, and matches request paths against
 * them.
 *
 * Template syntax, per `/` separated segment:
 *
 * - `users` a literal segment
 * - `{name}` a required parameter
 * - `{name:type}` a required parameter validated by a registered type
 * - `{name?}` an optional parameter, only valid as a trailing run
 * - `{*name}` a wildcard which captures the rest of the path, only valid as the
 *   final segment
 *
 * @module
 */

import { PatternError, UrlGenerationError } from "./errors.ts";
import {
  anchor,
  type ParamTypeRegistry,
  paramTypes,
} from "./param_types.ts";
import { decodeComponent, joinPaths } from "./utils.ts";

export type ParamKind = "required" | "optional" | "wildcard";

export interface ParamSpec {
  readonly name: string;
  /** The type tag, when the parameter was declared as `{name:type}`. */
  readonly type?: string;
  readonly kind: ParamKind;
  /**
   * The validator derived from the type tag, or from a pattern registered for
   * the parameter name.
   */
  readonly validator?: RegExp;
  /** The validator derived from a constraint supplied for the route. */
  readonly constraint?: RegExp;
  /** Whether the parameter has any validator, which affects its rank. */
  readonly typed: boolean;
  /** The bound text must convert to a safe integer. */
  readonly integer?: boolean;
}

export type Segment =
  | { readonly kind: "literal"; readonly value: string }
  | { readonly kind: "param"; readonly param: ParamSpec };

export interface CompiledPattern {
  readonly template: string;
  readonly segments: readonly Segment[];
  readonly trailingSlash: boolean;
  readonly paramNames: readonly string[];
  /** The specificity rank of each segment, lower is more specific. */
  readonly ranks: readonly number[];
}

export interface CompileOptions {
  /** The registry type tags are resolved from. */
  registry?: ParamTypeRegistry;
  /**
   * Regular expressions which must match the decoded text of the named
   * parameters, in addition to any type validator.
   */
  constraints?: Record<string, string | RegExp>;
  /**
   * The template is a group prefix, which cannot contain optional or wildcard
   * segments.
   */
  prefixOnly?: boolean;
}

/** A parameter and the decoded text which was bound to it. */
export interface RawBinding {
  param: ParamSpec;
  text: string;
}

export const RANK_LITERAL = 0;
export const RANK_TYPED = 1;
export const RANK_UNTYPED = 2;
export const RANK_OPTIONAL = 3;
export const RANK_WILDCARD = 4;

const NAME = "[A-Za-z_][A-Za-z0-9_]*";
const WILDCARD_RE = new RegExp(`^\\{\\*(${NAME})\\}$`);
const OPTIONAL_RE = new RegExp(`^\\{(${NAME})\\?\\}$`);
const TYPED_RE = new RegExp(`^\\{(${NAME}):([A-Za-z_][A-Za-z0-9_-]*)\\}$`);
const REQUIRED_RE = new RegExp(`^\\{(${NAME})\\}$`);

/**
 * Split a request path into its segments, noting if it ends in a slash. The
 * root path has no segments and no trailing slash.
 */
export function splitPath(
  path: string,
): { segments: string[]; trailingSlash: boolean } {
  let rest = path.startsWith("/") ? path.slice(1) : path;
  let trailingSlash = false;
  if (rest.endsWith("/")) {
    trailingSlash = true;
    rest = rest.slice(0, -1);
  }
  return { segments: rest === "" ? [] : rest.split("/"), trailingSlash };
}

function rankOf(segment: Segment): number {
  if (segment.kind === "literal") {
    return RANK_LITERAL;
  }
  switch (segment.param.kind) {
    case "wildcard":
      return RANK_WILDCARD;
    case "optional":
      return RANK_OPTIONAL;
    default:
      return segment.param.typed ? RANK_TYPED : RANK_UNTYPED;
  }
}

function compileConstraint(
  template: string,
  name: string,
  constraint: string | RegExp,
): RegExp {
  const [source, flags] = typeof constraint === "string"
    ? [constraint, ""]
    : [constraint.source, constraint.flags];
  try {
    return anchor(source, flags);
  } catch {
    throw new PatternError(
      template,
      `invalid constraint for "${name}": ${source}`,
    );
  }
}

/**
 * Compile a route template into a {@linkcode CompiledPattern}, throwing a
 * {@linkcode PatternError} when the template is invalid.
 */
export function compilePattern(
  template: string,
  options: CompileOptions = {},
): CompiledPattern {
  const { registry = paramTypes, constraints = {}, prefixOnly = false } =
    options;
  const normalized = joinPaths(template);
  const split = splitPath(normalized);
  const trailingSlash = prefixOnly ? false : split.trailingSlash;
  const segments: Segment[] = [];
  const paramNames: string[] = [];
  let seenOptional = false;
  if (split.segments.filter((text) => WILDCARD_RE.test(text)).length > 1) {
    throw new PatternError(template, "only one wildcard is allowed");
  }
  for (const [index, text] of split.segments.entries()) {
    const isLast = index === split.segments.length - 1;
    let match: RegExpExecArray | null;
    let param: ParamSpec | undefined;
    if ((match = WILDCARD_RE.exec(text))) {
      if (prefixOnly) {
        throw new PatternError(
          template,
          "a group prefix cannot contain a wildcard segment",
        );
      }
      if (!isLast || trailingSlash) {
        throw new PatternError(
          template,
          "a wildcard must be the final segment",
        );
      }
      param = { name: match[1], kind: "wildcard", typed: false };
    } else if ((match = OPTIONAL_RE.exec(text))) {
      if (prefixOnly) {
        throw new PatternError(
          template,
          "a group prefix cannot contain an optional segment",
        );
      }
      if (isLast && trailingSlash) {
        throw new PatternError(
          template,
          "a trailing slash cannot follow an optional segment",
        );
      }
      const global = registry.paramPattern(match[1]);
      param = {
        name: match[1],
        kind: "optional",
        validator: global?.pattern,
        typed: !!global,
      };
    } else if ((match = TYPED_RE.exec(text))) {
      const type = registry.lookup(match[2]);
      param = {
        name: match[1],
        type: type.name,
        kind: "required",
        validator: type.pattern,
        typed: true,
        integer: type.tag === "int",
      };
    } else if ((match = REQUIRED_RE.exec(text))) {
      const global = registry.paramPattern(match[1]);
      param = {
        name: match[1],
        kind: "required",
        validator: global?.pattern,
        typed: !!global,
      };
    } else if (text.includes("{") || text.includes("}")) {
      throw new PatternError(template, `malformed segment "${text}"`);
    }

    if (!param) {
      if (seenOptional) {
        throw new PatternError(
          template,
          `required segment "${text}" cannot follow an optional segment`,
        );
      }
      segments.push({ kind: "literal", value: decodeComponent(text) });
      continue;
    }
    if (param.kind === "optional") {
      seenOptional = true;
    } else if (param.kind === "required" && seenOptional) {
      throw new PatternError(
        template,
        `required parameter "${param.name}" cannot follow an optional segment`,
      );
    } else if (param.kind === "wildcard" && seenOptional) {
      throw new PatternError(
        template,
        `wildcard "${param.name}" cannot follow an optional segment`,
      );
    }
    if (paramNames.includes(param.name)) {
      throw new PatternError(
        template,
        `duplicate parameter name "${param.name}"`,
      );
    }
    const constraint = constraints[param.name];
    if (constraint !== undefined) {
      param = {
        ...param,
        constraint: compileConstraint(template, param.name, constraint),
        typed: param.kind === "required" ? true : param.typed,
      };
    }
    paramNames.push(param.name);
    segments.push({ kind: "param", param });
  }
  for (const name of Object.keys(constraints)) {
    if (!paramNames.includes(name)) {
      throw new PatternError(
        template,
        `constraint supplied for unknown parameter "${name}"`,
      );
    }
  }
  return Object.freeze({
    template: normalized,
    segments: Object.freeze(segments),
    trailingSlash,
    paramNames: Object.freeze(paramNames),
    ranks: Object.freeze(segments.map(rankOf)),
  });
}

function accepts(param: ParamSpec, text: string): boolean {
  if (text === "") {
    return false;
  }
  if (param.validator && !param.validator.test(text)) {
    return false;
  }
  if (param.constraint && !param.constraint.test(text)) {
    return false;
  }
  if (param.integer && !Number.isSafeInteger(Number(text))) {
    return false;
  }
  return true;
}

/**
 * Match the raw segments of a request path against a pattern, returning the
 * decoded bindings, or `undefined` if the pattern does not match.
 */
export function matchSegments(
  pattern: CompiledPattern,
  segments: readonly string[],
  trailingSlash: boolean,
): RawBinding[] | undefined {
  const bindings: RawBinding[] = [];
  let i = 0;
  for (const segment of pattern.segments) {
    if (segment.kind === "literal") {
      if (
        i >= segments.length ||
        decodeComponent(segments[i]) !== segment.value
      ) {
        return undefined;
      }
      i++;
      continue;
    }
    const { param } = segment;
    if (param.kind === "wildcard") {
      const rest = segments.slice(i).map(decodeComponent).join("/");
      bindings.push({
        param,
        text: rest && trailingSlash ? `${rest}/` : rest,
      });
      return bindings;
    }
    if (i >= segments.length) {
      if (param.kind === "optional") {
        continue;
      }
      return undefined;
    }
    const text = decodeComponent(segments[i]);
    if (!accepts(param, text)) {
      return undefined;
    }
    bindings.push({ param, text });
    i++;
  }
  if (i !== segments.length || trailingSlash !== pattern.trailingSlash) {
    return undefined;
  }
  return bindings;
}

/**
 * Match a group prefix against the leading segments of a request path,
 * returning the number of segments consumed, or `-1` if it does not match.
 */
export function matchPrefix(
  pattern: CompiledPattern,
  segments: readonly string[],
): number {
  if (pattern.segments.length > segments.length) {
    return -1;
  }
  for (const [i, segment] of pattern.segments.entries()) {
    const text = decodeComponent(segments[i]);
    if (segment.kind === "literal") {
      if (text !== segment.value) {
        return -1;
      }
    } else if (!accepts(segment.param, text)) {
      return -1;
    }
  }
  return pattern.segments.length;
}

/**
 * Order two patterns by specificity, segment by segment from the left. When
 * all compared segments tie, the pattern with fewer segments is more
 * specific. A negative result means `a` is more specific than `b`.
 */
export function compareSpecificity(
  a: CompiledPattern,
  b: CompiledPattern,
): number {
  const length = Math.min(a.ranks.length, b.ranks.length);
  for (let i = 0; i < length; i++) {
    if (a.ranks[i] !== b.ranks[i]) {
      return a.ranks[i] - b.ranks[i];
    }
  }
  return a.ranks.length - b.ranks.length;
}

function isMissing(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

/**
 * Substitute parameter values into a pattern, producing a percent-encoded
 * path. Throws a {@linkcode UrlGenerationError} when a required parameter is
 * missing or a value fails its validator.
 */
export function buildPath(
  pattern: CompiledPattern,
  params: Record<string, unknown> = {},
): string {
  const parts: string[] = [];
  let omitted: string | undefined;
  for (const segment of pattern.segments) {
    if (segment.kind === "literal") {
      parts.push(encodeURIComponent(segment.value));
      continue;
    }
    const { param } = segment;
    const value = params[param.name];
    if (isMissing(value)) {
      if (param.kind === "required") {
        throw new UrlGenerationError(
          `Missing required parameter "${param.name}" for "${pattern.template}".`,
        );
      }
      omitted = param.name;
      continue;
    }
    if (omitted) {
      throw new UrlGenerationError(
        `Parameter "${param.name}" cannot be provided without "${omitted}" for "${pattern.template}".`,
      );
    }
    const text = String(value);
    if (param.kind === "wildcard") {
      if (text !== "") {
        parts.push(text.split("/").map(encodeURIComponent).join("/"));
      }
      continue;
    }
    if (!accepts(param, text)) {
      throw new UrlGenerationError(
        `Value "${text}" is not valid for parameter "${param.name}" of "${pattern.template}".`,
      );
    }
    parts.push(encodeURIComponent(text));
  }
  const path = `/${parts.join("/")}`;
  return pattern.trailingSlash && parts.length ? `${path}/` : path;
}
