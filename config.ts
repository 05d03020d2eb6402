// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Loading of router options from flat configuration records, like
 * `process.env` or the parsed contents of a configuration file.
 *
 * @module
 */

import {
  boolean,
  getDotPath,
  type InferOutput,
  object,
  optional,
  picklist,
  pipe,
  safeParse,
  string,
  toLowerCase,
  transform,
  union,
} from "valibot";

import { ConfigurationError } from "./errors.ts";
import type { RouterOptions } from "./router.ts";

const TRUTHY = ["true", "1", "yes", "on"];
const FALSY = ["false", "0", "no", "off"];

const booleanish = pipe(
  union([
    boolean(),
    pipe(string(), toLowerCase(), picklist([...TRUTHY, ...FALSY])),
  ]),
  transform((value) =>
    typeof value === "boolean" ? value : TRUTHY.includes(value)
  ),
);

const LEVELS = [
  "trace",
  "debug",
  "info",
  "warning",
  "error",
  "fatal",
] as const;

/** The recognized keys of a configuration record. Other keys are ignored. */
export const RouterConfigSchema = object({
  "routing.redirect_trailing_slash": optional(booleanish),
  "routing.handle_method_not_allowed": optional(booleanish),
  "routing.remove_extra_slash": optional(booleanish),
  "routing.prefer_json": optional(booleanish),
  "routing.debug": optional(booleanish),
  "logging.enabled": optional(booleanish),
  "logging.level": optional(pipe(string(), toLowerCase(), picklist(LEVELS))),
});

export type RouterConfig = InferOutput<typeof RouterConfigSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flatten nested records into a single record with `.` separated keys, so
 * `{ routing: { debug: true } }` becomes `{ "routing.debug": true }`.
 */
export function flattenConfig(
  record: Record<string, unknown>,
  prefix = "",
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      Object.assign(result, flattenConfig(value, path));
    } else {
      result[path] = value;
    }
  }
  return result;
}

/**
 * Read router options from a configuration record. Keys can be flat
 * (`routing.redirect_trailing_slash`) or nested, and booleans can be given as
 * strings (`"true"`, `"false"`, `"1"`, `"0"`, `"yes"`, `"no"`, `"on"`,
 * `"off"`). Options which are not configured are left for the router to
 * default. Explicit `overrides` take precedence over the record.
 *
 * Throws a {@linkcode ConfigurationError} when a recognized key has an invalid
 * value.
 *
 * @example
 *
 * ```ts
 * const router = new Router(loadRouterOptions({
 *   "routing.redirect_trailing_slash": "false",
 *   "logging.level": "debug",
 * }));
 * ```
 */
export function loadRouterOptions(
  record: Record<string, unknown>,
  overrides: RouterOptions = {},
): RouterOptions {
  const result = safeParse(RouterConfigSchema, flattenConfig(record));
  if (!result.success) {
    const details = result.issues
      .map((issue) => `${getDotPath(issue) ?? "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid router configuration: ${details}`);
  }
  const config = result.output;
  const options: RouterOptions = {};
  if (config["routing.redirect_trailing_slash"] !== undefined) {
    options.redirectTrailingSlash = config["routing.redirect_trailing_slash"];
  }
  if (config["routing.handle_method_not_allowed"] !== undefined) {
    options.handleMethodNotAllowed =
      config["routing.handle_method_not_allowed"];
  }
  if (config["routing.remove_extra_slash"] !== undefined) {
    options.removeExtraSlash = config["routing.remove_extra_slash"];
  }
  if (config["routing.prefer_json"] !== undefined) {
    options.preferJson = config["routing.prefer_json"];
  }
  if (config["routing.debug"] !== undefined) {
    options.debug = config["routing.debug"];
  }
  const enabled = config["logging.enabled"];
  const level = config["logging.level"];
  if (enabled === false) {
    options.logger = false;
  } else if (level) {
    options.logger = { console: { level } };
  } else if (enabled) {
    options.logger = true;
  }
  return { ...options, ...overrides };
}
