// Copyright 2018-2024 the oak authors. All rights reserved.

/**
 * Errors which are raised while the routing table is being assembled, or
 * when the API is misused by a caller. Errors raised while handling a request
 * are HTTP errors created with `http-errors`.
 *
 * @module
 */

/**
 * Raised when registering routes, groups, middleware or parameter types
 * produces an invalid routing table. These errors are fatal and should
 * abort startup.
 */
export class ConfigurationError extends Error {
  name = "ConfigurationError";
}

/** A route or group template could not be compiled. */
export class PatternError extends ConfigurationError {
  name = "PatternError";
  readonly template: string;

  constructor(template: string, message: string) {
    super(`Invalid pattern "${template}": ${message}`);
    this.template = template;
  }
}

/** A template referred to a parameter type which has not been registered. */
export class UnknownParamTypeError extends ConfigurationError {
  name = "UnknownParamTypeError";
  readonly typeName: string;

  constructor(typeName: string) {
    super(`Unknown parameter type "${typeName}".`);
    this.typeName = typeName;
  }
}

/** Two routes in the same tree resolved to the same name. */
export class DuplicateRouteNameError extends ConfigurationError {
  name = "DuplicateRouteNameError";
  readonly routeName: string;

  constructor(routeName: string) {
    super(`A route named "${routeName}" is already registered.`);
    this.routeName = routeName;
  }
}

/**
 * A bound parameter was requested as a type other than the type it was
 * converted to.
 */
export class ParamTypeError extends TypeError {
  name = "ParamTypeError";
}

/** A URL could not be generated for a named route. */
export class UrlGenerationError extends Error {
  name = "UrlGenerationError";
}
