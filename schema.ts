// Copyright 2018-2024 the oak authors. All rights reserved.

import createHttpError from "http-errors";
import { StatusCodes } from "http-status-codes";
import {
  type BaseIssue,
  type BaseSchema,
  type BaseSchemaAsync,
  type Config,
  type ErrorMessage,
  type InferOutput,
  type ObjectEntries,
  type ObjectEntriesAsync,
  type ObjectIssue,
  type ObjectSchema,
  type ObjectSchemaAsync,
  parseAsync,
  safeParseAsync,
} from "valibot";
import { parse } from "qs";

import { BODYLESS_METHODS } from "./constants.ts";
import { getLogger } from "./logger.ts";
import type { RequestEvent } from "./types.ts";

/**
 * A base type of the schema that can be applied to the body of a request or
 * response.
 */
export type BodySchema =
  | BaseSchema<unknown, unknown, BaseIssue<unknown>>
  | BaseSchemaAsync<unknown, unknown, BaseIssue<unknown>>;

/**
 * A base type of the schema that can be applied to the querystring of a
 * request.
 */
export type QueryStringSchema =
  | ObjectSchema<
    ObjectEntries,
    ErrorMessage<ObjectIssue> | undefined
  >
  | ObjectSchemaAsync<
    ObjectEntriesAsync,
    ErrorMessage<ObjectIssue> | undefined
  >;

/** The issues found when a part of a request or response was invalid. */
export type Issues = [BaseIssue<unknown>, ...BaseIssue<unknown>[]];

/**
 * A function that can be called when a schema is invalid.
 *
 * `part` is a string that indicates which part of the schema is invalid.
 * `"querystring"` indicates that the querystring schema is invalid. `"body"`
 * indicates that the body schema is invalid. `"response"` indicates that the
 * response schema is invalid.
 *
 * The handler is expected to return a response which will be sent to the
 * client. If the handler throws an error, a `InternalServerError` HTTP error
 * will be thrown with the error as the `cause`.
 */
export interface InvalidHandler {
  (
    part: "querystring" | "body" | "response",
    issues: Issues,
  ): Promise<Response> | Response;
}

export type ValidationOptions = Omit<Config<BaseIssue<unknown>>, "skipPipe">;

type MaybeValid<T> = { output: T; invalidResponse?: undefined } | {
  output?: undefined;
  invalidResponse: Response;
};

/**
 * A descriptor for a schema that can be applied to a request and response.
 *
 * @template QSSchema the schema that can be applied to the querystring of a
 * request.
 * @template BSchema the schema that can be applied to the body of a request.
 * @template ResSchema the schema that can be applied to the body of a response.
 */
export interface SchemaDescriptor<
  QSSchema extends QueryStringSchema = QueryStringSchema,
  BSchema extends BodySchema = BodySchema,
  ResSchema extends BodySchema = BodySchema,
> {
  /**
   * A schema that can be applied to the querystring of a request.
   */
  querystring?: QSSchema;
  /**
   * A schema that can be applied to the body of a request.
   */
  body?: BSchema;
  /**
   * A schema that can be applied to the body of a response.
   */
  response?: ResSchema;
  /**
   * Options that can be applied to the validation of the schema.
   */
  options?: ValidationOptions;
  /**
   * A handler that can be called when the schema is invalid.
   */
  invalidHandler?: InvalidHandler;
}

/**
 * Read the body of a request, based on its content type. JSON bodies are
 * parsed, URL encoded forms are parsed with `qs`, multipart forms become a
 * plain object of their entries and any other text is returned as is.
 *
 * Requests with a method of `GET` or `HEAD` never have a body.
 */
export async function readBody(request: Request): Promise<unknown> {
  if (BODYLESS_METHODS.includes(request.method) || !request.body) {
    return undefined;
  }
  const contentType = request.headers.get("content-type")?.toLowerCase() ??
    "";
  if (contentType.startsWith("application/x-www-form-urlencoded")) {
    return parse(await request.text());
  }
  if (contentType.startsWith("multipart/form-data")) {
    const formData = await request.formData();
    const output: Record<string, FormDataEntryValue> = {};
    for (const [key, value] of formData) {
      output[key] = value;
    }
    return output;
  }
  const text = await request.text();
  if (contentType.startsWith("text/")) {
    return text;
  }
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (cause) {
    throw createHttpError(StatusCodes.BAD_REQUEST, "Malformed JSON body", {
      cause,
    });
  }
}

/**
 * Validate an arbitrary input against a schema, throwing a `BadRequest` HTTP
 * error when it is invalid.
 */
export async function bindSchema<S extends BodySchema>(
  schema: S,
  input: unknown,
  options?: ValidationOptions,
): Promise<InferOutput<S>> {
  try {
    return await parseAsync(schema, input, options);
  } catch (cause) {
    throw createHttpError(StatusCodes.BAD_REQUEST, "Invalid body", { cause });
  }
}

/**
 * A class that can apply validation schemas to the querystring and request and
 * response bodies.
 */
export class Schema {
  #body?: BodySchema;
  #invalidHandler?: InvalidHandler;
  #logger = getLogger("schema");
  #options?: ValidationOptions;
  #querystring?: QueryStringSchema;
  #response?: BodySchema;

  constructor(descriptor: SchemaDescriptor = {}) {
    this.#querystring = descriptor.querystring;
    this.#body = descriptor.body;
    this.#response = descriptor.response;
    this.#options = descriptor.options;
    this.#invalidHandler = descriptor.invalidHandler;
  }

  async #invalid(
    id: string,
    part: "querystring" | "body" | "response",
    issues: Issues,
  ): Promise<MaybeValid<never>> {
    if (!this.#invalidHandler) {
      throw new TypeError("No invalid handler.");
    }
    try {
      this.#logger.info("{id} {part} is invalid, calling invalid handler.", {
        id,
        part,
      });
      return { invalidResponse: await this.#invalidHandler(part, issues) };
    } catch (cause) {
      this.#logger.error("{id} invalid handler failed.", { id });
      throw createHttpError(
        StatusCodes.INTERNAL_SERVER_ERROR,
        "Invalid handler failed",
        { cause },
      );
    }
  }

  /**
   * Given a {@linkcode RequestEvent}, this method will attempt to parse the
   * `search` part of the URL and validate it against the schema provided. If
   * no schema was provided, the parsed search will be returned. If the schema
   * is provided and the parsed search is invalid, the invalid handler will be
   * called if provided, otherwise a `BadRequest` HTTP error will be thrown.
   */
  async validateQueryString(
    requestEvent: RequestEvent,
  ): Promise<MaybeValid<unknown>> {
    const id = requestEvent.id;
    this.#logger.debug("{id} schema.validateQueryString()", { id });
    const input = parse(requestEvent.url.search.slice(1));
    if (!this.#querystring) {
      this.#logger.debug("{id} no querystring schema provided.", { id });
      return { output: input };
    }
    if (this.#invalidHandler) {
      const result = await safeParseAsync(
        this.#querystring,
        input,
        this.#options,
      );
      if (result.success) {
        this.#logger.debug("{id} querystring is valid.", { id });
        return { output: result.output };
      }
      return this.#invalid(id, "querystring", result.issues);
    }
    try {
      this.#logger.debug("{id} validating querystring.", { id });
      return {
        output: await parseAsync(this.#querystring, input, this.#options),
      };
    } catch (cause) {
      this.#logger.info("{id} querystring is invalid.", { id });
      throw createHttpError(StatusCodes.BAD_REQUEST, "Invalid querystring", {
        cause,
      });
    }
  }

  /**
   * Validate the already read body of a request against the schema provided.
   * If no schema was provided, the input is returned. If the schema is
   * provided and the input is invalid, the invalid handler will be called if
   * provided, otherwise a `BadRequest` HTTP error will be thrown.
   */
  async validateBody(
    requestEvent: RequestEvent,
    input: unknown,
  ): Promise<MaybeValid<unknown>> {
    const id = requestEvent.id;
    this.#logger.debug("{id} schema.validateBody()", { id });
    if (!this.#body) {
      this.#logger.debug("{id} no body schema provided.", { id });
      return { output: input };
    }
    if (this.#invalidHandler) {
      const result = await safeParseAsync(this.#body, input, this.#options);
      if (result.success) {
        this.#logger.debug("{id} body is valid.", { id });
        return { output: result.output };
      }
      return this.#invalid(id, "body", result.issues);
    }
    try {
      this.#logger.debug("{id} validating body.", { id });
      return { output: await parseAsync(this.#body, input, this.#options) };
    } catch (cause) {
      this.#logger.info("{id} body is invalid.", { id });
      throw createHttpError(StatusCodes.BAD_REQUEST, "Invalid body", {
        cause,
      });
    }
  }

  /**
   * Given a response body, this method will attempt to validate it against the
   * schema provided. If no schema was provided, the response body will be
   * passed through. If the schema is provided and the response body is invalid,
   * the invalid handler will be called if provided, otherwise an
   * `InternalServerError` HTTP error will be thrown.
   */
  async validateResponse(
    id: string,
    input: unknown,
  ): Promise<MaybeValid<unknown>> {
    if (!this.#response) {
      return { output: input };
    }
    if (this.#invalidHandler) {
      const result = await safeParseAsync(
        this.#response,
        input,
        this.#options,
      );
      if (result.success) {
        return { output: result.output };
      }
      return this.#invalid(id, "response", result.issues);
    }
    try {
      return {
        output: await parseAsync(this.#response, input, this.#options),
      };
    } catch (cause) {
      this.#logger.error("{id} response is invalid.", { id });
      throw createHttpError(
        StatusCodes.INTERNAL_SERVER_ERROR,
        "Response body was invalid.",
        { cause },
      );
    }
  }
}
