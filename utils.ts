// Copyright 2018-2024 the oak authors. All rights reserved.

import type { HttpError } from "http-errors";
import { getReasonPhrase } from "http-status-codes";
import Negotiator from "negotiator";

import {
  CONTENT_TYPE_HTML,
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_TEXT,
} from "./constants.ts";

export interface PromiseWithResolvers<T> {
  promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void;
  reject: (reason?: unknown) => void;
}

/** Append a set of headers onto a response. */
export function appendHeaders(response: Response, headers: Headers): Response {
  for (const [key, value] of headers) {
    response.headers.append(key, value);
  }
  return response;
}

/**
 * Creates a promise with resolve and reject functions that can be called.
 */
export function createPromiseWithResolvers<T>(): PromiseWithResolvers<T> {
  let resolve: (value: T | PromiseLike<T>) => void = () => {};
  let reject: (reason?: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Safely decode a URI component, where if it fails, instead of throwing,
 * just returns the original string.
 */
export function decodeComponent(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch {
    return text;
  }
}

/**
 * Join path prefixes and templates with a single `/`, collapsing any
 * duplicate slashes at the joins. A trailing slash on the last part is kept.
 */
export function joinPaths(...parts: string[]): string {
  const joined = parts.filter((part) => part !== "").join("/")
    .replace(/\/{2,}/g, "/");
  if (!joined.startsWith("/")) {
    return `/${joined}`;
  }
  return joined;
}

/** The reason phrase for a status, or `"Unknown"` if it is not standard. */
export function statusText(status: number): string {
  try {
    return getReasonPhrase(status);
  } catch {
    return "Unknown";
  }
}

function escapeHtml(text: string): string {
  return text.replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

export interface ErrorResponseInit {
  /** When provided, the `accept` header is used to negotiate the body. */
  request?: Request;
  /**
   * Whether JSON or HTML is preferred when the request does not express a
   * preference.
   */
  prefer?: "json" | "html";
  /** Include the message and stack of errors which are not exposed. */
  debug?: boolean;
  headers?: HeadersInit;
}

/**
 * Convert an HTTP error into a {@linkcode Response}, negotiating a JSON, HTML
 * or plain text body. The message of an error is only included when the error
 * is marked as `expose` or `debug` is set. The stack is only included when
 * `debug` is set.
 */
export function responseFromHttpError(
  error: HttpError,
  init: ErrorResponseInit = {},
): Response {
  const { request, prefer = "json", debug = false } = init;
  const status = error.status;
  const reason = statusText(status);
  const message = error.expose || debug ? error.message : reason;
  const stack = debug ? error.stack : undefined;
  const available = prefer === "json"
    ? ["application/json", "text/html", "text/plain"]
    : ["text/html", "application/json", "text/plain"];
  const accept = request?.headers.get("accept");
  const mediaType = accept
    ? new Negotiator({ headers: { accept } }).mediaType(available) ??
      available[0]
    : available[0];
  const headers = new Headers(init.headers);
  if (error.headers) {
    for (const [key, value] of Object.entries(error.headers)) {
      headers.set(key, String(value));
    }
  }
  let body: string;
  switch (mediaType) {
    case "text/html":
      headers.set("content-type", CONTENT_TYPE_HTML);
      body = `<!DOCTYPE html><html><head><title>${
        escapeHtml(reason)
      }</title></head><body><h1>${status} - ${escapeHtml(reason)}</h1><h2>${
        escapeHtml(message)
      }</h2>${
        stack ? `<pre><code>${escapeHtml(stack)}</code></pre>` : ""
      }</body></html>`;
      break;
    case "text/plain":
      headers.set("content-type", CONTENT_TYPE_TEXT);
      body = `${status} ${reason}: ${message}${stack ? `\n\n${stack}` : ""}`;
      break;
    default:
      headers.set("content-type", CONTENT_TYPE_JSON);
      body = JSON.stringify({ status, statusText: reason, message, stack });
  }
  return new Response(body, { status, statusText: reason, headers });
}
