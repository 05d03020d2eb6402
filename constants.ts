// Copyright 2018-2024 the oak authors. All rights reserved.

import { contentType } from "mime-types";

export const BODYLESS_METHODS = ["GET", "HEAD"];
export const CONTENT_TYPE_HTML = contentType("html") ||
  "text/html; charset=utf-8";
export const CONTENT_TYPE_JSON = contentType("json") ||
  "application/json; charset=utf-8";
export const CONTENT_TYPE_TEXT = contentType("text/plain") ||
  "text/plain; charset=utf-8";

/** The methods registered by `.all()`. */
export const COMMON_METHODS = [
  "GET",
  "HEAD",
  "OPTIONS",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
] as const;

/** The method a fallback route is registered with. */
export const FALLBACK_METHOD = "*";
