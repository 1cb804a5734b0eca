import type { HeaderOptions } from '../types/request.js';

/** JSON scalar. */
export type JsonPrimitive = string | number | boolean | null;

/** Any JSON value. */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/** JSON object with string keys. */
export type JsonObject = { [key: string]: JsonValue };

/** HTTP verbs used by the API. */
export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/** Values substituted into `{param}` segments of a path template. */
export type PathParams = Record<string, string | number>;

/** Query parameters; `undefined` entries are left out of the URL. */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/** Raw file content accepted for multipart uploads. */
export type FileContent = Blob | ArrayBuffer | Uint8Array;

/** File content with an explicit filename and media type. */
export interface NamedFile {
  content: FileContent;
  /** Filename sent in the multipart part, defaults to the field name. */
  filename?: string;
  /** Media type of the part, e.g. `application/pdf`. */
  contentType?: string;
}

/** A single file part of a multipart request. */
export type FilePart = FileContent | NamedFile;

/**
 * Everything the transport needs to issue one request.
 *
 * Exactly one body encoding is used per request: when `files` is set, the `json`
 * fields travel as multipart form fields next to the files.
 */
export interface RequestDescriptor {
  method: HttpMethod;
  /** Path relative to the base URL, starting with `/`, may contain `{param}` segments. */
  path: string;
  params?: PathParams;
  query?: QueryParams;
  json?: JsonObject;
  files?: Record<string, FilePart>;
}

/** Structured logger receiving request lifecycle events. `console` fits. */
export interface Logger {
  debug: (event: string, meta: Record<string, unknown>) => void;
  warn: (event: string, meta: Record<string, unknown>) => void;
}

/** Options shared by the client and the transport beyond the validated configuration. */
export interface ConnectionOptions {
  /** Extra headers sent with every request. `X-API-Key` cannot be overridden. */
  headers?: HeaderOptions;
  /** Receives `http.request.*` events. The client is silent without one. */
  logger?: Logger;
}
