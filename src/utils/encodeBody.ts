import type { FileContent, FilePart, JsonObject, JsonValue } from '../core/types.js';

/** Serialized request body plus the headers it requires. */
export interface EncodedBody {
  body?: RequestInit['body'];
  headers: Record<string, string>;
}

function isFileContent(part: FilePart): part is FileContent {
  return part instanceof Blob || part instanceof ArrayBuffer || part instanceof Uint8Array;
}

function toBlob(content: FileContent, contentType?: string): Blob {
  if (content instanceof Blob && (contentType === undefined || content.type === contentType)) {
    return content;
  }

  if (content instanceof Blob) {
    return new Blob([content], { type: contentType });
  }

  const bytes = content instanceof Uint8Array ? Uint8Array.from(content) : new Uint8Array(content);
  return new Blob([bytes], contentType ? { type: contentType } : undefined);
}

/**
 * Turns a JSON value into a multipart form field.
 * Strings travel as-is, nested structures as JSON, `null` is left out.
 */
function toFormValue(value: JsonValue): string | null {
  if (value === null) {
    return null;
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}

/**
 * Picks the request encoding.
 *
 * - `files` given: a `FormData` body carrying the JSON fields and the files. No
 *   `Content-Type` is set so fetch can add the multipart boundary.
 * - otherwise `json` given (even `{}`): JSON text with `Content-Type: application/json`.
 * - otherwise no body.
 */
export function encodeBody(json?: JsonObject, files?: Record<string, FilePart>): EncodedBody {
  if (files) {
    const form = new FormData();
    for (const [field, value] of Object.entries(json ?? {})) {
      const formValue = toFormValue(value);
      if (formValue !== null) {
        form.append(field, formValue);
      }
    }

    for (const [field, part] of Object.entries(files)) {
      if (isFileContent(part)) {
        form.append(field, toBlob(part), field);
        continue;
      }

      form.append(field, toBlob(part.content, part.contentType), part.filename ?? field);
    }

    return { body: form, headers: {} };
  }

  if (json !== undefined) {
    return { body: JSON.stringify(json), headers: { 'Content-Type': 'application/json' } };
  }

  return { headers: {} };
}
