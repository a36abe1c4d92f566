// src/lib/transport.ts
import type { Transported } from "./types";
import { DecodeError } from "./errors";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/** `data:text/csv;base64` → `text/csv` */
function mimeOf(descriptor: string) {
  return descriptor.trim().replace(/^data:/i, "").replace(/;base64$/i, "");
}

function base64ToBytes(payload: string): Uint8Array {
  const s = payload.replace(/\s+/g, "");
  if (!BASE64_RE.test(s) || s.length % 4 !== 0) {
    throw new DecodeError("Payload is not valid base64");
  }
  let bin: string;
  try {
    bin = atob(s);
  } catch (e) {
    throw new DecodeError(`Payload is not valid base64: ${e instanceof Error ? e.message : String(e)}`);
  }
  const bytes = new Uint8Array(bin.length);
  for (let i = 0; i < bin.length; i++) bytes[i] = bin.charCodeAt(i);
  return bytes;
}

/**
 * Reverses the upload control's transport encoding: a content-type descriptor and a
 * base64 payload joined by the first comma (a browser data URL).
 */
export function decodeTransport(content: string): Transported {
  const comma = content.indexOf(",");
  if (comma < 0) throw new DecodeError("Missing ',' between content type and payload");
  return {
    contentType: mimeOf(content.slice(0, comma)),
    bytes: base64ToBytes(content.slice(comma + 1)),
  };
}
