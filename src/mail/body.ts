import { TextDecoder } from "node:util";
import type { RawMessagePart } from "./types.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Decode a Gmail body part (base64url; standard base64 is accepted too).
 * Returns null when the input is not valid base64 or the bytes are not valid
 * text in `charset`.
 */
export function tryDecodeBase64Url(data: string, charset = "utf-8"): string | null {
  const compact = data.replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(compact)) return null;

  const unpadded = compact.replace(/=+$/, "");
  if (unpadded.length % 4 === 1) return null;

  const bytes = Buffer.from(unpadded.replace(/\+/g, "-").replace(/\//g, "_"), "base64url");
  return decodeBytes(bytes, charset);
}

/** Like tryDecodeBase64Url, but malformed input yields "". */
export function decodeBase64Url(data: string | null | undefined, charset?: string): string {
  if (!data) return "";
  return tryDecodeBase64Url(data, charset) ?? "";
}

function decodeBytes(bytes: Buffer, charset: string): string | null {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: true });
  } catch {
    // Unknown charset label
    decoder = new TextDecoder("utf-8", { fatal: true });
  }
  try {
    return decoder.decode(bytes);
  } catch {
    return null;
  }
}

/** Strip HTML tags, keeping line structure and image alt text. */
export function htmlToText(html: string): string {
  if (!html) return "";

  return html
    .replace(/<(script|style|head)\b[^>]*>[\s\S]*?<\/\1>/gi, "")
    .replace(/<img[^>]+alt=["']([^"']*)["'][^>]*>/gi, " $1 ")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|tr|li|h[1-6])>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/gi, " ")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&#(\d+);/g, (entity, code: string) => {
      const n = Number(code);
      return n <= 0x10ffff ? String.fromCodePoint(n) : entity;
    })
    .replace(/&amp;/gi, "&")
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export interface ExtractedBody {
  text: string;
  /** MIME type of the part the text came from, or null when none was found. */
  mimeType: string | null;
  /** The chosen part carried data that could not be decoded. */
  decodeFailed: boolean;
}

/**
 * Pick the body of a message: the first text/plain part with inline data
 * (depth-first), else the first text/html part converted to text.
 * Parts with a filename are attachments and are skipped.
 */
export function extractBody(payload: RawMessagePart | null | undefined): ExtractedBody {
  if (!payload) return { text: "", mimeType: null, decodeFailed: false };

  const plain = findPart(payload, "text/plain");
  const part = plain ?? findPart(payload, "text/html");
  if (!part) return { text: "", mimeType: null, decodeFailed: false };

  const mimeType = part.mimeType ?? "text/plain";
  const decoded = tryDecodeBase64Url(part.body?.data ?? "", charsetOf(part));
  if (decoded === null) return { text: "", mimeType, decodeFailed: true };

  const text = mimeType === "text/html" ? htmlToText(decoded) : decoded;
  return { text, mimeType, decodeFailed: false };
}

function findPart(part: RawMessagePart, mimeType: string): RawMessagePart | null {
  if (part.mimeType === mimeType && part.body?.data && !part.filename) {
    return part;
  }
  for (const child of part.parts ?? []) {
    const found = findPart(child, mimeType);
    if (found) return found;
  }
  return null;
}

function charsetOf(part: RawMessagePart): string {
  const contentType = part.headers?.find(
    (h) => h.name?.toLowerCase() === "content-type"
  )?.value;
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match?.[1]?.toLowerCase() ?? "utf-8";
}

/** Header value by name (case-insensitive), or "" when absent. */
export function getHeader(part: RawMessagePart | null | undefined, name: string): string {
  const lower = name.toLowerCase();
  const header = part?.headers?.find((h) => h.name?.toLowerCase() === lower);
  return header?.value ?? "";
}
