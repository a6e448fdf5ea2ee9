import type { RawData } from "ws";

/** Decodes a `ws` message payload (Buffer, fragments or ArrayBuffer) as UTF-8. */
export const rawDataToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
};

/** Cuts `text` to at most `maxBytes` of UTF-8 without splitting a code point. */
export const truncateUtf8 = (text: string, maxBytes: number): string => {
  if (Buffer.byteLength(text, "utf8") <= maxBytes) return text;
  let used = 0;
  let out = "";
  for (const char of text) {
    const size = Buffer.byteLength(char, "utf8");
    if (used + size > maxBytes) break;
    used += size;
    out += char;
  }
  return out;
};
