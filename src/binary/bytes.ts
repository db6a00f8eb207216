/**
 * Byte-array helpers: text encodings, digests, bitwise ops, compression.
 *
 * Digests and compression go through node:crypto and node:zlib, so output
 * interoperates with any standard MD5/SHA/DEFLATE/GZip implementation.
 */

import { createHash, randomBytes } from "node:crypto";
import { deflateRawSync, gunzipSync, gzipSync, inflateRawSync } from "node:zlib";
import { getConfig } from "../core/config";
import { InvalidArgumentError, requireSameLength } from "../core/errors";
import { log } from "../core/log";
import { BitShift, bounded, NonNegativeInt, PositiveInt } from "../core/validate";
import { frequency, topEntry } from "../generic/query";
import type { TextEncoding } from "../types";

const view = (bytes: Uint8Array): Buffer => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

const own = (buf: Buffer): Uint8Array => new Uint8Array(buf);

export const fromText = (text: string, encoding: TextEncoding = "utf8"): Uint8Array => own(Buffer.from(text, encoding));

export const toHex = (bytes: Uint8Array): string => view(bytes).toString("hex").toUpperCase();

export const toHexLower = (bytes: Uint8Array): string => view(bytes).toString("hex");

export function fromHex(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new InvalidArgumentError("Hex string must have an even number of hex digits.", "hex");
  }
  return own(Buffer.from(hex, "hex"));
}

export const toBase64 = (bytes: Uint8Array): string => view(bytes).toString("base64");

type Base64Alphabet = "base64" | "base64url";

const BASE64_TEXT: Record<Base64Alphabet, RegExp> = {
  base64: /^[A-Za-z0-9+/]*(={0,2})$/,
  base64url: /^[A-Za-z0-9_-]*(={0,2})$/
};

/**
 * Padding is optional, but when present the text must be a whole number of
 * 4-character groups. A lone trailing character never encodes a byte.
 */
function decodeBase64(text: string, alphabet: Base64Alphabet): Uint8Array {
  const m = BASE64_TEXT[alphabet].exec(text);
  const pad = m === null ? "" : m[1];
  const body = text.length - pad.length;
  if (m === null || body % 4 === 1 || (pad.length > 0 && text.length % 4 !== 0)) {
    throw new InvalidArgumentError(`Not valid ${alphabet} text.`, "text", { length: text.length });
  }
  return own(Buffer.from(text, alphabet));
}

export const fromBase64 = (text: string): Uint8Array => decodeBase64(text, "base64");

/** URL-safe alphabet (RFC 4648 section 5), unpadded. */
export const toBase64Url = (bytes: Uint8Array): string => view(bytes).toString("base64url");

export const fromBase64Url = (text: string): Uint8Array => decodeBase64(text, "base64url");

export const decode = (bytes: Uint8Array, encoding: TextEncoding): string => view(bytes).toString(encoding);

export const toUtf8String = (bytes: Uint8Array): string => decode(bytes, "utf8");

/** Bytes are masked to 7 bits. */
export const toAsciiString = (bytes: Uint8Array): string => decode(bytes, "ascii");

type Digest = "md5" | "sha1" | "sha256" | "sha512";

const digest = (alg: Digest, bytes: Uint8Array): Uint8Array => own(createHash(alg).update(bytes).digest());

export const md5 = (bytes: Uint8Array): Uint8Array => digest("md5", bytes);
export const sha1 = (bytes: Uint8Array): Uint8Array => digest("sha1", bytes);
export const sha256 = (bytes: Uint8Array): Uint8Array => digest("sha256", bytes);
export const sha512 = (bytes: Uint8Array): Uint8Array => digest("sha512", bytes);

function pairwise(a: Uint8Array, b: Uint8Array, f: (x: number, y: number) => number): Uint8Array {
  requireSameLength(a, b);
  return a.map((x, i) => f(x, b[i]));
}

export const xor = (a: Uint8Array, b: Uint8Array): Uint8Array => pairwise(a, b, (x, y) => x ^ y);
export const and = (a: Uint8Array, b: Uint8Array): Uint8Array => pairwise(a, b, (x, y) => x & y);
export const or = (a: Uint8Array, b: Uint8Array): Uint8Array => pairwise(a, b, (x, y) => x | y);

// Uint8Array.map truncates each result to 8 bits
export const not = (bytes: Uint8Array): Uint8Array => bytes.map((b) => ~b);

/** Per-byte shift; bits shifted past bit 7 are dropped. */
export function shiftLeft(bytes: Uint8Array, positions: number): Uint8Array {
  bounded(BitShift, positions, "positions");
  return bytes.map((b) => b << positions);
}

export function shiftRight(bytes: Uint8Array, positions: number): Uint8Array {
  bounded(BitShift, positions, "positions");
  return bytes.map((b) => b >> positions);
}

export const byteFrequency = (bytes: Uint8Array): Map<number, number> => frequency(bytes);

/** Ties go to the byte seen first. */
export function mostFrequentByte(bytes: Uint8Array): number {
  const top = topEntry(byteFrequency(bytes));
  if (top === undefined) throw new InvalidArgumentError("Array is empty.", "arr");
  return top[0];
}

/** Shannon entropy in bits per byte (0-8). 0 for an empty array. */
export function entropy(bytes: Uint8Array): number {
  if (bytes.length === 0) return 0;
  let h = 0;
  for (const n of byteFrequency(bytes).values()) {
    const p = n / bytes.length;
    h -= p * Math.log2(p);
  }
  return h;
}

export function gzip(bytes: Uint8Array): Uint8Array {
  const out = gzipSync(bytes, { level: getConfig().compressionLevel });
  log.debug(`gzip ${bytes.length} -> ${out.length} bytes`);
  return own(out);
}

export const gunzip = (bytes: Uint8Array): Uint8Array => own(gunzipSync(bytes));

/** Raw DEFLATE (RFC 1951), no zlib header. */
export function deflate(bytes: Uint8Array): Uint8Array {
  const out = deflateRawSync(bytes, { level: getConfig().compressionLevel });
  log.debug(`deflate ${bytes.length} -> ${out.length} bytes`);
  return own(out);
}

export const inflate = (bytes: Uint8Array): Uint8Array => own(inflateRawSync(bytes));

export function splitChunks(bytes: Uint8Array, size: number): Uint8Array[] {
  bounded(PositiveInt, size, "size");
  const out: Uint8Array[] = [];
  for (let i = 0; i < bytes.length; i += size) out.push(bytes.slice(i, i + size));
  return out;
}

/** Cryptographically strong random bytes. */
export function secureRandom(length: number): Uint8Array {
  bounded(NonNegativeInt, length, "length");
  return own(randomBytes(length));
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

export function equals(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((x, i) => x === b[i]);
}
