import { base64 } from "@scure/base";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";
import { RpcTransportError } from "./errors.js";

export type HttpResponse = {
  status: number;
  body: string;
};

const HEADER_END = utf8ToBytes("\r\n\r\n");

export function basicAuthorization(user: string, password: string): string {
  return `Basic ${base64.encode(utf8ToBytes(`${user}:${password}`))}`;
}

/**
 * HTTP/1.0 so the daemon answers with a plain body and closes the connection
 * (no chunked transfer encoding, no keep-alive).
 */
export function buildHttpRequest(args: { host: string; user: string; password: string; body: string }): Uint8Array {
  const body = utf8ToBytes(args.body);
  const head =
    "POST / HTTP/1.0\r\n" +
    `Host: ${args.host}\r\n` +
    `Authorization: ${basicAuthorization(args.user, args.password)}\r\n` +
    "Content-Type: application/json\r\n" +
    `Content-Length: ${body.length}\r\n` +
    "\r\n";
  return concatBytes(utf8ToBytes(head), body);
}

function indexOfSequence(haystack: Uint8Array, needle: Uint8Array): number {
  outer: for (let i = 0; i + needle.length <= haystack.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

export function parseHttpResponse(raw: Uint8Array): HttpResponse {
  if (raw.length === 0) throw new RpcTransportError("Empty response from daemon");
  const decoder = new TextDecoder();
  const headerEnd = indexOfSequence(raw, HEADER_END);
  const head = decoder.decode(headerEnd < 0 ? raw : raw.subarray(0, headerEnd));
  const statusLine = head.split("\r\n", 1)[0] ?? "";
  const m = /^HTTP\/\d\.\d (\d{3})(?: |$)/.exec(statusLine);
  if (!m) throw new RpcTransportError("Invalid HTTP status line");
  if (headerEnd < 0) throw new RpcTransportError("No HTTP header separator found");
  return {
    status: Number(m[1]),
    body: decoder.decode(raw.subarray(headerEnd + HEADER_END.length)),
  };
}
