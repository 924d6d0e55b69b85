import type { HttpHeaders, RawHttpResponse } from '../types';

export function toArrayBuffer(text: string): ArrayBuffer {
  const bytes = new TextEncoder().encode(text);
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export function textResponse(status: number, text: string, headers: HttpHeaders = {}): RawHttpResponse {
  return { status, headers, body: toArrayBuffer(text) };
}

export function jsonResponse(status: number, body: unknown, headers: HttpHeaders = {}): RawHttpResponse {
  return textResponse(status, JSON.stringify(body), { 'content-type': 'application/json', ...headers });
}
