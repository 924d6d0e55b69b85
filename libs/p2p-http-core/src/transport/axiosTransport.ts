import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface AxiosInstanceLike {
  request(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: string;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

function copyBytes(view: ArrayBufferView): ArrayBuffer {
  const copy = new ArrayBuffer(view.byteLength);
  new Uint8Array(copy).set(new Uint8Array(view.buffer, view.byteOffset, view.byteLength));
  return copy;
}

function toArrayBuffer(data: unknown): ArrayBuffer {
  if (data instanceof ArrayBuffer) {
    return data;
  }
  if (ArrayBuffer.isView(data)) {
    // Node hands back a Buffer, which may be a view over a shared pool.
    return copyBytes(data);
  }
  if (typeof data === 'string') {
    return copyBytes(new TextEncoder().encode(data));
  }
  return new ArrayBuffer(0);
}

/**
 * Transport over an axios (or axios-compatible) instance. Every status is
 * returned as a response; classification happens downstream.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value !== undefined && value !== null) {
        headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
      }
    }

    return { status: response.status, headers, body: toArrayBuffer(response.data) };
  };
};
