export type HttpMethod = 'GET';

export type BodyChunk = Buffer | Uint8Array | string;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  ok: boolean;
  headers: {
    get(name: string): string | null;
  };
  // Lazy, finite and single-use
  body: AsyncIterable<BodyChunk>;
  /**
   * Release the connection without reading the remaining body.
   */
  discard(): void;
}

export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}
