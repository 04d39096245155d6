import fetch from 'node-fetch';
import { Readable } from 'stream';
import type { BodyChunk, HttpClient, HttpRequest, HttpResponse } from './types.js';
import { getConfig } from '../config/index.js';
import { debug } from '../utils/logger.js';

async function* emptyBody(): AsyncGenerator<BodyChunk> {
  return;
}

export class NodeFetchClient implements HttpClient {
  private readonly userAgent: string;

  constructor(userAgent: string = getConfig().http.userAgent) {
    this.userAgent = userAgent;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const { method, url, headers = {} } = request;

    debug('Sending request', { method, url, headers });

    const response = await fetch(url, {
      method,
      headers: { 'User-Agent': this.userAgent, ...headers },
      // Byte counts and ranges refer to the encoded representation
      compress: false,
    });
    const body = response.body;

    debug('Received response', { url, status: response.status });

    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      headers: response.headers,
      body: body ?? emptyBody(),
      discard: () => {
        if (body instanceof Readable) {
          body.destroy();
        }
      },
    };
  }
}

export function createHttpClient(): HttpClient {
  return new NodeFetchClient();
}
