export { NodeFetchClient, createHttpClient } from './client.js';
export type { BodyChunk, HttpClient, HttpMethod, HttpRequest, HttpResponse } from './types.js';
