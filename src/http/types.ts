/**
 * The parts of an HTTP request/response the handlers touch.
 * express' Request and Response satisfy both.
 */
export interface HttpRequest {
  query: Record<string, unknown>;
  params: Record<string, string>;
}

export interface HttpResponse {
  status(code: number): HttpResponse;
  json(body: unknown): unknown;
}

export type Handler = (req: HttpRequest, res: HttpResponse) => Promise<void>;
