import { HttpRequest, HttpResponse } from '../../src/http/types';

export interface RecordedResponse extends HttpResponse {
  statusCode: number | undefined;
  body: unknown;
}

export function createResponse(): RecordedResponse {
  const res: RecordedResponse = {
    statusCode: undefined,
    body: undefined,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(body: unknown) {
      res.body = body;
      return res;
    },
  };
  return res;
}

export function createRequest(
  query: Record<string, unknown> = {},
  params: Record<string, string> = {}
): HttpRequest {
  return { query, params };
}
