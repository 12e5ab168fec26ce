import type { FetchFn } from "../http.ts";

export interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
  body: RequestInit["body"];
}

export type Responder = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * In-process fetch that records every request and answers through `respond`
 */
export function fakeFetch(respond: Responder = () => jsonResponse({})) {
  const requests: RecordedRequest[] = [];

  const fetchFn: FetchFn = async (input, init) => {
    const request: RecordedRequest = {
      url: new URL(input.toString()),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: init?.body,
    };
    requests.push(request);
    return respond(request);
  };

  return { fetchFn, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Parse a JSON request body recorded by fakeFetch
 */
export function jsonBody(request: RecordedRequest | undefined): unknown {
  if (typeof request?.body !== "string") {
    throw new Error("Expected a JSON string body");
  }
  return JSON.parse(request.body);
}
