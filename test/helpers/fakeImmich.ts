import { ImmichClient } from "../../src/upstream/immichClient.js";

export interface RecordedCall {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: Headers;
  json: unknown;
  form?: FormData;
}

type RouteHandler = (call: RecordedCall) => Response | Promise<Response>;

export const TEST_BASE_URL = "http://immich.test";
export const TEST_API_KEY = "test-secret";

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

export function emptyResponse(status = 204): Response {
  return new Response(null, { status });
}

export function assetFixture(id: string, overrides: Record<string, unknown> = {}) {
  return {
    id,
    type: "IMAGE",
    originalFileName: `${id}.jpg`,
    fileCreatedAt: "2024-05-01T10:00:00.000Z",
    isFavorite: false,
    isArchived: false,
    ...overrides
  };
}

/** In-process stand-in for the upstream REST API, reached through an injected `fetch`. */
export class FakeImmich {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, RouteHandler[]>();

  on(method: string, path: string, handler: RouteHandler): this {
    const key = `${method} ${path}`;
    this.routes.set(key, [...(this.routes.get(key) ?? []), handler]);
    return this;
  }

  onJson(method: string, path: string, body: unknown, status = 200): this {
    return this.on(method, path, () => jsonResponse(body, status));
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && call.path === path);
  }

  mutatingCalls(): RecordedCall[] {
    return this.calls.filter((call) => call.method !== "GET");
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    const body = init?.body;
    const call: RecordedCall = {
      method: init?.method ?? "GET",
      path: url.pathname,
      query: url.searchParams,
      headers: new Headers(init?.headers),
      json: typeof body === "string" ? JSON.parse(body) : undefined,
      form: body instanceof FormData ? body : undefined
    };
    this.calls.push(call);

    // Handlers registered more than once for a route answer in order; the last one repeats.
    const handlers = this.routes.get(`${call.method} ${call.path}`);
    if (!handlers || handlers.length === 0) {
      return jsonResponse({ message: "Not Found" }, 404);
    }
    const handler = handlers.length > 1 ? handlers.shift() : handlers[0];
    return handler ? handler(call) : jsonResponse({ message: "Not Found" }, 404);
  };

  client(options: { maxAttempts?: number } = {}): ImmichClient {
    return new ImmichClient({
      baseUrl: TEST_BASE_URL,
      apiKey: TEST_API_KEY,
      fetch: this.fetch,
      retry: { maxAttempts: options.maxAttempts ?? 3, baseDelayMs: 0 }
    });
  }
}
