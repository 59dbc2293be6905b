export interface HttpRequest {
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface HttpClient {
  request(req: HttpRequest): Promise<HttpResponse>;
}

/** HttpClient over the global fetch, with a per-request timeout. */
export function createFetchClient(timeoutMs: number = 30_000): HttpClient {
  return {
    async request(req) {
      const signals = [AbortSignal.timeout(timeoutMs)];
      if (req.signal) signals.push(req.signal);
      const res = await fetch(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: anySignal(signals)
      });
      const text = await res.text();
      const hdrs: Record<string, string> = {};
      res.headers.forEach((v, k) => { hdrs[k] = v; });
      return { status: res.status, headers: hdrs, body: text };
    }
  };
}

/** Aborts as soon as any of the given signals does. */
export function anySignal(signals: readonly AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const s of signals) {
    if (s.aborted) {
      controller.abort(s.reason);
      break;
    }
    s.addEventListener("abort", () => controller.abort(s.reason), { once: true, signal: controller.signal });
  }
  return controller.signal;
}
