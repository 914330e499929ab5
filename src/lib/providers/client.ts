// ---------------------------------------------------------------------------
// Status Service — HTTP Client
// Auth, throttling (p-throttle), retry (p-retry), abort signal, Zod validation
// ---------------------------------------------------------------------------

import pRetry, { AbortError } from "p-retry";
import pThrottle from "p-throttle";
import type { z } from "zod";

export interface StatusServiceClientOptions {
	baseUrl: string;
	/** Returns a valid JWT service token */
	getToken: () => Promise<string>;
	/** Allowed API path prefix (defaults to '/api/service/') */
	allowedPathPrefix?: string;
	/** Requests per second (default: 20); `null` sends every request at once */
	rateLimit?: number | null;
	/** Max retries on 5xx/network failure (default: 1) */
	maxRetries?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

export interface RequestOptions {
	signal?: AbortSignal;
}

export class StatusApiError extends Error {
	constructor(
		public readonly status: number,
		public readonly statusText: string,
		public readonly body: string,
		public readonly url: string,
	) {
		super(`Status API error ${status} (${statusText}) for ${url}`);
		this.name = "StatusApiError";
	}
}

export class StatusTokenError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "StatusTokenError";
	}
}

/**
 * HTTP client for the status service that backs the dashboard providers.
 *
 * - Bearer token authentication
 * - Optional rate limiting via p-throttle; a queued request whose signal has
 *   aborted by the time its slot comes up is dropped without being sent
 * - Retry on 5xx/network errors via p-retry (exponential, jitter); 4xx aborts at once
 * - Retry-After support for 429 responses
 * - Every attempt and every backoff stops when the caller's signal aborts
 * - Zod validation of every response
 */
export class StatusServiceClient {
	private readonly baseUrl: string;
	private readonly getToken: () => Promise<string>;
	private readonly allowedPathPrefix: string;
	private readonly maxRetries: number;
	private readonly fetchFn: typeof fetch;
	private readonly dispatch: (input: string, init: RequestInit) => Promise<Response>;

	constructor(options: StatusServiceClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.getToken = options.getToken;
		this.allowedPathPrefix = options.allowedPathPrefix ?? "/api/service/";
		this.maxRetries = options.maxRetries ?? 1;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;

		const send = (input: string, init: RequestInit) => {
			if (init.signal?.aborted) {
				return Promise.reject(new AbortError("Request aborted before it was sent"));
			}
			return this.fetchFn(input, init);
		};
		const rateLimit = options.rateLimit === undefined ? 20 : options.rateLimit;
		this.dispatch = rateLimit === null ? send : pThrottle({ limit: rateLimit, interval: 1000 })(send);
	}

	async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: RequestOptions): Promise<T> {
		return this.request("GET", path, undefined, schema, options);
	}

	async post<T>(
		path: string,
		body: unknown,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		options?: RequestOptions,
	): Promise<T> {
		return this.request("POST", path, body, schema, options);
	}

	private async request<T>(
		method: "GET" | "POST",
		path: string,
		body: unknown,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		options: RequestOptions = {},
	): Promise<T> {
		this.ensurePathAllowed(path);
		const url = `${this.baseUrl}${path}`;
		const { signal } = options;

		const response = await pRetry(
			async () => {
				const token = await this.getToken();
				this.validateToken(token);

				const headers: Record<string, string> = {
					Authorization: `Bearer ${token}`,
					Accept: "application/json",
				};
				if (body !== undefined) headers["Content-Type"] = "application/json";

				const res = await this.dispatch(url, {
					method,
					headers,
					body: body === undefined ? undefined : JSON.stringify(body),
					signal,
				});

				if (res.status === 429) {
					const retryAfter = res.headers.get("Retry-After");
					const delayMs = retryAfter ? Number.parseInt(retryAfter, 10) * 1000 : 1000;
					await this.delay(delayMs, signal);
					throw new StatusApiError(res.status, res.statusText, "", url);
				}

				if (res.status >= 500) {
					throw new StatusApiError(res.status, res.statusText, await res.text(), url);
				}

				// Auth failures and other client errors: no retry
				if (!res.ok) {
					throw new AbortError(new StatusApiError(res.status, res.statusText, await res.text(), url));
				}

				return res;
			},
			{
				retries: this.maxRetries,
				minTimeout: 100,
				factor: 2,
				randomize: true,
				signal,
			},
		);

		const json: unknown = await response.json();
		return schema.parse(json);
	}

	private validateToken(token: string): void {
		if (!token || token.trim().length === 0) {
			throw new StatusTokenError(
				"Token validation failed: getToken() returned an empty token. Ensure STATUS_SERVICE_TOKEN is configured.",
			);
		}
		const parts = token.split(".");
		if (parts.length !== 3 || parts.some((part) => !/^[A-Za-z0-9_-]+$/.test(part))) {
			throw new StatusTokenError(
				"Token validation failed: expected a JWT with three non-empty base64url segments.",
			);
		}
	}

	private delay(ms: number, signal?: AbortSignal): Promise<void> {
		return new Promise((resolve) => {
			const timer = setTimeout(resolve, ms);
			signal?.addEventListener(
				"abort",
				() => {
					clearTimeout(timer);
					resolve();
				},
				{ once: true },
			);
		});
	}

	/**
	 * Reject paths outside the allowed prefix, including ones that only get
	 * there through `.`/`..` segments or doubled slashes.
	 */
	private ensurePathAllowed(path: string): void {
		const segments: string[] = [];
		for (const seg of path.split("?")[0].split("/")) {
			if (seg === "" || seg === ".") continue;
			if (seg === ".." || seg.toLowerCase() === "%2e%2e") {
				segments.pop();
				continue;
			}
			segments.push(seg);
		}
		const normalized = `/${segments.join("/")}`;
		if (!`${normalized}/`.startsWith(this.allowedPathPrefix)) {
			throw new Error(
				`StatusServiceClient: disallowed path "${path}" (normalized: "${normalized}") — only ${this.allowedPathPrefix} endpoints are permitted`,
			);
		}
	}
}
