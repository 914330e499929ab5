// ---------------------------------------------------------------------------
// Unit Tests: Status Service Client
// Mock fetch, auth, retry, Retry-After, Zod rejection, path and token guards
// ---------------------------------------------------------------------------

import { StatusApiError, StatusServiceClient, StatusTokenError } from "@/lib/providers/client";
import { StatusTokenManager, getTokenManager, resetTokenManager } from "@/lib/providers/token-manager";
import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";

const TOKEN = "aaa.bbb.ccc";
const BASE_URL = "https://status.example.test";
const ItemSchema = z.object({ id: z.string(), name: z.string() });

function createMockFetch(
	responses: Array<{ status: number; body?: unknown; headers?: Record<string, string> }>,
) {
	let callIndex = 0;
	return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
		const resp = responses[callIndex] ?? responses[responses.length - 1];
		callIndex++;
		return new Response(JSON.stringify(resp.body ?? ""), {
			status: resp.status,
			statusText: `Status ${resp.status}`,
			headers: resp.headers,
		});
	});
}

function createClient(
	fetchFn: ReturnType<typeof createMockFetch>,
	overrides: Partial<{ maxRetries: number; getToken: () => Promise<string>; baseUrl: string }> = {},
) {
	return new StatusServiceClient({
		baseUrl: overrides.baseUrl ?? BASE_URL,
		getToken: overrides.getToken ?? (async () => TOKEN),
		maxRetries: overrides.maxRetries ?? 1,
		rateLimit: 100, // high limit to avoid throttle delays in tests
		fetchFn,
	});
}

describe("StatusServiceClient", () => {
	// ── Auth Header ──────────────────────────────────────────────────────

	describe("authentication", () => {
		it("sends Authorization Bearer header with token from getToken", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: "1", name: "Test" } }]);
			const getToken = vi.fn(async () => TOKEN);
			const client = createClient(mockFetch, { getToken });

			await client.get("/api/service/ping", ItemSchema);

			expect(getToken).toHaveBeenCalledTimes(1);
			const [url, init] = mockFetch.mock.calls[0];
			expect(url).toBe("https://status.example.test/api/service/ping");
			expect(init?.method).toBe("GET");
			expect(init?.headers).toMatchObject({ Authorization: "Bearer aaa.bbb.ccc" });
		});

		it("strips trailing slashes from base URL", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: "1", name: "Test" } }]);
			const client = createClient(mockFetch, { baseUrl: `${BASE_URL}///` });

			await client.get("/api/service/ping", ItemSchema);

			expect(mockFetch.mock.calls[0][0]).toBe("https://status.example.test/api/service/ping");
		});

		it("rejects an empty token before sending anything", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: "1", name: "Test" } }]);
			const client = createClient(mockFetch, { getToken: async () => "  ", maxRetries: 0 });

			await expect(client.get("/api/service/ping", ItemSchema)).rejects.toBeInstanceOf(StatusTokenError);
			expect(mockFetch).not.toHaveBeenCalled();
		});

		it("rejects a token that is not a three-part JWT", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: "1", name: "Test" } }]);
			const client = createClient(mockFetch, { getToken: async () => "aaa.bbb", maxRetries: 0 });

			await expect(client.get("/api/service/ping", ItemSchema)).rejects.toThrow(
				"Token validation failed: expected a JWT with three non-empty base64url segments.",
			);
		});
	});

	// ── POST ─────────────────────────────────────────────────────────────

	describe("post", () => {
		it("sends a JSON body", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: "1", name: "Test" } }]);
			const client = createClient(mockFetch);

			await client.post("/api/service/lookup", { learnerId: "learner-1", courseIds: ["A"] }, ItemSchema);

			const init = mockFetch.mock.calls[0][1];
			expect(init?.method).toBe("POST");
			expect(init?.body).toBe('{"learnerId":"learner-1","courseIds":["A"]}');
			expect(init?.headers).toMatchObject({ "Content-Type": "application/json" });
		});
	});

	// ── Retry ────────────────────────────────────────────────────────────

	describe("retry", () => {
		it("retries once on a 5xx response and returns the second answer", async () => {
			const mockFetch = createMockFetch([
				{ status: 503 },
				{ status: 200, body: { id: "1", name: "Recovered" } },
			]);
			const client = createClient(mockFetch);

			const result = await client.get("/api/service/ping", ItemSchema);

			expect(result).toEqual({ id: "1", name: "Recovered" });
			expect(mockFetch).toHaveBeenCalledTimes(2);
		});

		it("gives up with StatusApiError after exhausting retries", async () => {
			const mockFetch = createMockFetch([{ status: 500 }]);
			const client = createClient(mockFetch, { maxRetries: 1 });

			const pending = client.get("/api/service/ping", ItemSchema);

			await expect(pending).rejects.toBeInstanceOf(StatusApiError);
			expect(mockFetch).toHaveBeenCalledTimes(2);
		});

		it("does not retry on a 4xx response", async () => {
			const mockFetch = createMockFetch([{ status: 404 }]);
			const client = createClient(mockFetch, { maxRetries: 3 });

			await expect(client.get("/api/service/ping", ItemSchema)).rejects.toThrow(
				"Status API error 404 (Status 404) for https://status.example.test/api/service/ping",
			);
			expect(mockFetch).toHaveBeenCalledTimes(1);
		});

		it("waits for Retry-After on 429 and then retries", async () => {
			const mockFetch = createMockFetch([
				{ status: 429, headers: { "Retry-After": "0" } },
				{ status: 200, body: { id: "1", name: "Later" } },
			]);
			const client = createClient(mockFetch);

			const result = await client.get("/api/service/ping", ItemSchema);

			expect(result.name).toBe("Later");
			expect(mockFetch).toHaveBeenCalledTimes(2);
		});
	});

	// ── Abort ────────────────────────────────────────────────────────────

	describe("abort signal", () => {
		it("stops waiting for Retry-After when the signal aborts", async () => {
			const mockFetch = createMockFetch([
				{ status: 429, headers: { "Retry-After": "10" } },
				{ status: 200, body: { id: "1", name: "Later" } },
			]);
			const client = createClient(mockFetch);
			const controller = new AbortController();

			const pending = client.get("/api/service/ping", ItemSchema, { signal: controller.signal });
			await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
			controller.abort();

			await expect(pending).rejects.toMatchObject({ name: "AbortError" });
			expect(mockFetch).toHaveBeenCalledTimes(1);
		});

		it("does not retry after the signal aborts during the backoff", async () => {
			const mockFetch = createMockFetch([
				{ status: 503 },
				{ status: 200, body: { id: "1", name: "Recovered" } },
			]);
			const client = createClient(mockFetch, { maxRetries: 3 });
			const controller = new AbortController();

			const pending = client.get("/api/service/ping", ItemSchema, { signal: controller.signal });
			await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));
			controller.abort();

			await expect(pending).rejects.toMatchObject({ name: "AbortError" });
			// longer than the largest backoff (minTimeout 100, randomized up to 2x)
			await new Promise((resolve) => setTimeout(resolve, 300));
			expect(mockFetch).toHaveBeenCalledTimes(1);
		});

		it("drops a throttled request whose signal aborted while it was queued", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: "1", name: "Test" } }]);
			const client = new StatusServiceClient({
				baseUrl: BASE_URL,
				getToken: async () => TOKEN,
				rateLimit: 1,
				fetchFn: mockFetch,
			});
			await client.get("/api/service/ping", ItemSchema);
			const controller = new AbortController();

			// queued for the next one-second window
			const pending = client.get("/api/service/ping", ItemSchema, { signal: controller.signal });
			controller.abort();

			await expect(pending).rejects.toMatchObject({ name: "AbortError" });
			expect(mockFetch).toHaveBeenCalledTimes(1);
		});

		it("sends every request at once when throttling is disabled", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: "1", name: "Test" } }]);
			const client = new StatusServiceClient({
				baseUrl: BASE_URL,
				getToken: async () => TOKEN,
				rateLimit: null,
				fetchFn: mockFetch,
			});

			const started = Date.now();
			await Promise.all(Array.from({ length: 30 }, () => client.get("/api/service/ping", ItemSchema)));

			expect(mockFetch).toHaveBeenCalledTimes(30);
			expect(Date.now() - started).toBeLessThan(1_000);
		});
	});

	// ── Validation ───────────────────────────────────────────────────────

	describe("response validation", () => {
		it("rejects a response that does not match the schema", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: { id: 1 } }]);
			const client = createClient(mockFetch);

			await expect(client.get("/api/service/ping", ItemSchema)).rejects.toBeInstanceOf(z.ZodError);
		});
	});

	// ── Path guard ───────────────────────────────────────────────────────

	describe("path guard", () => {
		it("rejects paths outside /api/service/", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: {} }]);
			const client = createClient(mockFetch);

			await expect(client.get("/admin/users", ItemSchema)).rejects.toThrow(
				'StatusServiceClient: disallowed path "/admin/users"',
			);
			expect(mockFetch).not.toHaveBeenCalled();
		});

		it("rejects paths that leave the prefix through dot segments", async () => {
			const mockFetch = createMockFetch([{ status: 200, body: {} }]);
			const client = createClient(mockFetch);

			await expect(client.get("/api/service/../../admin", ItemSchema)).rejects.toThrow(
				'(normalized: "/admin")',
			);
			expect(mockFetch).not.toHaveBeenCalled();
		});
	});
});

describe("StatusTokenManager", () => {
	afterEach(() => {
		resetTokenManager();
		vi.unstubAllEnvs();
	});

	it("returns the configured token", async () => {
		await expect(new StatusTokenManager(TOKEN).getToken()).resolves.toBe(TOKEN);
	});

	it("requires a token", () => {
		expect(() => new StatusTokenManager("")).toThrow("Service token is required");
	});

	it("builds the singleton from STATUS_SERVICE_TOKEN", async () => {
		vi.stubEnv("STATUS_SERVICE_TOKEN", TOKEN);

		const manager = getTokenManager();

		expect(getTokenManager()).toBe(manager);
		await expect(manager.getToken()).resolves.toBe(TOKEN);
	});

	it("throws when STATUS_SERVICE_TOKEN is missing", () => {
		vi.stubEnv("STATUS_SERVICE_TOKEN", "");

		expect(() => getTokenManager()).toThrow(
			"STATUS_SERVICE_TOKEN environment variable is required for status service authentication",
		);
	});
});
