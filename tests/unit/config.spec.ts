// ---------------------------------------------------------------------------
// Unit Tests: Environment Configuration Loader
// ---------------------------------------------------------------------------

import { loadConfig, resetConfig } from "@/lib/config";
import { afterEach, describe, expect, it } from "vitest";

const BASE_ENV = {
	STATUS_API_BASE_URL: "https://status.example.test",
	STATUS_SERVICE_TOKEN: "aaa.bbb.ccc",
	ROLLBAR_ENABLED: "0",
};

describe("loadConfig", () => {
	afterEach(() => {
		resetConfig();
	});

	it("applies defaults for every optional variable", () => {
		const config = loadConfig(BASE_ENV);

		expect(config).toMatchObject({
			STATUS_API_RATE_LIMIT: 20,
			STATUS_API_MAX_RETRIES: 1,
			PROVIDER_TIMEOUT_MS: 2000,
			RENDER_DEADLINE_MS: 2500,
			REQUIRED_PROVIDERS: [],
			LOOKUP_CHUNK_SIZE: 500,
			CATALOG_STALE_AFTER_MS: 900000,
			ROLLBAR_ENABLED: false,
			TELEMETRY_CONSENT: false,
			ROLLBAR_ALLOW_PII: false,
		});
	});

	it("coerces numeric variables", () => {
		const config = loadConfig({ ...BASE_ENV, PROVIDER_TIMEOUT_MS: "750", LOOKUP_CHUNK_SIZE: "50" });

		expect(config.PROVIDER_TIMEOUT_MS).toBe(750);
		expect(config.LOOKUP_CHUNK_SIZE).toBe(50);
	});

	it("parses and de-duplicates REQUIRED_PROVIDERS", () => {
		const config = loadConfig({
			...BASE_ENV,
			REQUIRED_PROVIDERS: " certificates, financial,,certificates ",
		});

		expect(config.REQUIRED_PROVIDERS).toEqual(["certificates", "financial"]);
	});

	it("rejects an unknown provider name", () => {
		expect(() => loadConfig({ ...BASE_ENV, REQUIRED_PROVIDERS: "certificates,grades" })).toThrow(
			'Environment configuration invalid:\n  REQUIRED_PROVIDERS: unknown provider "grades"',
		);
	});

	it("requires the status service settings", () => {
		expect(() => loadConfig({ ROLLBAR_ENABLED: "0" })).toThrow(/STATUS_API_BASE_URL: Required/);
	});

	it("rejects a service token that is not a JWT", () => {
		expect(() => loadConfig({ ...BASE_ENV, STATUS_SERVICE_TOKEN: "not-a-jwt" })).toThrow(
			"STATUS_SERVICE_TOKEN: STATUS_SERVICE_TOKEN must be a valid JWT (header.payload.signature)",
		);
	});

	it("requires a Rollbar token when Rollbar is enabled", () => {
		expect(() => loadConfig({ ...BASE_ENV, ROLLBAR_ENABLED: "true" })).toThrow(
			"ROLLBAR_SERVER_TOKEN: ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		);
		expect(loadConfig({ ...BASE_ENV, ROLLBAR_ENABLED: "1", ROLLBAR_SERVER_TOKEN: "test-secret" }).ROLLBAR_ENABLED).toBe(
			true,
		);
	});

	it("caches the first successful load until reset", () => {
		const first = loadConfig({ ...BASE_ENV, PROVIDER_TIMEOUT_MS: "100" });

		expect(loadConfig({ ...BASE_ENV, PROVIDER_TIMEOUT_MS: "200" })).toBe(first);

		resetConfig();
		expect(loadConfig({ ...BASE_ENV, PROVIDER_TIMEOUT_MS: "200" }).PROVIDER_TIMEOUT_MS).toBe(200);
	});
});
