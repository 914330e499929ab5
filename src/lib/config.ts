// ---------------------------------------------------------------------------
// Environment Configuration Loader
// Validates all env vars at startup using Zod
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Prod     │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 1        │ 0        │ 1        │
// │ TELEMETRY_CONSENT            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_ALLOW_PII            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_SAMPLE_RATE_WARN     │ 1        │ —        │ 0.05     │
// │ PROVIDER_TIMEOUT_MS          │ 2000     │ 2000     │ 2000     │
// │ RENDER_DEADLINE_MS           │ 2500     │ 2500     │ 2500     │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// * Set to 1 only with explicit learner consent.
// — Not applicable (Rollbar is disabled in CI).
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { ProviderName } from "./dashboard/types";
import { isProviderName } from "./providers/types";

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `"true"`. Falsy values: `"0"`, `"false"`.
 * Anything else fails validation.
 */
const envBool = (defaultValue: boolean) =>
	z
		.preprocess((v) => {
			if (v == null || v === "") return undefined;
			if (v === "1" || v === "true") return true;
			if (v === "0" || v === "false") return false;
			return v;
		}, z.boolean().optional())
		.transform((v) => v ?? defaultValue);

/** Comma-separated provider names, e.g. `certificates,financial`. */
const providerList = z
	.string()
	.default("")
	.transform((raw, ctx): ProviderName[] => {
		const names: ProviderName[] = [];
		for (const part of raw.split(",").map((p) => p.trim()).filter(Boolean)) {
			if (!isProviderName(part)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown provider "${part}"` });
				return z.NEVER;
			}
			if (!names.includes(part)) names.push(part);
		}
		return names;
	});

const EnvSchema = z
	.object({
		// Status service
		STATUS_API_BASE_URL: z.string().url(),
		// Service token must be a JWT (three base64url-encoded parts separated by dots)
		STATUS_SERVICE_TOKEN: z
			.string()
			.min(1)
			.refine(
				(token) => {
					const parts = token.split(".");
					return parts.length === 3 && parts.every((p) => /^[A-Za-z0-9_-]+$/.test(p));
				},
				{ message: "STATUS_SERVICE_TOKEN must be a valid JWT (header.payload.signature)" },
			),
		// Applies to catalog loads; provider lookups are unthrottled
		STATUS_API_RATE_LIMIT: z.coerce.number().int().positive().default(20),
		STATUS_API_MAX_RETRIES: z.coerce.number().int().nonnegative().default(1),

		// Fan-out
		PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
		RENDER_DEADLINE_MS: z.coerce.number().int().positive().default(2500),
		REQUIRED_PROVIDERS: providerList,
		LOOKUP_CHUNK_SIZE: z.coerce.number().int().positive().default(500),

		// Program catalog
		CATALOG_STALE_AFTER_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),

		// Rollbar
		ROLLBAR_SERVER_TOKEN: z.string().default(""),
		ROLLBAR_ENABLED: envBool(true),
		ROLLBAR_SAMPLE_RATE_ALL: z.coerce.number().min(0).max(1).default(1),
		ROLLBAR_SAMPLE_RATE_INFO: z.coerce.number().min(0).max(1).default(0.05),
		ROLLBAR_SAMPLE_RATE_WARN: z.coerce.number().min(0).max(1).default(0.05),
		ROLLBAR_SAMPLE_RATE_ERROR: z.coerce.number().min(0).max(1).default(1),
		ROLLBAR_SAMPLE_RATE_CRITICAL: z.coerce.number().min(0).max(1).default(1),

		// Privacy
		TELEMETRY_CONSENT: envBool(false),
		ROLLBAR_ALLOW_PII: envBool(false),
	})
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;

let _config: AppConfig | null = null;

/**
 * Load and validate environment configuration.
 * Throws a descriptive error if any required env var is missing or invalid.
 * Result is cached after first successful load.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (_config) return _config;

	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
		throw new Error(`Environment configuration invalid:\n${issues}`);
	}

	_config = result.data;
	return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}
