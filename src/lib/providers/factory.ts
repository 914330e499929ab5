// ---------------------------------------------------------------------------
// Provider Factory
// Creates the status service client, the HTTP provider registry and the
// program catalog source from environment configuration
// ---------------------------------------------------------------------------

import type { ProgramCatalogSource } from "@/lib/catalog/index-store";
import { type AppConfig, loadConfig } from "@/lib/config";
import {
	CertificateStatusSchema,
	CourseBlockStatusSchema,
	CourseRequirementsSchema,
	CoursewareAccessSchema,
	CreditEligibilitySchema,
	EmailPreferenceSchema,
	FinancialInfoSchema,
	ProgramCatalogResponseSchema,
	VerificationStatusSchema,
} from "@/lib/dashboard/schemas";
import type { Program } from "@/lib/dashboard/types";
import { StatusServiceClient, type StatusServiceClientOptions } from "./client";
import { HttpStatusProvider } from "./http-provider";
import { getTokenManager } from "./token-manager";
import type { ProviderRegistry } from "./types";

const LOOKUP_PREFIX = "/api/service/dashboard";

/**
 * Create a configured status service client, throttled to
 * `STATUS_API_RATE_LIMIT` unless `overrides.rateLimit` says otherwise.
 */
export function createStatusServiceClient(
	config: AppConfig = loadConfig(),
	overrides: Pick<StatusServiceClientOptions, "rateLimit"> = {},
): StatusServiceClient {
	const tokenManager = getTokenManager();
	return new StatusServiceClient({
		baseUrl: config.STATUS_API_BASE_URL,
		getToken: () => tokenManager.getToken(),
		rateLimit: overrides.rateLimit === undefined ? config.STATUS_API_RATE_LIMIT : overrides.rateLimit,
		maxRetries: config.STATUS_API_MAX_RETRIES,
	});
}

/** One HTTP provider per kind, all talking to the same status service. */
export function createHttpProviders(client: StatusServiceClient, chunkSize = 500): ProviderRegistry {
	return {
		certificates: new HttpStatusProvider({
			name: "certificates",
			client,
			path: `${LOOKUP_PREFIX}/certificates`,
			itemSchema: CertificateStatusSchema,
			chunkSize,
		}),
		credit: new HttpStatusProvider({
			name: "credit",
			client,
			path: `${LOOKUP_PREFIX}/credit`,
			itemSchema: CreditEligibilitySchema,
			chunkSize,
		}),
		requirements: new HttpStatusProvider({
			name: "requirements",
			client,
			path: `${LOOKUP_PREFIX}/requirements`,
			itemSchema: CourseRequirementsSchema,
			chunkSize,
		}),
		verification: new HttpStatusProvider({
			name: "verification",
			client,
			path: `${LOOKUP_PREFIX}/verification`,
			itemSchema: VerificationStatusSchema,
			chunkSize,
		}),
		financial: new HttpStatusProvider({
			name: "financial",
			client,
			path: `${LOOKUP_PREFIX}/financial`,
			itemSchema: FinancialInfoSchema,
			chunkSize,
		}),
		courseBlocks: new HttpStatusProvider({
			name: "courseBlocks",
			client,
			path: `${LOOKUP_PREFIX}/course-blocks`,
			itemSchema: CourseBlockStatusSchema,
			chunkSize,
		}),
		emailPreferences: new HttpStatusProvider({
			name: "emailPreferences",
			client,
			path: `${LOOKUP_PREFIX}/email-preferences`,
			itemSchema: EmailPreferenceSchema,
			chunkSize,
		}),
		courseware: new HttpStatusProvider({
			name: "courseware",
			client,
			path: `${LOOKUP_PREFIX}/courseware`,
			itemSchema: CoursewareAccessSchema,
			chunkSize,
		}),
	};
}

/** Reads the full program catalog from the status service. */
export class HttpProgramCatalogSource implements ProgramCatalogSource {
	constructor(private readonly client: StatusServiceClient) {}

	async loadCatalog(): Promise<Program[]> {
		const response = await this.client.get(`${LOOKUP_PREFIX}/programs`, ProgramCatalogResponseSchema);
		return response.programs;
	}
}
