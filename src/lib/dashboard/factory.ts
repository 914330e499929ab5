// ---------------------------------------------------------------------------
// Dashboard Renderer Factory
// Wires configuration, providers, the program index and the coordinator
// ---------------------------------------------------------------------------

import { type ProgramCatalogSource, ProgramIndexStore } from "@/lib/catalog/index-store";
import { type AppConfig, loadConfig } from "@/lib/config";
import {
	HttpProgramCatalogSource,
	createHttpProviders,
	createStatusServiceClient,
} from "@/lib/providers/factory";
import type { ProviderRegistry } from "@/lib/providers/types";
import { FetchCoordinator } from "./fetch-coordinator";
import { DashboardStatusRenderer } from "./render";

export interface CreateDashboardRendererOptions {
	config?: AppConfig;
	/** Override the HTTP providers (e.g. in-memory providers) */
	providers?: ProviderRegistry;
	/** Override the HTTP program catalog source */
	catalogSource?: ProgramCatalogSource;
}

export interface DashboardRuntime {
	renderer: DashboardStatusRenderer;
	programIndex: ProgramIndexStore;
}

/**
 * Create a configured dashboard renderer plus the program index store it
 * reads from. The store starts empty; call `programIndex.refresh()` at boot.
 */
export function createDashboardRenderer(options: CreateDashboardRendererOptions = {}): DashboardRuntime {
	const config = options.config ?? loadConfig();

	// Lookups are not throttled: renders for different learners never wait on each other
	const providers =
		options.providers ??
		createHttpProviders(createStatusServiceClient(config, { rateLimit: null }), config.LOOKUP_CHUNK_SIZE);
	const catalogSource = options.catalogSource ?? new HttpProgramCatalogSource(createStatusServiceClient(config));

	const programIndex = new ProgramIndexStore({
		source: catalogSource,
		staleAfterMs: config.CATALOG_STALE_AFTER_MS,
	});

	const coordinator = new FetchCoordinator({
		providers,
		programIndex,
		providerTimeoutMs: config.PROVIDER_TIMEOUT_MS,
		requiredProviders: config.REQUIRED_PROVIDERS,
	});

	const renderer = new DashboardStatusRenderer({
		coordinator,
		programIndex,
		renderDeadlineMs: config.RENDER_DEADLINE_MS,
	});

	return { renderer, programIndex };
}
