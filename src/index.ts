// ---------------------------------------------------------------------------
// Dashboard Status Composer — public API
// ---------------------------------------------------------------------------

export { ProgramIndexStore } from "./lib/catalog/index-store";
export type { ProgramCatalogSource, PublishedProgramIndex } from "./lib/catalog/index-store";
export { buildProgramIndex, lookupPrograms } from "./lib/catalog/program-index";
export { type AppConfig, loadConfig, resetConfig } from "./lib/config";
export {
	CREDIT_NOT_APPLICABLE,
	NO_CERTIFICATE,
	VERIFICATION_NOT_REQUIRED,
	canUnenroll,
	compose,
} from "./lib/dashboard/composer";
export {
	CatalogIndexStale,
	ProviderTimeoutError,
	ProviderUnavailableError,
	RequiredProviderFailedError,
} from "./lib/dashboard/errors";
export { createDashboardRenderer } from "./lib/dashboard/factory";
export type { CreateDashboardRendererOptions, DashboardRuntime } from "./lib/dashboard/factory";
export { FetchCoordinator } from "./lib/dashboard/fetch-coordinator";
export type { FetchRequest, FetchResult } from "./lib/dashboard/fetch-coordinator";
export { DashboardStatusRenderer } from "./lib/dashboard/render";
export type { RenderOptions } from "./lib/dashboard/render";
export { EnrollmentSchema, ProgramSchema } from "./lib/dashboard/schemas";
export { buildSnapshot, emptySnapshot } from "./lib/dashboard/snapshot";
export type * from "./lib/dashboard/types";
export { flushRollbar } from "./lib/monitoring/rollbar-official";
export { StatusApiError, StatusServiceClient, StatusTokenError } from "./lib/providers/client";
export { HttpStatusProvider } from "./lib/providers/http-provider";
export { InMemoryStatusProvider } from "./lib/providers/in-memory-provider";
export { PROVIDER_NAMES } from "./lib/providers/types";
export type { LookupOptions, ProviderRegistry, StatusProvider } from "./lib/providers/types";
