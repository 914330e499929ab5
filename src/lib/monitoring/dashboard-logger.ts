// ---------------------------------------------------------------------------
// Dashboard Logging — Rollbar Integration
// Structured warnings for degraded providers, rejected items, failed renders
// and catalog lag
// ---------------------------------------------------------------------------

import { redactLearnerId } from "@/lib/monitoring/privacy";
import { serverInstance } from "@/lib/monitoring/rollbar-official";
import type { CourseId, DegradedProvider, ProviderName } from "@/lib/dashboard/types";

function renderContext(renderId: string, learnerId: string): Record<string, string> {
	return {
		renderId,
		learnerId: redactLearnerId(learnerId),
		timestamp: new Date().toISOString(),
	};
}

export function logProviderDegraded(
	renderId: string,
	learnerId: string,
	degraded: DegradedProvider,
): void {
	serverInstance.warning(`Dashboard provider degraded: ${degraded.provider}`, {
		...renderContext(renderId, learnerId),
		provider: degraded.provider,
		reason: degraded.reason,
		elapsedMs: degraded.elapsedMs,
		detail: degraded.message,
	});
}

export function logProviderItemRejected(
	provider: ProviderName,
	courseId: CourseId | null,
	issues: string,
): void {
	serverInstance.warning(`Dashboard provider item rejected: ${provider}`, {
		provider,
		courseId,
		issues,
		timestamp: new Date().toISOString(),
	});
}

export function logRenderFailed(renderId: string, learnerId: string, reason: string): void {
	serverInstance.error(`Dashboard render failed: ${reason}`, renderContext(renderId, learnerId));
}

export function logCatalogStale(builtAt: Date | null, staleAfterMs: number): void {
	serverInstance.warning("Program catalog index is stale", {
		builtAt: builtAt ? builtAt.toISOString() : null,
		staleAfterMs,
		timestamp: new Date().toISOString(),
	});
}

export function logCatalogRefreshFailed(message: string): void {
	serverInstance.warning(`Program catalog refresh failed: ${message}`, {
		timestamp: new Date().toISOString(),
	});
}
