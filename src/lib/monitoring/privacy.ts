// ---------------------------------------------------------------------------
// Privacy & consent helpers for telemetry/monitoring.
// Default: no learner identifiers attached unless explicit consent.
// ---------------------------------------------------------------------------

/**
 * Returns whether telemetry consent is granted.
 * Environment-driven; read on every call so tests can toggle it.
 */
export function isTelemetryConsentGranted(): boolean {
	return process.env.TELEMETRY_CONSENT === "1" || process.env.ROLLBAR_ALLOW_PII === "1";
}

/** Learner ids are personal data; replace them unless consent is granted. */
export function redactLearnerId(learnerId: string): string {
	return isTelemetryConsentGranted() ? learnerId : "[redacted]";
}
