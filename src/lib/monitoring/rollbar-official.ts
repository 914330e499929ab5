// ---------------------------------------------------------------------------
// Rollbar Configuration
// Singleton server instance with environment detection, test no-op,
// PII filtering, sampling rates, and structured error reporting.
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";
import { isTelemetryConsentGranted } from "./privacy";

type LogFn = (...args: unknown[]) => void;

interface RollbarTestInstance {
	critical: LogFn;
	error: LogFn;
	warning: LogFn;
	warn: LogFn;
	info: LogFn;
	debug: LogFn;
	log: LogFn;
	wait: (cb?: () => void) => void;
}

// ── Enablement rules ──────────────────────────────────────────────────────

const isTestMode =
	process.env.NODE_ENV === "test" ||
	// Vitest sets VITEST / VITEST_POOL_ID
	typeof process.env.VITEST !== "undefined";
const isDevelopment = process.env.NODE_ENV === "development";
const isExplicitlyDisabled = process.env.ROLLBAR_ENABLED === "0";

function readNumberEnv(name: string, fallback: number): number {
	const v = process.env[name];
	if (!v) return fallback;
	const n = Number(v);
	return Number.isFinite(n) ? n : fallback;
}

// ── Base configuration ────────────────────────────────────────────────────

const baseConfig = {
	// In development, disable automatic capture to reduce noise; dashboard
	// problems are still reported explicitly via reportError() / logProviderDegraded().
	captureUncaught: !isDevelopment,
	captureUnhandledRejections: !isDevelopment,
	environment: process.env.NODE_ENV || "development",
	enabled: !isExplicitlyDisabled && Boolean(process.env.ROLLBAR_SERVER_TOKEN),
};

const noopInstance: RollbarTestInstance = {
	critical: () => {},
	error: () => {},
	warning: () => {},
	warn: () => {},
	info: () => {},
	debug: () => {},
	log: () => {},
	wait: (cb?: () => void) => {
		if (typeof cb === "function") cb();
	},
};

// In test mode, export a no-op instance to avoid network calls.
export const serverInstance: Rollbar | RollbarTestInstance = isTestMode
	? noopInstance
	: new Rollbar({
			accessToken: process.env.ROLLBAR_SERVER_TOKEN || "disabled",
			...baseConfig,
			payload: {
				server: { root: process.cwd() },
			},
			// Always scrub secrets; scrub learner-identifying fields when consent is not granted
			scrubFields: [
				"password",
				"apiKey",
				"api_key",
				"secret",
				"token",
				"authorization",
				...(isTelemetryConsentGranted()
					? []
					: ["email", "learnerId", "learner_id", "user_ip", "ip_address", "person"]),
			],
		});

// ── Severity & error context ──────────────────────────────────────────────

export const ErrorSeverity = {
	CRITICAL: "critical",
	ERROR: "error",
	WARNING: "warning",
	INFO: "info",
	DEBUG: "debug",
} as const;

export type ErrorSeverityType = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

export interface ErrorContext {
	learnerId?: string;
	renderId?: string;
	provider?: string;
	timestamp?: Date;
	additionalData?: Record<string, unknown>;
}

// ── Structured error reporting with sampling ──────────────────────────────

export function reportError(
	error: Error | string,
	context?: ErrorContext,
	severity: ErrorSeverityType = ErrorSeverity.ERROR,
): void {
	if (!baseConfig.enabled) return;

	const rateAll = readNumberEnv("ROLLBAR_SAMPLE_RATE_ALL", 1);
	const rateInfo = readNumberEnv("ROLLBAR_SAMPLE_RATE_INFO", 0.05);
	const rateWarn = readNumberEnv("ROLLBAR_SAMPLE_RATE_WARN", 0.05);
	const rateError = readNumberEnv("ROLLBAR_SAMPLE_RATE_ERROR", 1);
	const rateCritical = readNumberEnv("ROLLBAR_SAMPLE_RATE_CRITICAL", 1);

	const pick = (rate: number) =>
		Math.random() < Math.max(0, Math.min(1, rate)) && Math.random() < rateAll;

	const includePII = isTelemetryConsentGranted();
	const rollbarContext: Record<string, unknown> = {
		person: includePII && context?.learnerId ? { id: context.learnerId } : undefined,
		custom: {
			renderId: context?.renderId,
			provider: context?.provider,
			timestamp: context?.timestamp?.toISOString(),
			...context?.additionalData,
		},
	};

	switch (severity) {
		case ErrorSeverity.CRITICAL:
			if (pick(rateCritical)) serverInstance.critical(error, rollbarContext);
			break;
		case ErrorSeverity.ERROR:
			if (pick(rateError)) serverInstance.error(error, rollbarContext);
			break;
		case ErrorSeverity.WARNING:
			if (pick(rateWarn)) serverInstance.warning(error, rollbarContext);
			break;
		case ErrorSeverity.INFO:
			if (pick(rateInfo)) serverInstance.info(error, rollbarContext);
			break;
		case ErrorSeverity.DEBUG:
			if (pick(rateInfo)) serverInstance.debug(error, rollbarContext);
			break;
	}
}

// ── Flush helper ──────────────────────────────────────────────────────────

export function flushRollbar(): Promise<void> {
	return new Promise((resolve) => {
		if (!baseConfig.enabled) return resolve();
		serverInstance.wait(() => resolve());
	});
}
