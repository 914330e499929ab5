// ---------------------------------------------------------------------------
// Dashboard Status — Error Taxonomy
// Provider failures are absorbed by the fetch coordinator; only
// RequiredProviderFailedError can end a render.
// ---------------------------------------------------------------------------

import type { DegradedProvider, ProviderName, RenderWarning } from "./types";

export class ProviderTimeoutError extends Error {
	constructor(
		public readonly provider: ProviderName,
		public readonly timeoutMs: number,
	) {
		super(`Provider "${provider}" did not respond within ${timeoutMs}ms`);
		this.name = "ProviderTimeoutError";
	}
}

export class ProviderUnavailableError extends Error {
	constructor(
		public readonly provider: ProviderName,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`Provider "${provider}" unavailable: ${message}`, options);
		this.name = "ProviderUnavailableError";
	}
}

export class RequiredProviderFailedError extends Error {
	constructor(
		public readonly failures: DegradedProvider[],
		/** Warnings collected by the render before it failed */
		public readonly warnings: RenderWarning[] = [],
	) {
		super(
			`Required provider(s) failed: ${failures.map((f) => `${f.provider} (${f.reason})`).join(", ")}`,
		);
		this.name = "RequiredProviderFailedError";
	}
}

/** Program membership data may lag the catalog. Reported, never thrown. */
export class CatalogIndexStale extends Error {
	constructor(
		public readonly builtAt: Date | null,
		public readonly staleAfterMs: number,
	) {
		super(
			builtAt
				? `Program index built at ${builtAt.toISOString()} is older than ${staleAfterMs}ms`
				: "Program index has not been built yet",
		);
		this.name = "CatalogIndexStale";
	}
}

/** Normalizes anything a provider threw into one of the two provider error types. */
export function toProviderError(
	provider: ProviderName,
	err: unknown,
): ProviderTimeoutError | ProviderUnavailableError {
	if (err instanceof ProviderTimeoutError || err instanceof ProviderUnavailableError) {
		return err;
	}
	const message = err instanceof Error ? err.message : String(err);
	return new ProviderUnavailableError(provider, message, { cause: err });
}
