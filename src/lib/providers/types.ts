// ---------------------------------------------------------------------------
// Status Providers — batch lookup contract
// ---------------------------------------------------------------------------

import type {
	CourseId,
	LearnerId,
	ProviderName,
	ProviderResultMap,
	ProviderValueMap,
} from "@/lib/dashboard/types";

export interface LookupOptions {
	/** Aborted when the provider's timeout, the render deadline or the caller cancels. */
	signal: AbortSignal;
}

/**
 * One kind of per-course status fact.
 *
 * `lookup` returns an entry for every course the provider knows about;
 * courses missing from the result take the composer's defaults. Failures are
 * reported by rejecting with `ProviderTimeoutError` or `ProviderUnavailableError`.
 */
export interface StatusProvider<V> {
	readonly name: ProviderName;
	lookup(
		learnerId: LearnerId,
		courseIds: readonly CourseId[],
		options: LookupOptions,
	): Promise<ProviderResultMap<V>>;
}

/** One provider per kind, typed by the value each kind returns. */
export type ProviderRegistry = {
	readonly [K in ProviderName]: StatusProvider<ProviderValueMap[K]>;
};

export const PROVIDER_NAMES: readonly ProviderName[] = [
	"certificates",
	"credit",
	"requirements",
	"verification",
	"financial",
	"courseBlocks",
	"emailPreferences",
	"courseware",
];

export function isProviderName(value: string): value is ProviderName {
	return PROVIDER_NAMES.some((name) => name === value);
}
