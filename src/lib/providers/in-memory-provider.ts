// ---------------------------------------------------------------------------
// In-Memory Status Provider — fixed data keyed by learner
// ---------------------------------------------------------------------------

import { ProviderUnavailableError } from "@/lib/dashboard/errors";
import type { CourseId, LearnerId, ProviderName } from "@/lib/dashboard/types";
import type { LookupOptions, StatusProvider } from "./types";

export interface InMemoryStatusProviderOptions<V extends { courseId: CourseId }> {
	name: ProviderName;
	/** Items per learner */
	data: Record<LearnerId, V[]>;
	/** Artificial latency in milliseconds */
	latencyMs?: number;
}

/**
 * Serves lookups from a fixed record. Honors the abort signal, so it behaves
 * like a remote provider under timeouts and deadlines.
 */
export class InMemoryStatusProvider<V extends { courseId: CourseId }> implements StatusProvider<V> {
	readonly name: ProviderName;
	private readonly data: Record<LearnerId, V[]>;
	private readonly latencyMs: number;

	constructor(options: InMemoryStatusProviderOptions<V>) {
		this.name = options.name;
		this.data = options.data;
		this.latencyMs = options.latencyMs ?? 0;
	}

	async lookup(
		learnerId: LearnerId,
		courseIds: readonly CourseId[],
		{ signal }: LookupOptions,
	): Promise<ReadonlyMap<CourseId, V>> {
		if (this.latencyMs > 0) {
			await this.delay(this.latencyMs, signal);
		}
		if (signal.aborted) {
			throw new ProviderUnavailableError(this.name, "lookup aborted", { cause: signal.reason });
		}

		const wanted = new Set(courseIds);
		const result = new Map<CourseId, V>();
		for (const item of this.data[learnerId] ?? []) {
			if (wanted.has(item.courseId)) result.set(item.courseId, item);
		}
		return result;
	}

	private delay(ms: number, signal: AbortSignal): Promise<void> {
		return new Promise((resolve) => {
			const timer = setTimeout(resolve, ms);
			signal.addEventListener(
				"abort",
				() => {
					clearTimeout(timer);
					resolve();
				},
				{ once: true },
			);
		});
	}
}
