// ---------------------------------------------------------------------------
// Fetch Coordinator — concurrent provider fan-out for one dashboard render
// ---------------------------------------------------------------------------

import type { ProgramIndexStore } from "@/lib/catalog/index-store";
import { EMPTY_PROGRAM_INDEX } from "@/lib/catalog/program-index";
import type { ProviderRegistry, StatusProvider } from "@/lib/providers/types";
import { ProviderTimeoutError, RequiredProviderFailedError, toProviderError } from "./errors";
import { buildSnapshot, emptyProviderResults } from "./snapshot";
import type {
	CourseId,
	DegradationReason,
	DegradedProvider,
	LearnerId,
	ProgramIndex,
	ProviderName,
	ProviderResultMap,
	ProviderSnapshot,
	RenderWarning,
} from "./types";

export interface FetchCoordinatorOptions {
	providers: ProviderRegistry;
	/** Process-wide program index; omitted → no program membership */
	programIndex?: ProgramIndexStore;
	/** Per-provider timeout in milliseconds (default: 2000) */
	providerTimeoutMs?: number;
	/** Providers whose failure fails the render (default: none) */
	requiredProviders?: readonly ProviderName[];
	/** Clock (for testing) */
	now?: () => number;
}

export interface FetchRequest {
	learnerId: LearnerId;
	courseIds: readonly CourseId[];
	/** Absolute render deadline; outstanding calls are cancelled when it passes */
	deadline: Date;
	/** Caller cancellation */
	signal?: AbortSignal;
}

export interface FetchResult {
	snapshot: ProviderSnapshot;
	degradedProviders: DegradedProvider[];
	warnings: RenderWarning[];
}

type ProviderOutcome<V> =
	| { ok: true; values: ProviderResultMap<V> }
	| { ok: false; degraded: DegradedProvider };

/** Order-preserving de-duplication. */
export function uniqueCourseIds(courseIds: readonly CourseId[]): CourseId[] {
	return [...new Set(courseIds)];
}

/**
 * Dispatches one batch lookup per provider, all at once, and waits until each
 * has answered, failed, timed out or been cancelled. A failed provider
 * contributes an empty map and a `DegradedProvider` entry; the coordinator
 * never retries.
 */
export class FetchCoordinator {
	private readonly providers: ProviderRegistry;
	private readonly programIndex?: ProgramIndexStore;
	private readonly providerTimeoutMs: number;
	private readonly requiredProviders: ReadonlySet<ProviderName>;
	private readonly now: () => number;

	constructor(options: FetchCoordinatorOptions) {
		this.providers = options.providers;
		this.programIndex = options.programIndex;
		this.providerTimeoutMs = options.providerTimeoutMs ?? 2000;
		this.requiredProviders = new Set(options.requiredProviders ?? []);
		this.now = options.now ?? Date.now;
	}

	/**
	 * @throws {RequiredProviderFailedError} when a required provider degraded
	 */
	async fetch(request: FetchRequest): Promise<FetchResult> {
		const courseIds = uniqueCourseIds(request.courseIds);
		const warnings: RenderWarning[] = [];
		const programs = this.captureProgramIndex(warnings);

		if (courseIds.length === 0) {
			const snapshot = buildSnapshot(emptyProviderResults(), programs);
			return { snapshot, degradedProviders: [], warnings };
		}

		const render = new AbortController();
		const onCallerAbort = () => render.abort("cancelled");
		const deadlineTimer = setTimeout(
			() => render.abort("deadline"),
			Math.max(0, request.deadline.getTime() - this.now()),
		);
		if (request.signal?.aborted) {
			render.abort("cancelled");
		} else {
			request.signal?.addEventListener("abort", onCallerAbort, { once: true });
		}

		try {
			const call = <V>(provider: StatusProvider<V>) =>
				this.callProvider(provider, request.learnerId, courseIds, render.signal);

			const [
				certificates,
				credit,
				requirements,
				verification,
				financial,
				courseBlocks,
				emailPreferences,
				courseware,
			] = await Promise.all([
				call(this.providers.certificates),
				call(this.providers.credit),
				call(this.providers.requirements),
				call(this.providers.verification),
				call(this.providers.financial),
				call(this.providers.courseBlocks),
				call(this.providers.emailPreferences),
				call(this.providers.courseware),
			]);

			const degradedProviders: DegradedProvider[] = [];
			const valuesOf = <V>(outcome: ProviderOutcome<V>): ProviderResultMap<V> => {
				if (outcome.ok) return outcome.values;
				degradedProviders.push(outcome.degraded);
				return new Map<CourseId, V>();
			};

			const snapshot = buildSnapshot(
				{
					certificates: valuesOf(certificates),
					credit: valuesOf(credit),
					requirements: valuesOf(requirements),
					verification: valuesOf(verification),
					financial: valuesOf(financial),
					courseBlocks: valuesOf(courseBlocks),
					emailPreferences: valuesOf(emailPreferences),
					courseware: valuesOf(courseware),
				},
				programs,
			);

			const requiredFailures = degradedProviders.filter((d) => this.requiredProviders.has(d.provider));
			if (requiredFailures.length > 0) {
				throw new RequiredProviderFailedError(requiredFailures, warnings);
			}

			return { snapshot, degradedProviders, warnings };
		} finally {
			clearTimeout(deadlineTimer);
			request.signal?.removeEventListener("abort", onCallerAbort);
		}
	}

	private captureProgramIndex(warnings: RenderWarning[]): ProgramIndex {
		if (!this.programIndex) return EMPTY_PROGRAM_INDEX;
		const stale = this.programIndex.staleness();
		if (stale) {
			warnings.push({ code: "CatalogIndexStale", message: stale.message });
		}
		return this.programIndex.current().index;
	}

	/**
	 * Runs one provider lookup. Resolves (never rejects) as soon as the lookup
	 * settles, the per-provider timeout fires, or the render is aborted;
	 * whichever comes first wins and aborts the lookup's own signal.
	 */
	private callProvider<V>(
		provider: StatusProvider<V>,
		learnerId: LearnerId,
		courseIds: readonly CourseId[],
		renderSignal: AbortSignal,
	): Promise<ProviderOutcome<V>> {
		const started = this.now();
		const controller = new AbortController();

		return new Promise((resolve) => {
			let settled = false;

			const degrade = (reason: DegradationReason, message: string) => {
				finish({
					ok: false,
					degraded: { provider: provider.name, reason, message, elapsedMs: this.now() - started },
				});
			};

			const onRenderAbort = () => {
				const reason: DegradationReason = renderSignal.reason === "cancelled" ? "cancelled" : "deadline";
				degrade(reason, `Provider "${provider.name}" abandoned: render ${reason}`);
			};

			const timer = setTimeout(() => {
				degrade("timeout", new ProviderTimeoutError(provider.name, this.providerTimeoutMs).message);
			}, this.providerTimeoutMs);

			function finish(outcome: ProviderOutcome<V>) {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				renderSignal.removeEventListener("abort", onRenderAbort);
				if (!outcome.ok) controller.abort(outcome.degraded.reason);
				resolve(outcome);
			}

			if (renderSignal.aborted) {
				onRenderAbort();
				return;
			}
			renderSignal.addEventListener("abort", onRenderAbort, { once: true });

			const fail = (err: unknown) => {
				const error = toProviderError(provider.name, err);
				degrade(error instanceof ProviderTimeoutError ? "timeout" : "unavailable", error.message);
			};

			let lookup: Promise<ProviderResultMap<V>>;
			try {
				lookup = provider.lookup(learnerId, courseIds, { signal: controller.signal });
			} catch (err) {
				fail(err);
				return;
			}
			lookup.then((values) => finish({ ok: true, values }), fail);
		});
	}
}
