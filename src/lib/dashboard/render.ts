// ---------------------------------------------------------------------------
// Dashboard Render — fetch → compose for one learner
// ---------------------------------------------------------------------------

import type { ProgramIndexStore } from "@/lib/catalog/index-store";
import {
	logCatalogStale,
	logProviderDegraded,
	logRenderFailed,
} from "@/lib/monitoring/dashboard-logger";
import { ErrorSeverity, reportError } from "@/lib/monitoring/rollbar-official";
import { v4 as uuidv4 } from "uuid";
import { compose } from "./composer";
import { RequiredProviderFailedError } from "./errors";
import type { FetchCoordinator, FetchResult } from "./fetch-coordinator";
import type { Enrollment, LearnerId, RenderResult, RenderWarning } from "./types";

export interface DashboardRendererOptions {
	coordinator: FetchCoordinator;
	/** Refreshed in the background when a render finds it stale */
	programIndex?: ProgramIndexStore;
	/** Render budget used when the caller gives no deadline (default: 2500) */
	renderDeadlineMs?: number;
	/** Clock (for testing) */
	now?: () => number;
}

export interface RenderOptions {
	/** Absolute deadline for the whole render */
	deadline?: Date;
	/** Caller cancellation; treated like a deadline that has passed */
	signal?: AbortSignal;
}

/**
 * Renders the dashboard status for one learner.
 *
 * Each call is an independent pass: it captures its own provider snapshot and
 * shares nothing mutable with concurrent renders.
 */
export class DashboardStatusRenderer {
	private readonly coordinator: FetchCoordinator;
	private readonly programIndex?: ProgramIndexStore;
	private readonly renderDeadlineMs: number;
	private readonly now: () => number;

	constructor(options: DashboardRendererOptions) {
		this.coordinator = options.coordinator;
		this.programIndex = options.programIndex;
		this.renderDeadlineMs = options.renderDeadlineMs ?? 2500;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Fetch provider data for the learner's courses and compose one entry per
	 * enrollment, in enrollment order.
	 *
	 * Returns `complete` when every provider answered, `degraded` (with the
	 * full entry list) when some fell back to defaults, and `failed` only when
	 * a required provider degraded.
	 */
	async renderStatus(
		learnerId: LearnerId,
		enrollments: readonly Enrollment[],
		options: RenderOptions = {},
	): Promise<RenderResult> {
		const renderId = uuidv4();
		const started = this.now();
		const deadline = options.deadline ?? new Date(started + this.renderDeadlineMs);

		let fetched: FetchResult;
		try {
			fetched = await this.coordinator.fetch({
				learnerId,
				courseIds: enrollments.map((e) => e.courseId),
				deadline,
				signal: options.signal,
			});
		} catch (err) {
			if (err instanceof RequiredProviderFailedError) {
				logRenderFailed(renderId, learnerId, err.message);
				this.handleWarnings(err.warnings);
				return {
					status: "failed",
					renderId,
					durationMs: this.now() - started,
					reason: err.message,
					degradedProviders: err.failures,
					warnings: err.warnings,
				};
			}
			reportError(err instanceof Error ? err : String(err), { renderId }, ErrorSeverity.CRITICAL);
			throw err;
		}

		const { snapshot, degradedProviders, warnings } = fetched;
		for (const degraded of degradedProviders) {
			logProviderDegraded(renderId, learnerId, degraded);
		}
		this.handleWarnings(warnings);

		const entries = compose(enrollments, snapshot);
		const durationMs = this.now() - started;

		if (degradedProviders.length > 0) {
			return { status: "degraded", renderId, durationMs, entries, degradedProviders, warnings };
		}
		return { status: "complete", renderId, durationMs, entries, warnings };
	}

	/** A stale program index is logged and refreshed in the background. */
	private handleWarnings(warnings: readonly RenderWarning[]): void {
		if (!this.programIndex || !warnings.some((w) => w.code === "CatalogIndexStale")) return;
		const { builtAt } = this.programIndex.current();
		logCatalogStale(builtAt, this.programIndex.staleAfterMs);
		this.programIndex.scheduleRefresh();
	}
}
