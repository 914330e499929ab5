// ---------------------------------------------------------------------------
// Program Index Store — process-wide, read-only program membership index
// Rebuilt per catalog refresh and published by swapping a single reference.
// ---------------------------------------------------------------------------

import { CatalogIndexStale } from "@/lib/dashboard/errors";
import type { Program, ProgramIndex } from "@/lib/dashboard/types";
import { logCatalogRefreshFailed } from "@/lib/monitoring/dashboard-logger";
import { SimpleMutex } from "@/lib/utils/mutex";
import { EMPTY_PROGRAM_INDEX, buildProgramIndex } from "./program-index";

/** Source of the full program catalog (every program and its course list). */
export interface ProgramCatalogSource {
	loadCatalog(): Promise<Program[]>;
}

/** An index as published to readers. Never mutated after publication. */
export interface PublishedProgramIndex {
	readonly index: ProgramIndex;
	readonly builtAt: Date | null;
	readonly programCount: number;
}

export interface ProgramIndexStoreOptions {
	source: ProgramCatalogSource;
	/** Age after which the index is reported stale (default: 15 minutes) */
	staleAfterMs?: number;
	/** Clock (for testing) */
	now?: () => Date;
}

const UNBUILT: PublishedProgramIndex = Object.freeze({
	index: EMPTY_PROGRAM_INDEX,
	builtAt: null,
	programCount: 0,
});

export class ProgramIndexStore {
	private readonly source: ProgramCatalogSource;
	private readonly now: () => Date;
	private readonly refreshMutex = new SimpleMutex();
	private published: PublishedProgramIndex = UNBUILT;

	readonly staleAfterMs: number;

	constructor(options: ProgramIndexStoreOptions) {
		this.source = options.source;
		this.staleAfterMs = options.staleAfterMs ?? 15 * 60 * 1000;
		this.now = options.now ?? (() => new Date());
	}

	/** The currently published index. Safe to hold for the duration of a render. */
	current(): PublishedProgramIndex {
		return this.published;
	}

	isStale(at: Date = this.now()): boolean {
		const { builtAt } = this.published;
		if (builtAt === null) return true;
		return at.getTime() - builtAt.getTime() > this.staleAfterMs;
	}

	/** Describes the current staleness, or null when the index is fresh. */
	staleness(at: Date = this.now()): CatalogIndexStale | null {
		return this.isStale(at) ? new CatalogIndexStale(this.published.builtAt, this.staleAfterMs) : null;
	}

	/**
	 * Load the catalog, build a new index, then publish it.
	 * Concurrent refreshes run one after another. On failure the previous
	 * index stays published and the error propagates.
	 */
	async refresh(): Promise<PublishedProgramIndex> {
		return this.refreshMutex.runExclusive(async () => {
			const catalog = await this.source.loadCatalog();
			const next: PublishedProgramIndex = Object.freeze({
				index: buildProgramIndex(catalog),
				builtAt: this.now(),
				programCount: catalog.length,
			});
			this.published = next;
			return next;
		});
	}

	/**
	 * Start a refresh without waiting for it. Skipped while another refresh is
	 * in flight; failures are logged.
	 */
	scheduleRefresh(): void {
		if (this.refreshMutex.isLocked) return;
		this.refresh().catch((err: unknown) => {
			logCatalogRefreshFailed(err instanceof Error ? err.message : String(err));
		});
	}
}
