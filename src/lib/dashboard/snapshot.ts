// ---------------------------------------------------------------------------
// Provider Snapshot — joins raw provider results into the immutable value
// object the composer reads from
// ---------------------------------------------------------------------------

import { EMPTY_PROGRAM_INDEX } from "@/lib/catalog/program-index";
import type {
	CourseId,
	CourseModeInfo,
	CreditStatus,
	ProgramIndex,
	ProviderResults,
	ProviderSnapshot,
	RequirementDescriptor,
} from "./types";

/** Results of a render in which no provider answered. */
export function emptyProviderResults(): ProviderResults {
	return {
		certificates: new Map(),
		credit: new Map(),
		requirements: new Map(),
		verification: new Map(),
		financial: new Map(),
		courseBlocks: new Map(),
		emailPreferences: new Map(),
		courseware: new Map(),
	};
}

function collectWhere<V>(
	results: ReadonlyMap<CourseId, V>,
	predicate: (value: V) => boolean,
): ReadonlySet<CourseId> {
	const set = new Set<CourseId>();
	for (const [courseId, value] of results) {
		if (predicate(value)) set.add(courseId);
	}
	return set;
}

/**
 * Build a snapshot from provider results and the program index captured for
 * this render.
 *
 * A course has a `CreditStatus` only when the credit provider reported an
 * eligibility for it; its unmet requirements come from the requirements
 * provider and are empty when that provider is silent.
 */
export function buildSnapshot(
	results: ProviderResults,
	programs: ProgramIndex = EMPTY_PROGRAM_INDEX,
): ProviderSnapshot {
	const credit = new Map<CourseId, CreditStatus>();
	for (const [courseId, eligibility] of results.credit) {
		const requirements = results.requirements.get(courseId)?.requirements ?? [];
		const unmet: RequirementDescriptor[] = requirements
			.filter((r) => !r.satisfied)
			.map((r) => Object.freeze({ namespace: r.namespace, name: r.name, displayName: r.displayName }));
		credit.set(
			courseId,
			Object.freeze({
				courseId,
				eligibility: eligibility.eligibility,
				unmetRequirements: Object.freeze(unmet),
			}),
		);
	}

	const courseModes = new Map<CourseId, CourseModeInfo>();
	for (const [courseId, info] of results.financial) {
		if (info.modeInfo) courseModes.set(courseId, Object.freeze({ ...info.modeInfo }));
	}

	const emailOptIn = new Map<CourseId, boolean>();
	for (const [courseId, preference] of results.emailPreferences) {
		emailOptIn.set(courseId, preference.optIn);
	}

	return Object.freeze({
		certificates: new Map(results.certificates),
		credit,
		verification: new Map(results.verification),
		courseModes,
		emailOptIn,
		visibleCourseware: collectWhere(results.courseware, (a) => a.isVisible),
		emailable: collectWhere(results.emailPreferences, (p) => p.emailEnabled),
		refundable: collectWhere(results.financial, (f) => f.refundEligible),
		paid: collectWhere(results.financial, (f) => f.isPaid),
		blocked: collectWhere(results.courseBlocks, (b) => b.isBlocked),
		programs,
	});
}

/** Snapshot with no provider data at all; every entry composed from it is all-default. */
export function emptySnapshot(programs: ProgramIndex = EMPTY_PROGRAM_INDEX): ProviderSnapshot {
	return buildSnapshot(emptyProviderResults(), programs);
}
