// ---------------------------------------------------------------------------
// Dashboard Status — Types
// ---------------------------------------------------------------------------

import type { z } from "zod";
import type {
	CertificateStatusSchema,
	CourseBlockStatusSchema,
	CourseModeInfoSchema,
	CourseRequirementsSchema,
	CoursewareAccessSchema,
	CreditEligibilitySchema,
	CreditEligibilityStateSchema,
	EmailPreferenceSchema,
	EnrollmentModeSchema,
	FinancialInfoSchema,
	ProgramSchema,
	RequirementDescriptorSchema,
	VerificationStatusSchema,
} from "./schemas";

export type CourseId = string;
export type LearnerId = string;
export type ProgramId = string;

export type EnrollmentMode = z.infer<typeof EnrollmentModeSchema>;

/** A learner's registration in one course. Immutable for one composition pass. */
export interface Enrollment {
	readonly courseId: CourseId;
	readonly mode: EnrollmentMode;
	readonly isActive: boolean;
}

// ── Provider payloads ─────────────────────────────────────────────────────

export type CertificateStatus = z.infer<typeof CertificateStatusSchema>;
export type CreditEligibility = z.infer<typeof CreditEligibilitySchema>;
export type CreditEligibilityState = z.infer<typeof CreditEligibilityStateSchema>;
export type CourseRequirements = z.infer<typeof CourseRequirementsSchema>;
export type RequirementDescriptor = z.infer<typeof RequirementDescriptorSchema>;
export type VerificationStatus = z.infer<typeof VerificationStatusSchema>;
export type CourseModeInfo = z.infer<typeof CourseModeInfoSchema>;
export type FinancialInfo = z.infer<typeof FinancialInfoSchema>;
export type CourseBlockStatus = z.infer<typeof CourseBlockStatusSchema>;
export type EmailPreference = z.infer<typeof EmailPreferenceSchema>;
export type CoursewareAccess = z.infer<typeof CoursewareAccessSchema>;
export type Program = z.infer<typeof ProgramSchema>;

/** Joined credit view: eligibility from the credit provider, unmet requirements from the requirements provider. */
export interface CreditStatus {
	readonly courseId: CourseId;
	readonly eligibility: CreditEligibilityState;
	readonly unmetRequirements: readonly RequirementDescriptor[];
}

// ── Absence sentinels ─────────────────────────────────────────────────────

export interface NoCertificate {
	readonly status: "none";
}

export interface CreditNotApplicable {
	readonly eligibility: "not-applicable";
}

export interface VerificationNotRequired {
	readonly state: "not-required";
}

export type CertificateView = CertificateStatus | NoCertificate;
export type CreditView = CreditStatus | CreditNotApplicable;
export type VerificationView = VerificationStatus | VerificationNotRequired;

// ── Providers ─────────────────────────────────────────────────────────────

/** Value type returned per course by each provider kind. */
export interface ProviderValueMap {
	certificates: CertificateStatus;
	credit: CreditEligibility;
	requirements: CourseRequirements;
	verification: VerificationStatus;
	financial: FinancialInfo;
	courseBlocks: CourseBlockStatus;
	emailPreferences: EmailPreference;
	courseware: CoursewareAccess;
}

export type ProviderName = keyof ProviderValueMap;

export type ProviderResultMap<V> = ReadonlyMap<CourseId, V>;

/** Raw per-provider results for one render; a degraded provider contributes an empty map. */
export type ProviderResults = {
	readonly [K in ProviderName]: ProviderResultMap<ProviderValueMap[K]>;
};

// ── Program membership ────────────────────────────────────────────────────

/** Inverted index: course → ordered, de-duplicated program ids. */
export type ProgramIndex = ReadonlyMap<CourseId, readonly ProgramId[]>;

// ── Snapshot ──────────────────────────────────────────────────────────────

/**
 * Immutable bundle of provider data captured for one render.
 * Frozen on construction and passed by reference into `compose()`.
 */
export interface ProviderSnapshot {
	readonly certificates: ReadonlyMap<CourseId, CertificateStatus>;
	readonly credit: ReadonlyMap<CourseId, CreditStatus>;
	readonly verification: ReadonlyMap<CourseId, VerificationStatus>;
	readonly courseModes: ReadonlyMap<CourseId, CourseModeInfo>;
	readonly emailOptIn: ReadonlyMap<CourseId, boolean>;
	readonly visibleCourseware: ReadonlySet<CourseId>;
	readonly emailable: ReadonlySet<CourseId>;
	readonly refundable: ReadonlySet<CourseId>;
	readonly paid: ReadonlySet<CourseId>;
	readonly blocked: ReadonlySet<CourseId>;
	readonly programs: ProgramIndex;
}

// ── Output ────────────────────────────────────────────────────────────────

/** Fully derived per-course view model. Never mutated after emission. */
export interface DashboardEntry {
	readonly enrollment: Enrollment;
	/** Index of the enrollment in the learner's original list. */
	readonly position: number;
	readonly showCoursewareLink: boolean;
	readonly certificateStatus: CertificateView;
	readonly canUnenroll: boolean;
	readonly creditStatus: CreditView;
	readonly showEmailSettings: boolean;
	readonly emailOptIn: boolean;
	readonly courseModeInfo: CourseModeInfo | null;
	readonly showRefundOption: boolean;
	readonly isPaidCourse: boolean;
	readonly isCourseBlocked: boolean;
	readonly verificationStatus: VerificationView;
	readonly unmetRequirements: readonly RequirementDescriptor[];
	readonly relatedPrograms: readonly ProgramId[];
}

// ── Diagnostics & render results ──────────────────────────────────────────

export type DegradationReason = "timeout" | "deadline" | "cancelled" | "unavailable";

export interface DegradedProvider {
	provider: ProviderName;
	reason: DegradationReason;
	message: string;
	elapsedMs: number;
}

export interface RenderWarning {
	code: "CatalogIndexStale";
	message: string;
}

interface RenderResultBase {
	renderId: string;
	durationMs: number;
	warnings: RenderWarning[];
}

export interface RenderComplete extends RenderResultBase {
	status: "complete";
	entries: readonly DashboardEntry[];
}

export interface RenderDegraded extends RenderResultBase {
	status: "degraded";
	entries: readonly DashboardEntry[];
	degradedProviders: DegradedProvider[];
}

export interface RenderFailed extends RenderResultBase {
	status: "failed";
	reason: string;
	degradedProviders: DegradedProvider[];
}

export type RenderResult = RenderComplete | RenderDegraded | RenderFailed;
