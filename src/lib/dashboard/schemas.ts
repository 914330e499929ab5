// ---------------------------------------------------------------------------
// Dashboard Status — Zod Validation Schemas
// Provider payloads as returned by the status service (one item per course)
// ---------------------------------------------------------------------------

import { z } from "zod";

// --- Enrollment ---

export const EnrollmentModeSchema = z.enum([
	"audit",
	"honor",
	"verified",
	"professional",
	"no-id-professional",
	"credit",
	"masters",
]);

export const EnrollmentSchema = z.object({
	courseId: z.string().min(1),
	mode: EnrollmentModeSchema,
	isActive: z.boolean(),
});

// --- Certificates ---

export const CertificateStateSchema = z.enum([
	"unavailable",
	"notpassing",
	"downloadable",
	"generating",
	"restricted",
	"auditing",
	"audit_passing",
	"audit_notpassing",
	"unverified",
]);

export const CertificateStatusSchema = z.object({
	courseId: z.string().min(1),
	status: CertificateStateSchema,
	canUnenroll: z.boolean(),
	downloadUrl: z.string().url().nullable().default(null),
	grade: z.string().nullable().default(null),
});

// --- Credit ---

export const CreditEligibilityStateSchema = z.enum([
	"eligible",
	"ineligible",
	"pending",
	"approved",
	"rejected",
	"purchased",
]);

export const CreditEligibilitySchema = z.object({
	courseId: z.string().min(1),
	eligibility: CreditEligibilityStateSchema,
});

export const RequirementDescriptorSchema = z.object({
	namespace: z.string().min(1),
	name: z.string().min(1),
	displayName: z.string(),
});

export const CourseRequirementsSchema = z.object({
	courseId: z.string().min(1),
	requirements: z.array(
		RequirementDescriptorSchema.extend({
			satisfied: z.boolean(),
		}),
	),
});

// --- Verification ---

export const VerificationStateSchema = z.enum([
	"not-started",
	"pending",
	"approved",
	"expired",
	"denied",
]);

export const VerificationStatusSchema = z.object({
	courseId: z.string().min(1),
	state: VerificationStateSchema,
	deadline: z.string().datetime({ offset: true }).nullable(),
});

// --- Financial ---

export const CourseModeInfoSchema = z.object({
	mode: EnrollmentModeSchema,
	displayName: z.string(),
	minPrice: z.number().nonnegative(),
	currency: z.string().length(3),
	expirationDatetime: z.string().datetime({ offset: true }).nullable(),
});

export const FinancialInfoSchema = z.object({
	courseId: z.string().min(1),
	isPaid: z.boolean(),
	refundEligible: z.boolean(),
	modeInfo: CourseModeInfoSchema.nullable(),
});

// --- Course blocks ---

export const CourseBlockStatusSchema = z.object({
	courseId: z.string().min(1),
	isBlocked: z.boolean(),
	reason: z.enum(["audit-expired", "policy"]).nullable(),
});

// --- Email preferences ---

export const EmailPreferenceSchema = z.object({
	courseId: z.string().min(1),
	emailEnabled: z.boolean(),
	optIn: z.boolean().default(true),
});

// --- Courseware visibility ---

export const CoursewareAccessSchema = z.object({
	courseId: z.string().min(1),
	isVisible: z.boolean(),
});

// --- Program catalog ---

export const ProgramSchema = z.object({
	programId: z.string().min(1),
	title: z.string(),
	status: z.enum(["active", "retired", "unpublished"]),
	courseIds: z.array(z.string().min(1)),
});

export const ProgramCatalogResponseSchema = z.object({
	programs: z.array(ProgramSchema),
});

// --- Batch lookup envelope ---

/**
 * Every lookup endpoint answers `{ items: [...] }`. Items are validated one by
 * one against the provider's own schema.
 */
export const LookupResponseEnvelopeSchema = z.object({
	items: z.array(z.unknown()),
});
