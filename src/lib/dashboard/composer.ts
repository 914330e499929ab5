// ---------------------------------------------------------------------------
// Status Composer — pure merge of enrollments and a provider snapshot
// ---------------------------------------------------------------------------

import { lookupPrograms } from "@/lib/catalog/program-index";
import type {
	CertificateView,
	CreditNotApplicable,
	CreditView,
	DashboardEntry,
	Enrollment,
	NoCertificate,
	ProviderSnapshot,
	RequirementDescriptor,
	VerificationNotRequired,
	VerificationView,
} from "./types";

export const NO_CERTIFICATE: NoCertificate = Object.freeze({ status: "none" });
export const CREDIT_NOT_APPLICABLE: CreditNotApplicable = Object.freeze({
	eligibility: "not-applicable",
});
export const VERIFICATION_NOT_REQUIRED: VerificationNotRequired = Object.freeze({
	state: "not-required",
});

const NO_REQUIREMENTS: readonly RequirementDescriptor[] = Object.freeze([]);

/**
 * Unenrolling stays possible until a certificate reaches a state that cannot
 * be cancelled. Missing certificate data allows it.
 */
export function canUnenroll(certificate: CertificateView): boolean {
	return certificate.status === "none" || certificate.canUnenroll;
}

function unmetRequirementsOf(credit: CreditView): readonly RequirementDescriptor[] {
	return credit.eligibility === "not-applicable" ? NO_REQUIREMENTS : credit.unmetRequirements;
}

function composeEntry(
	enrollment: Enrollment,
	position: number,
	snapshot: ProviderSnapshot,
): DashboardEntry {
	const courseId = enrollment.courseId;
	const certificateStatus: CertificateView = snapshot.certificates.get(courseId) ?? NO_CERTIFICATE;
	const creditStatus: CreditView = snapshot.credit.get(courseId) ?? CREDIT_NOT_APPLICABLE;
	const verificationStatus: VerificationView =
		snapshot.verification.get(courseId) ?? VERIFICATION_NOT_REQUIRED;

	return Object.freeze({
		enrollment,
		position,
		showCoursewareLink: snapshot.visibleCourseware.has(courseId),
		certificateStatus,
		canUnenroll: canUnenroll(certificateStatus),
		creditStatus,
		showEmailSettings: snapshot.emailable.has(courseId),
		emailOptIn: snapshot.emailOptIn.get(courseId) ?? true,
		courseModeInfo: snapshot.courseModes.get(courseId) ?? null,
		showRefundOption: snapshot.refundable.has(courseId),
		isPaidCourse: snapshot.paid.has(courseId),
		isCourseBlocked: snapshot.blocked.has(courseId),
		verificationStatus,
		unmetRequirements: unmetRequirementsOf(creditStatus),
		relatedPrograms: lookupPrograms(snapshot.programs, courseId),
	});
}

/**
 * Derive one dashboard entry per enrollment, in input order.
 *
 * Total over its inputs: a course missing from every provider still yields a
 * full entry built from the absence defaults. Display flags default to false,
 * `canUnenroll` and `emailOptIn` default to true. No entry depends on another
 * course's data, and nothing here performs I/O.
 */
export function compose(
	enrollments: readonly Enrollment[],
	snapshot: ProviderSnapshot,
): readonly DashboardEntry[] {
	return Object.freeze(enrollments.map((enrollment, i) => composeEntry(enrollment, i, snapshot)));
}
