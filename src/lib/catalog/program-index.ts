// ---------------------------------------------------------------------------
// Program Index — Pure inversion of the program catalog
// ---------------------------------------------------------------------------

import type { CourseId, Program, ProgramId, ProgramIndex } from "../dashboard/types";

const EMPTY_PROGRAMS: readonly ProgramId[] = Object.freeze([]);

/**
 * Invert the program catalog into a course → program ids index.
 *
 * Program ids keep catalog order and appear once per course even when a
 * program lists the same course twice. Only `active` programs contribute.
 * Every program list in the index is frozen.
 */
export function buildProgramIndex(catalog: readonly Program[]): ProgramIndex {
	const working = new Map<CourseId, ProgramId[]>();

	for (const program of catalog) {
		if (program.status !== "active") continue;
		for (const courseId of program.courseIds) {
			const programs = working.get(courseId);
			if (!programs) {
				working.set(courseId, [program.programId]);
			} else if (!programs.includes(program.programId)) {
				programs.push(program.programId);
			}
		}
	}

	const index = new Map<CourseId, readonly ProgramId[]>();
	for (const [courseId, programs] of working) {
		index.set(courseId, Object.freeze(programs));
	}
	return index;
}

/** Programs a course contributes to; empty when the course is in no program. */
export function lookupPrograms(index: ProgramIndex, courseId: CourseId): readonly ProgramId[] {
	return index.get(courseId) ?? EMPTY_PROGRAMS;
}

export const EMPTY_PROGRAM_INDEX: ProgramIndex = new Map();
