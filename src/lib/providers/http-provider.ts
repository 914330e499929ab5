// ---------------------------------------------------------------------------
// HTTP Status Provider — batch lookups against the status service
// ---------------------------------------------------------------------------

import { ProviderUnavailableError, toProviderError } from "@/lib/dashboard/errors";
import { LookupResponseEnvelopeSchema } from "@/lib/dashboard/schemas";
import type { CourseId, LearnerId, ProviderName } from "@/lib/dashboard/types";
import { logProviderItemRejected } from "@/lib/monitoring/dashboard-logger";
import type { z } from "zod";
import type { StatusServiceClient } from "./client";
import type { LookupOptions, StatusProvider } from "./types";

export interface HttpStatusProviderOptions<V extends { courseId: CourseId }> {
	name: ProviderName;
	client: StatusServiceClient;
	/** Endpoint receiving `{ learnerId, courseIds }` */
	path: string;
	/** Schema of one item in the `items` array */
	itemSchema: z.ZodType<V, z.ZodTypeDef, unknown>;
	/** Max course ids per request (default: 500) */
	chunkSize?: number;
}

/** Split `items` into consecutive slices of at most `size` elements. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
	if (size < 1) throw new RangeError(`chunk size must be positive, got ${size}`);
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
}

function courseIdOf(raw: unknown): CourseId | null {
	if (typeof raw === "object" && raw !== null && "courseId" in raw && typeof raw.courseId === "string") {
		return raw.courseId;
	}
	return null;
}

/**
 * Looks course ids up in chunks, one request after another, and merges the
 * items into a single map. The whole lookup shares one abort signal, so the
 * coordinator's timeout bounds every chunk and every retry.
 *
 * Items are validated one by one: an invalid item is logged and skipped, so
 * its course takes the absence default while the rest of the batch is kept.
 * Items for courses that were not asked for are dropped.
 */
export class HttpStatusProvider<V extends { courseId: CourseId }> implements StatusProvider<V> {
	readonly name: ProviderName;
	private readonly client: StatusServiceClient;
	private readonly path: string;
	private readonly itemSchema: z.ZodType<V, z.ZodTypeDef, unknown>;
	private readonly chunkSize: number;

	constructor(options: HttpStatusProviderOptions<V>) {
		this.name = options.name;
		this.client = options.client;
		this.path = options.path;
		this.itemSchema = options.itemSchema;
		this.chunkSize = options.chunkSize ?? 500;
	}

	async lookup(
		learnerId: LearnerId,
		courseIds: readonly CourseId[],
		{ signal }: LookupOptions,
	): Promise<ReadonlyMap<CourseId, V>> {
		const result = new Map<CourseId, V>();
		const wanted = new Set(courseIds);

		try {
			for (const ids of chunk(courseIds, this.chunkSize)) {
				const envelope = await this.client.post(
					this.path,
					{ learnerId, courseIds: ids },
					LookupResponseEnvelopeSchema,
					{ signal },
				);
				for (const raw of envelope.items) {
					const parsed = this.itemSchema.safeParse(raw);
					if (!parsed.success) {
						logProviderItemRejected(this.name, courseIdOf(raw), parsed.error.message);
						continue;
					}
					if (wanted.has(parsed.data.courseId)) result.set(parsed.data.courseId, parsed.data);
				}
			}
		} catch (err) {
			if (signal.aborted) {
				throw new ProviderUnavailableError(this.name, "lookup aborted", { cause: err });
			}
			throw toProviderError(this.name, err);
		}

		return result;
	}
}
