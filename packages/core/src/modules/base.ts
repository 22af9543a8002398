/**
 * Capability interface for artifact extraction modules.
 * A module reads one device artifact store and yields typed records that the
 * caller turns into timeline events.
 */

import type { TimelineEvent } from "../types.js";

export interface ExtractionModule<TRecord> {
	readonly name: string;
	/** Returns a newly allocated array on every call. */
	run(): Promise<TRecord[]>;
	serialize(record: TRecord): TimelineEvent;
}
