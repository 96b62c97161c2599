/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import { Logger } from '@salesforce/core';
import { isBoolean, isDictionary, isNumber, isString } from '@salesforce/ts-types';
import type {
	CleanupPredicate,
	Executor,
	MutationRequest,
	OperationKind,
	RecordTrace,
	RollbackMarker,
	SObjectRecord,
	TraceEffect,
} from '../types/index.js';
import { type CleanupPattern, createdWindowPredicate, idPredicate, namePatternPredicate } from './cleanupQuery.js';
import {
	classifyErrorCode,
	classifyThrown,
	errorMessageOf,
	errorMessages,
	RollbackError,
	type RollbackFailure,
	ValidationError,
} from './errors.js';
import type { RateLimiter } from './rateLimiter.js';
import { type Clock, systemClock } from './retry.js';
import { isFieldValue } from './validator.js';

const MARKER = /^(\d+)(?::(.+))?$/;

/** Encodes a trace sequence number, and optionally a backend savepoint, as a marker. */
export function createRollbackMarker(seq: number, savepoint?: string): RollbackMarker {
	if (!Number.isInteger(seq) || seq < 0) {
		throw new ValidationError(errorMessages.getMessage('error.InvalidMarker', [String(seq)]));
	}
	const marker: string = savepoint ? `${seq}:${savepoint}` : `${seq}`;
	return marker as RollbackMarker;
}

export function parseRollbackMarker(value: string): { seq: number; savepoint?: string } {
	const match = MARKER.exec(value.trim());
	if (!match) throw new ValidationError(errorMessages.getMessage('error.InvalidMarker', [value]));
	return { seq: Number(match[1]), savepoint: match[2] };
}

export type TraceInput = {
	sobject: string;
	operationKind: OperationKind;
	effect: TraceEffect;
	recordId: string;
	before?: SObjectRecord;
};

const EFFECTS: readonly string[] = ['created', 'updated', 'deleted'];
const KINDS: readonly string[] = ['Query', 'Insert', 'Update', 'Delete', 'Upsert', 'BulkImport', 'BulkExport', 'TreeImport'];

function isTraceEffect(value: unknown): value is TraceEffect {
	return isString(value) && EFFECTS.includes(value);
}

function isOperationKind(value: unknown): value is OperationKind {
	return isString(value) && KINDS.includes(value);
}

function toRecord(value: unknown): SObjectRecord | undefined {
	if (!isDictionary(value)) return undefined;
	const record: SObjectRecord = {};
	for (const [key, field] of Object.entries(value)) {
		if (!isFieldValue(field)) return undefined;
		record[key] = field;
	}
	return record;
}

/**
 * Append-only log of every record the orchestrator committed. Sequence
 * numbers follow commit acknowledgement order, which is the order rollback
 * walks backwards.
 */
export class RecordTracker {
	private readonly log: RecordTrace[] = [];
	private readonly undone = new Set<number>();
	private nextSeq = 1;

	public constructor(private readonly clock: Pick<Clock, 'now'> = systemClock) {}

	/** Rebuilds a tracker from a log written by toNdjson. */
	public static fromNdjson(text: string, clock?: Pick<Clock, 'now'>): RecordTracker {
		const tracker = new RecordTracker(clock);
		for (const [position, line] of text.split('\n').entries()) {
			if (line.trim() === '') continue;
			let parsed: unknown;
			try {
				parsed = JSON.parse(line);
			} catch {
				throw new ValidationError(errorMessages.getMessage('error.InvalidTraceLog', [position + 1]));
			}
			if (
				!isDictionary(parsed) ||
				!isNumber(parsed.seq) ||
				!isString(parsed.sobject) ||
				!isOperationKind(parsed.operationKind) ||
				!isTraceEffect(parsed.effect) ||
				!isString(parsed.recordId) ||
				!isString(parsed.timestamp)
			) {
				throw new ValidationError(errorMessages.getMessage('error.InvalidTraceLog', [position + 1]));
			}
			const before = parsed.before === undefined ? undefined : toRecord(parsed.before);
			if (parsed.before !== undefined && !before) {
				throw new ValidationError(errorMessages.getMessage('error.InvalidTraceLog', [position + 1]));
			}
			tracker.log.push(
				Object.freeze({
					seq: parsed.seq,
					sobject: parsed.sobject,
					operationKind: parsed.operationKind,
					effect: parsed.effect,
					recordId: parsed.recordId,
					timestamp: parsed.timestamp,
					before,
				})
			);
			if (isBoolean(parsed.undone) && parsed.undone) tracker.undone.add(parsed.seq);
			tracker.nextSeq = Math.max(tracker.nextSeq, parsed.seq + 1);
		}
		return tracker;
	}

	public get traces(): readonly RecordTrace[] {
		return this.log;
	}

	public record(input: TraceInput): RecordTrace {
		const trace: RecordTrace = Object.freeze({
			seq: this.nextSeq++,
			sobject: input.sobject,
			operationKind: input.operationKind,
			effect: input.effect,
			recordId: input.recordId,
			timestamp: new Date(this.clock.now()).toISOString(),
			before: input.before,
		});
		this.log.push(trace);
		return trace;
	}

	public snapshot(savepoint?: string): RollbackMarker {
		return createRollbackMarker(this.nextSeq - 1, savepoint);
	}

	/** Traces recorded after `marker`, or every trace when there is none. */
	public since(marker?: RollbackMarker | string): RecordTrace[] {
		const seq = marker === undefined ? 0 : parseRollbackMarker(marker).seq;
		return this.log.filter((trace) => trace.seq > seq);
	}

	public isUndone(trace: RecordTrace): boolean {
		return this.undone.has(trace.seq);
	}

	public markUndone(trace: RecordTrace): void {
		this.undone.add(trace.seq);
	}

	/** Ids of records this session created and has not undone. */
	public idsFor(sobject?: string, marker?: RollbackMarker | string): string[] {
		return this.since(marker)
			.filter((trace) => trace.effect === 'created' && !this.isUndone(trace))
			.filter((trace) => !sobject || trace.sobject.toLowerCase() === sobject.toLowerCase())
			.map((trace) => trace.recordId);
	}

	/**
	 * Builds deletion predicates for cleanup outside this process. Tracked-id
	 * predicates come one per object; the pattern strategies do not look at the
	 * log at all.
	 */
	public generateCleanupQuery(pattern: CleanupPattern): CleanupPredicate[] {
		switch (pattern.strategy) {
			case 'namePattern':
				return [namePatternPredicate(pattern.sobject, pattern.pattern, pattern.field)];
			case 'createdWindow':
				return [createdWindowPredicate(pattern.sobject, pattern.from, pattern.to)];
			case 'trackedIds': {
				const byObject = new Map<string, string[]>();
				for (const trace of this.since(pattern.since)) {
					if (trace.effect !== 'created' || this.isUndone(trace)) continue;
					if (pattern.sobject && trace.sobject.toLowerCase() !== pattern.sobject.toLowerCase()) continue;
					const ids = byObject.get(trace.sobject) ?? [];
					ids.push(trace.recordId);
					byObject.set(trace.sobject, ids);
				}
				return [...byObject].map(([sobject, ids]) => idPredicate(sobject, ids));
			}
		}
	}

	public toNdjson(): string {
		return this.log
			.map((trace) => JSON.stringify({ ...trace, undone: this.undone.has(trace.seq) ? true : undefined }))
			.map((line) => `${line}\n`)
			.join('');
	}
}

function compensationFor(trace: RecordTrace): { request: MutationRequest; record: SObjectRecord } | undefined {
	switch (trace.effect) {
		case 'created':
			return { request: { kind: 'Delete', sobject: trace.sobject }, record: { Id: trace.recordId } };
		case 'deleted':
			return { request: { kind: 'Undelete', sobject: trace.sobject }, record: { Id: trace.recordId } };
		case 'updated':
			return trace.before
				? { request: { kind: 'Update', sobject: trace.sobject }, record: { ...trace.before, Id: trace.recordId } }
				: undefined;
	}
}

export type RollbackSummary = {
	undone: RecordTrace[];
	skipped: number; // already undone by an earlier rollback
	usedSavepoint: boolean;
};

/**
 * Undoes everything recorded after a marker. A backend savepoint is used when
 * the marker carries one and the Executor can roll back to it; otherwise each
 * trace gets a compensating call, newest first. Every compensation is tried;
 * the ones that fail are reported together in a RollbackError.
 */
export class RollbackManager {
	private readonly logger = Logger.childFromRoot('bulkops:rollback');

	public constructor(
		private readonly tracker: RecordTracker,
		private readonly executor: Executor,
		private readonly limiter?: RateLimiter
	) {}

	public async snapshot(): Promise<RollbackMarker> {
		if (!this.executor.setSavepoint) return this.tracker.snapshot();
		return this.tracker.snapshot(await this.executor.setSavepoint());
	}

	public async rollback(marker?: RollbackMarker | string): Promise<RollbackSummary> {
		const savepoint = marker === undefined ? undefined : parseRollbackMarker(marker).savepoint;
		const pending = this.tracker.since(marker);
		const open = pending.filter((trace) => !this.tracker.isUndone(trace));
		const skipped = pending.length - open.length;

		if (open.length === 0) {
			this.logger.debug(`nothing to roll back (${skipped} trace(s) already undone)`);
			return { undone: [], skipped, usedSavepoint: false };
		}

		const newestFirst = [...open].sort((a, b) => b.seq - a.seq);

		if (savepoint && this.executor.rollbackToSavepoint) {
			try {
				await this.executor.rollbackToSavepoint(savepoint);
			} catch (error) {
				const reason = `Rolling back to savepoint ${savepoint} failed: ${errorMessageOf(error)}`;
				this.logger.warn(reason);
				throw new RollbackError(newestFirst.map((trace) => ({ trace, reason })), []);
			}
			for (const trace of open) this.tracker.markUndone(trace);
			this.logger.debug(`rolled back to savepoint ${savepoint}`);
			return { undone: open, skipped, usedSavepoint: true };
		}

		const undone: RecordTrace[] = [];
		const failures: RollbackFailure[] = [];

		for (const trace of newestFirst) {
			// eslint-disable-next-line no-await-in-loop
			const reason = await this.compensate(trace);
			if (reason === undefined) {
				this.tracker.markUndone(trace);
				undone.push(trace);
			} else {
				failures.push({ trace, reason });
			}
		}

		this.logger.debug(`rollback undid ${undone.length} trace(s), ${failures.length} failed`);
		if (failures.length > 0) throw new RollbackError(failures, undone);
		return { undone, skipped, usedSavepoint: false };
	}

	// Returns why the trace could not be undone, or undefined on success.
	private async compensate(trace: RecordTrace): Promise<string | undefined> {
		const compensation = compensationFor(trace);
		if (!compensation) return 'no before-image was captured for this update';
		const { request, record } = compensation;

		try {
			const call = (): ReturnType<Executor['runSingle']> => this.executor.runSingle(request, record);
			const result = await (this.limiter ? this.limiter.run(call) : call());
			if (result.success || classifyErrorCode(result.errorCode) === 'EntityNotFound') return undefined;
			return result.errorMessage ?? result.errorCode ?? 'compensating call failed';
		} catch (error) {
			if (classifyThrown(error) === 'EntityNotFound') return undefined;
			return errorMessageOf(error);
		}
	}
}
