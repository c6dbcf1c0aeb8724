/**
 * Execution Context
 *
 * Context for a use case execution. Carries the principal, a correlation id for
 * log lines, and the caller's cancellation signal through every store call
 * made on behalf of a request.
 *
 * The signal aborts when the request deadline passes or the client goes away;
 * long-running work checks it through {@link ExecutionContext.throwIfAborted}
 * or races against it with {@link abortable}.
 */

import { randomUUID } from 'node:crypto';

/**
 * Execution context data.
 */
export interface ExecutionContext {
	/** Unique ID for this execution (generated) */
	readonly executionId: string;
	/** ID for log correlation (usually the request id) */
	readonly correlationId: string;
	/** ID of the principal performing the action, null before authentication */
	readonly principalId: string | null;
	/** When the execution was initiated */
	readonly initiatedAt: Date;
	/** Absolute deadline, null when the caller set none */
	readonly deadline: Date | null;
	/** Aborted on deadline or caller cancellation */
	readonly signal: AbortSignal;
}

export interface CreateExecutionContextOptions {
	readonly principalId?: string | null | undefined;
	readonly correlationId?: string | undefined;
	readonly timeoutMs?: number | undefined;
	readonly signal?: AbortSignal | undefined;
}

/**
 * Raised when the caller's deadline passes before the work completes.
 */
export class DeadlineExceededError extends Error {
	constructor(message = 'Operation exceeded its deadline') {
		super(message);
		this.name = 'DeadlineExceededError';
	}
}

function generateExecutionId(): string {
	return `exec-${randomUUID()}`;
}

function combineSignals(signal: AbortSignal | undefined, timeoutMs: number | undefined): AbortSignal {
	const signals: AbortSignal[] = [];
	if (signal) signals.push(signal);
	if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));
	if (signals.length === 0) return new AbortController().signal;
	if (signals.length === 1 && signals[0]) return signals[0];
	return AbortSignal.any(signals);
}

/**
 * ExecutionContext factory functions.
 */
export const ExecutionContext = {
	/**
	 * Create a new execution context for a fresh request or background job.
	 */
	create(options: CreateExecutionContextOptions = {}): ExecutionContext {
		const executionId = generateExecutionId();
		const initiatedAt = new Date();
		return {
			executionId,
			correlationId: options.correlationId ?? executionId,
			principalId: options.principalId ?? null,
			initiatedAt,
			deadline: options.timeoutMs !== undefined ? new Date(initiatedAt.getTime() + options.timeoutMs) : null,
			signal: combineSignals(options.signal, options.timeoutMs),
		};
	},

	/**
	 * Same execution, now attributed to an authenticated principal.
	 */
	withPrincipal(context: ExecutionContext, principalId: string): ExecutionContext {
		return { ...context, principalId };
	},

	/**
	 * Throw {@link DeadlineExceededError} when the context's signal has fired.
	 */
	throwIfAborted(context: Pick<ExecutionContext, 'signal'>): void {
		if (context.signal.aborted) {
			throw new DeadlineExceededError();
		}
	},
};

/**
 * Settle with `promise`, or reject with {@link DeadlineExceededError} as soon
 * as `signal` aborts. The underlying work is not cancelled; its result is
 * discarded.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
	if (!signal) return promise;
	if (signal.aborted) {
		promise.catch(() => undefined);
		return Promise.reject(new DeadlineExceededError());
	}

	return new Promise<T>((resolve, reject) => {
		const onAbort = (): void => {
			reject(new DeadlineExceededError());
		};
		signal.addEventListener('abort', onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(error);
			},
		);
	});
}
