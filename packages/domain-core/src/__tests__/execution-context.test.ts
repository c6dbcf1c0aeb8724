import { describe, it, expect } from 'vitest';
import { ExecutionContext, DeadlineExceededError, abortable } from '../execution-context.js';

describe('ExecutionContext', () => {
	describe('create', () => {
		it('should create context with generated execution ID', () => {
			const ctx = ExecutionContext.create({ principalId: 'admin@example.com' });

			expect(ctx.executionId).toMatch(/^exec-/);
			expect(ctx.principalId).toBe('admin@example.com');
			expect(ctx.correlationId).toBe(ctx.executionId);
			expect(ctx.deadline).toBeNull();
			expect(ctx.signal.aborted).toBe(false);
		});

		it('should keep a supplied correlation ID', () => {
			const ctx = ExecutionContext.create({ correlationId: 'req-1' });

			expect(ctx.correlationId).toBe('req-1');
			expect(ctx.principalId).toBeNull();
		});

		it('should compute the deadline from the timeout', () => {
			const ctx = ExecutionContext.create({ timeoutMs: 2000 });

			expect(ctx.deadline?.getTime()).toBe(ctx.initiatedAt.getTime() + 2000);
		});

		it('should follow the caller signal', () => {
			const controller = new AbortController();
			const ctx = ExecutionContext.create({ signal: controller.signal, timeoutMs: 60_000 });

			controller.abort();

			expect(ctx.signal.aborted).toBe(true);
			expect(() => ExecutionContext.throwIfAborted(ctx)).toThrow(DeadlineExceededError);
		});
	});

	describe('withPrincipal', () => {
		it('should keep the execution and swap the principal', () => {
			const ctx = ExecutionContext.create({ correlationId: 'req-2' });
			const authed = ExecutionContext.withPrincipal(ctx, 'u@example.com');

			expect(authed.executionId).toBe(ctx.executionId);
			expect(authed.correlationId).toBe('req-2');
			expect(authed.principalId).toBe('u@example.com');
		});
	});
});

describe('abortable', () => {
	it('should resolve with the promise value', async () => {
		const controller = new AbortController();
		await expect(abortable(Promise.resolve(3), controller.signal)).resolves.toBe(3);
	});

	it('should reject immediately with an aborted signal', async () => {
		const controller = new AbortController();
		controller.abort();
		await expect(abortable(Promise.resolve(3), controller.signal)).rejects.toBeInstanceOf(DeadlineExceededError);
	});

	it('should reject when the signal aborts first', async () => {
		const controller = new AbortController();
		const never = new Promise<number>(() => undefined);
		const pending = abortable(never, controller.signal);

		controller.abort();

		await expect(pending).rejects.toThrow('Operation exceeded its deadline');
	});

	it('should propagate the original rejection', async () => {
		await expect(abortable(Promise.reject(new Error('db down')), new AbortController().signal)).rejects.toThrow(
			'db down',
		);
	});
});
