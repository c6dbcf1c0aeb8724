import { describe, it, expect } from 'vitest';
import { Result, isSuccess, isFailure } from '../result.js';
import { UseCaseError } from '../errors.js';

describe('Result', () => {
	describe('success / failure', () => {
		it('should create a success', () => {
			const result = Result.success('value');

			expect(isSuccess(result)).toBe(true);
			expect(isFailure(result)).toBe(false);
			expect(result.value).toBe('value');
		});

		it('should create a failure', () => {
			const error = UseCaseError.validation('INVALID', 'Invalid input');
			const result: Result<string> = Result.failure(error);

			expect(isFailure(result)).toBe(true);
			if (isFailure(result)) {
				expect(result.error).toBe(error);
			}
		});
	});

	describe('map', () => {
		it('should map success values', () => {
			const mapped = Result.map(Result.success(5), (n) => n * 2);
			expect(mapped).toEqual({ _tag: 'success', value: 10 });
		});

		it('should pass through failures', () => {
			const error = UseCaseError.validation('X', 'Y');
			const result: Result<number> = Result.failure(error);
			const mapped = Result.map(result, (n: number) => n * 2);

			expect(mapped).toEqual({ _tag: 'failure', error });
		});
	});

	describe('flatMapAsync', () => {
		it('should chain successful steps', async () => {
			const chained = await Result.flatMapAsync(Result.success(2), async (n) => Result.success(`${n}!`));
			expect(chained).toEqual({ _tag: 'success', value: '2!' });
		});

		it('should not call the step on failure', async () => {
			const error = UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found');
			let called = false;
			const result: Result<number> = Result.failure(error);
			const chained = await Result.flatMapAsync(result, async (n) => {
				called = true;
				return Result.success(n);
			});

			expect(called).toBe(false);
			expect(chained).toEqual({ _tag: 'failure', error });
		});
	});

	describe('match / unwrap', () => {
		it('should match both branches', () => {
			expect(Result.match(Result.success(1), (v) => `ok:${v}`, (e) => `err:${e.code}`)).toBe('ok:1');
			expect(
				Result.match(Result.failure(UseCaseError.conflict('DUP', 'Duplicate')), (v) => `ok:${String(v)}`, (e) => `err:${e.code}`),
			).toBe('err:DUP');
		});

		it('should throw when unwrapping a failure', () => {
			const result: Result<number> = Result.failure(UseCaseError.validation('BAD', 'Bad value'));
			expect(() => Result.unwrap(result)).toThrow('Cannot unwrap failure result: BAD - Bad value');
			expect(Result.unwrapOr(result, 7)).toBe(7);
		});
	});
});
