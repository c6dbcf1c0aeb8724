import { describe, it, expect } from 'vitest';
import { Result, UseCaseError, ExecutionContext } from '@tenantgate/domain-core';
import type { UseCase, UseCaseFactory } from '../use-case.js';
import type { Command } from '../command.js';
import { validateRequired, validateEmail } from '../validation.js';

interface InviteMemberCommand extends Command {
	readonly email: string;
	readonly displayName: string;
}

interface Member {
	readonly id: number;
	readonly email: string;
	readonly displayName: string;
}

interface MemberStore {
	findByEmail(email: string, signal?: AbortSignal): Promise<Member | null>;
	insert(member: Omit<Member, 'id'>, signal?: AbortSignal): Promise<Member>;
}

const createInviteMemberUseCase: UseCaseFactory<InviteMemberCommand, Member, { store: MemberStore }> = ({
	store,
}) => ({
	async execute(command, context) {
		const nameResult = validateRequired(command.displayName, 'displayName', 'MISSING_REQUIRED_FIELD');
		if (Result.isFailure(nameResult)) return nameResult;

		const emailResult = validateEmail(command.email);
		if (Result.isFailure(emailResult)) return emailResult;

		if (await store.findByEmail(command.email, context.signal)) {
			return Result.failure(
				UseCaseError.conflict('MEMBER_EXISTS', 'Member is already invited', { email: command.email }),
			);
		}

		const member = await store.insert({ email: command.email, displayName: command.displayName }, context.signal);
		return Result.success(member);
	},
});

function memoryStore(existing: Member[] = []) {
	const members = [...existing];
	const signals: Array<AbortSignal | undefined> = [];
	const store: MemberStore = {
		async findByEmail(email, signal) {
			signals.push(signal);
			return members.find((member) => member.email === email) ?? null;
		},
		async insert(member, signal) {
			signals.push(signal);
			const created = { ...member, id: members.length + 1 };
			members.push(created);
			return created;
		},
	};
	return { store, members, signals };
}

describe('UseCase Pattern', () => {
	const ctx = ExecutionContext.create({ principalId: 'admin@example.com' });

	it('should return the created value for a valid command', async () => {
		const { store, members } = memoryStore();
		const useCase: UseCase<InviteMemberCommand, Member> = createInviteMemberUseCase({ store });

		const result = await useCase.execute({ email: 'user@example.com', displayName: 'Test User' }, ctx);

		expect(result).toEqual({
			_tag: 'success',
			value: { id: 1, email: 'user@example.com', displayName: 'Test User' },
		});
		expect(members).toHaveLength(1);
	});

	it('should return a validation error for a missing name', async () => {
		const { store, members } = memoryStore();

		const result = await createInviteMemberUseCase({ store }).execute({ email: 'user@example.com', displayName: ' ' }, ctx);

		expect(Result.isFailure(result)).toBe(true);
		if (Result.isFailure(result)) {
			expect(result.error.type).toBe('validation');
			expect(result.error.code).toBe('MISSING_REQUIRED_FIELD');
		}
		expect(members).toEqual([]);
	});

	it('should return a validation error for an invalid email', async () => {
		const { store } = memoryStore();

		const result = await createInviteMemberUseCase({ store }).execute({ email: 'invalid-email', displayName: 'Test' }, ctx);

		expect(Result.isFailure(result) && result.error.code).toBe('INVALID_EMAIL');
	});

	it('should return a conflict for a duplicate email', async () => {
		const { store } = memoryStore([{ id: 1, email: 'user@example.com', displayName: 'Existing' }]);

		const result = await createInviteMemberUseCase({ store }).execute({ email: 'user@example.com', displayName: 'Test' }, ctx);

		expect(Result.isFailure(result)).toBe(true);
		if (Result.isFailure(result)) {
			expect(result.error.type).toBe('conflict');
			expect(UseCaseError.httpStatus(result.error)).toBe(409);
		}
	});

	it('should pass the context signal to every store call', async () => {
		const { store, signals } = memoryStore();

		await createInviteMemberUseCase({ store }).execute({ email: 'user@example.com', displayName: 'Test' }, ctx);

		expect(signals).toEqual([ctx.signal, ctx.signal]);
	});
});
