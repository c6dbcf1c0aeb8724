/**
 * Create Team Use Case
 *
 * Team names are unique within their organization.
 */

import type { UseCase } from '@tenantgate/application';
import { validateRequired, validateMaxLength, Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { Team } from '../../../domain/index.js';
import type { DirectoryStore } from '../../../infrastructure/persistence/index.js';

import type { CreateTeamCommand } from './command.js';

export interface CreateTeamUseCaseDeps {
	readonly store: Pick<DirectoryStore, 'getOrganizationById' | 'listTeamsOfOrganization' | 'createTeam'>;
}

export function createCreateTeamUseCase(deps: CreateTeamUseCaseDeps): UseCase<CreateTeamCommand, Team> {
	const { store } = deps;

	return {
		async execute(command: CreateTeamCommand, context: ExecutionContext): Promise<Result<Team>> {
			const { signal } = context;

			const nameResult = validateRequired(command.name, 'name', 'MISSING_REQUIRED_FIELD');
			if (Result.isFailure(nameResult)) {
				return nameResult;
			}
			const name = command.name.trim();
			const lengthResult = validateMaxLength(name, 255, 'name', 'NAME_TOO_LONG');
			if (Result.isFailure(lengthResult)) {
				return lengthResult;
			}

			const { organizationId } = command;
			const organization = await store.getOrganizationById(organizationId, signal);
			if (!organization) {
				return Result.failure(
					UseCaseError.notFound('ORGANIZATION_NOT_FOUND', 'Organization not found', { organizationId }),
				);
			}

			const existing = await store.listTeamsOfOrganization(organizationId, signal);
			if (existing.some((team) => team.name === name)) {
				return Result.failure(
					UseCaseError.conflict('TEAM_NAME_EXISTS', `Team '${name}' already exists in this organization`, {
						organizationId,
						name,
					}),
				);
			}

			const team = await store.createTeam(
				{ organizationId, name, description: command.description ?? null },
				signal,
			);
			return Result.success(team);
		},
	};
}
