/**
 * Directory Repository
 *
 * Users, organizations and teams.
 */

import { asc, eq } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { runStoreOperation } from '@tenantgate/persistence';

import {
	organizations,
	teams,
	users,
	type OrganizationRecord,
	type TeamRecord,
	type UserRecord,
} from '../schema/index.js';
import type { NewTeam, NewUser, Organization, Team, User } from '../../../domain/index.js';
import type { DirectoryStore } from '../rbac-store.js';

/**
 * Create a Directory repository.
 */
export function createDirectoryRepository(db: PostgresJsDatabase): DirectoryStore {
	return {
		getUserById(id: number, signal?: AbortSignal): Promise<User | null> {
			return runStoreOperation('users.getById', signal, async () => {
				const [record] = await db.select().from(users).where(eq(users.id, id)).limit(1);
				return record ? recordToUser(record) : null;
			});
		},

		getUserByEmail(email: string, signal?: AbortSignal): Promise<User | null> {
			return runStoreOperation('users.getByEmail', signal, async () => {
				const [record] = await db.select().from(users).where(eq(users.email, email)).limit(1);
				return record ? recordToUser(record) : null;
			});
		},

		createUser(user: NewUser, signal?: AbortSignal): Promise<User> {
			return runStoreOperation('users.create', signal, async () => {
				const [record] = await db
					.insert(users)
					.values({
						email: user.email,
						firstName: user.firstName ?? null,
						lastName: user.lastName ?? null,
						phoneNumber: user.phoneNumber ?? null,
						verified: user.verified ?? false,
						passwordHash: user.passwordHash ?? null,
					})
					.returning();
				if (!record) throw new Error('insert returned no row');
				return recordToUser(record);
			});
		},

		getOrganizationById(id: number, signal?: AbortSignal): Promise<Organization | null> {
			return runStoreOperation('organizations.getById', signal, async () => {
				const [record] = await db.select().from(organizations).where(eq(organizations.id, id)).limit(1);
				return record ? recordToOrganization(record) : null;
			});
		},

		createOrganization(name: string, signal?: AbortSignal): Promise<Organization> {
			return runStoreOperation('organizations.create', signal, async () => {
				const [record] = await db.insert(organizations).values({ name }).returning();
				if (!record) throw new Error('insert returned no row');
				return recordToOrganization(record);
			});
		},

		getTeamById(id: number, signal?: AbortSignal): Promise<Team | null> {
			return runStoreOperation('teams.getById', signal, async () => {
				const [record] = await db.select().from(teams).where(eq(teams.id, id)).limit(1);
				return record ? recordToTeam(record) : null;
			});
		},

		createTeam(team: NewTeam, signal?: AbortSignal): Promise<Team> {
			return runStoreOperation('teams.create', signal, async () => {
				const [record] = await db
					.insert(teams)
					.values({ organizationId: team.organizationId, name: team.name, description: team.description })
					.returning();
				if (!record) throw new Error('insert returned no row');
				return recordToTeam(record);
			});
		},

		listTeamsOfOrganization(organizationId: number, signal?: AbortSignal): Promise<Team[]> {
			return runStoreOperation('teams.listOfOrganization', signal, async () => {
				const records = await db
					.select()
					.from(teams)
					.where(eq(teams.organizationId, organizationId))
					.orderBy(asc(teams.id));
				return records.map(recordToTeam);
			});
		},
	};
}

function recordToUser(record: UserRecord): User {
	return {
		id: record.id,
		email: record.email,
		firstName: record.firstName,
		lastName: record.lastName,
		phoneNumber: record.phoneNumber,
		verified: record.verified,
		passwordHash: record.passwordHash,
		createdAt: record.createdAt,
	};
}

function recordToOrganization(record: OrganizationRecord): Organization {
	return { id: record.id, name: record.name, createdAt: record.createdAt };
}

function recordToTeam(record: TeamRecord): Team {
	return {
		id: record.id,
		organizationId: record.organizationId,
		name: record.name,
		description: record.description,
		createdAt: record.createdAt,
	};
}
