/**
 * First-run setup: make sure a `super_admin` role exists and that the
 * configured account holds it globally.
 *
 * Safe to run on every start; existing rows are left as they are, and an
 * existing user's password is never changed.
 */

import type { Logger } from '@tenantgate/logging';

import { SUPER_ADMIN, type Role } from '../domain/index.js';
import type { DirectoryStore, RoleStore } from '../infrastructure/persistence/index.js';
import type { PasswordHasher } from '../auth/index.js';

export interface BootstrapSuperAdminDeps {
	readonly store: Pick<
		RoleStore & DirectoryStore,
		'getRoleByName' | 'createRole' | 'getUserByEmail' | 'createUser' | 'assignGlobalRole'
	>;
	readonly passwords: Pick<PasswordHasher, 'hash'>;
	readonly logger: Logger;
}

export interface BootstrapAdmin {
	readonly email: string;
	readonly password: string;
}

export interface BootstrapOutcome {
	readonly roleCreated: boolean;
	readonly userCreated: boolean;
	readonly roleAssigned: boolean;
}

async function ensureSuperAdminRole(store: BootstrapSuperAdminDeps['store']): Promise<[Role, boolean]> {
	const existing = await store.getRoleByName(SUPER_ADMIN);
	if (existing) return [existing, false];

	const role = await store.createRole({
		name: SUPER_ADMIN,
		slug: 'super-admin',
		description: 'Unrestricted access to every route',
		scope: 'organization',
		inheritsRoleId: null,
	});
	return [role, true];
}

export async function bootstrapSuperAdmin(
	deps: BootstrapSuperAdminDeps,
	admin: BootstrapAdmin,
): Promise<BootstrapOutcome> {
	const { store, passwords, logger } = deps;

	const [role, roleCreated] = await ensureSuperAdminRole(store);

	let user = await store.getUserByEmail(admin.email);
	const userCreated = user === null;
	if (!user) {
		user = await store.createUser({
			email: admin.email,
			verified: true,
			passwordHash: await passwords.hash(admin.password),
		});
	}

	const roleAssigned = await store.assignGlobalRole(user.id, role.id);

	if (roleCreated || userCreated || roleAssigned) {
		logger.info({ email: admin.email, roleCreated, userCreated, roleAssigned }, 'Super admin bootstrapped');
	}
	return { roleCreated, userCreated, roleAssigned };
}
