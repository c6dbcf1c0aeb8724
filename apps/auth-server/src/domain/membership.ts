/**
 * Memberships
 *
 * A user holds at most one role per organization and per team. Global roles
 * (user_roles) apply outside any organization or team.
 */

export type MembershipAssignmentOutcome = 'created' | 'updated';

export interface OrganizationMembership {
	readonly organizationId: number;
	readonly userId: number;
	readonly roleId: number;
}

export interface TeamMembership {
	readonly teamId: number;
	readonly userId: number;
	readonly roleId: number;
}
