/**
 * Users, organizations and teams.
 *
 * A user is identified in tokens by email. Every team belongs to exactly one
 * organization.
 */

export interface User {
	readonly id: number;
	readonly email: string;
	readonly firstName: string | null;
	readonly lastName: string | null;
	readonly phoneNumber: string | null;
	readonly verified: boolean;
	readonly passwordHash: string | null;
	readonly createdAt: Date;
}

export interface NewUser {
	readonly email: string;
	readonly firstName?: string | null | undefined;
	readonly lastName?: string | null | undefined;
	readonly phoneNumber?: string | null | undefined;
	readonly verified?: boolean | undefined;
	readonly passwordHash?: string | null | undefined;
}

export interface Organization {
	readonly id: number;
	readonly name: string;
	readonly createdAt: Date;
}

export interface Team {
	readonly id: number;
	readonly organizationId: number;
	readonly name: string;
	readonly description: string | null;
	readonly createdAt: Date;
}

export interface NewTeam {
	readonly organizationId: number;
	readonly name: string;
	readonly description: string | null;
}

export interface OrganizationSummary {
	readonly id: number;
	readonly name: string;
}

export interface TeamSummary {
	readonly id: number;
	readonly name: string;
	readonly organizationId: number;
}
