/**
 * Command Types
 *
 * Commands represent the input to write operations (mutations).
 * They are plain, immutable data objects; validation lives in the use case.
 *
 * @example
 * ```typescript
 * interface UpdateRoleCommand extends Command {
 *     readonly roleId: number;
 *     readonly name?: string;                 // undefined = no change
 *     readonly inheritsRoleId?: number | null; // null = clear, undefined = no change
 * }
 * ```
 */

/**
 * Base marker interface for commands.
 */
export interface Command {
	/**
	 * Optional operation name used in log lines.
	 */
	readonly _type?: string;
}

/**
 * Type helper for commands that operate on a specific entity.
 *
 * @example
 * ```typescript
 * type DeleteRoleCommand = EntityCommand<{}, 'roleId'>;
 * // Results in: { roleId: number; _type?: string }
 * ```
 */
export type EntityCommand<T, TIdField extends string = 'id'> = Command & {
	readonly [K in TIdField]: number;
} & T;
