/**
 * UseCase Interface
 *
 * UseCases encapsulate a single business operation. Each use case:
 * - Takes a command (input data) and execution context (principal, cancellation)
 * - Performs validation and business rule checks
 * - Persists changes through the stores it was built with
 * - Returns a Result containing the outcome on success
 *
 * @example
 * ```typescript
 * export function createDeletePermissionUseCase(deps: Deps): UseCase<DeletePermissionCommand, DeletedPermission> {
 *     return {
 *         async execute(command, context) {
 *             const permission = await deps.store.getPermissionById(command.permissionId, context.signal);
 *             if (!permission) {
 *                 return Result.failure(UseCaseError.notFound('PERMISSION_NOT_FOUND', 'Permission not found'));
 *             }
 *             ...
 *         },
 *     };
 * }
 * ```
 */

import type { Result, ExecutionContext } from '@tenantgate/domain-core';
import type { Command } from './command.js';

/**
 * UseCase interface for write operations.
 *
 * @typeParam TCommand - The command type (input data)
 * @typeParam TResult - The value returned on success
 */
export interface UseCase<TCommand extends Command, TResult> {
	execute(command: TCommand, context: ExecutionContext): Promise<Result<TResult>>;
}

/**
 * Type for extracting the command type from a UseCase.
 */
export type UseCaseCommand<T> = T extends UseCase<infer TCommand extends Command, unknown> ? TCommand : never;

/**
 * Type for extracting the success value type from a UseCase.
 */
export type UseCaseResult<T> = T extends UseCase<Command, infer TResult> ? TResult : never;

/**
 * A use case factory function type.
 */
export type UseCaseFactory<TCommand extends Command, TResult, TDeps> = (deps: TDeps) => UseCase<TCommand, TResult>;
