export type { LoginCommand } from './login/command.js';
export { createLoginUseCase, type LoginUseCaseDeps } from './login/use-case.js';
