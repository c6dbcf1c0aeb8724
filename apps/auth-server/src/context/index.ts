export * from './context-switch-service.js';
