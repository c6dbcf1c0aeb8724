export * from './bootstrap-super-admin.js';
