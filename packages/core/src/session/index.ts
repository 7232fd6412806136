export { bootstrapSession, type BootstrapOptions } from './bootstrap.js';
export type { Session, Organization, BootstrapResult } from './types.js';
