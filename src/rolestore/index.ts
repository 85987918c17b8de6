export { RoleStore, ROLE_STORE_API, type RoleStoreOptions } from './client.js';
export { RoleReconciler, type RoleDirectory, type ReconcileOutcome } from './reconciler.js';
export type { Role, RoleRef, User, Source, CreatedResponse } from './types.js';
