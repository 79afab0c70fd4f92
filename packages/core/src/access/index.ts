export { ADMIN_OPERATIONS, SingleAdminAuthorizer, requireAdmin } from './authorizer.js';
export type { AdminOperation, Authorizer } from './authorizer.js';
