export { Role, RoleRegistry, requireAnyRole } from './access-control.js';
export type { AccessController } from './access-control.js';
