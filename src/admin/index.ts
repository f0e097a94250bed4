export { ADMIN_SESSION, adminWorkDir, startAdmin, stopAdmin } from './session.js';
export type { AdminStartResult } from './session.js';
