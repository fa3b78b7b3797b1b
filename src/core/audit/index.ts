export type { AuditLogStore } from "./audit-store.js";
export { SqliteAuditStore, AUDIT_DB_FILENAME } from "./sqlite-audit-store.js";
