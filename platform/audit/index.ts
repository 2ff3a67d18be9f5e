export type { AuditEvent, AuditEventType } from "./AuditEvent";
export type { AuditSink } from "./AuditSink";
export { InMemoryAuditSink } from "./InMemoryAuditSink";
