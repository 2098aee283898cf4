// Audit service
export { auditReferralGraph, auditLotteryHeap } from './auditService';
export type { AuditIssue, AuditIssueType, AuditReport } from './auditService';
