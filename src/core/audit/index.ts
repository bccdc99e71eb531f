export { runAudit, type AuditOptions, type AuditResult } from './runner.js';
