export {
  auditGuides,
  type AuditReport,
  type DuplicateEntry,
  type NullEntry,
} from './integrity-auditor';
