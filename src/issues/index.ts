/**
 * Issue detection.
 */

export {
  ISSUE_CATALOG,
  SEVERITY_WEIGHTS,
  createIssue,
  calculateComplianceScore,
  sortByPriority,
  filterBySeverity,
  filterByType,
  issueTypes,
  type Issue,
  type IssueLocation,
} from "./issue.js";
export { IssueDetector, type DetectionReport, type IssueDetectorOptions } from "./detector.js";
