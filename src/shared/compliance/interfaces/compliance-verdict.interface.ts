export interface ComplianceVerdict {
  allowed: boolean;
  reason: string;
  /** robots.txt URL consulted, null when the check was skipped. */
  policySource: string | null;
  crawlDelay: number | null;
  /** Whether the policy admits the requested path itself. Informational. */
  pathAllowed: boolean;
  checkedAt: string;
}
