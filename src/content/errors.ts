/**
 * Content record errors.
 */

export interface ContentIssue {
  path: (string | number)[];
  message: string;
  code: string;
}

/**
 * A content record that failed to parse or validate.
 */
export class ContentValidationError extends Error {
  public readonly issues: ContentIssue[];

  constructor(message: string, issues: ContentIssue[]) {
    super(message);
    this.name = "ContentValidationError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Content record validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}
