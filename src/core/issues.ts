import type { ZodIssue } from "zod";

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type" && issue.received === "undefined") {
      return `${location}: Required`;
    }
    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}
