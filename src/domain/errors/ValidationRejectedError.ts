export class ValidationRejectedError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "ValidationRejectedError";
  }

  static because(issues: readonly string[]): ValidationRejectedError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid input")
          : `Invalid input: ${issues.join("; ")}`;
    return new ValidationRejectedError(message, issues);
  }
}
