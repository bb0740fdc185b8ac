// Raised before the server listens; never reaches the HTTP layer.
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
