export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class InvalidTransitionError extends Error {
  constructor(proposalId: number, from: string, to: string) {
    super(`P${proposalId}: cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}
