export class VisualScoringError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "VisualScoringError";
  }
}

export class VisualScoringTimeoutError extends VisualScoringError {
  constructor(message: string) {
    super(message);
    this.name = "VisualScoringTimeoutError";
  }
}

/** Rejected credentials. Never retried. */
export class VisualScoringAuthError extends VisualScoringError {
  constructor(message: string, status: number) {
    super(message, status);
    this.name = "VisualScoringAuthError";
  }
}
