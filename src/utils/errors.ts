/**
 * Raised when the session provider cannot hand out a browser session or page
 */
export class SessionUnavailableError extends Error {
  constructor(
    public readonly account: string,
    message: string
  ) {
    super(message);
    this.name = 'SessionUnavailableError';
  }
}

export class LoginFailedError extends Error {
  constructor(
    public readonly account: string,
    message = `Login failed for account ${account}`
  ) {
    super(message);
    this.name = 'LoginFailedError';
  }
}

export class AutomationAlreadyRunningError extends Error {
  constructor() {
    super('Automation is already running');
    this.name = 'AutomationAlreadyRunningError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Input rejected before anything was stored
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DuplicateEntryError extends Error {
  constructor(kind: string, key: string) {
    super(`${kind} ${key} already exists`);
    this.name = 'DuplicateEntryError';
  }
}
