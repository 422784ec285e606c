// Error types raised across the watcher. None of them stop the polling loop;
// only ConfigurationError is fatal, and only at startup.

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The tree could not be traversed at all (root missing or unreadable) */
export class FingerprintError extends Error {
  constructor(
    message: string,
    public readonly rootDirectory: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FingerprintError';
  }
}

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null
  ) {
    const status = signal ? `signal ${signal}` : `code ${exitCode}`;
    super(`Command failed (${status}): ${command}`);
    this.name = 'CommandFailedError';
  }
}

export class ProcessStartError extends Error {
  constructor(
    public readonly command: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to start process: ${command}${reason}`, options);
    this.name = 'ProcessStartError';
  }
}
