export class PingwatchError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = 'PingwatchError';
  }
}

/**
 * Raised when settings or environment values cannot drive a monitor.
 * Thrown at construction time only; a running monitor never raises it.
 */
export class ConfigurationError extends PingwatchError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'INVALID_SETTINGS');
    this.name = 'ConfigurationError';
  }
}

export class SinkError extends PingwatchError {
  constructor(
    message: string,
    public sink: 'event-log' | 'digest',
    public underlying?: unknown
  ) {
    super(message, 'SINK_FAILURE');
    this.name = 'SinkError';
  }
}
