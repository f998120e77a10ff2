/**
 * Error types raised by dnsblast
 */

export class DnsBlastError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid options or unusable domain list; raised before any worker starts
 */
export class ConfigError extends DnsBlastError {
  constructor(message: string) {
    super(message, 'ECONFIG');
  }
}

/**
 * A worker socket could not be bound or connected
 */
export class EndpointError extends DnsBlastError {
  constructor(message: string) {
    super(message, 'EENDPOINT');
  }
}

export class ReceiveTimeoutError extends DnsBlastError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No reply within ${timeoutMs}ms`, 'ETIMEOUT');
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedReplyError extends DnsBlastError {
  constructor(message: string) {
    super(`Malformed DNS reply: ${message}`, 'EMALFORMED');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
