/**
 * Option defaults and validation
 */

import { isIP } from 'net';
import { ConfigError } from './errors';
import {
  LoadTestConfig,
  LoadTestOptions,
  MismatchPolicy,
  RecordType,
  ServerAddress,
  Verbosity
} from './types';

export const DEFAULT_DNS_PORT = 53;

/** Largest delay setTimeout honours; longer ones fire after 1ms */
export const MAX_TIMEOUT_MS = 2147483647;

export const DEFAULTS = {
  threads: 10,
  queries: 100,
  domainsFile: 'domains.txt',
  recordType: 'A',
  timeout: 500,
  verbosity: 0,
  mismatchPolicy: 'deadline'
} as const;

export const RECORD_TYPES: readonly RecordType[] = ['A', 'AAAA'];
export const MISMATCH_POLICIES: readonly MismatchPolicy[] = ['deadline', 'reset'];

/**
 * Parse 'ip:port', '[ipv6]:port' or a bare IP (port 53)
 */
export function parseServerAddress(value: string): ServerAddress {
  const text = value.trim();
  let host = text;
  let portText: string | undefined;

  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(text);
  if (bracketed) {
    host = bracketed[1];
    portText = bracketed[2];
  } else if (isIP(text) !== 6) {
    const separator = text.lastIndexOf(':');
    if (separator !== -1) {
      host = text.slice(0, separator);
      portText = text.slice(separator + 1);
    }
  }

  const family = isIP(host);
  if (family !== 4 && family !== 6) {
    throw new ConfigError(`Invalid server address: ${value}`);
  }

  let port = DEFAULT_DNS_PORT;
  if (portText !== undefined) {
    port = /^\d+$/.test(portText) ? parseInt(portText, 10) : NaN;
    if (!(port >= 1 && port <= 65535)) {
      throw new ConfigError(`Invalid server port in ${value}`);
    }
  }

  return { host, port, family };
}

export function parseRecordType(value: string): RecordType {
  const match = RECORD_TYPES.find(type => type === value);
  if (!match) {
    throw new ConfigError(`Invalid record type: ${value} (expected A or AAAA)`);
  }
  return match;
}

export function parseMismatchPolicy(value: string): MismatchPolicy {
  const match = MISMATCH_POLICIES.find(policy => policy === value);
  if (!match) {
    throw new ConfigError(`Invalid mismatch policy: ${value} (expected deadline or reset)`);
  }
  return match;
}

export function parseVerbosity(value: number): Verbosity {
  if (value === 0 || value === 1 || value === 2) {
    return value;
  }
  throw new ConfigError(`Invalid debug level: ${value} (expected 0, 1 or 2)`);
}

function requireInteger(name: string, value: number, min: number, max?: number): number {
  if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
    const range = max === undefined ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new ConfigError(`${name} must be an integer ${range}, got ${value}`);
  }
  return value;
}

/**
 * Fill unset (or undefined) options from the defaults and validate the result
 */
export function resolveConfig(options: LoadTestOptions): LoadTestConfig {
  const { server } = options;

  return {
    server: typeof server === 'string' ? parseServerAddress(server) : server,
    threads: requireInteger('threads', options.threads ?? DEFAULTS.threads, 1),
    queries: requireInteger('queries', options.queries ?? DEFAULTS.queries, 0),
    domainsFile: options.domainsFile ?? DEFAULTS.domainsFile,
    recordType: parseRecordType(options.recordType ?? DEFAULTS.recordType),
    timeout: requireInteger('timeout', options.timeout ?? DEFAULTS.timeout, 1, MAX_TIMEOUT_MS),
    verbosity: parseVerbosity(options.verbosity ?? DEFAULTS.verbosity),
    mismatchPolicy: parseMismatchPolicy(options.mismatchPolicy ?? DEFAULTS.mismatchPolicy)
  };
}
