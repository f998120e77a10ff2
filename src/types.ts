/**
 * Type definitions for dnsblast
 */

export type RecordType = 'A' | 'AAAA';

export type Verbosity = 0 | 1 | 2;

/**
 * How a worker treats the receive window after a reply with the wrong transaction ID.
 * `deadline` keeps counting down to the first deadline, `reset` restarts the full timeout.
 */
export type MismatchPolicy = 'deadline' | 'reset';

export type WorkerStatus = 'sent' | 'success' | 'timeout' | 'failed' | 'done';

/** Outcome that closes an iteration which reached `sent` */
export type TerminalStatus = Extract<WorkerStatus, 'success' | 'timeout' | 'failed'>;

export interface StatusEvent {
  status: WorkerStatus;

  /**
   * Id of the worker that produced the event (e.g. 'worker-3')
   */
  origin: string;
}

export interface ServerAddress {
  host: string;
  port: number;
  family: 4 | 6;
}

export interface LoadTestOptions {
  /**
   * Resolver to load, as 'ip:port', '[ipv6]:port' or a parsed address
   */
  server: string | ServerAddress;

  /**
   * Number of concurrent workers (default: 10)
   */
  threads?: number;

  /**
   * Queries issued by each worker (default: 100)
   */
  queries?: number;

  /**
   * Newline-delimited domain list (default: 'domains.txt')
   */
  domainsFile?: string;

  /**
   * Record type to query (default: 'A')
   */
  recordType?: string;

  /**
   * Per-request timeout in milliseconds (default: 500)
   */
  timeout?: number;

  /**
   * 0: final summary only, 1: progress lines, 2: per-query detail (default: 0)
   */
  verbosity?: number;

  /**
   * Receive window handling after a mismatched reply (default: 'deadline')
   */
  mismatchPolicy?: string;
}

export interface LoadTestConfig {
  server: ServerAddress;
  threads: number;
  queries: number;
  domainsFile: string;
  recordType: RecordType;
  timeout: number;
  verbosity: Verbosity;
  mismatchPolicy: MismatchPolicy;
}

export interface Counters {
  sent: number;
  success: number;
  timeout: number;
  failed: number;
  workersDone: number;
}

export interface LoadTestSummary extends Counters {
  /**
   * Iterations configured across all workers (threads * queries)
   */
  total: number;

  /**
   * Share of the configured iterations that were sent, floored
   */
  percent: number;

  elapsedMs: number;
}
