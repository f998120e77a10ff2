/**
 * DnsLoadTester - fan queries out over worker endpoints and fold the outcomes into one summary
 */

import chalk from 'chalk';
import { Aggregator } from './aggregator';
import { resolveConfig } from './config';
import { DomainPool } from './domain-pool';
import { Endpoint, EndpointFactory, UdpEndpoint } from './endpoint';
import { ConfigError, EndpointError, errorMessage } from './errors';
import { EventChannel } from './event-channel';
import { logger, setVerbosity } from './logger';
import { QueryWorker } from './query-worker';
import { TransactionIdAllocator } from './transaction-id';
import { Counters, LoadTestConfig, LoadTestOptions, LoadTestSummary, StatusEvent } from './types';

export interface LoadTesterDeps {
  /**
   * Use this pool instead of reading `domainsFile`
   */
  domains?: DomainPool;

  /**
   * Opens one endpoint per worker (default: UdpEndpoint.open)
   */
  openEndpoint?: EndpointFactory;

  ids?: TransactionIdAllocator;
  random?: () => number;
  now?: () => number;
  onProgress?: (counters: Counters) => void;
}

export class DnsLoadTester {
  readonly config: LoadTestConfig;
  private deps: LoadTesterDeps;

  constructor(options: LoadTestOptions, deps: LoadTesterDeps = {}) {
    this.config = resolveConfig(options);
    this.deps = deps;
  }

  /**
   * Run the whole load test. Rejects only on startup failures; per-query
   * failures end up in the summary counters.
   */
  async run(): Promise<LoadTestSummary> {
    const { config } = this;
    setVerbosity(config.verbosity);
    const domains = await this.loadDomains();
    logger.debug(chalk.blue(`Loaded ${domains.size} domains`));

    const endpoints = await this.openEndpoints();
    logger.debug(chalk.blue(
      `Starting ${config.threads} workers against ${config.server.host}:${config.server.port}`
    ));

    try {
      const events = new EventChannel<StatusEvent>();
      const ids = this.deps.ids || new TransactionIdAllocator();

      const aggregator = new Aggregator(events, {
        workers: config.threads,
        queriesPerWorker: config.queries,
        onProgress: this.deps.onProgress,
        now: this.deps.now
      });

      const workers = endpoints.map((endpoint, index) => new QueryWorker({
        id: `worker-${index + 1}`,
        endpoint,
        domains,
        ids,
        events,
        recordType: config.recordType,
        queries: config.queries,
        timeout: config.timeout,
        mismatchPolicy: config.mismatchPolicy,
        random: this.deps.random,
        now: this.deps.now
      }));

      const [summary] = await Promise.all([
        aggregator.run(),
        ...workers.map(worker => worker.run())
      ]);
      return summary;
    } finally {
      await closeAll(endpoints);
    }
  }

  private async loadDomains(): Promise<DomainPool> {
    const domains = this.deps.domains || await DomainPool.fromFile(this.config.domainsFile);
    if (domains.size === 0) {
      throw new ConfigError('No valid domains to query');
    }
    return domains;
  }

  /**
   * Open one endpoint per worker; on failure close those already open
   */
  private async openEndpoints(): Promise<Endpoint[]> {
    const open = this.deps.openEndpoint || UdpEndpoint.open;
    const endpoints: Endpoint[] = [];

    try {
      for (let i = 0; i < this.config.threads; i++) {
        endpoints.push(await open(this.config.server));
      }
    } catch (error) {
      await closeAll(endpoints);
      if (error instanceof EndpointError) {
        throw error;
      }
      throw new EndpointError(`Cannot open worker endpoint: ${errorMessage(error)}`);
    }

    return endpoints;
  }
}

async function closeAll(endpoints: Endpoint[]): Promise<void> {
  await Promise.all(endpoints.map(endpoint => endpoint.close()));
}
