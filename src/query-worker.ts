/**
 * Query worker: drives one endpoint through a fixed number of request/response cycles
 */

import chalk from 'chalk';
import { decodeReply, describeAnswers, encodeQuery, DecodedReply } from './codec';
import { DomainPool } from './domain-pool';
import { Endpoint } from './endpoint';
import { ReceiveTimeoutError, errorMessage } from './errors';
import { EventChannel } from './event-channel';
import { logger } from './logger';
import { TransactionIdAllocator } from './transaction-id';
import {
  MismatchPolicy,
  RecordType,
  StatusEvent,
  TerminalStatus,
  WorkerStatus
} from './types';

export interface QueryWorkerOptions {
  id: string;
  endpoint: Endpoint;
  domains: DomainPool;
  ids: TransactionIdAllocator;
  events: EventChannel<StatusEvent>;
  recordType: RecordType;
  queries: number;
  timeout: number;
  mismatchPolicy: MismatchPolicy;

  /**
   * Random source for domain selection (default: Math.random)
   */
  random?: () => number;

  /**
   * Millisecond clock for the receive deadline (default: Date.now)
   */
  now?: () => number;
}

export class QueryWorker {
  readonly id: string;
  private options: QueryWorkerOptions;
  private random: () => number;
  private now: () => number;

  constructor(options: QueryWorkerOptions) {
    this.id = options.id;
    this.options = options;
    this.random = options.random || Math.random;
    this.now = options.now || Date.now;
  }

  /**
   * Run every configured iteration, then report `done`
   */
  async run(): Promise<void> {
    for (let i = 0; i < this.options.queries; i++) {
      await this.iterate();
    }
    this.emit('done');
  }

  private async iterate(): Promise<void> {
    const { endpoint, domains, ids, recordType } = this.options;
    const id = ids.next();
    const domain = domains.pick(this.random);
    logger.trace(chalk.gray(`[${this.id}] select domain: ${domain} (id ${id})`));

    try {
      await endpoint.send(encodeQuery(domain, recordType, id));
    } catch (error) {
      logger.trace(chalk.red(`[${this.id}] send failed for ${domain}: ${errorMessage(error)}`));
      this.emit('failed');
      return;
    }
    this.emit('sent');

    this.emit(await this.awaitReply(id));
  }

  /**
   * Wait for the reply carrying `id`, skipping replies for other transactions
   */
  private async awaitReply(id: number): Promise<TerminalStatus> {
    const { endpoint, timeout, mismatchPolicy } = this.options;
    const deadline = this.now() + timeout;
    let wait = timeout;

    for (;;) {
      let reply: DecodedReply;
      try {
        reply = decodeReply(await endpoint.receive(wait));
      } catch (error) {
        if (error instanceof ReceiveTimeoutError) {
          return 'timeout';
        }
        logger.trace(chalk.red(`[${this.id}] receive failed (id ${id}): ${errorMessage(error)}`));
        return 'failed';
      }

      if (reply.id === id) {
        const qname = reply.questions.length > 0 ? reply.questions[0].name : '?';
        logger.trace(chalk.green(`[${this.id}] OK, ${qname} -> ${describeAnswers(reply.answers)}`));
        return 'success';
      }

      logger.trace(chalk.yellow(`[${this.id}] ignoring reply id ${reply.id}, waiting for ${id}`));
      if (mismatchPolicy === 'deadline') {
        wait = deadline - this.now();
        if (wait <= 0) {
          return 'timeout';
        }
      }
    }
  }

  private emit(status: WorkerStatus): void {
    this.options.events.push({ status, origin: this.id });
  }
}
