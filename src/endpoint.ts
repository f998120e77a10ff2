/**
 * Connected UDP socket owned by a single worker
 */

import * as dgram from 'dgram';
import { EndpointError, ReceiveTimeoutError, errorMessage } from './errors';
import { ServerAddress } from './types';

export const MAX_QUEUED_DATAGRAMS = 256;

export interface UdpEndpointOptions {
  /**
   * Datagrams kept while no receive is pending; the oldest is dropped past this (default: 256)
   */
  maxQueued?: number;
}

export interface Endpoint {
  send(payload: Buffer): Promise<void>;

  /**
   * Resolve with the next datagram, or reject with ReceiveTimeoutError after timeoutMs
   */
  receive(timeoutMs: number): Promise<Buffer>;

  close(): Promise<void>;
}

export type EndpointFactory = (server: ServerAddress) => Promise<Endpoint>;

interface PendingReceive {
  resolve: (payload: Buffer) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class UdpEndpoint implements Endpoint {
  private socket: dgram.Socket;
  private inbox: Buffer[] = [];
  private pending: PendingReceive | null = null;
  private failure: Error | null = null;
  private closed = false;
  private maxQueued: number;
  private droppedCount = 0;

  private constructor(socket: dgram.Socket, maxQueued: number) {
    this.socket = socket;
    this.maxQueued = maxQueued;
    socket.on('message', (msg) => this.deliver(msg));
    socket.on('error', (err) => this.fail(err));
  }

  /**
   * Bind an ephemeral local port and connect it to the server
   */
  static open(server: ServerAddress, options: UdpEndpointOptions = {}): Promise<UdpEndpoint> {
    const maxQueued = options.maxQueued ?? MAX_QUEUED_DATAGRAMS;
    if (!Number.isInteger(maxQueued) || maxQueued < 1) {
      return Promise.reject(new EndpointError(`maxQueued must be a positive integer, got ${maxQueued}`));
    }

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket(server.family === 6 ? 'udp6' : 'udp4');

      const onError = (err: Error) => {
        socket.close();
        reject(new EndpointError(`Cannot open socket to ${server.host}:${server.port}: ${err.message}`));
      };
      socket.once('error', onError);

      socket.bind(0, () => {
        socket.connect(server.port, server.host, () => {
          socket.removeListener('error', onError);
          resolve(new UdpEndpoint(socket, maxQueued));
        });
      });
    });
  }

  /**
   * Datagrams waiting for a receive
   */
  get queued(): number {
    return this.inbox.length;
  }

  /**
   * Datagrams discarded because the queue was full
   */
  get dropped(): number {
    return this.droppedCount;
  }

  send(payload: Buffer): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('Endpoint is closed'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(payload, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs: number): Promise<Buffer> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      return Promise.reject(failure);
    }
    if (this.closed) {
      return Promise.reject(new Error('Endpoint is closed'));
    }
    if (this.pending) {
      return Promise.reject(new Error('A receive is already in progress on this endpoint'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new ReceiveTimeoutError(timeoutMs));
      }, Math.max(0, timeoutMs));
      this.pending = { resolve, reject, timer };
    });
  }

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;
    this.fail(new Error('Endpoint is closed'));
    return new Promise(resolve => this.socket.close(() => resolve()));
  }

  private deliver(payload: Buffer): void {
    const pending = this.takePending();
    if (pending) {
      pending.resolve(payload);
      return;
    }
    // Late replies wait for the next receive, like datagrams in the kernel buffer
    if (this.inbox.length >= this.maxQueued) {
      this.inbox.shift();
      this.droppedCount++;
    }
    this.inbox.push(payload);
  }

  private fail(err: Error): void {
    const pending = this.takePending();
    if (pending) {
      pending.reject(err);
      return;
    }
    if (!this.closed) {
      this.failure = new Error(`Socket error: ${errorMessage(err)}`);
    }
  }

  private takePending(): PendingReceive | null {
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      this.pending = null;
    }
    return pending;
  }
}
