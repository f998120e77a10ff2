/**
 * Tests for UdpEndpoint against an in-process loopback responder
 */

import * as dgram from 'dgram';
import * as dnsPacket from 'dns-packet';
import { DomainPool } from '../domain-pool';
import { UdpEndpoint } from '../endpoint';
import { EndpointError, ReceiveTimeoutError } from '../errors';
import { DnsLoadTester } from '../load-tester';
import { ServerAddress } from '../types';
import { reply } from './fakes';

type Responder = (query: dnsPacket.DecodedPacket) => Buffer[];

interface LoopbackResolver {
  address: ServerAddress;
  queries: number;
  close(): Promise<void>;
}

function startResolver(respond: Responder): Promise<LoopbackResolver> {
  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket('udp4');
    const resolver: LoopbackResolver = {
      address: { host: '127.0.0.1', port: 0, family: 4 },
      queries: 0,
      close: () => new Promise(done => socket.close(() => done()))
    };

    socket.on('message', (msg, remote) => {
      resolver.queries++;
      for (const payload of respond(dnsPacket.decode(msg))) {
        socket.send(payload, remote.port, remote.address);
      }
    });
    socket.once('error', reject);
    socket.bind(0, '127.0.0.1', () => {
      resolver.address.port = socket.address().port;
      resolve(resolver);
    });
  });
}

/**
 * Address of a loopback port that was bound and then released, so nothing listens on it
 */
async function closedPort(): Promise<ServerAddress> {
  const released = await startResolver(() => []);
  await released.close();
  return released.address;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function waitFor(condition: () => boolean, timeoutMs: number = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await sleep(5);
  }
}

const answer: Responder = query => [reply(query.id ?? 0, (query.questions || [])[0].name)];
const silent: Responder = () => [];

describe('UdpEndpoint', () => {
  let resolver: LoopbackResolver | null = null;
  let endpoint: UdpEndpoint | null = null;

  afterEach(async () => {
    if (endpoint) {
      await endpoint.close();
      endpoint = null;
    }
    if (resolver) {
      await resolver.close();
      resolver = null;
    }
  });

  test('sends a datagram and receives the reply', async () => {
    resolver = await startResolver(query => [Buffer.from(`pong ${query.id}`)]);
    endpoint = await UdpEndpoint.open(resolver.address);

    await endpoint.send(dnsPacket.encode({ type: 'query', id: 7, questions: [{ type: 'A', name: 'example.com' }] }));
    const payload = await endpoint.receive(1000);

    expect(payload.toString()).toBe('pong 7');
  });

  test('rejects with ReceiveTimeoutError when nothing arrives', async () => {
    resolver = await startResolver(silent);
    endpoint = await UdpEndpoint.open(resolver.address);

    await expect(endpoint.receive(20)).rejects.toThrow(ReceiveTimeoutError);
  });

  test('keeps datagrams that arrive while nobody is waiting', async () => {
    resolver = await startResolver(query => [reply(query.id ?? 0), reply((query.id ?? 0) + 1)]);
    endpoint = await UdpEndpoint.open(resolver.address);

    await endpoint.send(dnsPacket.encode({ type: 'query', id: 40, questions: [{ type: 'A', name: 'example.com' }] }));
    const first = dnsPacket.decode(await endpoint.receive(1000));
    const second = dnsPacket.decode(await endpoint.receive(1000));

    expect([first.id, second.id]).toEqual([40, 41]);
  });

  test('drops the oldest queued datagrams once the queue is full', async () => {
    resolver = await startResolver(query => [10, 11, 12, 13, 14].map(id => reply(id + (query.id ?? 0))));
    endpoint = await UdpEndpoint.open(resolver.address, { maxQueued: 3 });

    await endpoint.send(dnsPacket.encode({ type: 'query', id: 0, questions: [{ type: 'A', name: 'example.com' }] }));
    const open = endpoint;
    await waitFor(() => open.dropped === 2);

    expect(open.queued).toBe(3);
    const ids: Array<number | undefined> = [];
    for (let i = 0; i < 3; i++) {
      ids.push(dnsPacket.decode(await open.receive(1000)).id);
    }
    expect(ids).toEqual([12, 13, 14]);
    expect(open.queued).toBe(0);
  });

  test('rejects a queue bound below one', async () => {
    await expect(UdpEndpoint.open({ host: '127.0.0.1', port: 53, family: 4 }, { maxQueued: 0 }))
      .rejects.toThrow(EndpointError);
  });

  test('fails a receive with the socket error when the port is closed', async () => {
    endpoint = await UdpEndpoint.open(await closedPort());

    await endpoint.send(dnsPacket.encode({ type: 'query', id: 9, questions: [{ type: 'A', name: 'example.com' }] }));
    await sleep(50);
    const error = await endpoint.receive(1000).then(
      () => null,
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(ReceiveTimeoutError);
  });

  test('rejects receives after close', async () => {
    resolver = await startResolver(silent);
    const closing = await UdpEndpoint.open(resolver.address);
    await closing.close();

    await expect(closing.receive(1000)).rejects.toThrow('Endpoint is closed');
    await expect(closing.send(Buffer.from('x'))).rejects.toThrow('Endpoint is closed');
  });
});

describe('DnsLoadTester over loopback UDP', () => {
  let resolver: LoopbackResolver | null = null;
  let log: jest.SpyInstance;
  const domains = new DomainPool(['example.com', 'example.net']);

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    log.mockRestore();
    if (resolver) {
      await resolver.close();
      resolver = null;
    }
  });

  test('counts every answered query as success', async () => {
    resolver = await startResolver(answer);
    const tester = new DnsLoadTester(
      { server: resolver.address, threads: 2, queries: 5, timeout: 2000 },
      { domains }
    );

    const summary = await tester.run();

    expect(summary).toMatchObject({ sent: 10, success: 10, timeout: 0, failed: 0, workersDone: 2 });
    expect(resolver.queries).toBe(10);
  });

  test('skips a stray reply and matches the real one', async () => {
    resolver = await startResolver(query => [reply((query.id ?? 0) + 1000), reply(query.id ?? 0)]);
    const tester = new DnsLoadTester(
      { server: resolver.address, threads: 1, queries: 3, timeout: 2000 },
      { domains }
    );

    const summary = await tester.run();

    expect(summary).toMatchObject({ sent: 3, success: 3, timeout: 0, failed: 0 });
  });

  test('counts every query as failed when nothing listens on the port', async () => {
    const tester = new DnsLoadTester(
      { server: await closedPort(), threads: 2, queries: 5, timeout: 1000 },
      { domains }
    );

    const summary = await tester.run();

    expect(summary).toMatchObject({ sent: 10, success: 0, timeout: 0, failed: 10, workersDone: 2 });
  });

  test('counts every query as timed out against a silent server', async () => {
    resolver = await startResolver(silent);
    const tester = new DnsLoadTester(
      { server: resolver.address, threads: 2, queries: 2, timeout: 30 },
      { domains }
    );

    const summary = await tester.run();

    expect(summary).toMatchObject({ sent: 4, success: 0, timeout: 4, failed: 0, workersDone: 2 });
  });
});
