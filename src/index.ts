/**
 * dnsblast - concurrent DNS query load generator
 */

import { DnsLoadTester } from './load-tester';

export * from './types';
export * from './errors';
export { DnsLoadTester, LoadTesterDeps } from './load-tester';
export { Aggregator, AggregatorOptions, completionPercent, formatCounters } from './aggregator';
export { QueryWorker, QueryWorkerOptions } from './query-worker';
export { DomainPool, isValidDomainName, parseDomainList } from './domain-pool';
export { TransactionIdAllocator } from './transaction-id';
export { EventChannel } from './event-channel';
export { Endpoint, EndpointFactory, MAX_QUEUED_DATAGRAMS, UdpEndpoint, UdpEndpointOptions } from './endpoint';
export { encodeQuery, decodeReply, DecodedReply } from './codec';
export { DEFAULTS, MAX_TIMEOUT_MS, resolveConfig, parseServerAddress } from './config';
export { logger, setVerbosity } from './logger';

// Default export
export default DnsLoadTester;
