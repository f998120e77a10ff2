/**
 * Basic usage example for dnsblast
 */

import { DnsLoadTester, DomainPool } from '../src';

async function main() {
  // Load a local resolver with the defaults (10 workers x 100 queries, 500ms timeout)
  const tester = new DnsLoadTester({
    server: '127.0.0.1:53',
    domainsFile: 'domains.txt'
  });

  console.log('1. Default run:');
  const result1 = await tester.run();
  console.log(`Sent: ${result1.sent}, answered: ${result1.success}, timed out: ${result1.timeout}`);
  console.log('');

  // Fixed pool, AAAA queries, progress lines and a full receive window after every stray reply
  console.log('2. AAAA run with an in-memory pool:');
  const custom = new DnsLoadTester(
    {
      server: '[::1]:5353',
      threads: 4,
      queries: 250,
      recordType: 'AAAA',
      timeout: 1000,
      verbosity: 1,
      mismatchPolicy: 'reset'
    },
    {
      domains: new DomainPool(['example.com', 'example.net', 'example.org'])
    }
  );

  const result2 = await custom.run();
  console.log(`Completion: ${result2.percent}% in ${result2.elapsedMs}ms`);
}

// Run the example
main().catch(console.error);
