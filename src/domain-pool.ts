/**
 * Read-only pool of candidate query names
 */

import * as fs from 'fs';
import { ConfigError, errorMessage } from './errors';

const MAX_NAME_LENGTH = 253;
const LABEL_PATTERN = /^[a-zA-Z0-9_](?:[a-zA-Z0-9_-]{0,61}[a-zA-Z0-9_])?$/;

/**
 * Check a name for DNS syntax: 1-63 character labels of letters, digits, '_' and '-',
 * no label starting or ending with '-', and a top label that is not purely numeric.
 */
export function isValidDomainName(name: string): boolean {
  const bare = name.endsWith('.') ? name.slice(0, -1) : name;
  if (bare.length === 0 || bare.length > MAX_NAME_LENGTH) {
    return false;
  }

  const labels = bare.split('.');
  if (!labels.every(label => LABEL_PATTERN.test(label))) {
    return false;
  }

  return !/^[0-9]+$/.test(labels[labels.length - 1]);
}

/**
 * Parse a newline-delimited list, skipping blank lines and dropping invalid names
 */
export function parseDomainList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && isValidDomainName(line));
}

export class DomainPool {
  private readonly domains: readonly string[];

  /**
   * Names that fail `isValidDomainName` are left out of the pool
   */
  constructor(domains: readonly string[]) {
    this.domains = Object.freeze(domains.filter(isValidDomainName));
  }

  /**
   * Load a pool from a domain list file
   */
  static async fromFile(path: string): Promise<DomainPool> {
    let text: string;
    try {
      text = await fs.promises.readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read domain file ${path}: ${errorMessage(error)}`);
    }
    return new DomainPool(parseDomainList(text));
  }

  get size(): number {
    return this.domains.length;
  }

  toArray(): readonly string[] {
    return this.domains;
  }

  /**
   * Pick a name uniformly at random
   */
  pick(random: () => number = Math.random): string {
    if (this.domains.length === 0) {
      throw new Error('Cannot pick from an empty domain pool');
    }
    const index = Math.min(Math.floor(random() * this.domains.length), this.domains.length - 1);
    return this.domains[index];
  }
}
