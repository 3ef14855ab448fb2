/**
 * Private key parsing for key-based remote profiles
 *
 * Parsing is an ordered list of strategies. The first one that yields a key
 * wins; when all of them fail the caller gets a single AuthError listing
 * every attempt.
 */

import { createPrivateKey, type KeyObject } from 'crypto';
import { AuthError } from '../../core/errors.js';
import { logger } from '../../config/logger.js';

export interface KeyParseStrategy {
  name: string;
  /** Whether the strategy applies to this input at all */
  applies(key: string, passphrase?: string): boolean;
  parse(key: string, passphrase?: string): KeyObject;
}

function normalizeKey(key: string): string {
  return key.trim().replace(/\r\n|\r/g, '\n');
}

export const withPassphrase: KeyParseStrategy = {
  name: 'pem-with-passphrase',
  applies: (_key, passphrase) => passphrase !== undefined && passphrase !== '',
  parse: (key, passphrase) => createPrivateKey({ key: normalizeKey(key), format: 'pem', passphrase }),
};

export const withoutPassphrase: KeyParseStrategy = {
  name: 'pem',
  applies: () => true,
  parse: (key) => createPrivateKey({ key: normalizeKey(key), format: 'pem' }),
};

export const base64Encoded: KeyParseStrategy = {
  name: 'base64-pem',
  applies: (key) => !key.includes('BEGIN') && !key.includes('END'),
  parse: (key, passphrase) => {
    const decoded = Buffer.from(key.trim(), 'base64').toString('utf-8');
    return createPrivateKey({ key: normalizeKey(decoded), format: 'pem', passphrase });
  },
};

export const DEFAULT_KEY_STRATEGIES: readonly KeyParseStrategy[] = [withPassphrase, withoutPassphrase, base64Encoded];

/**
 * Parse a private key, trying each strategy in order.
 *
 * @throws AuthError when no strategy produced a key
 */
export function parsePrivateKey(
  key: string,
  passphrase?: string,
  strategies: readonly KeyParseStrategy[] = DEFAULT_KEY_STRATEGIES
): KeyObject {
  const failures: string[] = [];

  for (const strategy of strategies) {
    if (!strategy.applies(key, passphrase)) {
      continue;
    }
    try {
      return strategy.parse(key, passphrase);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.debug({ strategy: strategy.name, reason }, 'Private key strategy failed');
      failures.push(`${strategy.name}: ${reason}`);
    }
  }

  if (failures.length === 0) {
    throw new AuthError('Invalid private key format: no parsing strategy applies');
  }
  throw new AuthError(`Invalid private key format (${failures.join('; ')})`);
}
