import { createHash } from 'crypto';
import { EntityKind } from './types';

const HONORIFIC = /^(?:dr|mr|mrs|ms|prof)\.?\s+/i;

const TOKEN_PREFIX: Record<EntityKind, string> = {
  person_name: 'PERSON',
  organization: 'ORG',
};

export interface PseudonymOptions {
  salt: string;
  /** Hex characters kept from the digest */
  length: number;
}

/**
 * Run-scoped map from entity to pseudonym token.
 *
 * Append-only: resolve() inserts on first sight and returns the stored token
 * afterwards. Tokens are derived from the salted kind and normalized text, so
 * the same entity gets the same token regardless of the order it is seen in.
 */
export class PseudonymTable {
  private readonly entries = new Map<string, string>();

  constructor(private readonly options: PseudonymOptions) {
    if (!Number.isInteger(options.length) || options.length < 4 || options.length > 64) {
      throw new RangeError(`Pseudonym length must be an integer between 4 and 64, got ${options.length}`);
    }
  }

  static normalize(entity: string): string {
    return entity
      .trim()
      .replace(HONORIFIC, '')
      .replace(/\.+$/, '')
      .replace(/\s+/g, ' ')
      .trim()
      .toLowerCase();
  }

  resolve(kind: EntityKind, entity: string): string {
    const key = `${kind}:${PseudonymTable.normalize(entity)}`;
    const existing = this.entries.get(key);
    if (existing) return existing;

    const digest = createHash('sha256').update(this.options.salt + key).digest('hex');
    const token = `[${TOKEN_PREFIX[kind]}_${digest.slice(0, this.options.length)}]`;
    this.entries.set(key, token);
    return token;
  }

  get size(): number {
    return this.entries.size;
  }
}
