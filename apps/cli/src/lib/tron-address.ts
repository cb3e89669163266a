import { TronWeb } from 'tronweb';
import { ValidationError } from './errors.js';

const BASE58_REGEX = /^T[1-9A-HJ-NP-Za-km-z]{33}$/u;
const HEX_REGEX = /^41[0-9a-fA-F]{40}$/u;

export interface NormalizedAddress {
  base58: string;
  hex: string;
}

export function isBase58Address(value: string): boolean {
  return BASE58_REGEX.test(value.trim());
}

/**
 * Accept a base58 (`T...`) or hex (`41...`, optionally `0x`-prefixed or without
 * the `41` network byte) address and return both encodings.
 *
 * @throws ValidationError when the value is empty, malformed or fails the checksum
 */
export function normalizeAddress(address: string): NormalizedAddress {
  const trimmed = address.trim();
  if (!trimmed) {
    throw new ValidationError('Address is required', { address });
  }

  if (trimmed.startsWith('T')) {
    if (!isBase58Address(trimmed)) {
      throw new ValidationError('Invalid TRON address: expected 34 base58 characters starting with T', { address });
    }
    try {
      const hex = TronWeb.address.toHex(trimmed).toUpperCase();
      ensureHexFormat(hex);
      return { base58: trimmed, hex };
    } catch (error) {
      throw new ValidationError('Invalid TRON address provided', { address, error });
    }
  }

  const hex = normalizeHex(trimmed);
  try {
    const base58 = TronWeb.address.fromHex(hex);
    if (!isBase58Address(base58)) {
      throw new ValidationError('Invalid TRON address provided', { address });
    }
    return { base58, hex };
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    throw new ValidationError('Invalid TRON address provided', { address, error });
  }
}

function normalizeHex(input: string): string {
  let hex = input;
  if (hex.startsWith('0x') || hex.startsWith('0X')) {
    hex = hex.slice(2);
  }

  if (hex.length === 40) {
    hex = `41${hex}`;
  }

  if (!HEX_REGEX.test(hex)) {
    throw new ValidationError('Invalid TRON hex address', { hex: input });
  }

  return hex.toUpperCase();
}

function ensureHexFormat(hex: string) {
  if (!HEX_REGEX.test(hex)) {
    throw new ValidationError('Invalid TRON hex address', { hex });
  }
}
