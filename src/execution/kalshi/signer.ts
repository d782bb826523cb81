/**
 * Kalshi request signing
 *
 * Every authenticated request carries an RSA-PSS (SHA-256) signature over
 * `timestamp + METHOD + path`, where path is the URL pathname without query.
 */

import { constants, createPrivateKey, sign, type KeyObject } from 'node:crypto';
import { readFileSync } from 'node:fs';

import { ConfigError } from '../../core/errors.js';

export const HEADER_KEY = 'KALSHI-ACCESS-KEY';
export const HEADER_TIMESTAMP = 'KALSHI-ACCESS-TIMESTAMP';
export const HEADER_SIGNATURE = 'KALSHI-ACCESS-SIGNATURE';

export function signingMessage(timestampMs: string, method: string, path: string): string {
  const pathname = path.split('?')[0] ?? path;
  return `${timestampMs}${method.toUpperCase()}${pathname}`;
}

export class KalshiSigner {
  constructor(
    private apiKeyId: string,
    private privateKey: KeyObject
  ) {}

  static fromPem(apiKeyId: string, pem: string): KalshiSigner {
    return new KalshiSigner(apiKeyId, createPrivateKey(pem));
  }

  static fromFile(apiKeyId: string | undefined, keyPath: string | undefined): KalshiSigner {
    if (!apiKeyId || !keyPath) {
      throw new ConfigError('Kalshi credentials not configured (KALSHI_API_KEY_ID / KALSHI_PRIVATE_KEY_PATH).');
    }
    let pem: string;
    try {
      pem = readFileSync(keyPath, 'utf-8');
    } catch (err) {
      throw new ConfigError(
        `Failed to read Kalshi private key ${keyPath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    return KalshiSigner.fromPem(apiKeyId, pem);
  }

  sign(message: string): string {
    return sign('sha256', Buffer.from(message, 'utf-8'), {
      key: this.privateKey,
      padding: constants.RSA_PKCS1_PSS_PADDING,
      saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
    }).toString('base64');
  }

  headers(method: string, path: string, nowMs = Date.now()): Record<string, string> {
    const timestamp = String(nowMs);
    return {
      [HEADER_KEY]: this.apiKeyId,
      [HEADER_TIMESTAMP]: timestamp,
      [HEADER_SIGNATURE]: this.sign(signingMessage(timestamp, method, path)),
    };
  }
}
