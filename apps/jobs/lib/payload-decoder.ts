/**
 * Response body decoders for the source's data endpoints.
 *
 * Some deployments serve plain JSON; others wrap it as
 * base64("<base64 ciphertext>:<hex iv>") under AES-256-CBC with a
 * PBKDF2-SHA256 derived key. Password and salt come from configuration.
 */

import { createDecipheriv, pbkdf2Sync } from 'crypto';
import { StructuralChangeError, errMsg } from './errors';

export interface PayloadDecoder {
  readonly name: string;
  decode(body: string, url?: string): unknown;
}

export class JsonPayloadDecoder implements PayloadDecoder {
  readonly name = 'json';

  decode(body: string, url?: string): unknown {
    try {
      return JSON.parse(body.trim());
    } catch (error) {
      throw new StructuralChangeError(`Response is not JSON: ${errMsg(error)}`, url);
    }
  }
}

export interface AesDecoderConfig {
  password: string;
  salt: string;
  iterations?: number;
}

export class AesPayloadDecoder implements PayloadDecoder {
  readonly name = 'aes';
  private key: Buffer;

  constructor(config: AesDecoderConfig) {
    if (!config.password || !config.salt) {
      throw new Error('AES payload decoder requires ODDS_PAYLOAD_PASSWORD and ODDS_PAYLOAD_SALT');
    }
    this.key = pbkdf2Sync(config.password, config.salt, config.iterations ?? 1000, 32, 'sha256');
  }

  decode(body: string, url?: string): unknown {
    const trimmed = body.trim();

    // Plain JSON passes through (fixtures endpoints are not wrapped)
    if (trimmed.startsWith('{')) {
      return new JsonPayloadDecoder().decode(trimmed, url);
    }

    const envelope = Buffer.from(trimmed, 'base64').toString('utf8');
    const parts = envelope.split(':');
    if (parts.length !== 2 || !/^[0-9a-f]{32}$/i.test(parts[1])) {
      throw new StructuralChangeError('Encrypted payload is not "<ciphertext>:<iv>"', url);
    }

    let plaintext: string;
    try {
      const decipher = createDecipheriv('aes-256-cbc', this.key, Buffer.from(parts[1], 'hex'));
      plaintext = Buffer.concat([
        decipher.update(Buffer.from(parts[0], 'base64')),
        decipher.final(),
      ]).toString('utf8');
    } catch (error) {
      throw new StructuralChangeError(`Payload decryption failed: ${errMsg(error)}`, url);
    }

    return new JsonPayloadDecoder().decode(plaintext, url);
  }
}
