import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;

/**
 * Encrypts credential documents stored in the database.
 * Payload format: `iv:authTag:ciphertext`, all hex.
 */
@Injectable()
export class CredentialsCipher {
  constructor(private readonly config: ConfigService) {}

  encryptJson(value: unknown): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key(), iv);
    const encrypted = Buffer.concat([cipher.update(JSON.stringify(value), 'utf8'), cipher.final()]);
    return `${iv.toString('hex')}:${cipher.getAuthTag().toString('hex')}:${encrypted.toString('hex')}`;
  }

  decryptJson(payload: string): unknown {
    const parts = payload.split(':');
    if (parts.length !== 3) {
      throw new Error('Invalid encrypted credentials format');
    }
    const [ivHex, tagHex, dataHex] = parts;

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key(), Buffer.from(ivHex, 'hex'));
      decipher.setAuthTag(Buffer.from(tagHex, 'hex'));
      const plain = Buffer.concat([decipher.update(Buffer.from(dataHex, 'hex')), decipher.final()]);
      return JSON.parse(plain.toString('utf8'));
    } catch (error) {
      throw new Error(`Decryption failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private key(): Buffer {
    const secret = this.config.get<string>('CREDENTIALS_ENCRYPTION_KEY');
    if (!secret) {
      throw new Error('CREDENTIALS_ENCRYPTION_KEY must be defined');
    }
    return createHash('sha256').update(secret).digest();
  }
}
