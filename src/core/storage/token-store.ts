import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'crypto';
import type { Platform } from '../types.js';
import type { SqliteDatabase } from './database.js';

type PlatformTokenRow = {
  platform: Platform;
  encrypted_payload: string;
  iv: string;
  updated_at: string;
};

export interface StoredToken {
  accessToken: string;
  refreshToken?: string;
  /** ISO-8601 instant; absent means the expiry is unknown. */
  expiresAt?: string;
  /** LinkedIn person URN or Threads user id. */
  accountId?: string;
}

const PBKDF2_ITERATIONS = 120_000;
const PBKDF2_KEY_LEN = 32;
const PBKDF2_SALT = 'podqueue-platform-token-encryption-v1';

function isStoredToken(value: unknown): value is StoredToken {
  if (!value || typeof value !== 'object') return false;
  const record: Record<string, unknown> = { ...value };
  return typeof record.accessToken === 'string'
    && (record.refreshToken === undefined || typeof record.refreshToken === 'string')
    && (record.expiresAt === undefined || typeof record.expiresAt === 'string')
    && (record.accountId === undefined || typeof record.accountId === 'string');
}

/**
 * OAuth tokens per platform, encrypted at rest with AES-256-GCM.
 */
export class TokenStore {
  private key: Buffer;

  constructor(private db: SqliteDatabase, secret: string, private now: () => Date = () => new Date()) {
    this.key = pbkdf2Sync(secret, PBKDF2_SALT, PBKDF2_ITERATIONS, PBKDF2_KEY_LEN, 'sha256');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS platform_tokens (
        platform TEXT PRIMARY KEY,
        encrypted_payload TEXT NOT NULL,
        iv TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  save(platform: Platform, token: StoredToken): void {
    const encrypted = this.encrypt(token);
    this.db.prepare(`
      INSERT INTO platform_tokens (platform, encrypted_payload, iv, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(platform)
      DO UPDATE SET encrypted_payload = excluded.encrypted_payload, iv = excluded.iv, updated_at = excluded.updated_at
    `).run(platform, encrypted.payload, encrypted.iv, this.now().toISOString());
  }

  /** Null when nothing is stored or the payload no longer decrypts. */
  get(platform: Platform): StoredToken | null {
    const row = this.db.prepare(
      'SELECT platform, encrypted_payload, iv, updated_at FROM platform_tokens WHERE platform = ?',
    ).get(platform) as PlatformTokenRow | undefined;
    if (!row) return null;
    return this.decrypt(row);
  }

  delete(platform: Platform): boolean {
    return this.db.prepare('DELETE FROM platform_tokens WHERE platform = ?').run(platform).changes > 0;
  }

  private encrypt(token: StoredToken): { payload: string; iv: string } {
    const iv = randomBytes(12);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const encrypted = Buffer.concat([
      cipher.update(JSON.stringify(token), 'utf8'),
      cipher.final(),
    ]);
    const authTag = cipher.getAuthTag();
    return {
      payload: `${encrypted.toString('hex')}:${authTag.toString('hex')}`,
      iv: iv.toString('hex'),
    };
  }

  private decrypt(row: PlatformTokenRow): StoredToken | null {
    const [cipherHex, authTagHex] = row.encrypted_payload.split(':');
    if (!cipherHex || !authTagHex) return null;

    let parsed: unknown;
    try {
      const decipher = createDecipheriv('aes-256-gcm', this.key, Buffer.from(row.iv, 'hex'));
      decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));
      const decrypted = Buffer.concat([
        decipher.update(Buffer.from(cipherHex, 'hex')),
        decipher.final(),
      ]);
      parsed = JSON.parse(decrypted.toString('utf8'));
    } catch {
      return null;
    }
    return isStoredToken(parsed) ? parsed : null;
  }
}
