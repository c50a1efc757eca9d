import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import type { IPasswordHasher } from './IPasswordHasher.js';

const SCHEME = 'scrypt';
const SALT_BYTES = 16;

function deriveKey(password: string, salt: Buffer, keyLength: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

// Stored format: scrypt$<salt hex>$<key hex>
export class ScryptPasswordHasher implements IPasswordHasher {
  constructor(private readonly keyLength: number = 64) {}

  async hash(password: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await deriveKey(password, salt, this.keyLength);
    return `${SCHEME}$${salt.toString('hex')}$${key.toString('hex')}`;
  }

  async verify(password: string, storedHash: string): Promise<boolean> {
    const [scheme, saltHex, keyHex] = storedHash.split('$');
    if (scheme !== SCHEME || !saltHex || !keyHex) return false;

    const expected = Buffer.from(keyHex, 'hex');
    if (expected.length === 0) return false;

    const actual = await deriveKey(password, Buffer.from(saltHex, 'hex'), expected.length);
    return timingSafeEqual(expected, actual);
  }
}
