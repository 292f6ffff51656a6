import { createCipheriv, createDecipheriv, createHash, randomBytes, randomUUID, scryptSync } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { SentinelError } from '../errors.js';

export interface BlobStore {
  put(key: string, bytes: Uint8Array): Promise<string>;
  get(key: string): Promise<Buffer>;
  has(key: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
}

const NONCE_BYTES = 12;
const TAG_BYTES = 16;
const KEY_BYTES = 32;

export function contentChecksum(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export function isValidBlobKey(key: unknown): key is string {
  if (typeof key !== 'string') {
    return false;
  }
  const trimmed = key.trim();
  if (!trimmed || trimmed !== key || key.startsWith('/') || key.includes('\\') || key.includes('\0')) {
    return false;
  }
  return key.split('/').every(segment => segment.length > 0 && segment !== '.' && segment !== '..');
}

function assertBlobKey(key: string) {
  if (!isValidBlobKey(key)) {
    throw new RangeError(`Invalid blob key "${key}"`);
  }
}

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Buffer>();

  async put(key: string, bytes: Uint8Array) {
    assertBlobKey(key);
    this.blobs.set(key, Buffer.from(bytes));
    return key;
  }

  async get(key: string) {
    const blob = this.blobs.get(key);
    if (!blob) {
      throw new SentinelError('BlobNotFound', `Blob ${key} not found`);
    }
    return Buffer.from(blob);
  }

  async has(key: string) {
    return this.blobs.has(key);
  }

  async delete(key: string) {
    return this.blobs.delete(key);
  }

  keys() {
    return Array.from(this.blobs.keys()).sort();
  }
}

export class FileBlobStore implements BlobStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async put(key: string, bytes: Uint8Array) {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, bytes);
    await fs.rename(temp, target);
    return key;
  }

  async get(key: string) {
    const target = this.resolve(key);
    try {
      return await fs.readFile(target);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new SentinelError('BlobNotFound', `Blob ${key} not found`, { cause: error });
      }
      throw error;
    }
  }

  async has(key: string) {
    if (!isValidBlobKey(key)) {
      return false;
    }
    try {
      const stats = await fs.stat(this.resolve(key));
      return stats.isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async delete(key: string) {
    try {
      await fs.unlink(this.resolve(key));
      return true;
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  private resolve(key: string) {
    assertBlobKey(key);
    return path.join(this.root, ...key.split('/'));
  }
}

export type EncryptionOptions = {
  secret: string;
  salt?: string;
};

export class EncryptedBlobStore implements BlobStore {
  private readonly inner: BlobStore;
  private readonly key: Buffer;

  constructor(inner: BlobStore, options: EncryptionOptions) {
    this.inner = inner;
    this.key = scryptSync(options.secret, options.salt ?? 'sentinel-blob-store', KEY_BYTES);
  }

  async put(key: string, bytes: Uint8Array) {
    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv('aes-256-gcm', this.key, nonce);
    const ciphertext = Buffer.concat([cipher.update(bytes), cipher.final()]);
    const sealed = Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
    return this.inner.put(key, sealed);
  }

  async get(key: string) {
    const sealed = await this.inner.get(key);
    if (sealed.length < NONCE_BYTES + TAG_BYTES) {
      throw new SentinelError('BlobCorrupted', 'Blob decryption failed');
    }
    const nonce = sealed.subarray(0, NONCE_BYTES);
    const tag = sealed.subarray(sealed.length - TAG_BYTES);
    const ciphertext = sealed.subarray(NONCE_BYTES, sealed.length - TAG_BYTES);
    try {
      const decipher = createDecipheriv('aes-256-gcm', this.key, nonce);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw new SentinelError('BlobCorrupted', 'Blob decryption failed', { cause: error });
    }
  }

  has(key: string) {
    return this.inner.has(key);
  }

  delete(key: string) {
    return this.inner.delete(key);
  }
}

function isMissingFileError(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
