import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  EncryptedBlobStore,
  FileBlobStore,
  MemoryBlobStore,
  contentChecksum,
  isValidBlobKey
} from '../src/storage/blobStore.js';

describe('BlobKeys', () => {
  it('accepts relative slash-separated keys only', () => {
    expect(isValidBlobKey('models/cam-1/m1.bin')).toBe(true);
    expect(isValidBlobKey('/etc/passwd')).toBe(false);
    expect(isValidBlobKey('models/../secrets')).toBe(false);
    expect(isValidBlobKey('models//m1.bin')).toBe(false);
    expect(isValidBlobKey(' padded')).toBe(false);
    expect(isValidBlobKey(42)).toBe(false);
  });

  it('hashes content with sha256', () => {
    expect(contentChecksum(Buffer.from('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});

describe('FileBlobStore', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-blobs-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('writes nested keys and reads them back', async () => {
    const store = new FileBlobStore(root);
    await store.put('snapshots/cam-1/a.png', Buffer.from('frame'));

    expect((await store.get('snapshots/cam-1/a.png')).toString()).toBe('frame');
    expect(await store.has('snapshots/cam-1/a.png')).toBe(true);
    expect(fs.readdirSync(path.join(root, 'snapshots', 'cam-1'))).toEqual(['a.png']);
  });

  it('reports missing blobs', async () => {
    const store = new FileBlobStore(root);
    await expect(store.get('missing.bin')).rejects.toMatchObject({ code: 'BlobNotFound' });
    expect(await store.has('missing.bin')).toBe(false);
    expect(await store.delete('missing.bin')).toBe(false);
  });

  it('refuses keys that escape the root', async () => {
    const store = new FileBlobStore(root);
    await expect(store.put('../outside.bin', Buffer.from('x'))).rejects.toThrow('Invalid blob key "../outside.bin"');
    expect(await store.has('../outside.bin')).toBe(false);
  });
});

describe('EncryptedBlobStore', () => {
  it('stores ciphertext and decrypts on read', async () => {
    const inner = new MemoryBlobStore();
    const store = new EncryptedBlobStore(inner, { secret: 'test-secret' });
    const plain = Buffer.from('person at the gate');

    await store.put('events/e1/0.png', plain);

    const sealed = await inner.get('events/e1/0.png');
    expect(sealed.length).toBe(plain.length + 12 + 16);
    expect(sealed.includes(plain)).toBe(false);
    expect((await store.get('events/e1/0.png')).toString()).toBe('person at the gate');
  });

  it('detects tampering and wrong keys', async () => {
    const inner = new MemoryBlobStore();
    const store = new EncryptedBlobStore(inner, { secret: 'test-secret' });
    await store.put('a.bin', Buffer.from('payload'));

    const other = new EncryptedBlobStore(inner, { secret: 'other-secret' });
    await expect(other.get('a.bin')).rejects.toMatchObject({ code: 'BlobCorrupted' });

    const sealed = await inner.get('a.bin');
    sealed[14] ^= 0xff;
    await inner.put('a.bin', sealed);
    await expect(store.get('a.bin')).rejects.toMatchObject({ code: 'BlobCorrupted' });

    await inner.put('short.bin', Buffer.alloc(8));
    await expect(store.get('short.bin')).rejects.toThrow('BlobCorrupted: Blob decryption failed');
  });
});
