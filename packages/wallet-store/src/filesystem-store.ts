import type { Dir } from 'node:fs';
import { mkdir, opendir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { bytesToUtf8 } from '@hdkeystore/helpers';
import type { Store } from './types';

const INDEX_FILE = 'index';
const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

const walletNameSchema = z.object({ name: z.string() });

const UNSAFE_SEGMENT = /[\/\\\0]/;

function assertSafeSegment(segment: string): string {
  if (segment === '' || segment === '.' || segment === '..' || UNSAFE_SEGMENT.test(segment)) {
    throw new Error(`Refusing unsafe store key "${segment}"`);
  }
  return segment;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readIfExists(path: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

function walletNameOf(data: Uint8Array): string | null {
  try {
    const parsed = walletNameSchema.safeParse(JSON.parse(bytesToUtf8(data)));
    return parsed.success ? parsed.data.name : null;
  } catch {
    // Not a readable wallet record, so it cannot be the one being looked up.
    return null;
  }
}

/**
 * One directory per wallet under `baseDir`:
 *
 *   <baseDir>/<walletId>/<walletId>   wallet record
 *   <baseDir>/<walletId>/<accountId>  account records
 *   <baseDir>/<walletId>/index        account name index
 *
 * Ids are used as single path segments; an id that could step outside its
 * directory is rejected before any file is touched.
 */
export class FilesystemStore implements Store {
  readonly name = 'filesystem';

  constructor(private readonly baseDir: string) {}

  async storeWallet(walletId: string, _walletName: string, data: Uint8Array): Promise<void> {
    await this.writeWalletFile(walletId, walletId, data);
  }

  async retrieveWallet(walletName: string): Promise<Uint8Array | null> {
    for await (const data of this.retrieveWallets()) {
      if (walletNameOf(data) === walletName) {
        return data;
      }
    }
    return null;
  }

  async *retrieveWallets(): AsyncGenerator<Uint8Array> {
    let walletIds: string[];
    try {
      const entries = await readdir(this.baseDir, { withFileTypes: true });
      walletIds = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }
    for (const walletId of walletIds) {
      const data = await readIfExists(this.pathOf(walletId, walletId));
      if (data) yield data;
    }
  }

  async storeAccount(walletId: string, accountId: string, data: Uint8Array): Promise<void> {
    await this.writeWalletFile(walletId, accountId, data);
  }

  async retrieveAccount(walletId: string, accountId: string): Promise<Uint8Array | null> {
    if (accountId === walletId || accountId === INDEX_FILE) return null;
    return readIfExists(this.pathOf(walletId, accountId));
  }

  async *retrieveAccounts(walletId: string): AsyncGenerator<Uint8Array> {
    let dir: Dir;
    try {
      dir = await opendir(this.pathOf(walletId));
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }
    // The directory handle is closed when iteration finishes or is abandoned.
    for await (const entry of dir) {
      if (!entry.isFile() || entry.name === walletId || entry.name === INDEX_FILE) continue;
      const data = await readIfExists(this.pathOf(walletId, entry.name));
      if (data) yield data;
    }
  }

  async storeAccountsIndex(walletId: string, data: Uint8Array): Promise<void> {
    await this.writeWalletFile(walletId, INDEX_FILE, data);
  }

  async retrieveAccountsIndex(walletId: string): Promise<Uint8Array | null> {
    return readIfExists(this.pathOf(walletId, INDEX_FILE));
  }

  private async writeWalletFile(walletId: string, file: string, data: Uint8Array): Promise<void> {
    const path = this.pathOf(walletId, file);
    await mkdir(this.pathOf(walletId), { recursive: true, mode: DIR_MODE });
    await writeFile(path, data, { mode: FILE_MODE });
  }

  private pathOf(walletId: string, file?: string): string {
    const dir = join(this.baseDir, assertSafeSegment(walletId));
    return file === undefined ? dir : join(dir, assertSafeSegment(file));
  }
}
