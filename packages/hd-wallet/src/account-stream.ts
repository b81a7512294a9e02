import type { Account } from "./account";
import { BoundedQueue } from "./bounded-queue";
import { StorageError, WalletError } from "./errors";
import type { WalletLogger } from "./logger";

interface PassState {
  skipped: number;
}

export interface AccountStreamOptions {
  bufferSize: number;
  logger: WalletLogger;
  walletId: string;
}

/**
 * Lazily decoded accounts of one wallet. Each `for await` starts a fresh read
 * of the store; a producer decodes ahead of the consumer into a bounded
 * queue, and leaving the loop early stops it and closes the store read.
 *
 * Records that fail to decode are skipped and counted in {@link skipped}.
 * Every pass keeps its own count, so overlapping passes do not disturb each other.
 */
export class AccountStream implements AsyncIterable<Account> {
  private latestPass: PassState = { skipped: 0 };

  constructor(
    private readonly source: () => AsyncIterable<Uint8Array>,
    private readonly decode: (data: Uint8Array) => Account,
    private readonly options: AccountStreamOptions,
  ) {}

  /** Undecodable records skipped by the most recently started pass. */
  get skipped(): number {
    return this.latestPass.skipped;
  }

  [Symbol.asyncIterator](): AsyncIterator<Account> {
    const pass: PassState = { skipped: 0 };
    this.latestPass = pass;
    const queue = new BoundedQueue<Account>(this.options.bufferSize);
    const producer = this.produce(queue, pass);

    return {
      next: () => queue.next(),
      return: async (): Promise<IteratorResult<Account>> => {
        queue.cancel();
        await producer;
        return { value: undefined, done: true };
      },
    };
  }

  /** Collects every decodable account. */
  async toArray(): Promise<Account[]> {
    const accounts: Account[] = [];
    for await (const account of this) {
      accounts.push(account);
    }
    return accounts;
  }

  private async produce(queue: BoundedQueue<Account>, pass: PassState): Promise<void> {
    const { logger, walletId } = this.options;
    try {
      for await (const data of this.source()) {
        let account: Account;
        try {
          account = this.decode(data);
        } catch (err) {
          pass.skipped++;
          logger.warn("Skipping undecodable account record", { wallet: walletId, error: err });
          continue;
        }
        const accepted = await queue.push(account);
        if (!accepted) {
          logger.debug("Account listing cancelled", { wallet: walletId });
          return;
        }
      }
      queue.close();
    } catch (err) {
      queue.fail(
        err instanceof WalletError
          ? err
          : new StorageError("Failed to read accounts", { wallet: walletId }, { cause: err }),
      );
    }
  }
}
