// Per-guild mutex serializing playlist/player mutations and node events.
// A Map<guildId, Promise> acts as a chain; each run() appends to the end of
// the chain so tasks for one guild execute FIFO while guilds stay independent.

export type GuildMutexTask<T> = () => Promise<T> | T;

export class GuildMutex {
  private chains = new Map<string, Promise<void>>();

  async run<T>(guildId: string, task: GuildMutexTask<T>): Promise<T> {
    const prev = this.chains.get(guildId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });

    const chainPromise = prev.then(() => done);
    this.chains.set(guildId, chainPromise);

    try {
      await prev;
      return await task();
    } finally {
      release();

      if (this.chains.get(guildId) === chainPromise) {
        this.chains.delete(guildId);
      }
    }
  }

  /** Whether a task is queued or running for the guild. */
  isLocked(guildId: string): boolean {
    return this.chains.has(guildId);
  }
}

export const guildMutex = new GuildMutex();
