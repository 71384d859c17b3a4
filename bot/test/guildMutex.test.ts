import { describe, expect, it } from 'vitest';
import { GuildMutex } from '../src/guildMutex.js';
import { delay } from '../src/util.js';

describe('GuildMutex', () => {
  it('should run tasks for one guild in FIFO order', async () => {
    const mutex = new GuildMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.run('g1', async () => {
        order.push('a:start');
        await delay(20);
        order.push('a:end');
      }),
      mutex.run('g1', async () => {
        order.push('b:start');
        await delay(5);
        order.push('b:end');
      }),
      mutex.run('g1', () => {
        order.push('c');
      }),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c']);
  });

  it('should not block other guilds', async () => {
    const mutex = new GuildMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.run('g1', async () => {
        await delay(20);
        order.push('g1');
      }),
      mutex.run('g2', () => {
        order.push('g2');
      }),
    ]);

    expect(order).toEqual(['g2', 'g1']);
  });

  it('should return task results', async () => {
    const mutex = new GuildMutex();
    await expect(mutex.run('g1', () => 42)).resolves.toBe(42);
  });

  it('should release the lock when a task fails', async () => {
    const mutex = new GuildMutex();

    await expect(
      mutex.run('g1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.run('g1', () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('g1')).toBe(false);
  });

  it('should report whether a guild is locked', async () => {
    const mutex = new GuildMutex();
    let observed = false;

    await mutex.run('g1', () => {
      observed = mutex.isLocked('g1');
    });

    expect(observed).toBe(true);
    expect(mutex.isLocked('g1')).toBe(false);
  });
});
