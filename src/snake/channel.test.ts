import { describe, it, expect } from 'vitest';
import { RendezvousChannel } from './channel';

describe('RendezvousChannel', () => {
  it('refuses a send when no receiver is waiting', () => {
    const channel = new RendezvousChannel<number>();
    expect(channel.trySend(1)).toBe(false);
    expect(channel.hasReceiver).toBe(false);
  });

  it('hands a value to a waiting receiver', async () => {
    const channel = new RendezvousChannel<number>();
    const pending = channel.recv();
    expect(channel.hasReceiver).toBe(true);
    expect(channel.trySend(7)).toBe(true);
    await expect(pending).resolves.toEqual({ value: 7, done: false });
  });

  it('never buffers: a second send before the next recv is refused', async () => {
    const channel = new RendezvousChannel<number>();
    const pending = channel.recv();
    expect(channel.trySend(1)).toBe(true);
    expect(channel.trySend(2)).toBe(false);
    await expect(pending).resolves.toEqual({ value: 1, done: false });

    const next = channel.recv();
    expect(channel.trySend(3)).toBe(true);
    await expect(next).resolves.toEqual({ value: 3, done: false });
  });

  it('wakes waiting receivers with done on close', async () => {
    const channel = new RendezvousChannel<number>();
    const pending = channel.recv();
    channel.close();
    await expect(pending).resolves.toEqual({ value: undefined, done: true });
    expect(channel.isClosed).toBe(true);
  });

  it('refuses sends and ends receives once closed', async () => {
    const channel = new RendezvousChannel<number>();
    channel.close();
    expect(channel.trySend(1)).toBe(false);
    await expect(channel.recv()).resolves.toEqual({ value: undefined, done: true });
  });

  it('iterates until closed', async () => {
    const channel = new RendezvousChannel<number>();
    const received: number[] = [];
    const consumer = (async () => {
      for await (const value of channel) {
        received.push(value);
      }
    })();

    for (const value of [1, 2, 3]) {
      // Let the consumer get back into recv before each send
      while (!channel.hasReceiver) {
        await Promise.resolve();
      }
      expect(channel.trySend(value)).toBe(true);
    }
    while (!channel.hasReceiver) {
      await Promise.resolve();
    }
    channel.close();
    await consumer;

    expect(received).toEqual([1, 2, 3]);
  });
});
