import { describe, it, expect } from 'vitest';
import { HandoffChannel } from '../src/channel';
import { ChannelClosedError } from '../src/errors';
import { flushMicrotasks } from './helpers';

describe('HandoffChannel', () => {
  it('should hold a send until a receiver takes the value', async () => {
    const channel = new HandoffChannel<number>();
    let delivered = false;
    const sending = channel.send(1).then(() => {
      delivered = true;
    });

    await flushMicrotasks();
    expect(delivered).toBe(false);

    await expect(channel.receive()).resolves.toEqual({ done: false, value: 1 });
    await sending;
    expect(delivered).toBe(true);
  });

  it('should hand a value straight to a waiting receiver', async () => {
    const channel = new HandoffChannel<string>();
    const receiving = channel.receive();

    await channel.send('a');

    await expect(receiving).resolves.toEqual({ done: false, value: 'a' });
  });

  it('should serve waiting senders in order', async () => {
    const channel = new HandoffChannel<number>();
    const first = channel.send(1);
    const second = channel.send(2);

    await expect(channel.receive()).resolves.toEqual({ done: false, value: 1 });
    await expect(channel.receive()).resolves.toEqual({ done: false, value: 2 });
    await Promise.all([first, second]);
  });

  it('should finish receivers and reject senders on close', async () => {
    const receiving = new HandoffChannel<number>();
    const waiting = receiving.receive();
    receiving.close();
    await expect(waiting).resolves.toEqual({ done: true, value: undefined });
    await expect(receiving.send(1)).rejects.toBeInstanceOf(ChannelClosedError);

    const sending = new HandoffChannel<number>();
    const pending = sending.send(1);
    sending.close();
    sending.close();
    await expect(pending).rejects.toThrow('Send on closed channel');
    expect(sending.isClosed).toBe(true);
  });

  it('should iterate values until closed', async () => {
    const channel = new HandoffChannel<number>();
    const seen: number[] = [];
    const consumer = (async () => {
      for await (const value of channel) seen.push(value);
    })();

    await channel.send(1);
    await channel.send(2);
    channel.close();
    await consumer;

    expect(seen).toEqual([1, 2]);
  });
});
