import { describe, expect, it } from 'vitest';
import { BoundedChannel } from '../src/channel.js';

interface Item {
  n: number;
}

describe('BoundedChannel', () => {
  it('rejects a capacity below one', () => {
    expect(() => new BoundedChannel<Item>(0)).toThrow(RangeError);
  });

  it('hands items over in order', async () => {
    const channel = new BoundedChannel<Item>(4);
    await channel.push({ n: 1 });
    await channel.push({ n: 2 });

    const first = await channel.take();
    const second = await channel.take();

    expect(first).toEqual({ value: { n: 1 }, done: false });
    expect(second).toEqual({ value: { n: 2 }, done: false });
  });

  it('holds the producer back while full', async () => {
    const channel = new BoundedChannel<Item>(1);
    await channel.push({ n: 1 });
    let accepted = false;
    const blocked = channel.push({ n: 2 }).then(() => {
      accepted = true;
    });

    await Promise.resolve();
    expect(accepted).toBe(false);
    expect(channel.size).toBe(1);

    expect((await channel.take()).value).toEqual({ n: 1 });
    await blocked;
    expect(accepted).toBe(true);
    expect((await channel.take()).value).toEqual({ n: 2 });
  });

  it('wakes a waiting consumer on push', async () => {
    const channel = new BoundedChannel<Item>(1);
    const pending = channel.take();

    await channel.push({ n: 7 });

    expect(await pending).toEqual({ value: { n: 7 }, done: false });
    expect(channel.size).toBe(0);
  });

  it('drains accepted items after close, then ends', async () => {
    const channel = new BoundedChannel<Item>(2);
    await channel.push({ n: 1 });
    channel.close();

    expect((await channel.take()).value).toEqual({ n: 1 });
    expect(await channel.take()).toEqual({ value: undefined, done: true });
  });

  it('rejects blocked and later producers once closed', async () => {
    const channel = new BoundedChannel<Item>(1);
    await channel.push({ n: 1 });
    const blocked = channel.push({ n: 2 });

    channel.close();

    await expect(blocked).rejects.toThrow('channel closed');
    await expect(channel.push({ n: 3 })).rejects.toThrow('channel closed');
  });

  it('ends waiting consumers on close', async () => {
    const channel = new BoundedChannel<Item>(1);
    const pending = channel.take();

    channel.close();

    expect(await pending).toEqual({ value: undefined, done: true });
  });

  it('iterates with for await until closed', async () => {
    const channel = new BoundedChannel<Item>(3);
    await channel.push({ n: 1 });
    await channel.push({ n: 2 });
    channel.close();
    const seen: number[] = [];

    for await (const item of channel) seen.push(item.n);

    expect(seen).toEqual([1, 2]);
  });
});
