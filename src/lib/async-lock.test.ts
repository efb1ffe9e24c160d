import { describe, expect, it } from 'vitest';
import { AsyncLock, KeyedLock } from './async-lock';
import { sleep } from './timing';

describe('AsyncLock', () => {
    it('grants the lock in arrival order', async () => {
        const lock = new AsyncLock();
        const order: number[] = [];

        await Promise.all([3, 1, 2].map((delay, index) =>
            lock.runExclusive(async () => {
                await sleep(delay);
                order.push(index);
            })
        ));

        expect(order).toEqual([0, 1, 2]);
        expect(lock.isLocked()).toBe(false);
    });

    it('releases the lock when the callback throws', async () => {
        const lock = new AsyncLock();
        await expect(lock.runExclusive(() => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(lock.isLocked()).toBe(false);
        await expect(lock.runExclusive(() => 'next')).resolves.toBe('next');
    });

    it('ignores a second release', async () => {
        const lock = new AsyncLock();
        const release = await lock.acquire();
        const waiter = lock.acquire();
        release();
        release();

        const releaseWaiter = await waiter;
        expect(lock.isLocked()).toBe(true);
        expect(lock.pendingCount()).toBe(0);
        releaseWaiter();
        expect(lock.isLocked()).toBe(false);
    });
});

describe('KeyedLock', () => {
    it('serializes work on one key and runs other keys in parallel', async () => {
        const locks = new KeyedLock();
        const events: string[] = [];

        const task = (key: string, label: string, delay: number) => locks.runExclusive(key, async () => {
            events.push(`${label}:start`);
            await sleep(delay);
            events.push(`${label}:end`);
        });

        await Promise.all([task('a', 'a1', 20), task('a', 'a2', 1), task('b', 'b1', 1)]);

        expect(events.indexOf('a1:end')).toBeLessThan(events.indexOf('a2:start'));
        expect(events.indexOf('b1:end')).toBeLessThan(events.indexOf('a1:end'));
    });

    it('drops locks nobody holds', async () => {
        const locks = new KeyedLock();
        await locks.runExclusive('a', () => undefined);
        expect(locks.size()).toBe(0);
        expect(locks.isLocked('a')).toBe(false);
    });
});
