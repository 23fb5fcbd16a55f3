import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../src/utils/keyedLock';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('KeyedLock', () => {
  it('runs tasks on the same key one after another', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];

    const task = (name: string) => async () => {
      log.push(`${name}:start`);
      await tick();
      log.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run('worker:1', task('a')),
      lock.run('worker:1', task('b'))
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys overlap', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];

    await Promise.all([
      lock.run('worker:1', async () => {
        log.push('one:start');
        await tick();
        log.push('one:end');
      }),
      lock.run('worker:2', async () => {
        log.push('two:start');
        await tick();
        log.push('two:end');
      })
    ]);

    expect(log.indexOf('two:start')).toBeLessThan(log.indexOf('one:end'));
  });

  it('passes rejections through and keeps the key usable', async () => {
    const lock = new KeyedLock();

    await expect(lock.run('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('k', async () => 'after')).resolves.toBe('after');
  });

  it('forgets keys once their queue drains', async () => {
    const lock = new KeyedLock();
    const pending = lock.run('k', async () => {
      await tick();
    });
    expect(lock.size).toBe(1);
    await pending;
    expect(lock.size).toBe(0);
  });
});
