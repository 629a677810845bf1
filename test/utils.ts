import assert from 'assert';
import { InflightGroup } from '@src/utils/sync';
import { secureRandom } from '@src/utils/random';

describe('InflightGroup', function() {
  it('runs the function and returns its value', async () => {
    const group = new InflightGroup<string>();
    assert.strictEqual(await group.run('key1', async () => 'value1'), 'value1');
  });

  it('deduplicates concurrent calls with the same key', async () => {
    const group = new InflightGroup<string>();
    let callCount = 0;

    const fn = async () => {
      callCount++;
      await new Promise(resolve => setImmediate(resolve));
      return 'result';
    };

    const pending = [group.run('key', fn), group.run('key', fn), group.run('key', fn)];
    assert.strictEqual(group.size, 1);
    const results = await Promise.all(pending);

    assert.strictEqual(callCount, 1, 'Function should only be called once');
    assert.deepStrictEqual(results, ['result', 'result', 'result']);
  });

  it('runs different keys separately', async () => {
    const group = new InflightGroup<string>();
    let callCount = 0;

    const fn = async (val: string) => {
      callCount++;
      await new Promise(resolve => setImmediate(resolve));
      return val;
    };

    const results = await Promise.all([
      group.run('key1', () => fn('a')),
      group.run('key2', () => fn('b'))
    ]);

    assert.strictEqual(callCount, 2);
    assert.deepStrictEqual(results, ['a', 'b']);
  });

  it('releases the key once the call settles', async () => {
    const group = new InflightGroup<number>();
    let callCount = 0;
    const fn = async () => ++callCount;

    assert.strictEqual(await group.run('key', fn), 1);
    assert.strictEqual(group.size, 0);
    assert.strictEqual(await group.run('key', fn), 2);
  });

  it('propagates errors to all waiters and releases the key', async () => {
    const group = new InflightGroup<string>();
    const error = new Error('test error');

    const fn = async () => {
      await new Promise(resolve => setImmediate(resolve));
      throw error;
    };

    const results = await Promise.allSettled([group.run('key', fn), group.run('key', fn)]);

    assert.deepStrictEqual(results, [
      { status: 'rejected', reason: error },
      { status: 'rejected', reason: error }
    ]);
    assert.strictEqual(group.size, 0);
  });

  it('turns a synchronous throw into a rejection', async () => {
    const group = new InflightGroup<string>();
    await assert.rejects(group.run('key', () => { throw new Error('sync failure'); }), /sync failure/);
    assert.strictEqual(group.size, 0);
  });
});

describe('secureRandom', function() {
  it('returns the requested number of bytes', () => {
    assert.strictEqual(secureRandom(12).length, 12);
    assert.notDeepStrictEqual(secureRandom(16), secureRandom(16));
  });
});
