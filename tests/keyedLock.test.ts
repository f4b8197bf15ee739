import assert from 'node:assert/strict';
import test from 'node:test';

import { KeyedLock } from '../src/services/keyedLock.js';
import { deferred } from './support/deferred.js';

test('KeyedLock: 同じキーは到着順に直列、別のキーは並行', async () => {
  const lock = new KeyedLock();
  const order: string[] = [];
  const gate = deferred();

  const first = lock.run('a', async () => {
    order.push('first:start');
    await gate.promise;
    order.push('first:end');
  });
  const second = lock.run('a', async () => {
    order.push('second');
  });
  const other = lock.run('b', async () => {
    order.push('other');
  });

  await other;
  assert.deepEqual(order, ['first:start', 'other']);
  assert.equal(lock.isLocked('a'), true);
  assert.equal(lock.isLocked('b'), false);

  gate.resolve();
  await Promise.all([first, second]);
  assert.deepEqual(order, ['first:start', 'other', 'first:end', 'second']);
  assert.equal(lock.size, 0);
});

test('KeyedLock: 失敗したタスクは後続をブロックしない', async () => {
  const lock = new KeyedLock();
  await assert.rejects(lock.run('k', async () => {
    throw new Error('boom');
  }), /boom/);
  assert.equal(await lock.run('k', () => 42), 42);
  assert.equal(lock.size, 0);
});
