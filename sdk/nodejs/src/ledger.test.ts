// SPDX-License-Identifier: MIT

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ExchangeLedger, clampedDelta } from './ledger.js';

describe('clampedDelta', () => {
  const testCases: [number, number, number][] = [
    [150, 100, 50],
    [100, 0, 100],
    [150, 150, 0],
    [90, 100, 0],
    [0, 0, 0],
  ];

  for (const [current, previous, expected] of testCases) {
    it(`should return ${expected} for ${current} after ${previous}`, () => {
      assert.strictEqual(clampedDelta(current, previous), expected);
    });
  }

  it('should yield each step difference and never go negative over a sequence', () => {
    const totals = [0, 40, 40, 100, 30, 35];
    const deltas: number[] = [];
    let previous = 0;
    for (const total of totals) {
      deltas.push(clampedDelta(total, previous));
      previous = total;
    }
    assert.deepStrictEqual(deltas, [0, 40, 0, 60, 0, 5]);
  });
});

describe('ExchangeLedger', () => {
  it('should measure a new peer from zero', () => {
    const ledger = new ExchangeLedger();

    assert.strictEqual(ledger.record('peer-p', 10), 10);
    assert.strictEqual(ledger.get('peer-p'), 10);
    assert.strictEqual(ledger.size, 1);
  });

  it('should return the increase since the last observation', () => {
    const ledger = new ExchangeLedger();
    ledger.record('peer-p', 10);

    assert.strictEqual(ledger.record('peer-p', 12), 2);
    assert.strictEqual(ledger.get('peer-p'), 12);
  });

  it('should clamp a reset counter to zero and store the new value', () => {
    const ledger = new ExchangeLedger();
    ledger.record('peer-p', 10);

    assert.strictEqual(ledger.record('peer-p', 3), 0);
    assert.strictEqual(ledger.get('peer-p'), 3);
  });

  it('should keep peers that are no longer recorded', () => {
    const ledger = new ExchangeLedger();
    ledger.record('peer-p', 10);
    ledger.record('peer-q', 5);
    ledger.record('peer-q', 8);

    assert.ok(ledger.has('peer-p'));
    assert.strictEqual(ledger.get('peer-p'), 10);
    assert.strictEqual(ledger.size, 2);
  });

  it('should report unknown peers as absent', () => {
    const ledger = new ExchangeLedger();

    assert.strictEqual(ledger.has('peer-x'), false);
    assert.strictEqual(ledger.get('peer-x'), undefined);
  });
});
