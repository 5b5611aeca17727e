import { describe, it, expect } from '@jest/globals';
import { MockClusterAdapter, MockClusterError } from '../../adapters';
import { MigrationCancelledError, ReadOnlyStalledError } from '../../utils/errors';
import { ReadOnlyGate } from '../ReadOnlyGate';

function setup(writeBlockVisibleAfter = 1) {
  const adapter = new MockClusterAdapter({ writeBlockVisibleAfter });
  adapter.addIndex('concepts-1.0.0', [{ id: 'doc-1', source: { tier: 'primary' } }]);
  const gate = new ReadOnlyGate(adapter, { pollIntervalMs: 1 });
  return { adapter, gate };
}

describe('ReadOnlyGate', () => {
  it('rejects writes once read-only is confirmed', async () => {
    const { adapter, gate } = setup();

    await gate.setReadOnly('concepts-1.0.0');
    await gate.waitUntilReadOnly('concepts-1.0.0', 5);

    expect(() => adapter.indexDocument('concepts-1.0.0', { id: 'doc-2', source: {} })).toThrow(
      'index [concepts-1.0.0] blocked by: [FORBIDDEN/8/index write (api)];'
    );
    expect(adapter.getDocumentCount('concepts-1.0.0')).toBe(1);
    expect(adapter.getCallCount('getWriteBlock')).toBe(1);
  });

  it('re-issues the read-only setting until it is observed', async () => {
    const { adapter, gate } = setup(3);

    await gate.setReadOnly('concepts-1.0.0');
    await gate.waitUntilReadOnly('concepts-1.0.0', 5);

    // 1回目の設定 + 未反映の観測2回ごとに再設定
    expect(adapter.getCallCount('setWriteBlock')).toBe(3);
    expect(adapter.getCallCount('getWriteBlock')).toBe(3);
  });

  it('fails after the retry budget is exhausted', async () => {
    const { adapter, gate } = setup(Number.POSITIVE_INFINITY);

    await gate.setReadOnly('concepts-1.0.0');
    await expect(gate.waitUntilReadOnly('concepts-1.0.0', 3)).rejects.toThrow(
      new ReadOnlyStalledError('concepts-1.0.0').message
    );
    expect(adapter.getCallCount('getWriteBlock')).toBe(3);
  });

  it('propagates the settings error that exhausts the budget', async () => {
    const { adapter, gate } = setup();
    const failure = new MockClusterError('no such index [concepts-1.0.0]', 404, 'index_not_found_exception');
    adapter.failNext('getWriteBlock', failure, 2);

    await expect(gate.waitUntilReadOnly('concepts-1.0.0', 2)).rejects.toBe(failure);
  });

  it('recovers from transient settings errors', async () => {
    const { adapter, gate } = setup();
    adapter.failNext('getWriteBlock', new Error('socket hang up'), 2);

    await gate.waitUntilReadOnly('concepts-1.0.0', 5);

    expect(adapter.getCallCount('getWriteBlock')).toBe(3);
  });

  it('stops when cancelled', async () => {
    const { gate } = setup(Number.POSITIVE_INFINITY);
    const controller = new AbortController();
    controller.abort();

    await expect(gate.waitUntilReadOnly('concepts-1.0.0', 0, controller.signal)).rejects.toBeInstanceOf(
      MigrationCancelledError
    );
  });
});
