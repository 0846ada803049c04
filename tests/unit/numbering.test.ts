import { describe, expect, it } from 'vitest';

import { AllocationExhaustedError } from '../../src/modules/certificates/errors';
import {
  CertificateNumberAllocator,
  counterKeyFor,
  createNumberAllocator,
  formatDateKey,
} from '../../src/modules/certificates/numbering';
import type { CounterStore } from '../../src/modules/certificates/numbering';

class MemoryCounterStore implements CounterStore {
  readonly counters = new Map<string, number>();

  async increment(key: string): Promise<number> {
    await Promise.resolve();
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    return next;
  }
}

const SEPT_FIRST = new Date('2025-09-01T10:00:00.000Z');

describe('formatDateKey', () => {
  it('uses the UTC calendar day', () => {
    expect(formatDateKey(SEPT_FIRST)).toBe('250901');
    expect(formatDateKey(new Date('2025-09-01T23:30:00.000-05:00'))).toBe('250902');
    expect(formatDateKey(new Date('2009-01-05T00:00:00.000Z'))).toBe('090105');
  });
});

describe('CertificateNumberAllocator', () => {
  it('starts a fresh day at one and increments', async () => {
    const store = new MemoryCounterStore();
    const allocator = new CertificateNumberAllocator(store, { prefix: 'G', width: 4 });

    await expect(allocator.next(SEPT_FIRST)).resolves.toBe('G2509010001');
    await expect(allocator.next(SEPT_FIRST)).resolves.toBe('G2509010002');
    expect(store.counters.get(counterKeyFor('250901'))).toBe(2);
  });

  it('keeps separate sequences per day', async () => {
    const allocator = new CertificateNumberAllocator(new MemoryCounterStore(), { prefix: 'G', width: 4 });

    await allocator.next(SEPT_FIRST);
    await expect(allocator.next(new Date('2025-09-02T08:00:00.000Z'))).resolves.toBe('G2509020001');
  });

  it('hands out distinct numbers to concurrent callers', async () => {
    const allocator = new CertificateNumberAllocator(new MemoryCounterStore(), { prefix: 'G', width: 4 });

    const numbers = await Promise.all(Array.from({ length: 25 }, () => allocator.next(SEPT_FIRST)));
    const expected = Array.from({ length: 25 }, (_value, index) => `G250901${String(index + 1).padStart(4, '0')}`);

    expect(new Set(numbers).size).toBe(25);
    expect([...numbers].sort()).toEqual(expected);
  });

  it('fails once the daily sequence exceeds its width', async () => {
    const store: CounterStore = { increment: async () => 10_000 };

    await expect(
      new CertificateNumberAllocator(store, { prefix: 'G', width: 4 }).next(SEPT_FIRST),
    ).rejects.toBeInstanceOf(AllocationExhaustedError);
    await expect(new CertificateNumberAllocator(store, { prefix: 'G', width: 5 }).next(SEPT_FIRST)).resolves.toBe(
      'G25090110000',
    );
  });

  it('reads prefix and width from configuration', async () => {
    const allocator = createNumberAllocator(new MemoryCounterStore());
    await expect(allocator.next(SEPT_FIRST)).resolves.toBe('G2509010001');
  });
});
