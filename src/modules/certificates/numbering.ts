import { getEnv } from '../../config/env';
import { AllocationExhaustedError } from './errors';
import { incrementCounter } from './repository';

export interface CounterStore {
  /** Atomically increments (creating at 1) and returns the new value. */
  increment(key: string): Promise<number>;
}

export type SequenceWidth = 4 | 5;

export type AllocatorOptions = {
  prefix: string;
  width: SequenceWidth;
};

export const postgresCounterStore: CounterStore = {
  increment: incrementCounter,
};

/** `YYMMDD` of the given instant in UTC. */
export function formatDateKey(now: Date): string {
  const year = String(now.getUTCFullYear() % 100).padStart(2, '0');
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  const day = String(now.getUTCDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

export function counterKeyFor(dateKey: string): string {
  return `certificate_number_${dateKey}`;
}

export class CertificateNumberAllocator {
  constructor(
    private readonly store: CounterStore,
    private readonly options: AllocatorOptions,
  ) {}

  /**
   * Allocates the next number for the UTC day of `now`, e.g. `G2509010001`.
   * Numbers are never handed out twice; a failed persist leaves a gap.
   */
  async next(now: Date = new Date()): Promise<string> {
    const dateKey = formatDateKey(now);
    const seq = await this.store.increment(counterKeyFor(dateKey));

    if (seq > 10 ** this.options.width - 1) {
      throw new AllocationExhaustedError(dateKey);
    }

    return `${this.options.prefix}${dateKey}${String(seq).padStart(this.options.width, '0')}`;
  }
}

export function createNumberAllocator(store: CounterStore = postgresCounterStore): CertificateNumberAllocator {
  const env = getEnv();
  return new CertificateNumberAllocator(store, {
    prefix: env.CERTIFICATE_NUMBER_PREFIX,
    width: env.CERTIFICATE_SEQUENCE_WIDTH === '5' ? 5 : 4,
  });
}
