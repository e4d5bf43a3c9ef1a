import { ILogger } from '../src/domain/common/ILogger';
import { IIdGenerator } from '../src/domain/common/IIdGenerator';
import { NewEmail } from '../src/types';

/**
 * Test helper utilities
 */

export function createMockLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * Deterministic ids: email_1, email_2, att_3, ...
 */
export class SequentialIdGenerator implements IIdGenerator {
  private counter = 0;

  generate(prefix: string): string {
    this.counter++;
    return `${prefix}_${this.counter}`;
  }
}

/**
 * A random source that replays `values` in a loop.
 */
export function sequenceRandom(values: number[]): () => number {
  let i = 0;
  return () => {
    const value = values[i % values.length];
    i++;
    return value;
  };
}

export const BASE_TIME = Date.UTC(2025, 2, 10, 12, 0, 0);

/**
 * Create test email data
 */
export function createTestEmail(overrides: Partial<NewEmail> = {}): NewEmail {
  return {
    subject: 'Test Subject',
    sender: 'sender@example.com',
    recipients: ['user@example.com'],
    body: 'Test body',
    timestamp: BASE_TIME,
    ...overrides,
  };
}
