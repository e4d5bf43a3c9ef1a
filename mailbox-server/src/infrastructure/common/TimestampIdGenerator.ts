import { IIdGenerator } from '../../domain/common/IIdGenerator';

/**
 * ID generator that uses timestamps and random strings.
 * Generates IDs in the format: {prefix}_{timestamp}_{random}
 */
export class TimestampIdGenerator implements IIdGenerator {
  private lastTimestamp = 0;
  private sequence = 0;

  /**
   * Generate a unique ID with the given prefix.
   * A per-millisecond counter is folded into the random part so ids
   * minted in a tight loop stay distinct.
   */
  generate(prefix: string): string {
    const timestamp = Date.now();
    if (timestamp === this.lastTimestamp) {
      this.sequence++;
    } else {
      this.lastTimestamp = timestamp;
      this.sequence = 0;
    }
    const random = Math.random().toString(36).slice(2, 8);
    return `${prefix}_${timestamp}_${this.sequence.toString(36)}${random}`;
  }

  /**
   * Validate an ID format.
   * @returns true if ID matches prefix_timestamp_random
   */
  validate(id: string): boolean {
    const parts = id.split('_');
    if (parts.length < 3) return false;

    const timestamp = parseInt(parts[parts.length - 2], 10);
    return !isNaN(timestamp);
  }
}
