import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { Clock, systemClock } from '../../domain/common/Clock';

/**
 * ID generator that uses timestamps and random strings.
 * Generates IDs in the format: {prefix}_{timestamp}_{random}
 */
export class TimestampIdGenerator implements IIdGenerator {
  constructor(private readonly clock: Clock = systemClock) {}

  generate(prefix: string): string {
    const random = Math.random().toString(36).slice(2, 11);
    return `${prefix}_${this.clock()}_${random}`;
  }

  /**
   * Check an ID has the prefix_timestamp_random shape.
   */
  validate(id: string): boolean {
    const parts = id.split('_');
    if (parts.length < 3) return false;

    const timestamp = parseInt(parts[parts.length - 2], 10);
    return !isNaN(timestamp);
  }
}
