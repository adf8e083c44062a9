/**
 * Interface for generating unique IDs.
 */
export interface IIdGenerator {
  /**
   * Generate a unique ID with a prefix.
   * @param prefix - Prefix for the ID (e.g., 'proj', 'task', 'turn')
   * @example
   * generate('proj') => 'proj_1706884823456_a1b2c3'
   * generate('turn') => 'turn_1706884823457_d4e5f6'
   */
  generate(prefix: string): string;
}
