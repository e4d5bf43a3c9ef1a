/**
 * Interface for generating unique IDs.
 */
export interface IIdGenerator {
  /**
   * Generate a unique ID with optional prefix.
   * @param prefix - Prefix for the ID (e.g., 'email', 'att')
   * @example
   * generate('email') => 'email_1706884823456_a1b2c3'
   * generate('att') => 'att_1706884823457_d4e5f6'
   */
  generate(prefix: string): string;

  /**
   * Validate an ID format.
   */
  validate?(id: string): boolean;
}
