/**
 * What happens to the owner fee when the winner transfer fails.
 */
export enum PayoutPolicy {
  /** Owner fee is returned to the vault, so neither transfer sticks. */
  ATOMIC = 'atomic',
  /** Owner fee stays with the owner even though the winner was not paid. */
  PARTIAL = 'partial',
}
