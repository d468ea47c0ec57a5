/**
 * Types for the folder queue.
 */

/** The three stores of one route */
export interface QueuePaths {
  /** Submitted, unclaimed requests */
  drafts: string;
  /** Claimed requests being processed */
  inbox: string;
  /** Finished transactions (records or error sentinels) */
  sent: string;
}

/** Store names, in lifecycle order */
export type QueueStage = keyof QueuePaths;

export const QUEUE_STAGES: readonly QueueStage[] = ['drafts', 'inbox', 'sent'] as const;

/**
 * Mutual exclusion over "who processes this draft".
 *
 * The default strategy relies on atomic rename. Storage without atomic rename
 * (for example some sync clients) can plug in a lease-based strategy here
 * without touching the processor.
 */
export interface ClaimStrategy {
  /**
   * Move `draftPath` to `inboxPath` if nobody else has.
   * Resolves false when the draft is already gone (claimed elsewhere).
   */
  claim(draftPath: string, inboxPath: string): Promise<boolean>;
}
