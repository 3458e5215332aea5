/**
 * Fixed strings and codes of the engine's callback protocol
 */

/** Returned by a poll callback to let the engine carry on. */
export const POLL_CONTINUE = 0;
/** Returned by a poll callback to make the engine abort the backup. */
export const POLL_CANCEL = -1;

/** First poll message of every backup; carries no progress data. */
export const PREPARING_BACKUP_PREFIX = "Preparing backup";
