/**
 * Ban enforcement
 *
 * Removing a user is idempotent: banning someone who is already gone
 * reports `not_found` rather than failing. After the delete the user is
 * looked up again; if the row is still there the store is inconsistent,
 * which is logged at `critical` and reported as `integrity_fault` so the
 * caller can fall back to deactivating the account.
 *
 * Each moderated submission records its enforcement in
 * `moderation_actions`, keyed by submission. The record and the removal
 * commit together, so a retried submission never bans twice.
 */

import type { ForumDatabase } from '../memory/database.js';
import { deactivateUser, deleteUserRow, getUserById } from '../memory/database.js';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { IntegrityFault } from '../utils/errors.js';
import { isModerationLabel, type ModerationVerdict } from './classifier.js';

const logger = createModuleLogger('enforcement');

export type BanOutcome = 'banned' | 'not_found' | 'integrity_fault' | 'error';

/**
 * Delete a user and confirm they no longer resolve.
 */
export function removeUser(db: ForumDatabase, userId: string): BanOutcome {
  try {
    const user = getUserById(db, userId);
    if (!user) {
      logger.debug(`User ${userId} already removed`);
      return 'not_found';
    }

    deleteUserRow(db, userId);

    if (getUserById(db, userId)) {
      const fault = new IntegrityFault(`User ${userId} (${user.username}) still exists after deletion`);
      logger.critical(fault.message, { userId, code: fault.code });
      return 'integrity_fault';
    }

    logger.warn(`User ${userId} (${user.username}) banned and deleted`);
    return 'banned';
  } catch (error) {
    logger.error(`Error banning user ${userId}: ${errorMessage(error)}`);
    return 'error';
  }
}

/**
 * @returns true only when this call removed the user
 */
export function banUser(db: ForumDatabase, userId: string): boolean {
  return removeUser(db, userId) === 'banned';
}

export type EnforcementOutcome = 'none' | BanOutcome | 'deactivated';

export interface EnforcementRecord {
  submissionKey: string;
  userId: string;
  outcome: EnforcementOutcome;
  /** false when an earlier attempt with the same key already enforced */
  applied: boolean;
}

interface ActionRow {
  user_id: string;
  outcome: EnforcementOutcome;
}

interface RecordedActionRow extends ActionRow {
  label: string;
  reason: string;
}

export interface RecordedEnforcement {
  verdict: ModerationVerdict;
  enforcement: EnforcementRecord;
}

/**
 * Look up an enforcement already recorded for a submission key.
 * The returned record has `applied: false`.
 */
export function findEnforcement(db: ForumDatabase, submissionKey: string): RecordedEnforcement | null {
  const row = db.prepare(`
    SELECT user_id, label, reason, outcome FROM moderation_actions WHERE submission_key = ?
  `).get(submissionKey) as RecordedActionRow | undefined;

  if (!row) return null;

  return {
    // Only bans are recorded
    verdict: { label: isModerationLabel(row.label) ? row.label : 'UNKNOWN', action: 'ban', reason: row.reason },
    enforcement: { submissionKey, userId: row.user_id, outcome: row.outcome, applied: false },
  };
}

/**
 * Apply a verdict's enforcement once per submission key.
 *
 * Only `ban` has a side effect. A ban that hits an integrity fault falls
 * back to deactivating the account. Calling again with the same key
 * returns the stored outcome without touching the user.
 */
export function enforceVerdict(
  db: ForumDatabase,
  input: { submissionKey: string; userId: string; verdict: ModerationVerdict }
): EnforcementRecord {
  const { submissionKey, userId, verdict } = input;

  if (verdict.action !== 'ban') {
    return { submissionKey, userId, outcome: 'none', applied: false };
  }

  const findAction = db.prepare(`
    SELECT user_id, outcome FROM moderation_actions WHERE submission_key = ?
  `);
  const recordAction = db.prepare(`
    INSERT INTO moderation_actions (submission_key, user_id, label, action, reason, outcome, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const apply = db.transaction((): EnforcementRecord => {
    const existing = findAction.get(submissionKey) as ActionRow | undefined;
    if (existing) {
      return { submissionKey, userId: existing.user_id, outcome: existing.outcome, applied: false };
    }

    let outcome: EnforcementOutcome = removeUser(db, userId);
    if (outcome === 'error') {
      // Nothing recorded, so a retry with the same key tries again
      return { submissionKey, userId, outcome, applied: false };
    }
    if (outcome === 'integrity_fault') {
      outcome = deactivateUser(db, userId) ? 'deactivated' : 'integrity_fault';
      logger.warn(`Fell back to deactivating user ${userId}`, { outcome });
    }

    recordAction.run(
      submissionKey,
      userId,
      verdict.label,
      verdict.action,
      verdict.reason,
      outcome,
      new Date().toISOString()
    );

    return { submissionKey, userId, outcome, applied: true };
  });

  return apply();
}
