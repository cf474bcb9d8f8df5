/**
 * Reverses journaled actions, newest first.
 *
 * Processing is best effort: a failing entry is logged and left in the
 * journal, later entries are still attempted, and earlier successes are never
 * rolled back. Deletions cannot be reversed; they are reported and dropped
 * from the journal so they are not retried.
 */

import type { ActionJournal } from './action-journal.js';
import { processBatch } from './batch-processor.js';
import { InvalidArgumentError, errorMessage } from './errors.js';
import { Logger } from './logger.js';
import { pathExists, restoreExact } from './safe-mover.js';
import { ActionEntry, DeletionEntry, RelocationEntry, UndoCount, UndoOutcome, UndoResult } from './types.js';

export interface UndoEngineOptions {
  logger?: Logger;
  /** Exact-path move used for restores. */
  restore?: (from: string, to: string) => void;
}

export class UndoEngine {
  private journal: ActionJournal;
  private logger: Logger;
  private restore: (from: string, to: string) => void;

  constructor(journal: ActionJournal, options: UndoEngineOptions = {}) {
    this.journal = journal;
    this.logger = options.logger ?? new Logger({ context: 'undo' });
    this.restore = options.restore ?? restoreExact;
  }

  undo(count: UndoCount = 1): UndoResult {
    const limit = this.resolveCount(count);
    if (limit === 0) {
      this.logger.info('Nothing to undo');
      return { success: false, outcomes: [], removedIds: [] };
    }

    const entries = this.journal.mostRecent(limit);
    if (entries.length === 0) {
      this.logger.info('Nothing to undo');
      return { success: false, outcomes: [], removedIds: [] };
    }

    const batch = processBatch(entries, entry => this.reverse(entry));
    const outcomes: UndoOutcome[] = batch.results.map((result): UndoOutcome =>
      result.value ?? {
        entry: result.item,
        status: 'failed',
        reason: result.error ? result.error.message : 'unknown failure',
      }
    );

    const removable = outcomes
      .filter(outcome => outcome.status !== 'failed')
      .map(outcome => outcome.entry.id);

    let removedIds: number[] = [];
    if (removable.length > 0) {
      try {
        this.journal.delete(removable);
        removedIds = removable;
      } catch (error) {
        this.logger.error(
          'Reversed actions could not be removed from the journal',
          error instanceof Error ? error : undefined,
          { ids: removable, cause: errorMessage(error) }
        );
      }
    }

    const restored = outcomes.filter(outcome => outcome.status === 'restored').length;
    this.logger.info(`Undo finished: ${restored}/${outcomes.length} action(s) reversed`);

    return { success: restored > 0, outcomes, removedIds };
  }

  private resolveCount(count: UndoCount): number {
    if (count === 'all') return this.journal.count();
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidArgumentError(`Undo count must be a positive integer or "all", got ${count}`);
    }
    return count;
  }

  private reverse(entry: ActionEntry): UndoOutcome {
    switch (entry.kind) {
      case 'move':
      case 'rename':
        return this.reverseRelocation(entry);
      case 'delete':
        return this.reportDeletion(entry);
    }
  }

  private reverseRelocation(entry: RelocationEntry): UndoOutcome {
    const destinationPresent = pathExists(entry.destination);
    const sourcePresent = pathExists(entry.source);

    if (!destinationPresent || sourcePresent) {
      const reason = !destinationPresent
        ? `${entry.destination} no longer exists`
        : `${entry.source} is occupied`;
      this.logger.error(`Cannot undo ${entry.kind} #${entry.id}: ${reason}`, undefined, {
        source: entry.source,
        destination: entry.destination,
      });
      return { entry, status: 'failed', reason };
    }

    try {
      this.restore(entry.destination, entry.source);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`Cannot undo ${entry.kind} #${entry.id}: ${reason}`, error instanceof Error ? error : undefined);
      return { entry, status: 'failed', reason };
    }

    this.logger.info(`Undid ${entry.kind}: ${entry.destination} -> ${entry.source}`);
    return { entry, status: 'restored' };
  }

  private reportDeletion(entry: DeletionEntry): UndoOutcome {
    const reason = `Deleted file cannot be restored: ${entry.source}`;
    this.logger.warn(reason, { id: entry.id });
    return { entry, status: 'unrestorable', reason };
  }
}
