/**
 * One-to-one mapping from outstanding request ids to their pending
 * completion callbacks.
 */

import { DuplicateRequestIdError, UnmatchedReplyError } from '../errors.js';

export interface PendingCompletion<TResult, TError = unknown, TProgress = unknown> {
  onSuccess: (result: TResult) => void;
  onError: (error: TError) => void;
  onProgress?: (progress: TProgress) => void;
}

export type ReplyOutcome<TResult, TError> =
  | { isError: false; payload: TResult }
  | { isError: true; payload: TError };

/**
 * Every registered entry is completed at most once: `resolve` removes the
 * entry before calling back, so a duplicate reply surfaces as an
 * `UnmatchedReplyError` instead of a second invocation.
 */
export class CorrelationTable<TResult, TError = unknown, TProgress = unknown> {
  private entries = new Map<string, PendingCompletion<TResult, TError, TProgress>>();
  private abandoned = new Set<string>();

  register(id: string, completion: PendingCompletion<TResult, TError, TProgress>): void {
    if (this.entries.has(id) || this.abandoned.has(id)) {
      throw new DuplicateRequestIdError(id);
    }
    this.entries.set(id, completion);
  }

  /**
   * Remove the entry and call exactly one of its completion callbacks.
   * Returns false when the entry had been abandoned and the reply was dropped.
   * @throws UnmatchedReplyError when nothing is pending under `id`
   */
  resolve(id: string, outcome: ReplyOutcome<TResult, TError>): boolean {
    if (this.abandoned.delete(id)) return false;

    const completion = this.entries.get(id);
    if (!completion) {
      throw new UnmatchedReplyError(id);
    }
    this.entries.delete(id);

    if (outcome.isError) {
      completion.onError(outcome.payload);
    } else {
      completion.onSuccess(outcome.payload);
    }
    return true;
  }

  /** Forward an intermediate update. Returns false when `id` is not pending. */
  progress(id: string, payload: TProgress): boolean {
    if (this.abandoned.has(id)) return false;
    const completion = this.entries.get(id);
    if (!completion) return false;
    completion.onProgress?.(payload);
    return true;
  }

  /**
   * Drop the callbacks of a pending entry but remember its id. A reply that
   * still arrives is consumed without effect; one that never arrives leaves
   * the id behind.
   */
  abandon(id: string): boolean {
    if (!this.entries.delete(id)) return false;
    this.abandoned.add(id);
    return true;
  }

  /** Forget a pending entry without remembering its id. */
  remove(id: string): boolean {
    return this.entries.delete(id);
  }

  /** Fail every pending entry and empty the table. */
  rejectAll(error: TError): void {
    const pending = [...this.entries.values()];
    this.entries.clear();
    this.abandoned.clear();
    for (const completion of pending) {
      completion.onError(error);
    }
  }

  /** Whether a live (not abandoned) entry is pending under `id`. */
  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }
}
