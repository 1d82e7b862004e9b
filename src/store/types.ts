import type { CandidateLink, LinkRecord } from "../pipeline/types";

/**
 * Durable record of links whose download completed. One run owns it at a
 * time (see ./lock).
 */
export type ProcessedStore = {
  readonly path: string;
  /** Empty set when no record exists yet. Throws StoreCorruptionError otherwise. */
  readonly load: () => Promise<Set<CandidateLink>>;
  /**
   * Links recorded by earlier runs but never downloaded. Stores that keep no
   * per-item history return an empty list.
   */
  readonly pendingFromHistory: () => Promise<Array<CandidateLink>>;
  /** Atomic: the record on disk is either the previous version or the new one. */
  readonly persist: (
    processed: ReadonlySet<CandidateLink>,
    records: ReadonlyArray<LinkRecord>,
  ) => Promise<void>;
  readonly close: () => void;
};
