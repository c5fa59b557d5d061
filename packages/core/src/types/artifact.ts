// packages/core/src/types/artifact.ts

export interface ArtifactRecord {
  fingerprint: string;
  stepId: string;
  /** Absolute object directory holding the stored outputs. */
  path: string;
  /** Stored outputs, relative to the work directory they came from. */
  outputs: string[];
  /** Tree hash of each stored output. */
  outputHashes: Record<string, string>;
  /** sha256 over `outputHashes`. */
  digest: string;
  createdAt: string;
  toolVersions: Record<string, string>;
  /** BuildConfig version scope the record belongs to. */
  version: string;
}

/** What a producer hands back to the store for ingestion. */
export interface ProducedArtifact {
  stepId: string;
  workDir: string;
  outputs: string[];
  toolVersions: Record<string, string>;
  /** Paths inside the outputs that belong to other steps; not stored. */
  exclude?: string[];
}

export type EvictScope =
  | { kind: 'version'; version: string }
  | { kind: 'age'; olderThanMs: number }
  | { kind: 'all' };
