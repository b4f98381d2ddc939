/**
 * Shared types for classification, planning and the operation log
 */

/**
 * One classified filesystem path. Snapshot taken before any rename; stale afterwards.
 */
export interface Entry {
  path: string;
  isDirectory: boolean;
  /** MIME primary type, e.g. "image"; empty for directories */
  kind: string;
  /** Canonical lower-case extension including the dot; empty for directories */
  suffix: string;
}

export const BUCKET_KINDS = [
  'directory',
  'cover',
  'image',
  'video',
  'audio',
  'gif',
  'pdf',
  'psd',
  'unknown',
] as const;

export type BucketKind = (typeof BUCKET_KINDS)[number];

/** Buckets whose contents can be moved into a per-type subdirectory */
export type TypeBucket = Exclude<BucketKind, 'directory' | 'cover'>;

export const TYPE_BUCKETS: readonly TypeBucket[] = ['image', 'video', 'audio', 'gif', 'pdf', 'psd', 'unknown'];

export type Groups = Map<BucketKind, Entry[]>;

/** Ordered source → destination pairs */
export type RenameMapping = Map<string, string>;

/** One executed mapping as persisted: absolute source → absolute destination */
export type LogEntry = Record<string, string>;

export interface MimeType {
  type: string;
  subtype: string;
}

/**
 * Content-type detector consulted for every regular file.
 */
export interface MimeOracle {
  detect(path: string): Promise<MimeType>;
}

/** Asks the user a yes/no question */
export type Confirm = (message: string) => Promise<boolean>;

/** Receives each completed rename */
export type PairReporter = (source: string, destination: string) => void;

export function createGroups(): Groups {
  return new Map(BUCKET_KINDS.map((kind): [BucketKind, Entry[]] => [kind, []]));
}

export function bucket(groups: Groups, kind: BucketKind): Entry[] {
  return groups.get(kind) ?? [];
}
