/**
 * One pinned package in a snapshot.
 */
export interface SnapshotEntry {
  package: string;
  version: string;
}

/**
 * An environment snapshot, in install order.
 *
 * - first entry: the runtime itself (package "R")
 * - then every dependency, deepest level first
 * - last entry: the root package
 */
export type Snapshot = readonly Readonly<SnapshotEntry>[];
