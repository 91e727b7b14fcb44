/**
 * Media listing and transfer interfaces
 */

export interface MediaFileRef {
  folder: string;
  name: string;
}

/** Composite `folder/name` keys as listed by the device at one point in time */
export type MediaIndex = ReadonlySet<string>;

export type MediaIndexResult =
  | { kind: 'known'; index: MediaIndex }
  | { kind: 'unknown'; reason: string };

export type Observation =
  | { kind: 'unknown'; reason: string }
  | { kind: 'unchanged' }
  | { kind: 'grown'; index: MediaIndex };

export type DetectionMode = 'auto' | 'listing' | 'last-captured';

export interface DetectionStrategy {
  name: Exclude<DetectionMode, 'auto'>;
  /**
   * `previous` mirrors the device listing; `seen` also holds every key
   * already transferred this run, including ones deleted from the device.
   */
  observe: (
    previous: MediaIndex,
    seen: ReadonlySet<string>,
  ) => Promise<Observation>;
}

export interface TransferResult {
  key: string;
  downloaded: boolean;
  deleted: boolean;
  /** A delete was sent; it may have landed even when `deleted` is false */
  deleteAttempted: boolean;
  localPath?: string;
  error?: string;
}
