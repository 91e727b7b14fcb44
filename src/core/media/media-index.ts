/**
 * Media Index
 * Turns device listings into sets of `folder/name` keys and compares them
 */

import path from 'node:path';
import * as logger from '../../utils/logger';
import { Transport } from '../../interfaces/transport';
import {
  MediaFileRef,
  MediaIndex,
  MediaIndexResult,
} from '../../interfaces/media';
import { describeFailure, parseJson } from '../transport/transport';

export const MEDIA_LIST_PATH = '/gopro/media/list';
export const LAST_CAPTURED_PATH = '/gopro/media/last_captured';

const HTTP_SERVICE_UNAVAILABLE = 503;

export function toMediaKey(ref: MediaFileRef): string {
  return `${ref.folder}/${ref.name}`;
}

/**
 * Local file name for a media key: the directory component is dropped.
 */
export function baseName(key: string): string {
  return path.posix.basename(key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const unknownIndex = (reason: string): MediaIndexResult => ({
  kind: 'unknown',
  reason,
});

/**
 * Parse a `/gopro/media/list` body:
 * `{ "media": [ { "d": "100GOPRO", "fs": [ { "n": "G001.JPG" } ] } ] }`
 *
 * Every folder entry is flattened. `media: []` is an empty device; any other
 * shape is reported as unknown.
 */
export function parseMediaListing(json: unknown): MediaIndexResult {
  if (!isRecord(json)) {
    return unknownIndex('listing is not an object');
  }

  const media = json.media;
  if (!Array.isArray(media)) {
    return unknownIndex('listing has no "media" array');
  }

  const index = new Set<string>();
  for (const folderEntry of media) {
    if (!isRecord(folderEntry) || typeof folderEntry.d !== 'string') {
      return unknownIndex('folder entry without a "d" name');
    }
    const files = folderEntry.fs;
    if (!Array.isArray(files)) {
      return unknownIndex(`folder ${folderEntry.d} has no "fs" array`);
    }
    for (const file of files) {
      if (!isRecord(file) || typeof file.n !== 'string') {
        return unknownIndex(`file entry in ${folderEntry.d} without a name`);
      }
      index.add(toMediaKey({ folder: folderEntry.d, name: file.n }));
    }
  }

  return { kind: 'known', index };
}

/**
 * Parse a `/gopro/media/last_captured` body: `{ "folder": ..., "file": ... }`
 */
export function parseLastCaptured(json: unknown): MediaFileRef | null {
  if (
    !isRecord(json) ||
    typeof json.folder !== 'string' ||
    typeof json.file !== 'string' ||
    json.folder === '' ||
    json.file === ''
  ) {
    return null;
  }
  return { folder: json.folder, name: json.file };
}

export async function fetchMediaIndex(
  transport: Transport,
  verbosity: number,
): Promise<MediaIndexResult> {
  const log = logger.createScopedLogger('Media', verbosity);
  const response = await transport.get(MEDIA_LIST_PATH);

  if (!response.ok) {
    if (response.status === HTTP_SERVICE_UNAVAILABLE) {
      log.verbose('Camera is busy, listing unavailable');
    }
    return unknownIndex(`listing request failed: ${describeFailure(response)}`);
  }

  const json = parseJson(response.body);
  if (!json.ok) {
    log.verbose(`Listing is not valid JSON: ${json.error}`);
    return unknownIndex(`invalid JSON: ${json.error}`);
  }

  const result = parseMediaListing(json.value);
  if (result.kind === 'unknown') {
    log.verbose(`Malformed listing: ${result.reason}`);
  }
  return result;
}

export async function fetchLastCaptured(
  transport: Transport,
  verbosity: number,
): Promise<MediaFileRef | null> {
  const log = logger.createScopedLogger('Media', verbosity);
  const response = await transport.get(LAST_CAPTURED_PATH);

  if (!response.ok) {
    log.verbose(`Last captured request failed: ${describeFailure(response)}`);
    return null;
  }

  const json = parseJson(response.body);
  if (!json.ok) {
    log.verbose(`Last captured response is not valid JSON: ${json.error}`);
    return null;
  }

  return parseLastCaptured(json.value);
}

/**
 * Keys present in `next` but not in `previous`.
 */
export function diffIndex(previous: MediaIndex, next: MediaIndex): string[] {
  const added: string[] = [];
  for (const key of next) {
    if (!previous.has(key)) {
      added.push(key);
    }
  }
  return added;
}

/**
 * The lexicographically greatest key, which for camera file numbering is
 * the most recent capture.
 */
export function selectLatest(keys: Iterable<string>): string | null {
  let latest: string | null = null;
  for (const key of keys) {
    if (latest === null || key > latest) {
      latest = key;
    }
  }
  return latest;
}
