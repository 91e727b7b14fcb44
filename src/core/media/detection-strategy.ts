/**
 * Detection strategies for the wait-for-new-media phase.
 *
 * Both report against the previous full-listing snapshot and, on growth,
 * hand back a complete index so the diff logic is shared.
 */

import { Transport } from '../../interfaces/transport';
import {
  DetectionMode,
  DetectionStrategy,
  MediaIndex,
  Observation,
} from '../../interfaces/media';
import {
  fetchLastCaptured,
  fetchMediaIndex,
  toMediaKey,
} from './media-index';

/** Models whose firmware serves `/gopro/media/last_captured` */
export const LAST_CAPTURED_MODELS: readonly string[] = [
  'HERO12',
  'HERO12 BLACK',
  'HERO13',
  'HERO13 BLACK',
];

export function supportsLastCaptured(model: string | undefined): boolean {
  if (!model) {
    return false;
  }
  const normalized = model.trim().toUpperCase().replace(/\s+/g, ' ');
  return LAST_CAPTURED_MODELS.includes(normalized);
}

export function createListingStrategy(
  transport: Transport,
  verbosity: number,
): DetectionStrategy {
  return {
    name: 'listing',
    observe: async (previous: MediaIndex): Promise<Observation> => {
      const result = await fetchMediaIndex(transport, verbosity);
      if (result.kind === 'unknown') {
        return { kind: 'unknown', reason: result.reason };
      }
      return result.index.size > previous.size
        ? { kind: 'grown', index: result.index }
        : { kind: 'unchanged' };
    },
  };
}

export function createLastCapturedStrategy(
  transport: Transport,
  verbosity: number,
): DetectionStrategy {
  return {
    name: 'last-captured',
    observe: async (
      previous: MediaIndex,
      seen: ReadonlySet<string>,
    ): Promise<Observation> => {
      const ref = await fetchLastCaptured(transport, verbosity);
      if (!ref) {
        return { kind: 'unknown', reason: 'last captured file unavailable' };
      }
      const key = toMediaKey(ref);
      // last_captured keeps naming a file after it is deleted
      if (previous.has(key) || seen.has(key)) {
        return { kind: 'unchanged' };
      }
      return { kind: 'grown', index: new Set([...previous, key]) };
    },
  };
}

export function resolveDetectionMode(
  mode: DetectionMode,
  model: string | undefined,
): Exclude<DetectionMode, 'auto'> {
  if (mode !== 'auto') {
    return mode;
  }
  return supportsLastCaptured(model) ? 'last-captured' : 'listing';
}

export function createDetectionStrategy(
  mode: DetectionMode,
  model: string | undefined,
  transport: Transport,
  verbosity: number,
): DetectionStrategy {
  return resolveDetectionMode(mode, model) === 'last-captured'
    ? createLastCapturedStrategy(transport, verbosity)
    : createListingStrategy(transport, verbosity);
}
