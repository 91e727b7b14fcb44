import { describe, it, expect } from 'vitest';
import {
  createDetectionStrategy,
  createLastCapturedStrategy,
  createListingStrategy,
  resolveDetectionMode,
  supportsLastCaptured,
} from './detection-strategy';
import {
  createMockTransport,
  failed,
  listingBody,
  okBody,
} from '../../../test-config/mocks/test-helpers';

const previous = new Set(['100GOPRO/G001.JPG']);

describe('listing strategy', () => {
  it('should report growth with the full new index', async () => {
    const transport = createMockTransport({
      '/gopro/media/list': () =>
        okBody(listingBody('100GOPRO', ['G001.JPG', 'G002.JPG'])),
    });
    const strategy = createListingStrategy(transport, 0);

    expect(await strategy.observe(previous, new Set())).toEqual({
      kind: 'grown',
      index: new Set(['100GOPRO/G001.JPG', '100GOPRO/G002.JPG']),
    });
  });

  it('should report an index of the same size as unchanged', async () => {
    const transport = createMockTransport({
      '/gopro/media/list': () => okBody(listingBody('100GOPRO', ['G001.JPG'])),
    });
    const strategy = createListingStrategy(transport, 0);

    expect(await strategy.observe(previous, new Set())).toEqual({
      kind: 'unchanged',
    });
  });

  it('should pass unknown listings through', async () => {
    const transport = createMockTransport({
      '/gopro/media/list': () => failed(),
    });
    const strategy = createListingStrategy(transport, 0);

    expect((await strategy.observe(previous, new Set())).kind).toBe('unknown');
  });
});

describe('last-captured strategy', () => {
  it('should normalize a new file into previous plus that file', async () => {
    const transport = createMockTransport({
      '/gopro/media/last_captured': () =>
        okBody('{"folder":"100GOPRO","file":"G002.JPG"}'),
    });
    const strategy = createLastCapturedStrategy(transport, 0);

    expect(await strategy.observe(previous, new Set())).toEqual({
      kind: 'grown',
      index: new Set(['100GOPRO/G001.JPG', '100GOPRO/G002.JPG']),
    });
    expect(transport.calls).toEqual(['/gopro/media/last_captured']);
  });

  it('should treat a known file as unchanged', async () => {
    const transport = createMockTransport({
      '/gopro/media/last_captured': () =>
        okBody('{"folder":"100GOPRO","file":"G001.JPG"}'),
    });
    const strategy = createLastCapturedStrategy(transport, 0);

    expect(await strategy.observe(previous, new Set())).toEqual({
      kind: 'unchanged',
    });
  });

  it('should ignore files already transferred and deleted', async () => {
    const transport = createMockTransport({
      '/gopro/media/last_captured': () =>
        okBody('{"folder":"100GOPRO","file":"G002.JPG"}'),
    });
    const strategy = createLastCapturedStrategy(transport, 0);

    expect(
      await strategy.observe(previous, new Set(['100GOPRO/G002.JPG'])),
    ).toEqual({ kind: 'unchanged' });
  });

  it('should report failures as unknown', async () => {
    const strategy = createLastCapturedStrategy(createMockTransport(), 0);

    expect(await strategy.observe(previous, new Set())).toEqual({
      kind: 'unknown',
      reason: 'last captured file unavailable',
    });
  });
});

describe('strategy selection', () => {
  it('should recognise models with the fast path', () => {
    expect(supportsLastCaptured('HERO12')).toBe(true);
    expect(supportsLastCaptured('hero13  black')).toBe(true);
    expect(supportsLastCaptured('HERO11')).toBe(false);
    expect(supportsLastCaptured(undefined)).toBe(false);
  });

  it('should resolve auto from the model and respect explicit modes', () => {
    expect(resolveDetectionMode('auto', 'HERO12')).toBe('last-captured');
    expect(resolveDetectionMode('auto', 'HERO10')).toBe('listing');
    expect(resolveDetectionMode('listing', 'HERO12')).toBe('listing');
    expect(resolveDetectionMode('last-captured', undefined)).toBe(
      'last-captured',
    );
  });

  it('should build the selected strategy', () => {
    const transport = createMockTransport();

    expect(createDetectionStrategy('auto', 'HERO13', transport, 0).name).toBe(
      'last-captured',
    );
    expect(createDetectionStrategy('auto', undefined, transport, 0).name).toBe(
      'listing',
    );
  });
});
