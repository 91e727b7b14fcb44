import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import {
  createTransfer,
  deleteFilePath,
  mediaDownloadUrl,
} from './transfer';
import { RunStats } from '../capture/run-stats';
import { createTransport } from '../transport/transport';
import {
  createMockTransport,
  failed,
  muteStdout,
  okBody,
  okStream,
} from '../../../test-config/mocks/test-helpers';

const MEDIA_BASE_URL = 'http://10.5.5.9:8080';

describe('Transfer', () => {
  let tempDir: string;
  let outputDir: string;

  beforeEach(() => {
    muteStdout();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gopro-transfer-'));
    outputDir = path.join(tempDir, 'photos');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should build download and delete URLs', () => {
    expect(mediaDownloadUrl('http://10.5.5.9:8080/', '100GOPRO/G002.JPG')).toBe(
      'http://10.5.5.9:8080/videos/DCIM/100GOPRO/G002.JPG',
    );
    expect(deleteFilePath('100GOPRO/G002.JPG')).toBe(
      '/gopro/media/delete/file?path=100GOPRO/G002.JPG',
    );
  });

  it('should save under the base name and delete from the device once', async () => {
    const transport = createMockTransport(
      { '/gopro/media/delete/file': () => okBody('{}') },
      () => okStream('JPEG-G002'),
    );
    const stats = new RunStats();
    const transfer = createTransfer(
      {
        mediaBaseUrl: MEDIA_BASE_URL,
        outputDir,
        deleteAfterDownload: true,
        verbosity: 0,
      },
      { transport, stats },
    );

    const result = await transfer.transfer('100GOPRO/G002.JPG');

    const localPath = path.join(outputDir, 'G002.JPG');
    expect(result).toEqual({
      key: '100GOPRO/G002.JPG',
      downloaded: true,
      deleted: true,
      deleteAttempted: true,
      localPath,
    });
    expect(fs.readFileSync(localPath, 'utf8')).toBe('JPEG-G002');
    expect(fs.existsSync(`${localPath}.part`)).toBe(false);
    expect(transport.getStream).toHaveBeenCalledWith(
      'http://10.5.5.9:8080/videos/DCIM/100GOPRO/G002.JPG',
    );
    expect(transport.get).toHaveBeenCalledTimes(1);
    expect(transport.get).toHaveBeenCalledWith(
      '/gopro/media/delete/file?path=100GOPRO/G002.JPG',
    );
    expect(stats.get('downloads')).toBe(1);
    expect(stats.get('deletes')).toBe(1);
  });

  it('should leave the file on the device when deletion is disabled', async () => {
    const transport = createMockTransport({}, () => okStream('JPEG'));
    const transfer = createTransfer(
      {
        mediaBaseUrl: MEDIA_BASE_URL,
        outputDir,
        deleteAfterDownload: false,
        verbosity: 0,
      },
      { transport },
    );

    const result = await transfer.transfer('100GOPRO/G001.JPG');

    expect(result.downloaded).toBe(true);
    expect(result.deleted).toBe(false);
    expect(result.deleteAttempted).toBe(false);
    expect(transport.get).not.toHaveBeenCalled();
  });

  it('should skip the delete when the download failed', async () => {
    const transport = createMockTransport(
      { '/gopro/media/delete/file': () => okBody('{}') },
      () => failed(404),
    );
    const stats = new RunStats();
    const transfer = createTransfer(
      {
        mediaBaseUrl: MEDIA_BASE_URL,
        outputDir,
        deleteAfterDownload: true,
        verbosity: 0,
      },
      { transport, stats },
    );

    const result = await transfer.transfer('100GOPRO/G003.JPG');

    expect(result).toEqual({
      key: '100GOPRO/G003.JPG',
      downloaded: false,
      deleted: false,
      deleteAttempted: false,
      error:
        'HTTP 404 after 3 attempt(s): http://10.5.5.9:8080/videos/DCIM/100GOPRO/G003.JPG',
    });
    expect(transport.get).not.toHaveBeenCalled();
    expect(stats.get('downloadFailures')).toBe(1);
  });

  it('should keep the local copy when the delete fails', async () => {
    const transport = createMockTransport(
      { '/gopro/media/delete/file': () => failed(500) },
      () => okStream('JPEG'),
    );
    const stats = new RunStats();
    const transfer = createTransfer(
      {
        mediaBaseUrl: MEDIA_BASE_URL,
        outputDir,
        deleteAfterDownload: true,
        verbosity: 0,
      },
      { transport, stats },
    );

    const result = await transfer.transfer('100GOPRO/G004.JPG');

    expect(result.downloaded).toBe(true);
    expect(result.deleted).toBe(false);
    expect(result.deleteAttempted).toBe(true);
    expect(fs.existsSync(path.join(outputDir, 'G004.JPG'))).toBe(true);
    expect(stats.get('deleteFailures')).toBe(1);
  });

  it('should remove the partial file when the stream breaks', async () => {
    const broken = new Readable({
      read() {
        this.push('JP');
        this.destroy(new Error('connection reset'));
      },
    });
    const transport = createMockTransport({}, () => ({
      ok: true,
      status: 200,
      stream: broken,
    }));
    const transfer = createTransfer(
      {
        mediaBaseUrl: MEDIA_BASE_URL,
        outputDir,
        deleteAfterDownload: true,
        verbosity: 0,
      },
      { transport },
    );

    const result = await transfer.transfer('100GOPRO/G005.JPG');

    expect(result.downloaded).toBe(false);
    expect(result.error).toBe('connection reset');
    expect(fs.readdirSync(outputDir)).toEqual([]);
    expect(transport.get).not.toHaveBeenCalled();
  });

  it('should give up on a download whose body stops arriving', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('JPE'));
        },
      });
      return new Response(body, { status: 200 });
    });
    const transport = createTransport(
      { baseUrl: MEDIA_BASE_URL, retries: 1, timeoutMs: 50, verbosity: 0 },
      { fetchFn },
    );
    const stats = new RunStats();
    const transfer = createTransfer(
      {
        mediaBaseUrl: MEDIA_BASE_URL,
        outputDir,
        deleteAfterDownload: true,
        verbosity: 0,
      },
      { transport, stats },
    );

    const result = await transfer.transfer('100GOPRO/G001.JPG');

    expect(result).toEqual({
      key: '100GOPRO/G001.JPG',
      downloaded: false,
      deleted: false,
      deleteAttempted: false,
      error: 'No data received for 50ms',
    });
    expect(fs.readdirSync(outputDir)).toEqual([]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(stats.get('downloadFailures')).toBe(1);
  });

  it('should overwrite an earlier download of the same name', async () => {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(path.join(outputDir, 'G006.JPG'), 'old');
    const transport = createMockTransport({}, () => okStream('new'));
    const transfer = createTransfer(
      {
        mediaBaseUrl: MEDIA_BASE_URL,
        outputDir,
        deleteAfterDownload: false,
        verbosity: 0,
      },
      { transport },
    );

    await transfer.transfer('100GOPRO/G006.JPG');

    expect(fs.readFileSync(path.join(outputDir, 'G006.JPG'), 'utf8')).toBe(
      'new',
    );
  });
});
