import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import * as logger from '../../utils/logger';
import { Transport } from '../../interfaces/transport';
import { TransferResult } from '../../interfaces/media';
import { describeFailure } from '../transport/transport';
import { baseName } from '../media/media-index';
import { RunStats } from '../capture/run-stats';

export const DELETE_FILE_PATH = '/gopro/media/delete/file';

export interface TransferOptions {
  /** `http://<ip>:<mediaPort>` */
  mediaBaseUrl: string;
  outputDir: string;
  deleteAfterDownload: boolean;
  verbosity: number;
}

export interface TransferDeps {
  transport: Transport;
  stats?: RunStats;
}

export function mediaDownloadUrl(mediaBaseUrl: string, key: string): string {
  const encoded = key.split('/').map(encodeURIComponent).join('/');
  return `${mediaBaseUrl.replace(/\/+$/, '')}/videos/DCIM/${encoded}`;
}

// The camera expects the raw `folder/name` here, slash included.
export function deleteFilePath(key: string): string {
  return `${DELETE_FILE_PATH}?path=${key}`;
}

export function createTransfer(options: TransferOptions, deps: TransferDeps) {
  const { transport, stats } = deps;
  const downloadLog = logger.createScopedLogger('Download', options.verbosity);
  const photoLog = logger.createScopedLogger('Photo', options.verbosity);

  /**
   * Stream one media file into the output directory under its base name.
   * The body lands in `<name>.part` first and is renamed once complete.
   */
  const download = async (
    key: string,
  ): Promise<{ localPath: string } | { error: string }> => {
    const fileName = baseName(key);
    if (fileName === '' || fileName === '.' || fileName === '..') {
      return { error: `Refusing to write unsafe file name: ${key}` };
    }

    const localPath = path.join(options.outputDir, fileName);
    const partialPath = `${localPath}.part`;
    const url = mediaDownloadUrl(options.mediaBaseUrl, key);

    await fs.promises.mkdir(options.outputDir, { recursive: true });

    const response = await transport.getStream(url);
    if (!response.ok) {
      return { error: `${describeFailure(response)}: ${url}` };
    }

    try {
      await pipeline(response.stream, fs.createWriteStream(partialPath));
      await fs.promises.rename(partialPath, localPath);
      return { localPath };
    } catch (error) {
      await fs.promises.rm(partialPath, { force: true });
      return { error: logger.errorMessage(error) };
    }
  };

  const deleteFromDevice = async (key: string): Promise<boolean> => {
    const response = await transport.get(deleteFilePath(key));
    return response.ok;
  };

  /**
   * Download `key` and, when enabled, delete it from the device. A failed
   * download leaves the file on the device.
   */
  const transfer = async (key: string): Promise<TransferResult> => {
    let downloaded: { localPath: string } | { error: string };
    try {
      downloaded = await download(key);
    } catch (error) {
      downloaded = { error: logger.errorMessage(error) };
    }

    if ('error' in downloaded) {
      stats?.record('downloadFailures');
      downloadLog.error(`Failed: ${downloaded.error}`);
      if (options.deleteAfterDownload) {
        photoLog.warning(`Keeping ${key} on the device`);
      }
      return {
        key,
        downloaded: false,
        deleted: false,
        deleteAttempted: false,
        error: downloaded.error,
      };
    }

    stats?.record('downloads');
    downloadLog.success(`Saved: ${downloaded.localPath}`);

    if (!options.deleteAfterDownload) {
      return {
        key,
        downloaded: true,
        deleted: false,
        deleteAttempted: false,
        localPath: downloaded.localPath,
      };
    }

    const deleted = await deleteFromDevice(key);
    if (deleted) {
      stats?.record('deletes');
      photoLog.info(`Deleted file: ${key}`);
    } else {
      stats?.record('deleteFailures');
      photoLog.warning(`Failed to delete file: ${key}`);
    }

    return {
      key,
      downloaded: true,
      deleted,
      deleteAttempted: true,
      localPath: downloaded.localPath,
    };
  };

  return { transfer, download, deleteFromDevice };
}

export type Transfer = ReturnType<typeof createTransfer>;
