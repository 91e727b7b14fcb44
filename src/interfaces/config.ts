import type { DetectionMode } from './media';

export interface CaptureConfig {
  ip: string;
  port: number;
  mediaPort: number;
  preset: string;
  model?: string;
  detection: DetectionMode;
  photoIntervalMs: number;
  keepAliveSeconds: number;
  waitBudgetMs: number;
  outputDir: string;
  deleteAfterDownload: boolean;
  retries: number;
  requestTimeoutMs: number;
  retryDelayMs: number;
  verbosity: number;
}
