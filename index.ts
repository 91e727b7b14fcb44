#!/usr/bin/env tsx

import fs from 'node:fs';
import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';
import { buildCaptureConfig, CaptureArgs, ConfigError } from './src/config';
import { createRunner } from './src/core/runner/runner';
import { bold, red } from './src/utils/logger';

function readVersion(): string {
  try {
    const raw = fs.readFileSync(
      new URL('./package.json', import.meta.url),
      'utf8',
    );
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'version' in parsed &&
      typeof parsed.version === 'string'
    ) {
      return parsed.version;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(red(`Could not read package.json: ${message}`));
  }
  return 'unknown';
}

const VERSION = readVersion();

export function parseCaptureArgs(args: string[]): CaptureArgs & {
  help?: boolean;
  version?: boolean;
} {
  const { values } = parseArgs({
    args,
    options: {
      ip: { type: 'string' },
      port: { type: 'string' },
      'media-port': { type: 'string' },
      preset: { type: 'string' },
      model: { type: 'string' },
      detection: { type: 'string' },
      interval: { type: 'string' },
      'keep-alive': { type: 'string' },
      wait: { type: 'string' },
      output: { type: 'string' },
      'keep-on-device': { type: 'boolean' },
      retries: { type: 'string' },
      timeout: { type: 'string' },
      quiet: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: false,
  });

  return values;
}

export function showHelp() {
  console.log(`
${bold(`GoPro Periodic Capture v${VERSION} - Capture, download and clear photos on an Open GoPro camera`)}

${bold('Usage: gopro-periodic-capture --ip=<address> [options]')}

${bold('Options:')}
  --ip=<address>          Camera IP address (required), e.g. 172.2X.1YZ.51
  --port=<port>           Control API port (default: 8080)
  --media-port=<port>     Media download port (default: 8080)
  --preset=<id>           Preset ID to load before capturing (default: 65536)
  --model=<name>          Camera model, e.g. HERO12 (enables the last-captured fast path)
  --detection=<mode>      auto | listing | last-captured (default: auto)
  --interval=<seconds>    Seconds between captures, 0 for back to back (default: 0)
  --keep-alive=<seconds>  Seconds between keep-alive requests (default: 3)
  --wait=<seconds>        How long to wait for a new photo to appear (default: 7)
  --output=<dir>          Directory to save photos in (default: ./photos)
  --keep-on-device        Keep photos on the SD card after download
  --retries=<n>           Attempts per HTTP request (default: 3)
  --timeout=<seconds>     Timeout per HTTP attempt (default: 5)
  --quiet                 Show minimal output
  --verbose               Show every request and the camera state
  --help, -h              Show this help message
  --version, -v           Show version information

${bold('Examples:')}
  gopro-periodic-capture --ip=172.21.151.51
  gopro-periodic-capture --ip=172.21.151.51 --interval=10 --output=/data/timelapse
  gopro-periodic-capture --ip=172.21.151.51 --model=HERO12 --keep-on-device

The X, Y and Z in 172.2X.1YZ.51 are the last three digits of the camera serial number.
`);
}

function showVersion() {
  console.log(`gopro-periodic-capture v${VERSION}`);
}

function fail(message: string): never {
  console.error(red(`Error: ${message}`));
  console.log();
  showHelp();
  process.exit(1);
}

export async function main(rawArgs: string[] = process.argv.slice(2)) {
  if (rawArgs.length === 0) {
    showHelp();
    process.exit(0);
  }

  let args: ReturnType<typeof parseCaptureArgs>;
  try {
    args = parseCaptureArgs(rawArgs);
  } catch (error: unknown) {
    fail(error instanceof Error ? error.message : String(error));
  }

  if (args.help) {
    showHelp();
    process.exit(0);
  }

  if (args.version) {
    showVersion();
    process.exit(0);
  }

  try {
    const config = buildCaptureConfig(args);
    await createRunner(config).start();
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      fail(error.message);
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(red(`Error: ${errorMessage}`));
    process.exit(1);
  }
}

function isInvokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) {
    return false;
  }
  return (
    fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url))
  );
}

if (isInvokedDirectly()) {
  main().catch((err) => {
    const errorMessage = err instanceof Error ? err.message : String(err);
    console.error(red(`Error: ${errorMessage}`));
    process.exit(1);
  });
}
