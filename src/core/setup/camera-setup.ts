/**
 * Camera setup
 * One-time, best-effort preparation before the capture loop starts.
 * No step is fatal; each outcome is logged and reported.
 */

import * as logger from '../../utils/logger';
import { Transport } from '../../interfaces/transport';
import { describeFailure, parseJson } from '../transport/transport';

export const DEFAULT_PRESET_ID = '65536';

export type SetupStep =
  | 'resetUsbControl'
  | 'version'
  | 'enableUsbControl'
  | 'externalControl'
  | 'state'
  | 'presets'
  | 'loadPreset';

export interface SetupReport {
  version: string | null;
  steps: Record<SetupStep, boolean>;
}

export interface CameraSetupOptions {
  preset: string;
  verbosity: number;
}

export const setupPaths = {
  wiredUsb: (enabled: boolean) =>
    `/gopro/camera/control/wired_usb?p=${enabled ? 1 : 0}`,
  version: '/gopro/version',
  externalControl: '/gopro/camera/control/set_ui_controller?p=2',
  state: '/gopro/camera/state',
  presets: '/gopro/camera/presets/get',
  loadPreset: (id: string) =>
    `/gopro/camera/presets/load?id=${encodeURIComponent(id)}`,
};

function readVersion(body: string): string | null {
  const json = parseJson(body);
  if (
    !json.ok ||
    typeof json.value !== 'object' ||
    json.value === null ||
    !('version' in json.value)
  ) {
    return null;
  }
  const { version } = json.value;
  return typeof version === 'string' || typeof version === 'number'
    ? String(version)
    : null;
}

export async function runCameraSetup(
  transport: Transport,
  options: CameraSetupOptions,
): Promise<SetupReport> {
  const log = logger.createScopedLogger('Control', options.verbosity);

  // Drop USB control first so the camera starts from a known state; this
  // fails harmlessly when it was already off.
  const reset = await transport.get(setupPaths.wiredUsb(false));

  let version: string | null = null;
  const versionResponse = await transport.get(setupPaths.version);
  if (versionResponse.ok) {
    version = readVersion(versionResponse.body);
    if (version) {
      log.info(`Open GoPro version: ${version}`);
    } else {
      log.warning('Version key not found in response.');
    }
  } else {
    log.warning(
      `Couldn't fetch Open GoPro version: ${describeFailure(versionResponse)}`,
    );
  }

  const usb = await transport.get(setupPaths.wiredUsb(true));
  if (usb.ok) {
    log.success('USB control activated.');
  } else {
    log.warning('USB control activation failed.');
  }

  const external = await transport.get(setupPaths.externalControl);
  if (external.ok) {
    log.success('External UI control activated.');
  } else {
    log.warning('Activating external UI control failed.');
  }

  const dumpJson = async (path: string, label: string): Promise<boolean> => {
    const response = await transport.get(path);
    if (!response.ok) {
      log.warning(`Failed to get camera ${label}.`);
      return false;
    }
    const json = parseJson(response.body);
    if (!json.ok) {
      log.warning(`Camera ${label} response is not valid JSON.`);
      return false;
    }
    log.verbose(`Camera ${label}:\n${JSON.stringify(json.value, null, 4)}`);
    return true;
  };

  const state = await dumpJson(setupPaths.state, 'state');
  const presets = await dumpJson(setupPaths.presets, 'presets');

  const load = await transport.get(setupPaths.loadPreset(options.preset));
  if (load.ok) {
    log.success(`Set camera preset ID: ${options.preset}`);
  } else {
    log.warning(`Failed to set camera preset ${options.preset}.`);
  }

  return {
    version,
    steps: {
      resetUsbControl: reset.ok,
      version: version !== null,
      enableUsbControl: usb.ok,
      externalControl: external.ok,
      state,
      presets,
      loadPreset: load.ok,
    },
  };
}
