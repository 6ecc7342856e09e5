import type { AppConfig } from './config/appConfig';
import { CaptureController } from './lib/capture/captureController';
import { createImageSource } from './lib/capture/createImageSource';
import type { ImageSource } from './lib/capture/imageSource';
import { DetectionClient, type DetectionSubmitter } from './lib/detection/detectionClient';
import { NoCameraFoundError } from './lib/errors';
import { createLogger } from './lib/debugLog';

const log = createLogger('bootstrap');

export type BootstrapResult =
  | { kind: 'ready'; controller: CaptureController }
  | { kind: 'fatal'; message: string };

export type BootstrapDeps = {
  source?: ImageSource;
  client?: DetectionSubmitter;
};

/**
 * Build the controller from configuration and acquire the image source.
 * A missing camera is fatal only when the config requires one.
 */
export async function bootstrap(config: AppConfig, deps: BootstrapDeps = {}): Promise<BootstrapResult> {
  const source = deps.source ?? createImageSource(config);
  const client = deps.client ?? new DetectionClient({ endpointUrl: config.endpointUrl, timeoutMs: config.requestTimeoutMs });
  const controller = new CaptureController({ source, client, requireCamera: config.requireCamera });

  log.debug('starting with', { source: source.kind, cameraSelection: config.cameraSelection, endpoint: config.endpointUrl });

  try {
    await controller.initializeCamera();
  } catch (err) {
    if (err instanceof NoCameraFoundError) {
      controller.dispose();
      return { kind: 'fatal', message: err.message };
    }
    throw err;
  }
  return { kind: 'ready', controller };
}
