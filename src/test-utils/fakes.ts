import type { AppConfig } from '../config/appConfig';
import { CaptureController } from '../lib/capture/captureController';
import type { ImageSource } from '../lib/capture/imageSource';
import type { DetectionSubmitter } from '../lib/detection/detectionClient';
import type { DetectionResult } from '../types/detection';

export const TEST_FRAME = new Uint8Array([0xff, 0xd8, 0xff, 0xe0]);

export const TEST_CONFIG: AppConfig = {
  endpointUrl: 'http://detector.test/api/detect_drowsiness',
  cameraSelection: 'first',
  requireCamera: false,
  imageSource: 'file',
  requestTimeoutMs: 1000
};

export function makeFakeSource(overrides: Partial<ImageSource> = {}): ImageSource {
  return {
    kind: 'file',
    readyText: 'Ready to pick an image',
    initialize: jest.fn(async () => undefined),
    capture: jest.fn(async () => TEST_FRAME),
    release: jest.fn(),
    previewStream: () => null,
    ...overrides
  };
}

export function makeFakeClient(submitFrame: (bytes: Uint8Array) => Promise<DetectionResult>): DetectionSubmitter {
  return { submitFrame: jest.fn(submitFrame) };
}

export function makeController(source: ImageSource, client: DetectionSubmitter, requireCamera = false) {
  return new CaptureController({ source, client, requireCamera });
}

export function deferred<T>() {
  let resolve: (v: T) => void = () => undefined;
  let reject: (e: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let every pending promise continuation run. */
export const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));
