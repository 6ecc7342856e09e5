import { useCallback, useSyncExternalStore } from 'react';
import type { CaptureController } from '../lib/capture/captureController';
import { isBusy, type CaptureSessionState } from '../lib/capture/captureSessionReducer';
import { createLogger } from '../lib/debugLog';

const log = createLogger('ui');

export type UseCaptureControllerResult = {
  state: CaptureSessionState;
  busy: boolean;
  previewStream: MediaStream | null;
  requestCapture: () => void;
  retryCamera: () => void;
};

/** Presentation adapter: renders from controller snapshots, never owns session state. */
export function useCaptureController(controller: CaptureController): UseCaptureControllerResult {
  const state = useSyncExternalStore(controller.subscribe, controller.getSnapshot);

  const requestCapture = useCallback(() => {
    controller.requestCapture().catch((err: unknown) => log.error('capture request failed:', err));
  }, [controller]);

  const retryCamera = useCallback(() => {
    // A missing required camera is already reflected in the status text.
    controller.initializeCamera().catch((err: unknown) => log.error('camera re-initialization failed:', err));
  }, [controller]);

  return {
    state,
    busy: isBusy(state),
    previewStream: state.sourceReady ? controller.source.previewStream() : null,
    requestCapture,
    retryCamera
  };
}
