import type { CaptureStatus, DetectionResult } from '../../types/detection';
import { STATUS_TEXT, formatDetectionStatus } from '../detection/statusText';

export type CaptureOutcome = 'succeeded' | 'failed';

export type CaptureSessionState = {
  status: CaptureStatus;
  statusText: string;
  lastError: string | null;
  /** Image source acquired; false after an init failure until re-initialized. */
  sourceReady: boolean;
  result: DetectionResult | null;
  capturedImage: Uint8Array | null;
  lastOutcome: CaptureOutcome | null;
};

export type CaptureSessionAction =
  | { type: 'initStarted' }
  | { type: 'initSucceeded'; statusText: string }
  | { type: 'initFailed'; message: string }
  | { type: 'busy' }
  | { type: 'notInitialized' }
  | { type: 'captureStarted' }
  | { type: 'captureCancelled' }
  | { type: 'captured'; image: Uint8Array }
  | { type: 'submitSucceeded'; result: DetectionResult }
  | { type: 'requestFailed'; message: string }
  | { type: 'settled' }
  | { type: 'released' };

export function createInitialCaptureSessionState(): CaptureSessionState {
  return {
    status: 'uninitialized',
    statusText: STATUS_TEXT.initializing,
    lastError: null,
    sourceReady: false,
    result: null,
    capturedImage: null,
    lastOutcome: null
  };
}

export function isBusy(state: CaptureSessionState): boolean {
  return state.status === 'capturing' || state.status === 'submitting';
}

export function captureSessionReducer(state: CaptureSessionState, action: CaptureSessionAction): CaptureSessionState {
  switch (action.type) {
    case 'initStarted':
      // Re-initialization starts a fresh session.
      return createInitialCaptureSessionState();
    case 'initSucceeded':
      return { ...state, status: 'ready', statusText: action.statusText, sourceReady: true, lastError: null };
    case 'initFailed':
      return {
        ...state,
        status: 'failed',
        statusText: action.message,
        lastError: action.message,
        sourceReady: false,
        lastOutcome: 'failed'
      };
    case 'busy':
      return { ...state, statusText: STATUS_TEXT.busy };
    case 'notInitialized':
      return { ...state, statusText: STATUS_TEXT.notInitialized, lastError: STATUS_TEXT.notInitialized };
    case 'captureStarted':
      // The previous result is stale from here on.
      return {
        ...state,
        status: 'capturing',
        statusText: STATUS_TEXT.detecting,
        lastError: null,
        result: null,
        lastOutcome: null
      };
    case 'captureCancelled':
      return { ...state, status: 'ready', statusText: STATUS_TEXT.noImage };
    case 'captured':
      return { ...state, status: 'submitting', capturedImage: action.image };
    case 'submitSucceeded':
      return {
        ...state,
        status: 'succeeded',
        statusText: formatDetectionStatus(action.result),
        result: action.result,
        lastOutcome: 'succeeded'
      };
    case 'requestFailed':
      return { ...state, status: 'failed', statusText: action.message, lastError: action.message, lastOutcome: 'failed' };
    case 'settled':
      if ((state.status === 'succeeded' || state.status === 'failed') && state.sourceReady) {
        return { ...state, status: 'ready' };
      }
      return state;
    case 'released':
      return {
        ...createInitialCaptureSessionState(),
        statusText: STATUS_TEXT.released
      };
    default:
      return state;
  }
}
