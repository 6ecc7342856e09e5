import type { DetectionSubmitter } from '../detection/detectionClient';
import { describeInitFailure, describeRequestFailure } from '../detection/statusText';
import { CaptureError, NoCameraFoundError, formatError } from '../errors';
import { createLogger } from '../debugLog';
import type { ImageSource } from './imageSource';
import {
  captureSessionReducer,
  createInitialCaptureSessionState,
  type CaptureSessionAction,
  type CaptureSessionState
} from './captureSessionReducer';

const log = createLogger('capture');

export type CaptureControllerOptions = {
  source: ImageSource;
  client: DetectionSubmitter;
  /** Rethrow NoCameraFoundError from initializeCamera() instead of only recording it. */
  requireCamera: boolean;
};

type Listener = () => void;

/**
 * Owns the image source and runs one capture → submit cycle at a time.
 *
 * UI code subscribes to snapshots (see `useCaptureController`) and never holds
 * session state of its own. Every failure ends up in `statusText`; only a
 * missing camera with `requireCamera` escapes `initializeCamera()`.
 */
export class CaptureController {
  private state: CaptureSessionState = createInitialCaptureSessionState();
  private readonly listeners = new Set<Listener>();
  private inFlight = false;
  private disposed = false;
  private pendingInit: Promise<void> | null = null;

  constructor(private readonly options: CaptureControllerOptions) {}

  public get source(): ImageSource {
    return this.options.source;
  }

  public get isInFlight(): boolean {
    return this.inFlight;
  }

  public getSnapshot = (): CaptureSessionState => this.state;

  public subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /** Overlapping calls share the acquisition already under way. */
  public initializeCamera(): Promise<void> {
    if (this.pendingInit) return this.pendingInit;

    const pending = this.runInitialize().finally(() => {
      this.pendingInit = null;
    });
    this.pendingInit = pending;
    return pending;
  }

  private async runInitialize(): Promise<void> {
    if (this.disposed) return;
    if (this.inFlight) {
      this.dispatch({ type: 'busy' });
      return;
    }

    this.dispatch({ type: 'initStarted' });
    try {
      await this.options.source.initialize();
      this.dispatch({ type: 'initSucceeded', statusText: this.options.source.readyText });
    } catch (err) {
      log.error('image source initialization failed:', err);
      this.dispatch({ type: 'initFailed', message: describeInitFailure(err) });
      if (err instanceof NoCameraFoundError && this.options.requireCamera) throw err;
    }
  }

  /** Capture a frame and submit it. Rejected, not queued, while a request is in flight. */
  public async requestCapture(): Promise<void> {
    if (this.disposed) return;
    if (this.inFlight) {
      this.dispatch({ type: 'busy' });
      return;
    }
    if (!this.state.sourceReady) {
      this.dispatch({ type: 'notInitialized' });
      return;
    }

    this.inFlight = true;
    this.dispatch({ type: 'captureStarted' });
    try {
      const image = await this.captureImage();
      if (!image) {
        this.dispatch({ type: 'captureCancelled' });
        return;
      }

      this.dispatch({ type: 'captured', image });
      const result = await this.options.client.submitFrame(image);
      this.dispatch({ type: 'submitSucceeded', result });
    } catch (err) {
      log.error('detection request failed:', err);
      this.dispatch({ type: 'requestFailed', message: describeRequestFailure(err) });
    } finally {
      this.inFlight = false;
      this.dispatch({ type: 'settled' });
    }
  }

  public dispose(): void {
    if (this.disposed) return;
    this.options.source.release();
    this.dispatch({ type: 'released' });
    this.disposed = true;
    this.listeners.clear();
  }

  private async captureImage(): Promise<Uint8Array | null> {
    log.debug(`capturing from ${this.options.source.kind} source`, { status: this.state.status });
    try {
      return await this.options.source.capture();
    } catch (err) {
      throw err instanceof CaptureError ? err : new CaptureError(formatError(err));
    }
  }

  private dispatch(action: CaptureSessionAction): void {
    if (this.disposed) return;
    const next = captureSessionReducer(this.state, action);
    if (next === this.state) return;

    log.debug(`${action.type}: ${this.state.status} -> ${next.status}`);
    this.state = next;
    for (const l of this.listeners) l();
  }
}
