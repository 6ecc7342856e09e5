import type { CameraDevice, CameraFacing } from '../../types/detection';
import { CameraInitError, CaptureError, formatError } from '../errors';
import { createLogger } from '../debugLog';
import type { CameraProvider } from './imageSource';

const log = createLogger('camera');

export type CameraErrorKind = 'permission_denied' | 'not_supported' | 'no_camera' | 'in_use' | 'constraints' | 'unknown';

export type BrowserCameraHandle = {
  stream: MediaStream;
  video: HTMLVideoElement;
};

export function getMediaDevices(): MediaDevices | null {
  // Some environments (tests, insecure origins) do not define navigator.mediaDevices.
  if (typeof navigator === 'undefined') return null;
  return navigator.mediaDevices ?? null;
}

export function hasCameraAccess(): boolean {
  return typeof getMediaDevices()?.getUserMedia === 'function';
}

function errorName(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') return err.name;
  return '';
}

export function classifyGetUserMediaError(err: unknown): { kind: CameraErrorKind; message: string } {
  // DOMException.name is the most reliable signal across browsers.
  const lowerName = errorName(err).toLowerCase();
  const msg = formatError(err);

  if (lowerName.includes('notallowed') || lowerName.includes('security')) {
    return {
      kind: 'permission_denied',
      message: 'Camera permission was denied. Allow camera access for this site in your browser settings, then try again.'
    };
  }

  if (lowerName.includes('notfound') || lowerName.includes('devicesnotfound')) {
    return { kind: 'no_camera', message: 'No camera was found on this device.' };
  }

  if (lowerName.includes('notreadable') || lowerName.includes('trackstarterror')) {
    return {
      kind: 'in_use',
      message: 'The camera could not be started (it may already be in use by another app). Close other apps and try again.'
    };
  }

  if (lowerName.includes('overconstrained') || lowerName.includes('constraintnotsatisfied')) {
    return { kind: 'constraints', message: 'The camera could not satisfy the requested constraints.' };
  }

  if (msg.toLowerCase().includes('denied') || msg.toLowerCase().includes('permission')) {
    return { kind: 'permission_denied', message: msg };
  }

  return { kind: 'unknown', message: msg };
}

export function facingFromLabel(label: string): CameraFacing {
  const l = label.toLowerCase();
  if (/front|user|facetime/.test(l)) return 'front';
  if (/back|rear|environment/.test(l)) return 'back';
  return 'unknown';
}

function stopTracks(stream: MediaStream) {
  for (const t of stream.getTracks()) t.stop();
}

/**
 * Camera access through getUserMedia. Frames are encoded as JPEG via an
 * offscreen canvas.
 */
export class BrowserCameraProvider implements CameraProvider<BrowserCameraHandle> {
  constructor(
    private readonly mediaDevices: MediaDevices | null = getMediaDevices(),
    private readonly jpegQuality = 0.9
  ) {}

  private requireMediaDevices(): MediaDevices {
    if (!this.mediaDevices?.getUserMedia) {
      throw new CameraInitError('Camera access is not supported in this environment.');
    }
    return this.mediaDevices;
  }

  public async listDevices(): Promise<CameraDevice[]> {
    const md = this.requireMediaDevices();

    let inputs = (await md.enumerateDevices()).filter((d) => d.kind === 'videoinput');

    // Labels stay empty until the site holds camera permission; ask once so facing can be read.
    if (inputs.length > 0 && inputs.every((d) => d.label === '')) {
      try {
        stopTracks(await md.getUserMedia({ video: true, audio: false }));
      } catch (err) {
        throw new CameraInitError(classifyGetUserMediaError(err).message);
      }
      inputs = (await md.enumerateDevices()).filter((d) => d.kind === 'videoinput');
    }

    return inputs.map((d, i) => ({
      id: d.deviceId,
      label: d.label || `Camera ${i + 1}`,
      facing: facingFromLabel(d.label)
    }));
  }

  public async open(device: CameraDevice): Promise<BrowserCameraHandle> {
    const md = this.requireMediaDevices();

    let stream: MediaStream;
    try {
      stream = await md.getUserMedia({
        video: {
          deviceId: device.id ? { exact: device.id } : undefined,
          width: { ideal: 1280 },
          height: { ideal: 720 }
        },
        audio: false
      });
    } catch (err) {
      throw new CameraInitError(classifyGetUserMediaError(err).message);
    }

    const video = document.createElement('video');
    video.srcObject = stream;
    // iOS Safari requires these flags for inline playback.
    video.playsInline = true;
    video.muted = true;

    try {
      await video.play();
    } catch (err) {
      stopTracks(stream);
      throw new CameraInitError(formatError(err));
    }

    log.debug(`opened ${device.label}`);
    return { stream, video };
  }

  public async capture(handle: BrowserCameraHandle): Promise<Uint8Array> {
    const { video, stream } = handle;
    const track = stream.getVideoTracks()[0];
    log.debug('camera state before capture', {
      readyState: track?.readyState,
      paused: video.paused,
      width: video.videoWidth,
      height: video.videoHeight
    });

    const w = video.videoWidth || 0;
    const h = video.videoHeight || 0;
    if (w === 0 || h === 0) throw new CaptureError('Camera has not produced a frame yet.');

    const canvas = document.createElement('canvas');
    canvas.width = w;
    canvas.height = h;
    const ctx = canvas.getContext('2d');
    if (!ctx) throw new CaptureError('2D canvas is not available.');
    ctx.drawImage(video, 0, 0, w, h);

    const blob = await new Promise<Blob | null>((resolve) => canvas.toBlob(resolve, 'image/jpeg', this.jpegQuality));
    if (!blob) throw new CaptureError('Could not encode the captured frame.');
    return new Uint8Array(await blob.arrayBuffer());
  }

  public release(handle: BrowserCameraHandle): void {
    stopTracks(handle.stream);
    handle.video.srcObject = null;
  }

  public previewStream(handle: BrowserCameraHandle): MediaStream | null {
    return handle.stream;
  }
}
