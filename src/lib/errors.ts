export type DetectionErrorKind = 'no_camera' | 'camera_init' | 'capture' | 'remote' | 'transport';

export abstract class DetectionAppError extends Error {
  abstract readonly kind: DetectionErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Device enumeration produced nothing usable. Fatal at startup when a camera is required. */
export class NoCameraFoundError extends DetectionAppError {
  readonly kind = 'no_camera' as const;
}

/** The selected device could not be opened. The user may retry. */
export class CameraInitError extends DetectionAppError {
  readonly kind = 'camera_init' as const;
}

export class CaptureError extends DetectionAppError {
  readonly kind = 'capture' as const;
}

/** Non-200 answer from the detection endpoint. The body is never read. */
export class RemoteError extends DetectionAppError {
  readonly kind = 'remote' as const;

  constructor(public readonly statusCode: number) {
    super(`API Error: ${statusCode}`);
  }
}

/** Network, timeout or malformed-response failure. */
export class TransportError extends DetectionAppError {
  readonly kind = 'transport' as const;

  constructor(public readonly detail: string) {
    super(detail);
  }
}

export function formatError(err: unknown): string {
  if (!err) return 'Unknown error';
  if (typeof err === 'string') return err;
  if (err instanceof Error) return err.message || 'Unknown error';
  return 'Unknown error';
}
