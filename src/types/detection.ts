export type CaptureStatus = 'uninitialized' | 'ready' | 'capturing' | 'submitting' | 'succeeded' | 'failed';

export type CameraSelection = 'first' | 'front';

export type ImageSourcePreference = 'auto' | 'camera' | 'file';

export type CameraFacing = 'front' | 'back' | 'unknown';

export type CameraDevice = {
  id: string;
  label: string;
  facing: CameraFacing;
};

export type DetectionResult = {
  drowsyDetected: boolean;
  /** Fraction in [0, 1]. */
  confidence: number;
  /** Decoded `processed_image`; absent when the server sent none or an empty string. */
  annotatedImage?: Uint8Array;
};

/** JSON body POSTed to the detection endpoint. */
export type DetectionRequestBody = {
  image: string;
};
