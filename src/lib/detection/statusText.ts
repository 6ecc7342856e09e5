import type { DetectionResult } from '../../types/detection';
import { RemoteError, formatError } from '../errors';

export const STATUS_TEXT = {
  initializing: 'Initializing...',
  cameraReady: 'Camera initialized',
  pickerReady: 'Ready to pick an image',
  detecting: 'Detecting...',
  busy: 'Detection already in progress',
  notInitialized: 'Error: Camera is not initialized',
  noImage: 'No image captured',
  released: 'Camera released'
} as const;

export function formatConfidence(confidence: number): string {
  return `${(confidence * 100).toFixed(2)}%`;
}

export function formatDetectionStatus(result: DetectionResult): string {
  return result.drowsyDetected
    ? `Drowsy Detected (Confidence: ${formatConfidence(result.confidence)})`
    : 'No Drowsiness Detected';
}

export function describeInitFailure(err: unknown): string {
  return `Error initializing camera: ${formatError(err)}`;
}

export function describeRequestFailure(err: unknown): string {
  if (err instanceof RemoteError) return err.message;
  return `Error during detection: ${formatError(err)}`;
}
