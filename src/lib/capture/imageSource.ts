import type { CameraDevice, CameraSelection } from '../../types/detection';
import { CameraInitError, CaptureError, NoCameraFoundError, formatError } from '../errors';
import { STATUS_TEXT } from '../detection/statusText';

export type ImageSourceKind = 'camera' | 'file';

/** Where a frame comes from. Chosen once, when the controller is built. */
export interface ImageSource {
  readonly kind: ImageSourceKind;
  /** Status text once `initialize` has succeeded. */
  readonly readyText: string;
  initialize(): Promise<void>;
  /** Resolves to `null` when the user dismissed the capture. */
  capture(): Promise<Uint8Array | null>;
  release(): void;
  previewStream(): MediaStream | null;
}

/** Platform camera access. `H` is the provider's opaque handle type. */
export interface CameraProvider<H> {
  listDevices(): Promise<CameraDevice[]>;
  open(device: CameraDevice): Promise<H>;
  capture(handle: H): Promise<Uint8Array>;
  release(handle: H): void;
  previewStream?(handle: H): MediaStream | null;
}

export interface FilePicker {
  pickImage(): Promise<Uint8Array | null>;
}

export function selectCameraDevice(devices: CameraDevice[], selection: CameraSelection): CameraDevice | null {
  if (selection === 'front') return devices.find((d) => d.facing === 'front') ?? null;
  return devices[0] ?? null;
}

export class DeviceCameraSource<H> implements ImageSource {
  public readonly kind = 'camera' as const;
  public readonly readyText = STATUS_TEXT.cameraReady;

  private handle: H | null = null;
  private device: CameraDevice | null = null;
  /** Bumped by every release; an open that finishes under an older generation is stale. */
  private generation = 0;

  constructor(
    private readonly provider: CameraProvider<H>,
    private readonly selection: CameraSelection
  ) {}

  public get selectedDevice(): CameraDevice | null {
    return this.device;
  }

  public async initialize(): Promise<void> {
    this.release();
    const generation = this.generation;

    let devices: CameraDevice[];
    try {
      devices = await this.provider.listDevices();
    } catch (err) {
      throw new CameraInitError(formatError(err));
    }

    const device = selectCameraDevice(devices, this.selection);
    if (!device) {
      throw new NoCameraFoundError(
        this.selection === 'front' ? 'No front-facing camera available on this device' : 'No cameras available on this device'
      );
    }

    let handle: H;
    try {
      handle = await this.provider.open(device);
    } catch (err) {
      throw err instanceof CameraInitError ? err : new CameraInitError(formatError(err));
    }

    // Released or re-initialized while the device was opening.
    if (generation !== this.generation) {
      this.provider.release(handle);
      throw new CameraInitError('Camera initialization was cancelled');
    }
    this.handle = handle;
    this.device = device;
  }

  public async capture(): Promise<Uint8Array> {
    const handle = this.handle;
    if (handle === null) throw new CaptureError('Camera is not initialized');
    try {
      return await this.provider.capture(handle);
    } catch (err) {
      throw err instanceof CaptureError ? err : new CaptureError(formatError(err));
    }
  }

  public release(): void {
    this.generation++;
    const handle = this.handle;
    this.handle = null;
    this.device = null;
    if (handle !== null) this.provider.release(handle);
  }

  public previewStream(): MediaStream | null {
    if (this.handle === null || !this.provider.previewStream) return null;
    return this.provider.previewStream(this.handle);
  }
}

export class FilePickerSource implements ImageSource {
  public readonly kind = 'file' as const;
  public readonly readyText = STATUS_TEXT.pickerReady;

  constructor(private readonly picker: FilePicker) {}

  public async initialize(): Promise<void> {
    // Nothing to acquire.
  }

  public async capture(): Promise<Uint8Array | null> {
    try {
      return await this.picker.pickImage();
    } catch (err) {
      throw new CaptureError(formatError(err));
    }
  }

  public release(): void {
    // Nothing held.
  }

  public previewStream(): MediaStream | null {
    return null;
  }
}
