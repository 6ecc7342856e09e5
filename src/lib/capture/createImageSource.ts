import type { AppConfig } from '../../config/appConfig';
import { BrowserCameraProvider, hasCameraAccess } from './browserCamera';
import { BrowserFilePicker } from './browserFilePicker';
import { DeviceCameraSource, FilePickerSource, type ImageSource, type ImageSourceKind } from './imageSource';

export function resolveImageSourceKind(preference: AppConfig['imageSource'], cameraAvailable: boolean): ImageSourceKind {
  if (preference === 'auto') return cameraAvailable ? 'camera' : 'file';
  return preference;
}

export function createImageSource(config: AppConfig, cameraAvailable = hasCameraAccess()): ImageSource {
  const kind = resolveImageSourceKind(config.imageSource, cameraAvailable);
  if (kind === 'file') {
    return new FilePickerSource(new BrowserFilePicker({ captureHint: config.cameraSelection === 'front' ? 'user' : 'environment' }));
  }
  return new DeviceCameraSource(new BrowserCameraProvider(), config.cameraSelection);
}
