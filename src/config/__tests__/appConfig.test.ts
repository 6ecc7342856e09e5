import { AppConfigError, DEFAULT_ENDPOINT_URL, resolveAppConfig } from '../appConfig';

describe('resolveAppConfig', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(resolveAppConfig({})).toEqual({
      endpointUrl: DEFAULT_ENDPOINT_URL,
      cameraSelection: 'first',
      requireCamera: false,
      imageSource: 'auto',
      requestTimeoutMs: 15000
    });
  });

  it('reads the front-camera variant', () => {
    const config = resolveAppConfig({
      VITE_DETECT_API_URL: 'https://detector.example.test/api/detect_drowsiness',
      VITE_CAMERA_SELECTION: 'front',
      VITE_REQUIRE_CAMERA: '1',
      VITE_IMAGE_SOURCE: 'camera',
      VITE_REQUEST_TIMEOUT_MS: '5000'
    });
    expect(config).toEqual({
      endpointUrl: 'https://detector.example.test/api/detect_drowsiness',
      cameraSelection: 'front',
      requireCamera: true,
      imageSource: 'camera',
      requestTimeoutMs: 5000
    });
  });

  it('ignores non-string entries and blank values', () => {
    const config = resolveAppConfig({ PROD: true, DEV: false, VITE_CAMERA_SELECTION: '  ' });
    expect(config.cameraSelection).toBe('first');
  });

  it('rejects an unknown camera selection', () => {
    expect(() => resolveAppConfig({ VITE_CAMERA_SELECTION: 'rear' })).toThrow(AppConfigError);
  });

  it('names the offending variable', () => {
    expect(() => resolveAppConfig({ VITE_REQUEST_TIMEOUT_MS: '-3' })).toThrow(/VITE_REQUEST_TIMEOUT_MS/);
  });
});
