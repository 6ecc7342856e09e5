import { CameraInitError } from '../../errors';
import { BrowserCameraProvider, classifyGetUserMediaError, facingFromLabel } from '../browserCamera';

type FakeDeviceInfo = { kind: string; deviceId: string; label: string };

function makeStream() {
  const stop = jest.fn();
  const track = { stop, readyState: 'live' };
  const stream = { getTracks: () => [track], getVideoTracks: () => [track] };
  return { stream: stream as unknown as MediaStream, stop };
}

function makeMediaDevices(devices: FakeDeviceInfo[][], getUserMedia: jest.Mock) {
  const enumerateDevices = jest.fn();
  for (const list of devices) enumerateDevices.mockResolvedValueOnce(list);
  return { md: { enumerateDevices, getUserMedia } as unknown as MediaDevices, enumerateDevices };
}

describe('classifyGetUserMediaError', () => {
  it('recognizes permission denial', () => {
    expect(classifyGetUserMediaError(new DOMException('Permission denied', 'NotAllowedError')).kind).toBe('permission_denied');
  });

  it('recognizes a camera in use', () => {
    expect(classifyGetUserMediaError(new DOMException('Could not start video source', 'NotReadableError')).kind).toBe('in_use');
  });

  it('falls back to the message', () => {
    expect(classifyGetUserMediaError(new Error('weird failure'))).toEqual({ kind: 'unknown', message: 'weird failure' });
  });
});

describe('facingFromLabel', () => {
  it('reads common label conventions', () => {
    expect(facingFromLabel('FaceTime HD Camera')).toBe('front');
    expect(facingFromLabel('camera2 1, facing front')).toBe('front');
    expect(facingFromLabel('Back Camera')).toBe('back');
    expect(facingFromLabel('USB Video Device')).toBe('unknown');
  });
});

describe('BrowserCameraProvider', () => {
  it('lists only video inputs', async () => {
    const { md } = makeMediaDevices(
      [
        [
          { kind: 'audioinput', deviceId: 'mic', label: 'Microphone' },
          { kind: 'videoinput', deviceId: 'cam-1', label: 'FaceTime HD Camera' }
        ]
      ],
      jest.fn()
    );

    await expect(new BrowserCameraProvider(md).listDevices()).resolves.toEqual([
      { id: 'cam-1', label: 'FaceTime HD Camera', facing: 'front' }
    ]);
  });

  it('asks for permission once when labels are hidden', async () => {
    const { stream, stop } = makeStream();
    const getUserMedia = jest.fn().mockResolvedValue(stream);
    const { md, enumerateDevices } = makeMediaDevices(
      [
        [{ kind: 'videoinput', deviceId: '', label: '' }],
        [{ kind: 'videoinput', deviceId: 'cam-1', label: 'Back Camera' }]
      ],
      getUserMedia
    );

    const devices = await new BrowserCameraProvider(md).listDevices();

    expect(getUserMedia).toHaveBeenCalledWith({ video: true, audio: false });
    expect(stop).toHaveBeenCalled();
    expect(enumerateDevices).toHaveBeenCalledTimes(2);
    expect(devices).toEqual([{ id: 'cam-1', label: 'Back Camera', facing: 'back' }]);
  });

  it('opens the device at medium resolution without audio', async () => {
    const { stream } = makeStream();
    const getUserMedia = jest.fn().mockResolvedValue(stream);
    const { md } = makeMediaDevices([], getUserMedia);
    const provider = new BrowserCameraProvider(md);

    const handle = await provider.open({ id: 'cam-1', label: 'Back Camera', facing: 'back' });

    expect(getUserMedia).toHaveBeenCalledWith({
      video: { deviceId: { exact: 'cam-1' }, width: { ideal: 1280 }, height: { ideal: 720 } },
      audio: false
    });
    expect(handle.stream).toBe(stream);
    expect(handle.video.srcObject).toBe(stream);
    expect(provider.previewStream(handle)).toBe(stream);
  });

  it('reports an open failure as CameraInitError', async () => {
    const getUserMedia = jest.fn().mockRejectedValue(new DOMException('busy', 'NotReadableError'));
    const { md } = makeMediaDevices([], getUserMedia);

    await expect(new BrowserCameraProvider(md).open({ id: 'cam-1', label: 'Cam', facing: 'unknown' })).rejects.toBeInstanceOf(
      CameraInitError
    );
  });

  it('refuses to work without mediaDevices', async () => {
    await expect(new BrowserCameraProvider(null).listDevices()).rejects.toThrow(
      'Camera access is not supported in this environment.'
    );
  });

  it('stops the tracks on release', async () => {
    const { stream, stop } = makeStream();
    const { md } = makeMediaDevices([], jest.fn().mockResolvedValue(stream));
    const provider = new BrowserCameraProvider(md);
    const handle = await provider.open({ id: 'cam-1', label: 'Cam', facing: 'unknown' });

    provider.release(handle);

    expect(stop).toHaveBeenCalledTimes(1);
    expect(handle.video.srcObject).toBeNull();
  });
});
