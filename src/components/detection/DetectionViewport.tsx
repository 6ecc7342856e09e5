import { useEffect, useMemo, useRef } from 'react';
import { toImageDataUrl } from '../../lib/detection/base64';
import { createLogger } from '../../lib/debugLog';

const log = createLogger('viewport');

export type DetectionViewportProps = {
  previewStream: MediaStream | null;
  capturedImage: Uint8Array | null;
};

export function DetectionViewport(props: DetectionViewportProps) {
  const { previewStream, capturedImage } = props;
  const videoRef = useRef<HTMLVideoElement | null>(null);

  useEffect(() => {
    const v = videoRef.current;
    if (!v || !previewStream) return;

    v.srcObject = previewStream;
    // Autoplay can be refused until the user interacts; capture reads from the provider's own element.
    v.play().catch((err: unknown) => log.warn('preview playback refused:', err));
    return () => {
      v.srcObject = null;
    };
  }, [previewStream]);

  const capturedUrl = useMemo(() => (capturedImage ? toImageDataUrl(capturedImage) : null), [capturedImage]);

  if (previewStream) {
    return (
      <div className="viewport">
        <video ref={videoRef} className="viewportMedia" playsInline muted aria-label="Camera preview" />
      </div>
    );
  }

  if (capturedUrl) {
    return (
      <div className="viewport">
        <img className="viewportMedia" src={capturedUrl} alt="Captured image" />
      </div>
    );
  }

  return (
    <div className="viewport viewportEmpty">
      <p className="muted">Click &quot;Detect Drowsiness&quot; to use the camera</p>
    </div>
  );
}
