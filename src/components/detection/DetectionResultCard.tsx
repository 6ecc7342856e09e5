import { useMemo, useState } from 'react';
import type { DetectionResult } from '../../types/detection';
import { toImageDataUrl } from '../../lib/detection/base64';
import { formatConfidence } from '../../lib/detection/statusText';

export type DetectionResultCardProps = {
  result: DetectionResult;
};

function AnnotatedImage(props: { src: string }) {
  const [failed, setFailed] = useState(false);

  if (failed) {
    return (
      <p className="statusText statusError" role="alert">
        Error loading processed image
      </p>
    );
  }
  return <img className="annotatedImage" src={props.src} alt="Annotated detection result" onError={() => setFailed(true)} />;
}

export function DetectionResultCard(props: DetectionResultCardProps) {
  const { result } = props;
  const annotatedUrl = useMemo(
    () => (result.annotatedImage ? toImageDataUrl(result.annotatedImage) : null),
    [result.annotatedImage]
  );

  return (
    <div className="card">
      <h2>Result</h2>
      <dl className="resultGrid">
        <dt>Drowsy</dt>
        <dd>{result.drowsyDetected ? 'Yes' : 'No'}</dd>
        <dt>Confidence</dt>
        <dd>{formatConfidence(result.confidence)}</dd>
      </dl>
      {/* key resets the error state when a new image arrives */}
      {annotatedUrl ? <AnnotatedImage key={annotatedUrl} src={annotatedUrl} /> : null}
    </div>
  );
}
