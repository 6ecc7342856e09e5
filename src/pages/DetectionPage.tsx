import type { CaptureController } from '../lib/capture/captureController';
import { useCaptureController } from '../hooks/useCaptureController';
import { DetectionControls, DetectionIntroCard, DetectionResultCard, DetectionViewport } from '../components/detection';

export type DetectionPageProps = {
  controller: CaptureController;
};

export default function DetectionPage(props: DetectionPageProps) {
  const { controller } = props;
  const { state, busy, previewStream, requestCapture, retryCamera } = useCaptureController(controller);

  return (
    <>
      <DetectionIntroCard sourceKind={controller.source.kind} />

      <div className="card">
        <DetectionViewport previewStream={previewStream} capturedImage={controller.source.kind === 'file' ? state.capturedImage : null} />
      </div>

      <DetectionControls
        statusText={state.statusText}
        isError={state.lastError !== null}
        busy={busy}
        canRetryCamera={!state.sourceReady && state.status === 'failed'}
        onDetect={requestCapture}
        onRetryCamera={retryCamera}
      />

      {state.result ? <DetectionResultCard result={state.result} /> : null}
    </>
  );
}
