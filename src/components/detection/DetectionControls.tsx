export type DetectionControlsProps = {
  statusText: string;
  isError: boolean;
  busy: boolean;
  canRetryCamera: boolean;
  onDetect: () => void;
  onRetryCamera: () => void;
};

export function DetectionControls(props: DetectionControlsProps) {
  const { statusText, isError, busy, canRetryCamera, onDetect, onRetryCamera } = props;

  return (
    <div className="card">
      <p className={isError ? 'statusText statusError' : 'statusText'} role="status" aria-live="polite">
        {statusText}
      </p>
      <div className="buttonRow">
        <button type="button" className="btn btnPrimary" onClick={onDetect} disabled={busy}>
          Detect Drowsiness
        </button>
        {canRetryCamera ? (
          <button type="button" className="btn" onClick={onRetryCamera} disabled={busy}>
            Retry camera
          </button>
        ) : null}
      </div>
    </div>
  );
}
