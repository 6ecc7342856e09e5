export function DetectionIntroCard(props: { sourceKind: 'camera' | 'file' }) {
  return (
    <div className="card">
      <h2>Drowsiness check</h2>
      <p className="muted">
        {props.sourceKind === 'camera'
          ? 'Face the camera in good light and tap Detect Drowsiness. A single frame is sent to the detection service.'
          : 'No live camera is available here. Tap Detect Drowsiness to take or pick a photo; it is sent to the detection service.'}
      </p>
    </div>
  );
}
