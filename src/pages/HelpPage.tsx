export default function HelpPage() {
  return (
    <>
      <div className="card">
        <h2>How to use Drowsiness Check</h2>
        <p className="muted">
          Each tap on <strong>Detect Drowsiness</strong> captures one photo and sends it to the detection service. The
          service answers with a verdict, a confidence score and, when it has one, an annotated copy of the photo.
        </p>
      </div>

      <div className="card">
        <h2>Reading the result</h2>
        <ul>
          <li>
            <strong>Drowsy Detected</strong> shows the confidence as a percentage
          </li>
          <li>
            <strong>No Drowsiness Detected</strong> means the service found no signs of drowsiness
          </li>
          <li>
            <strong>API Error</strong> shows the HTTP status the service returned
          </li>
        </ul>
      </div>

      <div className="card">
        <h2>Recommended setup</h2>
        <ul>
          <li>
            <strong>Lighting:</strong> light your face evenly; avoid a bright window behind you
          </li>
          <li>
            <strong>Framing:</strong> keep both eyes inside the frame
          </li>
          <li>
            <strong>One at a time:</strong> the button is disabled while a check is running
          </li>
        </ul>
      </div>
    </>
  );
}
