export function FatalErrorCard(props: { message: string }) {
  return (
    <div className="card">
      <h2>Cannot start</h2>
      <p className="statusText statusError" role="alert">
        {props.message}
      </p>
    </div>
  );
}
