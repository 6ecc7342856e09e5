import { render, screen } from '@testing-library/react';
import App from '../App';
import { makeController, makeFakeClient, makeFakeSource } from '../test-utils/fakes';

// Lightweight check that the routes render; avoids asserting on copy that changes often.

function readyBoot() {
  const controller = makeController(makeFakeSource(), makeFakeClient(async () => ({ drowsyDetected: false, confidence: 0 })));
  return { kind: 'ready' as const, controller };
}

describe('App routes (smoke)', () => {
  it('renders the detection route', () => {
    window.location.hash = '#/';
    render(<App boot={readyBoot()} />);
    expect(screen.getByRole('button', { name: /detect drowsiness/i })).toBeInTheDocument();
  });

  it('renders the help route', () => {
    window.location.hash = '#/help';
    render(<App boot={readyBoot()} />);
    expect(screen.getByText(/how to use drowsiness check/i)).toBeInTheDocument();
  });

  it('redirects unknown routes to detection', () => {
    window.location.hash = '#/camera';
    render(<App boot={readyBoot()} />);
    expect(screen.getByRole('button', { name: /detect drowsiness/i })).toBeInTheDocument();
  });

  it('renders a fatal startup error', () => {
    window.location.hash = '#/';
    render(<App boot={{ kind: 'fatal', message: 'No cameras available on this device' }} />);
    expect(screen.getByRole('alert')).toHaveTextContent('No cameras available on this device');
  });
});
