import ReactDOM from 'react-dom/client';
import { StrictMode } from 'react';
import { registerSW } from 'virtual:pwa-register';
import App from './App';
import { bootstrap, type BootstrapResult } from './bootstrap';
import { resolveAppConfig } from './config/appConfig';
import { formatError } from './lib/errors';
import { createLogger } from './lib/debugLog';
import { watchPageLifecycle } from './lib/pageLifecycle';
import './styles.css';

const log = createLogger('main');

// Register the service worker (PWA).
if (import.meta.env.PROD) {
  registerSW({ immediate: true });
}

async function start(): Promise<BootstrapResult> {
  try {
    return await bootstrap(resolveAppConfig(import.meta.env));
  } catch (err) {
    log.error('startup failed:', err);
    return { kind: 'fatal', message: formatError(err) };
  }
}

const rootEl = document.getElementById('root');
if (!rootEl) throw new Error('Missing #root element');
const root = ReactDOM.createRoot(rootEl);

let current: BootstrapResult | null = null;

async function mount(): Promise<void> {
  const boot = await start();
  current = boot;
  root.render(
    <StrictMode>
      <App boot={boot} />
    </StrictMode>
  );
}

// The camera is released on hide; a page restored from the back/forward cache gets a fresh session.
watchPageLifecycle(window, {
  onHide: () => {
    if (current?.kind === 'ready') current.controller.dispose();
  },
  onRestore: () => {
    mount().catch((err: unknown) => log.error('remount failed:', err));
  }
});

mount().catch((err: unknown) => log.error('render failed:', err));
