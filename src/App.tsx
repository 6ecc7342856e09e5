import { HashRouter, NavLink, Navigate, Route, Routes } from 'react-router-dom';
import HelpPage from './pages/HelpPage';
import DetectionPage from './pages/DetectionPage';
import { FatalErrorCard } from './components/FatalErrorCard';
import type { BootstrapResult } from './bootstrap';

function TopNav() {
  return (
    <div className="header">
      <div className="brand">
        <h1>Drowsiness Check</h1>
      </div>

      <nav className="nav" aria-label="Primary navigation">
        <NavLink to="/" className={({ isActive }) => `navLink${isActive ? ' navLinkActive' : ''}`}>Detect</NavLink>
        <NavLink to="/help" className={({ isActive }) => `navLink${isActive ? ' navLinkActive' : ''}`}>Help</NavLink>
      </nav>
    </div>
  );
}

export type AppProps = {
  boot: BootstrapResult;
};

export default function App(props: AppProps) {
  const { boot } = props;

  return (
    <HashRouter
      // Opt into React Router v7 behavior early to avoid noisy test warnings.
      future={{ v7_startTransition: true, v7_relativeSplatPath: true }}
    >
      <div className="container">
        <TopNav />
        <Routes>
          <Route
            path="/"
            element={boot.kind === 'ready' ? <DetectionPage controller={boot.controller} /> : <FatalErrorCard message={boot.message} />}
          />
          <Route path="/help" element={<HelpPage />} />

          {/* Unknown routes return to the detection page */}
          <Route path="*" element={<Navigate to="/" replace />} />
        </Routes>
      </div>
    </HashRouter>
  );
}
