import { useCallback, useEffect, useRef, useState } from 'react';
import { NavLink, Navigate, Route, Routes } from 'react-router-dom';
import { ToastStack, type Toast, type ToastTone } from './components/ToastStack';
import type { ThemeMode } from './lib/chartOptions';
import { DashboardPage } from './pages/DashboardPage';
import { SettingsPage } from './pages/SettingsPage';

const THEME_STORAGE_KEY = 'dashboard.theme';
const TOAST_AUTO_CLOSE_MS = 8000;

export type NotifyFn = (title: string, message: string, tone: ToastTone) => void;

function loadStoredTheme(): ThemeMode {
  try {
    return window.localStorage.getItem(THEME_STORAGE_KEY) === 'dark' ? 'dark' : 'light';
  } catch {
    return 'light';
  }
}

function persistTheme(theme: ThemeMode): void {
  try {
    window.localStorage.setItem(THEME_STORAGE_KEY, theme);
  } catch {
    // storage can be unavailable in private windows; the toggle still works for this session
  }
}

export function App() {
  const [theme, setTheme] = useState<ThemeMode>(loadStoredTheme);
  const [toasts, setToasts] = useState<Toast[]>([]);
  const nextToastId = useRef(1);

  useEffect(() => {
    document.documentElement.dataset.theme = theme;
    persistTheme(theme);
  }, [theme]);

  const dismissToast = useCallback((id: number) => {
    setToasts((current) => current.filter((toast) => toast.id !== id));
  }, []);

  const notify = useCallback<NotifyFn>(
    (title, message, tone) => {
      const id = nextToastId.current;
      nextToastId.current += 1;
      setToasts((current) => [...current.slice(-4), { id, title, message, tone }]);
      window.setTimeout(() => dismissToast(id), TOAST_AUTO_CLOSE_MS);
    },
    [dismissToast]
  );

  return (
    <div className="app-shell">
      <header className="app-header">
        <div className="brand-wrap">
          <p className="eyebrow">Aim trainer run history</p>
          <h1 className="brand-title">Aim Stats Dashboard</h1>
        </div>
        <div className="header-nav-wrap">
          <nav className="main-nav" aria-label="Main">
            <NavLink to="/" end>
              Dashboard
            </NavLink>
            <NavLink to="/settings">Settings</NavLink>
          </nav>
          <label className="theme-switch">
            <input
              type="checkbox"
              checked={theme === 'dark'}
              onChange={(event) => setTheme(event.target.checked ? 'dark' : 'light')}
            />
            <span>Dark mode</span>
          </label>
        </div>
      </header>

      <main className="app-main">
        <Routes>
          <Route path="/" element={<DashboardPage theme={theme} notify={notify} />} />
          <Route path="/settings" element={<SettingsPage notify={notify} />} />
          <Route path="*" element={<Navigate to="/" replace />} />
        </Routes>
      </main>

      <ToastStack toasts={toasts} onDismiss={dismissToast} />
    </div>
  );
}
