import { useEffect, useState } from 'react';
import { NavLink, Navigate, Route, Routes } from 'react-router-dom';
import ReminderToasts from './app/components/ReminderToasts';
import CommunicationsPage from './app/pages/CommunicationsPage';
import CustomersPage from './app/pages/CustomersPage';
import ReportsPage from './app/pages/ReportsPage';
import TasksPage from './app/pages/TasksPage';
import { crmStore, useCrmStore } from './app/store/useCrmStore';
import { reminderScheduler, useReminderStore } from './app/store/useReminderStore';
import { buildTime, versionLabel } from './version';

const THEME_KEY = 'crm-desk.theme';

const NAV_ITEMS = [
  { to: '/customers', label: 'Customers' },
  { to: '/communications', label: 'Communications' },
  { to: '/tasks', label: 'Tasks' },
  { to: '/reports', label: 'Reports' }
];

const App = () => {
  const [isDark, setIsDark] = useState(() => {
    const stored = localStorage.getItem(THEME_KEY);
    if (stored === 'dark') {
      return true;
    }
    if (stored === 'light') {
      return false;
    }
    return window.matchMedia('(prefers-color-scheme: dark)').matches;
  });
  const [status, setStatus] = useState<string | null>(null);
  const notificationsEnabled = useCrmStore((state) => state.settings.notificationsEnabled);
  const updateSettings = useCrmStore((state) => state.updateSettings);
  const pushToast = useReminderStore((state) => state.push);

  useEffect(() => {
    document.documentElement.classList.toggle('dark', isDark);
    localStorage.setItem(THEME_KEY, isDark ? 'dark' : 'light');
  }, [isDark]);

  useEffect(() => {
    reminderScheduler.setNotificationHandler(pushToast);
    reminderScheduler.start();
    return () => {
      reminderScheduler.stop();
      reminderScheduler.setNotificationHandler(null);
    };
  }, [pushToast]);

  useEffect(() => {
    const { registerObserver } = crmStore.getState();
    const unsubscribers = [
      registerObserver('customer:added', (customer) => setStatus(`Customer added: ${customer.name}`)),
      registerObserver('customer:updated', (customer) =>
        setStatus(`Customer updated: ${customer.name}`)
      ),
      registerObserver('customer:deleted', (customer) =>
        setStatus(`Customer deleted: ${customer.name}`)
      ),
      registerObserver('communication:added', () => setStatus('Communication logged.')),
      registerObserver('communication:updated', () => setStatus('Communication updated.')),
      registerObserver('task:added', (task) => setStatus(`Task added: ${task.description}`)),
      registerObserver('task:updated', (task) => setStatus(`Task updated: ${task.description}`))
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }, []);

  return (
    <div className="min-h-screen bg-background text-foreground">
      <header className="border-b border-border bg-card/70">
        <div className="mx-auto flex max-w-6xl flex-wrap items-center justify-between gap-4 px-6 py-4">
          <div className="flex items-center gap-4">
            <div>
              <div className="text-lg font-semibold">CRM Desk</div>
              <div className="text-xs text-muted-foreground" title={buildTime || undefined}>
                {versionLabel()}
              </div>
            </div>
            <nav className="flex items-center gap-3 text-sm text-muted-foreground">
              {NAV_ITEMS.map((item) => (
                <NavLink
                  key={item.to}
                  to={item.to}
                  className={({ isActive }) =>
                    `rounded-full px-3 py-1 ${isActive ? 'bg-accent text-accent-foreground' : ''}`
                  }
                >
                  {item.label}
                </NavLink>
              ))}
            </nav>
          </div>
          <div className="flex items-center gap-3">
            <label className="flex items-center gap-2 text-sm">
              <input
                type="checkbox"
                className="ul-checkbox"
                checked={notificationsEnabled}
                onChange={(event) =>
                  updateSettings({ notificationsEnabled: event.target.checked })
                }
              />
              Notifications
            </label>
            <button
              className="ul-button ul-button-ghost"
              onClick={() => setIsDark((prev) => !prev)}
              aria-label={isDark ? 'Switch to light theme' : 'Switch to dark theme'}
              title={isDark ? 'Switch to light theme' : 'Switch to dark theme'}
            >
              {isDark ? (
                <svg
                  aria-hidden="true"
                  viewBox="0 0 24 24"
                  className="h-5 w-5"
                  fill="none"
                  stroke="currentColor"
                  strokeWidth="1.6"
                  strokeLinecap="round"
                  strokeLinejoin="round"
                >
                  <circle cx="12" cy="12" r="4" />
                  <path d="M12 2v2M12 20v2M4.9 4.9l1.4 1.4M17.7 17.7l1.4 1.4M2 12h2M20 12h2M4.9 19.1l1.4-1.4M17.7 6.3l1.4-1.4" />
                </svg>
              ) : (
                <svg
                  aria-hidden="true"
                  viewBox="0 0 24 24"
                  className="h-5 w-5"
                  fill="none"
                  stroke="currentColor"
                  strokeWidth="1.6"
                  strokeLinecap="round"
                  strokeLinejoin="round"
                >
                  <path d="M21 12.8A9 9 0 1 1 11.2 3a7 7 0 0 0 9.8 9.8z" />
                </svg>
              )}
            </button>
          </div>
        </div>
      </header>
      <div className="mx-auto max-w-6xl space-y-4 px-6 py-8">
        {status && (
          <div className="ul-surface flex items-center justify-between px-4 py-2 text-sm">
            <span>{status}</span>
            <button className="text-xs text-muted-foreground" onClick={() => setStatus(null)}>
              Dismiss
            </button>
          </div>
        )}
        <Routes>
          <Route path="/" element={<Navigate to="/customers" replace />} />
          <Route path="/customers" element={<CustomersPage />} />
          <Route path="/communications" element={<CommunicationsPage />} />
          <Route path="/tasks" element={<TasksPage />} />
          <Route path="/reports" element={<ReportsPage />} />
        </Routes>
      </div>
      <ReminderToasts />
    </div>
  );
};

export default App;
