import { create } from 'zustand';
import { loadCrmConfig } from '../../services/DataLoader';
import { ReminderScheduler } from '../../services/ReminderScheduler';
import type { ReminderAlert } from '../../services/ReminderScheduler';
import { crmStore } from './useCrmStore';

export const reminderScheduler = new ReminderScheduler(crmStore, {
  intervalMs: loadCrmConfig().reminders.checkIntervalMs
});

export type ReminderToast = ReminderAlert & { toastId: string };

type ReminderStoreState = {
  toasts: ReminderToast[];
  push: (alert: ReminderAlert) => void;
  dismiss: (toastId: string) => void;
  dismissAll: () => void;
};

const MAX_TOASTS = 5;

export const useReminderStore = create<ReminderStoreState>((set) => ({
  toasts: [],
  push: (alert) =>
    set((state) => ({
      toasts: [
        ...state.toasts,
        { ...alert, toastId: `${alert.kind}:${alert.task.id}:${alert.firedAt}` }
      ].slice(-MAX_TOASTS)
    })),
  dismiss: (toastId) =>
    set((state) => ({ toasts: state.toasts.filter((toast) => toast.toastId !== toastId) })),
  dismissAll: () => set({ toasts: [] })
}));
