import { PRIORITY_LABELS } from '../../models/Task';
import { formatDateTime } from '../../utils/dates';
import { useReminderStore } from '../store/useReminderStore';

const ReminderToasts = () => {
  const toasts = useReminderStore((state) => state.toasts);
  const dismiss = useReminderStore((state) => state.dismiss);

  if (toasts.length === 0) {
    return null;
  }

  return (
    <div className="fixed bottom-4 right-4 z-40 flex w-80 flex-col gap-3" aria-live="polite">
      {toasts.map((toast) => {
        const overdue = toast.kind === 'overdue';
        return (
          <div
            key={toast.toastId}
            className={`ul-surface border-l-4 p-4 text-sm ${
              overdue ? 'border-l-rose-500' : 'border-l-amber-500'
            }`}
          >
            <div className="flex items-start justify-between gap-3">
              <div className="font-semibold">{overdue ? 'Overdue task' : 'Task reminder'}</div>
              <button
                className="text-xs text-muted-foreground hover:text-foreground"
                onClick={() => dismiss(toast.toastId)}
                aria-label="Dismiss"
              >
                Dismiss
              </button>
            </div>
            <div className="mt-2">{toast.task.description}</div>
            <div className="mt-1 text-xs text-muted-foreground">
              {toast.customerName} · due {formatDateTime(toast.task.dueDate)} ·{' '}
              {PRIORITY_LABELS[toast.task.priority]}
            </div>
          </div>
        );
      })}
    </div>
  );
};

export default ReminderToasts;
