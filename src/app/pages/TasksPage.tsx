import { useMemo, useState } from 'react';
import type { Customer } from '../../models/Customer';
import type { Task, TaskPriority } from '../../models/Task';
import { PRIORITY_LABELS, TASK_PRIORITIES, TaskPrioritySchema } from '../../models/Task';
import { createTask } from '../../services/CrmFactory';
import { filterTasks, nameContains } from '../../services/FilterService';
import { collectReminderUpdates, validateTaskInput } from '../../services/FormValidation';
import { formatDateTime, timeOptions, toDateInputValue, toTimeInputValue } from '../../utils/dates';
import Modal, { Field } from '../components/Modal';
import { useCrmStore } from '../store/useCrmStore';
import { reminderScheduler } from '../store/useReminderStore';

type DialogMode = 'add' | 'reminder' | null;

type ReminderDraft = { date: string; time: string };

const DEFAULT_REMINDER_SLOT = '09:00';

const draftFromTask = (task: Task): ReminderDraft => {
  const reminder = new Date(task.reminderTime);
  if (Number.isNaN(reminder.getTime())) {
    return { date: '', time: DEFAULT_REMINDER_SLOT };
  }
  return { date: toDateInputValue(reminder), time: toTimeInputValue(reminder) };
};

const TasksPage = () => {
  const customers = useCrmStore((state) => state.customers);
  const tasks = useCrmStore((state) => state.tasks);
  const leadHours = useCrmStore((state) => state.settings.reminderLeadHours);
  const addTask = useCrmStore((state) => state.addTask);
  const setTaskCompleted = useCrmStore((state) => state.setTaskCompleted);
  const setReminderTimes = useCrmStore((state) => state.setReminderTimes);

  const [showCompleted, setShowCompleted] = useState(false);
  const [selectedId, setSelectedId] = useState<string | null>(null);
  const [dialog, setDialog] = useState<DialogMode>(null);
  const [errors, setErrors] = useState<string[]>([]);
  const [info, setInfo] = useState<string | null>(null);

  const [formCustomerId, setFormCustomerId] = useState('');
  const [formDescription, setFormDescription] = useState('');
  const [formDueDate, setFormDueDate] = useState('');
  const [formPriority, setFormPriority] = useState<TaskPriority>('medium');

  const [customerQuery, setCustomerQuery] = useState('');
  const [reminderCustomer, setReminderCustomer] = useState<Customer | null>(null);
  const [reminderDrafts, setReminderDrafts] = useState<Record<string, ReminderDraft>>({});
  const [editedIds, setEditedIds] = useState<Set<string>>(new Set());

  const customerList = useMemo(
    () => Object.values(customers).sort((a, b) => a.name.localeCompare(b.name)),
    [customers]
  );
  const rows = useMemo(() => {
    const all = Object.values(tasks).flat();
    return filterTasks(all, (task) => showCompleted || !task.completed).sort(
      (a, b) => Date.parse(a.dueDate) - Date.parse(b.dueDate)
    );
  }, [tasks, showCompleted]);
  const selected = rows.find((task) => task.id === selectedId);

  const matchingCustomers = useMemo(
    () => customerList.filter(nameContains(customerQuery.trim())),
    [customerList, customerQuery]
  );
  const reminderTasks = useMemo(
    () =>
      reminderCustomer
        ? filterTasks(tasks[reminderCustomer.id] ?? [], (task) => !task.completed)
        : [],
    [reminderCustomer, tasks]
  );

  const closeDialog = () => {
    setDialog(null);
    setErrors([]);
    setReminderCustomer(null);
    setCustomerQuery('');
  };

  const openAdd = () => {
    setFormCustomerId('');
    setFormDescription('');
    setFormDueDate('');
    setFormPriority('medium');
    setErrors([]);
    setDialog('add');
  };

  const onAdd = () => {
    const result = validateTaskInput({
      customerId: formCustomerId,
      description: formDescription,
      dueDate: formDueDate,
      priority: formPriority
    });
    if (!result.ok) {
      setErrors(result.errors);
      return;
    }
    const task = createTask(result.value, leadHours);
    addTask(task);
    setSelectedId(task.id);
    closeDialog();
  };

  const onMarkCompleted = () => {
    if (!selected) {
      setInfo('Please select a task first.');
      return;
    }
    setInfo(null);
    setTaskCompleted(selected.id, true);
  };

  const pickReminderCustomer = (customer: Customer) => {
    setReminderCustomer(customer);
    setErrors([]);
    const drafts: Record<string, ReminderDraft> = {};
    (tasks[customer.id] ?? [])
      .filter((task) => !task.completed)
      .forEach((task) => {
        drafts[task.id] = draftFromTask(task);
      });
    setReminderDrafts(drafts);
    setEditedIds(new Set());
  };

  const updateDraft = (taskId: string, patch: Partial<ReminderDraft>) => {
    setReminderDrafts((prev) => ({
      ...prev,
      [taskId]: { ...(prev[taskId] ?? { date: '', time: DEFAULT_REMINDER_SLOT }), ...patch }
    }));
    setEditedIds((prev) => new Set(prev).add(taskId));
  };

  const onSaveReminders = () => {
    if (!reminderCustomer) {
      setErrors(['Please select a customer.']);
      return;
    }
    const result = collectReminderUpdates(reminderTasks, reminderDrafts, editedIds);
    if (!result.ok) {
      setErrors(result.errors);
      return;
    }
    const updates = result.value;
    const count = setReminderTimes(updates);
    updates.forEach(({ taskId }) => reminderScheduler.clearNotificationStatus(taskId));
    setInfo(`Updated ${count} reminder${count === 1 ? '' : 's'} for ${reminderCustomer.name}.`);
    closeDialog();
  };

  return (
    <section className="space-y-4">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <h1 className="text-xl font-semibold">Tasks</h1>
        <div className="flex gap-2">
          <button className="ul-button ul-button-primary" onClick={openAdd}>
            Add Task
          </button>
          <button className="ul-button ul-button-secondary" onClick={onMarkCompleted}>
            Mark as Completed
          </button>
          <button
            className="ul-button ul-button-ghost"
            onClick={() => {
              setErrors([]);
              setDialog('reminder');
            }}
          >
            Reminder
          </button>
        </div>
      </div>

      {info && (
        <div className="ul-surface px-4 py-2 text-sm text-muted-foreground">{info}</div>
      )}

      <label className="flex items-center gap-2 text-sm">
        <input
          type="checkbox"
          className="ul-checkbox"
          checked={showCompleted}
          onChange={(event) => setShowCompleted(event.target.checked)}
        />
        Show Completed Tasks
      </label>

      <div className="ul-surface overflow-x-auto">
        <table className="ul-table">
          <thead>
            <tr>
              <th>ID</th>
              <th>Customer</th>
              <th>Description</th>
              <th>Due Date</th>
              <th>Priority</th>
              <th>Reminder</th>
              <th>Completed</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((task) => (
              <tr
                key={task.id}
                onClick={() => {
                  setSelectedId(task.id);
                  setInfo(null);
                }}
                className={`cursor-pointer ${task.id === selectedId ? 'bg-accent' : ''}`}
              >
                <td className="font-mono text-xs">{task.id.slice(0, 8)}</td>
                <td>{customers[task.customerId]?.name ?? 'Unknown'}</td>
                <td>{task.description}</td>
                <td>{formatDateTime(task.dueDate)}</td>
                <td>{PRIORITY_LABELS[task.priority]}</td>
                <td>{formatDateTime(task.reminderTime)}</td>
                <td>{task.completed ? 'Yes' : 'No'}</td>
              </tr>
            ))}
            {rows.length === 0 && (
              <tr>
                <td colSpan={7} className="text-center text-muted-foreground">
                  No tasks to show.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>

      {dialog === 'add' && (
        <Modal title="Add Task" errors={errors} onClose={closeDialog} onConfirm={onAdd}>
          <Field label="Customer">
            <select
              className="ul-input"
              value={formCustomerId}
              onChange={(event) => setFormCustomerId(event.target.value)}
            >
              <option value="">Select a customer</option>
              {customerList.map((customer) => (
                <option key={customer.id} value={customer.id}>
                  {customer.name}
                </option>
              ))}
            </select>
          </Field>
          <Field label="Description">
            <input
              className="ul-input"
              value={formDescription}
              onChange={(event) => setFormDescription(event.target.value)}
            />
          </Field>
          <Field label="Due date">
            <input
              className="ul-input"
              value={formDueDate}
              onChange={(event) => setFormDueDate(event.target.value)}
              placeholder="YYYY-MM-DD HH:MM"
            />
          </Field>
          <Field label="Priority">
            <select
              className="ul-input"
              value={formPriority}
              onChange={(event) => {
                const parsed = TaskPrioritySchema.safeParse(event.target.value);
                if (parsed.success) {
                  setFormPriority(parsed.data);
                }
              }}
            >
              {TASK_PRIORITIES.map((priority) => (
                <option key={priority} value={priority}>
                  {PRIORITY_LABELS[priority]}
                </option>
              ))}
            </select>
          </Field>
        </Modal>
      )}

      {dialog === 'reminder' && (
        <Modal
          title="Set Task Reminder"
          subtitle={
            reminderCustomer
              ? `Pending tasks for ${reminderCustomer.name}`
              : 'Select a customer to set task reminders'
          }
          errors={errors}
          onClose={closeDialog}
          onConfirm={reminderCustomer ? onSaveReminders : undefined}
          wide
        >
          {!reminderCustomer && (
            <>
              <Field label="Enter customer name">
                <input
                  className="ul-input"
                  value={customerQuery}
                  onChange={(event) => setCustomerQuery(event.target.value)}
                  placeholder="Type customer name"
                />
              </Field>
              <div className="max-h-60 space-y-1 overflow-y-auto">
                {matchingCustomers.map((customer) => (
                  <button
                    key={customer.id}
                    className="ul-button ul-button-ghost w-full justify-start"
                    onClick={() => pickReminderCustomer(customer)}
                  >
                    {customer.name} ({customer.email})
                  </button>
                ))}
                {matchingCustomers.length === 0 && (
                  <div className="text-xs text-muted-foreground">No matching customers.</div>
                )}
              </div>
            </>
          )}
          {reminderCustomer && reminderTasks.length === 0 && (
            <div className="text-sm text-muted-foreground">
              No pending tasks found for this customer.
            </div>
          )}
          {reminderCustomer &&
            reminderTasks.map((task) => {
              const draft = reminderDrafts[task.id] ?? { date: '', time: DEFAULT_REMINDER_SLOT };
              return (
                <div key={task.id} className="ul-surface space-y-2 px-3 py-2">
                  <div className="text-sm font-medium">{task.description}</div>
                  <div className="text-xs text-muted-foreground">
                    Due {formatDateTime(task.dueDate)} · {PRIORITY_LABELS[task.priority]}
                  </div>
                  <div className="flex gap-2">
                    <input
                      type="date"
                      className="ul-input"
                      value={draft.date}
                      onChange={(event) => updateDraft(task.id, { date: event.target.value })}
                    />
                    <select
                      className="ul-input max-w-[120px]"
                      value={draft.time}
                      onChange={(event) => updateDraft(task.id, { time: event.target.value })}
                    >
                      {timeOptions(draft.time).map((slot) => (
                        <option key={slot} value={slot}>
                          {slot}
                        </option>
                      ))}
                    </select>
                  </div>
                </div>
              );
            })}
        </Modal>
      )}
    </section>
  );
};

export default TasksPage;
