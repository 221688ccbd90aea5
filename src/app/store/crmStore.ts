import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { Communication } from '../../models/Communication';
import type { CrmSettings } from '../../models/Config';
import type { Customer } from '../../models/Customer';
import type { Task } from '../../models/Task';
import { normalizeTags } from '../../services/CrmFactory';
import { loadCrmConfig, settingsFromConfig } from '../../services/DataLoader';

export type CrmEventMap = {
  'customer:added': Customer;
  'customer:updated': Customer;
  'customer:deleted': Customer;
  'communication:added': Communication;
  'communication:updated': Communication;
  'task:added': Task;
  'task:updated': Task;
};

export type CrmEventType = keyof CrmEventMap;
export type CrmObserver<E extends CrmEventType> = (payload: CrmEventMap[E]) => void;

type ObserverRegistry = { [E in CrmEventType]: CrmObserver<E>[] };

export type ReminderTimeUpdate = {
  taskId: string;
  reminderTime: string;
};

export type CrmState = {
  customers: Record<string, Customer>;
  /** Communications grouped by customer id, in logging order. */
  communications: Record<string, Communication[]>;
  /** Tasks grouped by customer id, in creation order. */
  tasks: Record<string, Task[]>;
  settings: CrmSettings;

  addCustomer: (customer: Customer) => void;
  updateCustomer: (customer: Customer) => void;
  deleteCustomer: (customerId: string) => void;
  getCustomer: (customerId: string) => Customer | undefined;
  getAllCustomers: () => Customer[];

  addCommunication: (communication: Communication) => void;
  updateCommunication: (communication: Communication) => void;
  addTags: (communicationId: string, tags: string[]) => void;
  removeTag: (communicationId: string, tag: string) => void;
  getCustomerCommunications: (customerId: string) => Communication[];
  getAllCommunications: () => Communication[];

  addTask: (task: Task) => void;
  updateTask: (task: Task) => void;
  setTaskCompleted: (taskId: string, completed: boolean) => void;
  setReminderTimes: (updates: ReminderTimeUpdate[]) => number;
  getCustomerTasks: (customerId: string) => Task[];
  getAllTasks: () => Task[];
  getPendingTasks: () => Task[];

  updateSettings: (settings: Partial<CrmSettings>) => void;

  registerObserver: <E extends CrmEventType>(event: E, observer: CrmObserver<E>) => () => void;
  removeObserver: <E extends CrmEventType>(event: E, observer: CrmObserver<E>) => void;
};

export type CrmStore = StoreApi<CrmState>;

const replaceById = <T extends { id: string }>(list: T[], entity: T): T[] | null => {
  const index = list.findIndex((entry) => entry.id === entity.id);
  if (index === -1) {
    return null;
  }
  const next = list.slice();
  next[index] = entity;
  return next;
};

export const createCrmStore = (
  settings: CrmSettings = settingsFromConfig(loadCrmConfig())
): CrmStore => {
  const observers: ObserverRegistry = {
    'customer:added': [],
    'customer:updated': [],
    'customer:deleted': [],
    'communication:added': [],
    'communication:updated': [],
    'task:added': [],
    'task:updated': []
  };

  const notify = <E extends CrmEventType>(event: E, payload: CrmEventMap[E]): void => {
    const listeners: CrmObserver<E>[] = observers[event].slice();
    listeners.forEach((observer) => {
      try {
        observer(payload);
      } catch (error) {
        console.error(`[CRM] Observer for "${event}" failed:`, error);
      }
    });
  };

  return createStore<CrmState>()((set, get) => {
    const findCommunication = (communicationId: string): Communication | undefined => {
      for (const list of Object.values(get().communications)) {
        const match = list.find((entry) => entry.id === communicationId);
        if (match) {
          return match;
        }
      }
      return undefined;
    };

    const findTask = (taskId: string): Task | undefined => {
      for (const list of Object.values(get().tasks)) {
        const match = list.find((entry) => entry.id === taskId);
        if (match) {
          return match;
        }
      }
      return undefined;
    };

    const replaceCommunication = (communication: Communication): boolean => {
      const list = get().communications[communication.customerId];
      const next = list ? replaceById(list, communication) : null;
      if (!next) {
        return false;
      }
      set({ communications: { ...get().communications, [communication.customerId]: next } });
      notify('communication:updated', communication);
      return true;
    };

    const replaceTask = (task: Task): boolean => {
      const list = get().tasks[task.customerId];
      const next = list ? replaceById(list, task) : null;
      if (!next) {
        return false;
      }
      set({ tasks: { ...get().tasks, [task.customerId]: next } });
      notify('task:updated', task);
      return true;
    };

    return {
      customers: {},
      communications: {},
      tasks: {},
      settings: { ...settings, reminderLeadHours: { ...settings.reminderLeadHours } },

      addCustomer: (customer) => {
        set({ customers: { ...get().customers, [customer.id]: customer } });
        notify('customer:added', customer);
      },
      updateCustomer: (customer) => {
        if (!get().customers[customer.id]) {
          return;
        }
        set({ customers: { ...get().customers, [customer.id]: customer } });
        notify('customer:updated', customer);
      },
      deleteCustomer: (customerId) => {
        const customer = get().customers[customerId];
        if (!customer) {
          return;
        }
        const customers = { ...get().customers };
        const communications = { ...get().communications };
        const tasks = { ...get().tasks };
        delete customers[customerId];
        delete communications[customerId];
        delete tasks[customerId];
        set({ customers, communications, tasks });
        notify('customer:deleted', customer);
      },
      getCustomer: (customerId) => get().customers[customerId],
      getAllCustomers: () => Object.values(get().customers),

      addCommunication: (communication) => {
        const existing = get().communications[communication.customerId] ?? [];
        set({
          communications: {
            ...get().communications,
            [communication.customerId]: [...existing, communication]
          }
        });
        notify('communication:added', communication);
      },
      updateCommunication: (communication) => {
        replaceCommunication(communication);
      },
      addTags: (communicationId, tags) => {
        const communication = findCommunication(communicationId);
        const additions = normalizeTags(tags);
        if (!communication || additions.length === 0) {
          return;
        }
        replaceCommunication({ ...communication, tags: [...communication.tags, ...additions] });
      },
      removeTag: (communicationId, tag) => {
        const communication = findCommunication(communicationId);
        if (!communication) {
          return;
        }
        const index = communication.tags.indexOf(tag);
        if (index === -1) {
          return;
        }
        const tags = communication.tags.slice();
        tags.splice(index, 1);
        replaceCommunication({ ...communication, tags });
      },
      getCustomerCommunications: (customerId) => get().communications[customerId] ?? [],
      getAllCommunications: () => Object.values(get().communications).flat(),

      addTask: (task) => {
        const existing = get().tasks[task.customerId] ?? [];
        set({ tasks: { ...get().tasks, [task.customerId]: [...existing, task] } });
        notify('task:added', task);
      },
      updateTask: (task) => {
        replaceTask(task);
      },
      setTaskCompleted: (taskId, completed) => {
        const task = findTask(taskId);
        if (!task || task.completed === completed) {
          return;
        }
        replaceTask({ ...task, completed });
      },
      setReminderTimes: (updates) => {
        let updated = 0;
        updates.forEach(({ taskId, reminderTime }) => {
          const task = findTask(taskId);
          if (task && replaceTask({ ...task, reminderTime })) {
            updated += 1;
          }
        });
        return updated;
      },
      getCustomerTasks: (customerId) => get().tasks[customerId] ?? [],
      getAllTasks: () => Object.values(get().tasks).flat(),
      getPendingTasks: () =>
        Object.values(get().tasks)
          .flat()
          .filter((task) => !task.completed),

      updateSettings: (partial) => {
        const current = get().settings;
        set({
          settings: {
            ...current,
            ...partial,
            reminderLeadHours: { ...current.reminderLeadHours, ...partial.reminderLeadHours }
          }
        });
      },

      registerObserver: (event, observer) => {
        observers[event].push(observer);
        return () => get().removeObserver(event, observer);
      },
      removeObserver: (event, observer) => {
        const list = observers[event];
        const index = list.indexOf(observer);
        if (index !== -1) {
          list.splice(index, 1);
        }
      }
    };
  });
};
