import { useStore } from 'zustand';
import { createCrmStore } from './crmStore';
import type { CrmState } from './crmStore';

export const crmStore = createCrmStore();

export const useCrmStore = <T,>(selector: (state: CrmState) => T): T =>
  useStore(crmStore, selector);
