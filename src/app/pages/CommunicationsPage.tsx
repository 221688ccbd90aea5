import { useMemo, useState } from 'react';
import type { Communication, CommunicationType } from '../../models/Communication';
import {
  ALL_TYPES_FILTER,
  COMMUNICATION_TYPES,
  COMMUNICATION_TYPE_LABELS,
  CommunicationTypeSchema
} from '../../models/Communication';
import { createCommunication, parseTagInput } from '../../services/CrmFactory';
import {
  COMMUNICATION_TYPE_FILTERS,
  isCommunicationTypeFilter
} from '../../services/FilterDefinitions';
import type { CommunicationTypeFilter } from '../../services/FilterDefinitions';
import { searchCommunications } from '../../services/FilterService';
import { validateCommunicationInput } from '../../services/FormValidation';
import { formatDateTime } from '../../utils/dates';
import Modal, { Field } from '../components/Modal';
import { useCrmStore } from '../store/useCrmStore';

type DialogMode = 'log' | 'tags' | 'edit' | null;

const typeLabel = (value: CommunicationTypeFilter): string =>
  value === ALL_TYPES_FILTER ? value : COMMUNICATION_TYPE_LABELS[value];

const CommunicationsPage = () => {
  const customers = useCrmStore((state) => state.customers);
  const communications = useCrmStore((state) => state.communications);
  const addCommunication = useCrmStore((state) => state.addCommunication);
  const updateCommunication = useCrmStore((state) => state.updateCommunication);
  const addTags = useCrmStore((state) => state.addTags);
  const removeTag = useCrmStore((state) => state.removeTag);

  const [typeFilter, setTypeFilter] = useState<CommunicationTypeFilter>(ALL_TYPES_FILTER);
  const [tagSearch, setTagSearch] = useState('');
  const [selectedId, setSelectedId] = useState<string | null>(null);
  const [dialog, setDialog] = useState<DialogMode>(null);
  const [errors, setErrors] = useState<string[]>([]);
  const [info, setInfo] = useState<string | null>(null);

  const [formCustomerId, setFormCustomerId] = useState('');
  const [formType, setFormType] = useState<CommunicationType>('phone');
  const [formNotes, setFormNotes] = useState('');
  const [formTags, setFormTags] = useState('');

  const customerList = useMemo(
    () => Object.values(customers).sort((a, b) => a.name.localeCompare(b.name)),
    [customers]
  );
  const rows = useMemo(
    () =>
      searchCommunications(communications, { type: typeFilter, tagSearch }).sort(
        (a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp)
      ),
    [communications, typeFilter, tagSearch]
  );
  const selected: Communication | undefined = rows.find((row) => row.id === selectedId);

  const closeDialog = () => {
    setDialog(null);
    setErrors([]);
  };

  const openLog = () => {
    setFormCustomerId('');
    setFormType('phone');
    setFormNotes('');
    setFormTags('');
    setErrors([]);
    setDialog('log');
  };

  const openForSelection = (mode: 'tags' | 'edit') => {
    if (!selected) {
      setInfo('Please select a communication first.');
      return;
    }
    setInfo(null);
    setFormType(selected.type);
    setFormNotes(selected.notes);
    setFormTags('');
    setErrors([]);
    setDialog(mode);
  };

  const onLog = () => {
    const result = validateCommunicationInput({
      customerId: formCustomerId,
      type: formType,
      notes: formNotes,
      tags: formTags
    });
    if (!result.ok) {
      setErrors(result.errors);
      return;
    }
    const communication = createCommunication(result.value);
    addCommunication(communication);
    setSelectedId(communication.id);
    closeDialog();
  };

  const onAddTags = () => {
    const tags = parseTagInput(formTags);
    if (!selected || tags.length === 0) {
      setErrors(['Enter at least one tag.']);
      return;
    }
    addTags(selected.id, tags);
    closeDialog();
  };

  const onEdit = () => {
    if (!selected) {
      return;
    }
    const notes = formNotes.trim();
    if (!notes) {
      setErrors(['Notes are required.']);
      return;
    }
    updateCommunication({ ...selected, type: formType, notes });
    closeDialog();
  };

  const typeSelect = (
    <select
      className="ul-input"
      value={formType}
      onChange={(event) => {
        const parsed = CommunicationTypeSchema.safeParse(event.target.value);
        if (parsed.success) {
          setFormType(parsed.data);
        }
      }}
    >
      {COMMUNICATION_TYPES.map((type) => (
        <option key={type} value={type}>
          {COMMUNICATION_TYPE_LABELS[type]}
        </option>
      ))}
    </select>
  );

  return (
    <section className="space-y-4">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <h1 className="text-xl font-semibold">Communications</h1>
        <div className="flex gap-2">
          <button className="ul-button ul-button-primary" onClick={openLog}>
            Log Communication
          </button>
          <button className="ul-button ul-button-secondary" onClick={() => openForSelection('tags')}>
            Add Tags
          </button>
          <button className="ul-button ul-button-ghost" onClick={() => openForSelection('edit')}>
            Edit Communication
          </button>
        </div>
      </div>

      {info && (
        <div className="ul-surface px-4 py-2 text-sm text-muted-foreground">{info}</div>
      )}

      <div className="flex flex-wrap gap-3">
        <select
          className="ul-input max-w-[200px]"
          value={typeFilter}
          onChange={(event) => {
            if (isCommunicationTypeFilter(event.target.value)) {
              setTypeFilter(event.target.value);
            }
          }}
        >
          {COMMUNICATION_TYPE_FILTERS.map((option) => (
            <option key={option} value={option}>
              {typeLabel(option)}
            </option>
          ))}
        </select>
        <input
          className="ul-input max-w-xs"
          value={tagSearch}
          onChange={(event) => setTagSearch(event.target.value)}
          placeholder="Search tags"
        />
      </div>

      <div className="ul-surface overflow-x-auto">
        <table className="ul-table">
          <thead>
            <tr>
              <th>ID</th>
              <th>Customer</th>
              <th>Type</th>
              <th>Date/Time</th>
              <th>Notes</th>
              <th>Tags</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((communication) => (
              <tr
                key={communication.id}
                onClick={() => {
                  setSelectedId(communication.id);
                  setInfo(null);
                }}
                className={`cursor-pointer ${communication.id === selectedId ? 'bg-accent' : ''}`}
              >
                <td className="font-mono text-xs">{communication.id.slice(0, 8)}</td>
                <td>{customers[communication.customerId]?.name ?? 'Unknown'}</td>
                <td>{COMMUNICATION_TYPE_LABELS[communication.type]}</td>
                <td>{formatDateTime(communication.timestamp)}</td>
                <td className="max-w-xs truncate">{communication.notes}</td>
                <td>
                  <div className="flex flex-wrap gap-1">
                    {communication.tags.map((tag, index) => (
                      <span
                        key={`${tag}-${index}`}
                        className="inline-flex items-center gap-1 rounded-full bg-muted px-2 py-0.5 text-xs"
                      >
                        {tag}
                        <button
                          className="text-muted-foreground hover:text-foreground"
                          aria-label={`Remove tag ${tag}`}
                          onClick={(event) => {
                            event.stopPropagation();
                            removeTag(communication.id, tag);
                          }}
                        >
                          ×
                        </button>
                      </span>
                    ))}
                  </div>
                </td>
              </tr>
            ))}
            {rows.length === 0 && (
              <tr>
                <td colSpan={6} className="text-center text-muted-foreground">
                  No communications logged.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>

      {dialog === 'log' && (
        <Modal title="Log Communication" errors={errors} onClose={closeDialog} onConfirm={onLog}>
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
          <Field label="Type">{typeSelect}</Field>
          <Field label="Notes">
            <textarea
              className="ul-input min-h-[80px]"
              value={formNotes}
              onChange={(event) => setFormNotes(event.target.value)}
            />
          </Field>
          <Field label="Tags (comma separated)">
            <input
              className="ul-input"
              value={formTags}
              onChange={(event) => setFormTags(event.target.value)}
            />
          </Field>
        </Modal>
      )}

      {dialog === 'tags' && selected && (
        <Modal
          title="Add Tags"
          subtitle={`Current tags: ${selected.tags.join(', ') || 'none'}`}
          errors={errors}
          onClose={closeDialog}
          onConfirm={onAddTags}
          confirmLabel="Add"
        >
          <Field label="New tags (comma separated)">
            <input
              className="ul-input"
              value={formTags}
              onChange={(event) => setFormTags(event.target.value)}
            />
          </Field>
        </Modal>
      )}

      {dialog === 'edit' && selected && (
        <Modal title="Edit Communication" errors={errors} onClose={closeDialog} onConfirm={onEdit}>
          <Field label="Type">{typeSelect}</Field>
          <Field label="Notes">
            <textarea
              className="ul-input min-h-[80px]"
              value={formNotes}
              onChange={(event) => setFormNotes(event.target.value)}
            />
          </Field>
        </Modal>
      )}
    </section>
  );
};

export default CommunicationsPage;
