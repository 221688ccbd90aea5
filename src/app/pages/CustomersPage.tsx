import { useMemo, useState } from 'react';
import type { Customer, CustomerInput } from '../../models/Customer';
import { ALL_CUSTOMERS_FILTER } from '../../models/Customer';
import { createCustomer } from '../../services/CrmFactory';
import { loadCrmConfig } from '../../services/DataLoader';
import { buildCustomerFilterOptions } from '../../services/FilterDefinitions';
import { filterCustomerList } from '../../services/FilterService';
import { validateCustomerInput } from '../../services/FormValidation';
import Modal, { Field } from '../components/Modal';
import { useCrmStore } from '../store/useCrmStore';

type DialogMode = 'add' | 'update' | 'delete' | null;

type CustomerForm = Required<CustomerInput>;

const emptyForm = (role: string): CustomerForm => ({
  name: '',
  email: '',
  phone: '',
  role,
  notes: ''
});

const formFromCustomer = (customer: Customer): CustomerForm => ({
  name: customer.name,
  email: customer.email,
  phone: customer.phone,
  role: customer.role,
  notes: customer.notes
});

const CustomersPage = () => {
  const { roles } = loadCrmConfig();
  const customers = useCrmStore((state) => state.customers);
  const communications = useCrmStore((state) => state.communications);
  const addCustomer = useCrmStore((state) => state.addCustomer);
  const updateCustomer = useCrmStore((state) => state.updateCustomer);
  const deleteCustomer = useCrmStore((state) => state.deleteCustomer);

  const [search, setSearch] = useState('');
  const [filterOption, setFilterOption] = useState(ALL_CUSTOMERS_FILTER);
  const [selectedId, setSelectedId] = useState<string | null>(null);
  const [dialog, setDialog] = useState<DialogMode>(null);
  const [form, setForm] = useState<CustomerForm>(() => emptyForm(roles[0]));
  const [errors, setErrors] = useState<string[]>([]);
  const [info, setInfo] = useState<string | null>(null);

  const filterOptions = useMemo(() => buildCustomerFilterOptions(roles), [roles]);
  const rows = useMemo(
    () => filterCustomerList(Object.values(customers), filterOption, search, communications),
    [customers, filterOption, search, communications]
  );
  const selected = selectedId ? customers[selectedId] : undefined;

  const closeDialog = () => {
    setDialog(null);
    setErrors([]);
  };

  const openAdd = () => {
    setForm(emptyForm(roles[0]));
    setErrors([]);
    setDialog('add');
  };

  const openForSelection = (mode: 'update' | 'delete') => {
    if (!selected) {
      setInfo('Please select a customer first.');
      return;
    }
    setInfo(null);
    setForm(formFromCustomer(selected));
    setErrors([]);
    setDialog(mode);
  };

  const onSave = () => {
    const result = validateCustomerInput(form);
    if (!result.ok) {
      setErrors(result.errors);
      return;
    }
    if (dialog === 'add') {
      const customer = createCustomer(result.value);
      addCustomer(customer);
      setSelectedId(customer.id);
    } else if (dialog === 'update' && selected) {
      updateCustomer({ ...selected, ...result.value, notes: result.value.notes ?? '' });
    }
    closeDialog();
  };

  const onDelete = () => {
    if (selected) {
      deleteCustomer(selected.id);
      setSelectedId(null);
    }
    closeDialog();
  };

  const setField = (field: keyof CustomerForm) => (value: string) =>
    setForm((prev) => ({ ...prev, [field]: value }));

  return (
    <section className="space-y-4">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <h1 className="text-xl font-semibold">Customers</h1>
        <div className="flex gap-2">
          <button className="ul-button ul-button-primary" onClick={openAdd}>
            Add Customer
          </button>
          <button className="ul-button ul-button-secondary" onClick={() => openForSelection('update')}>
            Update Customer
          </button>
          <button className="ul-button ul-button-ghost" onClick={() => openForSelection('delete')}>
            Delete Customer
          </button>
        </div>
      </div>

      {info && (
        <div className="ul-surface px-4 py-2 text-sm text-muted-foreground">{info}</div>
      )}

      <div className="flex flex-wrap gap-3">
        <input
          className="ul-input max-w-xs"
          value={search}
          onChange={(event) => setSearch(event.target.value)}
          placeholder="Search customers"
        />
        <select
          className="ul-input max-w-[220px]"
          value={filterOption}
          onChange={(event) => setFilterOption(event.target.value)}
        >
          {filterOptions.map((option) => (
            <option key={option} value={option}>
              {option}
            </option>
          ))}
        </select>
      </div>

      <div className="ul-surface overflow-x-auto">
        <table className="ul-table">
          <thead>
            <tr>
              <th>ID</th>
              <th>Name</th>
              <th>Email</th>
              <th>Phone</th>
              <th>Role</th>
              <th>Notes</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((customer) => (
              <tr
                key={customer.id}
                onClick={() => {
                  setSelectedId(customer.id);
                  setInfo(null);
                }}
                className={`cursor-pointer ${customer.id === selectedId ? 'bg-accent' : ''}`}
              >
                <td className="font-mono text-xs">{customer.id.slice(0, 8)}</td>
                <td>{customer.name}</td>
                <td>{customer.email}</td>
                <td>{customer.phone}</td>
                <td>{customer.role}</td>
                <td className="max-w-xs truncate">{customer.notes}</td>
              </tr>
            ))}
            {rows.length === 0 && (
              <tr>
                <td colSpan={6} className="text-center text-muted-foreground">
                  No customers match the current filter.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>

      {(dialog === 'add' || dialog === 'update') && (
        <Modal
          title={dialog === 'add' ? 'Add Customer' : 'Update Customer'}
          errors={errors}
          onClose={closeDialog}
          onConfirm={onSave}
        >
          <Field label="Name">
            <input className="ul-input" value={form.name} onChange={(e) => setField('name')(e.target.value)} />
          </Field>
          <Field label="Email">
            <input className="ul-input" value={form.email} onChange={(e) => setField('email')(e.target.value)} />
          </Field>
          <Field label="Phone">
            <input className="ul-input" value={form.phone} onChange={(e) => setField('phone')(e.target.value)} />
          </Field>
          <Field label="Role">
            <select className="ul-input" value={form.role} onChange={(e) => setField('role')(e.target.value)}>
              {roles.map((role) => (
                <option key={role} value={role}>
                  {role}
                </option>
              ))}
            </select>
          </Field>
          <Field label="Notes">
            <textarea
              className="ul-input min-h-[80px]"
              value={form.notes}
              onChange={(e) => setField('notes')(e.target.value)}
            />
          </Field>
        </Modal>
      )}

      {dialog === 'delete' && selected && (
        <Modal
          title="Delete Customer"
          subtitle={`Delete "${selected.name}" together with their communications and tasks?`}
          onClose={closeDialog}
          onConfirm={onDelete}
          confirmLabel="Delete"
        />
      )}
    </section>
  );
};

export default CustomersPage;
