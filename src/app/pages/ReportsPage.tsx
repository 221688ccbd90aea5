import { useMemo, useState } from 'react';
import { COMMUNICATION_TYPES, COMMUNICATION_TYPE_LABELS } from '../../models/Communication';
import type { CommunicationType } from '../../models/Communication';
import {
  REPORT_PERIODS,
  buildCommunicationFrequency,
  buildCustomerActivity,
  getCommunicationStats,
  getTaskCompletionStats
} from '../../services/ReportService';
import type { ReportPeriod } from '../../services/ReportService';
import { useCrmStore } from '../store/useCrmStore';

const TYPE_COLORS: Record<CommunicationType, string> = {
  phone: 'bg-sky-500',
  email: 'bg-amber-500',
  meeting: 'bg-emerald-500'
};

const isReportPeriod = (value: string): value is ReportPeriod =>
  REPORT_PERIODS.some((period) => period === value);

const ReportsPage = () => {
  const customers = useCrmStore((state) => state.customers);
  const communications = useCrmStore((state) => state.communications);
  const tasks = useCrmStore((state) => state.tasks);
  const [period, setPeriod] = useState<ReportPeriod>('Weekly');
  // Bumped by "Refresh Report" so the buckets are rebuilt against the current time.
  const [refreshedAt, setRefreshedAt] = useState(() => Date.now());

  const allCommunications = useMemo(() => Object.values(communications).flat(), [communications]);
  const allTasks = useMemo(() => Object.values(tasks).flat(), [tasks]);
  const communicationStats = getCommunicationStats(allCommunications);
  const taskStats = getTaskCompletionStats(allTasks);

  const buckets = useMemo(
    () => buildCommunicationFrequency(allCommunications, period, new Date(refreshedAt)),
    [allCommunications, period, refreshedAt]
  );
  const maxCount = Math.max(
    1,
    ...buckets.flatMap((bucket) => COMMUNICATION_TYPES.map((type) => bucket[type]))
  );
  const activity = useMemo(
    () =>
      buildCustomerActivity(Object.values(customers), communications, tasks).sort((a, b) =>
        a.name.localeCompare(b.name)
      ),
    [customers, communications, tasks]
  );

  return (
    <section className="space-y-6">
      <h1 className="text-xl font-semibold">Reports</h1>

      <div className="grid gap-4 sm:grid-cols-3">
        <div className="ul-surface p-5">
          <div className="text-xs uppercase text-muted-foreground">Customers</div>
          <div className="mt-2 text-2xl font-semibold">{Object.keys(customers).length}</div>
        </div>
        <div className="ul-surface p-5">
          <div className="text-xs uppercase text-muted-foreground">Communications</div>
          <div className="mt-2 text-2xl font-semibold">
            {communicationStats.totalCommunications}
          </div>
        </div>
        <div className="ul-surface p-5">
          <div className="text-xs uppercase text-muted-foreground">Tasks completed</div>
          <div className="mt-2 text-2xl font-semibold">
            {taskStats.completedTasks} / {taskStats.totalTasks}
          </div>
        </div>
      </div>

      <section className="ul-surface p-6">
        <div className="flex flex-wrap items-center justify-between gap-3">
          <h2 className="text-lg font-semibold">Communication Frequency</h2>
          <div className="flex items-center gap-2">
            <select
              className="ul-input max-w-[160px]"
              value={period}
              onChange={(event) => {
                if (isReportPeriod(event.target.value)) {
                  setPeriod(event.target.value);
                }
              }}
            >
              {REPORT_PERIODS.map((option) => (
                <option key={option} value={option}>
                  {option}
                </option>
              ))}
            </select>
            <button className="ul-button ul-button-ghost" onClick={() => setRefreshedAt(Date.now())}>
              Refresh Report
            </button>
          </div>
        </div>

        <div className="mt-4 flex gap-4 text-xs text-muted-foreground">
          {COMMUNICATION_TYPES.map((type) => (
            <span key={type} className="flex items-center gap-1">
              <span className={`inline-block h-2 w-2 rounded-full ${TYPE_COLORS[type]}`} />
              {COMMUNICATION_TYPE_LABELS[type]}
            </span>
          ))}
        </div>

        <div className="mt-4 flex h-48 items-end gap-4 overflow-x-auto">
          {buckets.map((bucket) => (
            <div key={bucket.label} className="flex h-full min-w-[72px] flex-1 flex-col">
              <div className="flex flex-1 items-end justify-center gap-1">
                {COMMUNICATION_TYPES.map((type) => (
                  <div
                    key={type}
                    className={`w-3 rounded-t ${TYPE_COLORS[type]}`}
                    style={{ height: `${(bucket[type] / maxCount) * 100}%` }}
                    title={`${COMMUNICATION_TYPE_LABELS[type]}: ${bucket[type]}`}
                  />
                ))}
              </div>
              <div className="mt-2 text-center text-xs text-muted-foreground">{bucket.label}</div>
            </div>
          ))}
        </div>
      </section>

      <section className="ul-surface overflow-x-auto">
        <table className="ul-table">
          <thead>
            <tr>
              <th>Customer</th>
              <th>Communications</th>
              <th>Tasks</th>
              <th>Completed</th>
              <th>Completion rate</th>
            </tr>
          </thead>
          <tbody>
            {activity.map((row) => (
              <tr key={row.customerId}>
                <td>{row.name}</td>
                <td>{row.communications}</td>
                <td>{row.tasks}</td>
                <td>{row.completedTasks}</td>
                <td>{row.completionRate}%</td>
              </tr>
            ))}
            {activity.length === 0 && (
              <tr>
                <td colSpan={5} className="text-center text-muted-foreground">
                  No customers yet.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </section>
    </section>
  );
};

export default ReportsPage;
