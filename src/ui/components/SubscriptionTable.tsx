import { useState } from 'react';
import { deleteSubscription, updateSubscription, type ApiOptions } from '../../api/client';
import { formatCurrency } from '../../domain/currency';
import type { EnrichedSubscription, SubscriptionInput } from '../../domain/types';
import { CYCLE_LABELS, describeDays, formatDateKey } from '../format';
import { SubscriptionForm } from './SubscriptionForm';

interface SubscriptionTableProps {
  subscriptions: EnrichedSubscription[];
  options: ApiOptions;
  onChanged: () => void;
}

function dueClass(s: EnrichedSubscription, warningDays: number): string {
  if (s.daysRemaining < 0) return 'overdue';
  if (s.daysRemaining <= warningDays) return 'due-soon';
  return '';
}

export function SubscriptionTable({ subscriptions, options, onChanged }: SubscriptionTableProps) {
  const [editingId, setEditingId] = useState<string | null>(null);
  const [confirmingId, setConfirmingId] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  const handleUpdate = async (id: string, input: SubscriptionInput) => {
    await updateSubscription(id, input);
    setEditingId(null);
    onChanged();
  };

  const handleDelete = async (id: string) => {
    setError(null);
    try {
      await deleteSubscription(id);
      setConfirmingId(null);
      onChanged();
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to delete subscription');
    }
  };

  return (
    <div className="subscription-table-wrap">
      {error && (
        <p className="status-line error" role="alert">
          {error}
        </p>
      )}
      <table className="subscription-table">
        <thead>
          <tr>
            <th>Name</th>
            <th>Category</th>
            <th>Cycle</th>
            <th className="amount">Amount</th>
            <th className="amount">Monthly ({options.baseCurrency})</th>
            <th>Next payment</th>
            <th>Renewal</th>
            <th aria-label="Actions" />
          </tr>
        </thead>
        <tbody>
          {subscriptions.map((s) =>
            editingId === s.id ? (
              <tr key={s.id} className="editing">
                <td colSpan={8}>
                  <SubscriptionForm
                    options={options}
                    initial={s}
                    submitLabel="Save"
                    onSubmit={(input) => handleUpdate(s.id, input)}
                    onCancel={() => setEditingId(null)}
                  />
                </td>
              </tr>
            ) : (
              <tr key={s.id} className={dueClass(s, options.warningDays)}>
                <td>
                  <div className="cell-name">{s.name}</div>
                  {s.vendor && <div className="cell-sub">{s.vendor}</div>}
                </td>
                <td>{s.category}</td>
                <td>{CYCLE_LABELS[s.cycle]}</td>
                <td className="amount">{formatCurrency(s.amount, s.currency)}</td>
                <td className="amount">{formatCurrency(s.monthlyCost, options.baseCurrency)}</td>
                <td>
                  <div>{formatDateKey(s.nextPayment)}</div>
                  <div className="cell-sub">{describeDays(s.daysRemaining)}</div>
                </td>
                <td>{s.autoRenew ? 'Auto' : 'Manual'}</td>
                <td className="actions">
                  {confirmingId === s.id ? (
                    <span className="confirm-delete">
                      Delete {s.name}?{' '}
                      <button className="btn btn-danger btn-small" onClick={() => void handleDelete(s.id)}>
                        Yes, delete
                      </button>
                      <button className="btn btn-ghost btn-small" onClick={() => setConfirmingId(null)}>
                        Keep
                      </button>
                    </span>
                  ) : (
                    <>
                      <button className="btn btn-ghost btn-small" onClick={() => setEditingId(s.id)}>
                        Edit
                      </button>
                      <button className="btn btn-ghost btn-small" onClick={() => setConfirmingId(s.id)}>
                        Delete
                      </button>
                    </>
                  )}
                </td>
              </tr>
            ),
          )}
        </tbody>
      </table>
    </div>
  );
}
