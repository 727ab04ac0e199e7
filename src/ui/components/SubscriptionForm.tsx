import { useState, type FormEvent } from 'react';
import type { ApiOptions } from '../../api/client';
import { toDateKey } from '../../domain/computations';
import type { BillingCycle, Subscription, SubscriptionInput } from '../../domain/types';
import { validateSubscriptionInput } from '../../domain/validation';
import { CYCLE_LABELS } from '../format';

interface SubscriptionFormProps {
  options: ApiOptions;
  initial?: Subscription;
  submitLabel?: string;
  onSubmit: (input: SubscriptionInput) => Promise<void>;
  onCancel?: () => void;
}

interface FormState {
  name: string;
  vendor: string;
  category: string;
  cycle: BillingCycle;
  amount: string;
  currency: string;
  nextPayment: string;
  autoRenew: boolean;
}

function initialState(options: ApiOptions, initial?: Subscription): FormState {
  if (initial) {
    return { ...initial, amount: String(initial.amount) };
  }
  return {
    name: '',
    vendor: '',
    category: options.categories[0] ?? '',
    cycle: 'monthly',
    amount: '',
    currency: options.baseCurrency,
    nextPayment: toDateKey(new Date()),
    autoRenew: true,
  };
}

export function SubscriptionForm({ options, initial, submitLabel = 'Add', onSubmit, onCancel }: SubscriptionFormProps) {
  const [form, setForm] = useState<FormState>(() => initialState(options, initial));
  const [saving, setSaving] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [success, setSuccess] = useState(false);

  const idPrefix = initial ? `edit-${initial.id}` : 'new';

  const update = <K extends keyof FormState>(key: K, value: FormState[K]) => {
    setForm((prev) => ({ ...prev, [key]: value }));
  };

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setSuccess(false);

    const result = validateSubscriptionInput(form);
    if (!result.ok) {
      setError(result.error);
      return;
    }

    setSaving(true);
    setError(null);
    try {
      await onSubmit(result.value);
      if (!initial) {
        setForm(initialState(options));
        setSuccess(true);
      }
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to save subscription');
    } finally {
      setSaving(false);
    }
  };

  return (
    <form className="subscription-form" onSubmit={(e) => void handleSubmit(e)} noValidate>
      <div className="form-row">
        <label htmlFor={`${idPrefix}-name`}>Name *</label>
        <input
          id={`${idPrefix}-name`}
          type="text"
          value={form.name}
          onChange={(e) => update('name', e.target.value)}
          placeholder="e.g. Chatbot Pro"
        />
      </div>
      <div className="form-row">
        <label htmlFor={`${idPrefix}-vendor`}>Vendor</label>
        <input
          id={`${idPrefix}-vendor`}
          type="text"
          value={form.vendor}
          onChange={(e) => update('vendor', e.target.value)}
        />
      </div>
      <div className="form-row">
        <label htmlFor={`${idPrefix}-category`}>Category *</label>
        <input
          id={`${idPrefix}-category`}
          type="text"
          value={form.category}
          onChange={(e) => update('category', e.target.value)}
          list={`${idPrefix}-categories`}
        />
        <datalist id={`${idPrefix}-categories`}>
          {options.categories.map((cat) => (
            <option key={cat} value={cat} />
          ))}
        </datalist>
      </div>
      <div className="form-row">
        <label htmlFor={`${idPrefix}-cycle`}>Billing cycle</label>
        <select
          id={`${idPrefix}-cycle`}
          value={form.cycle}
          onChange={(e) => {
            const cycle = options.cycles.find((c) => c === e.target.value);
            if (cycle) update('cycle', cycle);
          }}
        >
          {options.cycles.map((c) => (
            <option key={c} value={c}>
              {CYCLE_LABELS[c]}
            </option>
          ))}
        </select>
      </div>
      <div className="form-row form-row-inline">
        <div>
          <label htmlFor={`${idPrefix}-amount`}>Amount *</label>
          <input
            id={`${idPrefix}-amount`}
            type="number"
            min="0"
            step="0.01"
            value={form.amount}
            onChange={(e) => update('amount', e.target.value)}
          />
        </div>
        <div>
          <label htmlFor={`${idPrefix}-currency`}>Currency</label>
          <select
            id={`${idPrefix}-currency`}
            value={form.currency}
            onChange={(e) => update('currency', e.target.value)}
          >
            {options.currencies.map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </div>
      </div>
      <div className="form-row">
        <label htmlFor={`${idPrefix}-next-payment`}>Next payment *</label>
        <input
          id={`${idPrefix}-next-payment`}
          type="date"
          value={form.nextPayment}
          onChange={(e) => update('nextPayment', e.target.value)}
        />
      </div>
      <div className="form-row form-row-check">
        <input
          id={`${idPrefix}-auto-renew`}
          type="checkbox"
          checked={form.autoRenew}
          onChange={(e) => update('autoRenew', e.target.checked)}
        />
        <label htmlFor={`${idPrefix}-auto-renew`}>Renews automatically</label>
      </div>
      <div className="button-row">
        <button type="submit" className="btn btn-primary" disabled={saving}>
          {saving ? 'Saving...' : submitLabel}
        </button>
        {onCancel && (
          <button type="button" className="btn btn-ghost" onClick={onCancel} disabled={saving}>
            Cancel
          </button>
        )}
      </div>
      {error && (
        <p className="status-line error" role="alert">
          {error}
        </p>
      )}
      {success && <p className="status-line success">Saved</p>}
    </form>
  );
}
