import { useState } from 'react';
import { sendReminders, type ReminderResult } from '../../api/client';

interface ReminderPanelProps {
  defaultDays: number;
}

export function ReminderPanel({ defaultDays }: ReminderPanelProps) {
  const [days, setDays] = useState(String(defaultDays));
  const [email, setEmail] = useState('');
  const [force, setForce] = useState(false);
  const [busy, setBusy] = useState(false);
  const [result, setResult] = useState<ReminderResult | null>(null);
  const [error, setError] = useState<string | null>(null);

  const run = async (dryRun: boolean) => {
    const parsedDays = Number.parseInt(days, 10);
    setBusy(true);
    setError(null);
    setResult(null);
    try {
      setResult(
        await sendReminders({
          days: Number.isNaN(parsedDays) ? defaultDays : parsedDays,
          dryRun,
          force,
          email: email.trim() || undefined,
        }),
      );
    } catch (err) {
      console.error('[Reminders] Request failed:', err);
      setError(err instanceof Error ? err.message : 'Failed to send reminders');
    } finally {
      setBusy(false);
    }
  };

  return (
    <section className="card reminder-panel" aria-label="Email reminders">
      <h3 className="card-title">Email reminders</h3>
      <div className="form-row form-row-inline">
        <div>
          <label htmlFor="reminder-days">Days ahead</label>
          <input
            id="reminder-days"
            type="number"
            min="0"
            max="365"
            value={days}
            onChange={(e) => setDays(e.target.value)}
          />
        </div>
        <div>
          <label htmlFor="reminder-email">Recipient</label>
          <input
            id="reminder-email"
            type="email"
            value={email}
            placeholder="configured address"
            onChange={(e) => setEmail(e.target.value)}
          />
        </div>
      </div>
      <div className="form-row form-row-check">
        <input id="reminder-force" type="checkbox" checked={force} onChange={(e) => setForce(e.target.checked)} />
        <label htmlFor="reminder-force">Send even if already reminded today</label>
      </div>
      <div className="button-row">
        <button className="btn" onClick={() => void run(true)} disabled={busy}>
          Preview
        </button>
        <button className="btn btn-primary" onClick={() => void run(false)} disabled={busy}>
          {busy ? 'Working...' : 'Send now'}
        </button>
      </div>

      {error && (
        <p className="status-line error" role="alert">
          {error}
        </p>
      )}
      {result && (
        <div className={`status-line ${result.success ? 'success' : 'error'}`} role="status">
          <p>{result.message}</p>
          {result.skipped.length > 0 && <p>Already reminded today: {result.skipped.join(', ')}</p>}
          {result.preview && <pre className="reminder-preview">{result.preview}</pre>}
        </div>
      )}
    </section>
  );
}
