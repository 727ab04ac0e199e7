import { useState } from 'react';
import { exportSubscriptions, type ExportFormat } from '../../api/client';

function download(blob: Blob, filename: string) {
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = filename;
  link.click();
  URL.revokeObjectURL(url);
}

export function ExportPanel() {
  const [busy, setBusy] = useState<ExportFormat | null>(null);
  const [error, setError] = useState<string | null>(null);

  const handleExport = async (format: ExportFormat) => {
    setBusy(format);
    setError(null);
    try {
      const { blob, filename } = await exportSubscriptions(format);
      download(blob, filename);
    } catch (err) {
      console.error('[Export] Failed:', err);
      setError(err instanceof Error ? err.message : 'Export failed');
    } finally {
      setBusy(null);
    }
  };

  return (
    <section className="card export-panel" aria-label="Export">
      <h3 className="card-title">Export</h3>
      <div className="button-row">
        <button className="btn" onClick={() => void handleExport('csv')} disabled={busy !== null}>
          {busy === 'csv' ? 'Exporting...' : 'Download CSV'}
        </button>
        <button className="btn" onClick={() => void handleExport('xlsx')} disabled={busy !== null}>
          {busy === 'xlsx' ? 'Exporting...' : 'Download Excel'}
        </button>
      </div>
      {error && <p className="status-line error">{error}</p>}
    </section>
  );
}
