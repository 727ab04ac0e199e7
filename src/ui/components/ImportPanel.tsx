import { useRef, useState, type ChangeEvent } from 'react';
import { importSubscriptions, rowErrors, type ImportResult } from '../../api/client';
import { parseImportFile, type ParsedImport } from '../../api/importer';
import type { ImportMode } from '../../domain/types';

const MODE_LABELS: Record<ImportMode, string> = {
  append: 'Append (same name: last one wins)',
  merge: 'Merge (update by name, add new)',
  replace: 'Replace all',
};

interface ImportPanelProps {
  modes: ImportMode[];
  onImported: () => void;
}

export function ImportPanel({ modes, onImported }: ImportPanelProps) {
  const [parsed, setParsed] = useState<ParsedImport | null>(null);
  const [fileName, setFileName] = useState('');
  const [mode, setMode] = useState<ImportMode>('append');
  const [importing, setImporting] = useState(false);
  const [result, setResult] = useState<ImportResult | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [details, setDetails] = useState<string[]>([]);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const resetState = () => {
    setParsed(null);
    setResult(null);
    setError(null);
    setDetails([]);
  };

  const handleFileChange = async (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;

    resetState();
    setFileName(file.name);
    try {
      const parsedFile = parseImportFile(file.name, await file.arrayBuffer());
      if (!parsedFile.ok) {
        setError(parsedFile.error);
        return;
      }
      setParsed(parsedFile.data);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to read file');
    }
  };

  const handleImport = async () => {
    if (!parsed) return;

    setImporting(true);
    setError(null);
    setDetails([]);
    try {
      const imported = await importSubscriptions(parsed.records, mode);
      setResult(imported);
      setParsed(null);
      if (fileInputRef.current) fileInputRef.current.value = '';
      onImported();
    } catch (err) {
      console.error('[Import] Failed:', err);
      setError(err instanceof Error ? err.message : 'Import failed');
      setDetails(rowErrors(err));
    } finally {
      setImporting(false);
    }
  };

  return (
    <section className="card import-panel" aria-label="Import">
      <h3 className="card-title">Import</h3>
      <p className="hint">CSV, Excel or JSON. Needs name, category, cycle, amount, next_payment, auto_renew.</p>
      <input
        ref={fileInputRef}
        type="file"
        accept=".csv,.txt,.xlsx,.xls,.json"
        aria-label="Import file"
        onChange={(e) => void handleFileChange(e)}
      />

      {parsed && (
        <div className="import-preview">
          <p>
            {fileName}: {parsed.records.length} row(s), showing the first {parsed.preview.length}
          </p>
          <table className="preview-table">
            <thead>
              <tr>
                {parsed.headers.map((h) => (
                  <th key={h}>{h}</th>
                ))}
              </tr>
            </thead>
            <tbody>
              {parsed.preview.map((row, i) => (
                <tr key={i}>
                  {parsed.headers.map((h) => (
                    <td key={h}>{row[h] ?? ''}</td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
          <div className="form-row">
            <label htmlFor="import-mode">Mode</label>
            <select
              id="import-mode"
              value={mode}
              onChange={(e) => {
                const next = modes.find((m) => m === e.target.value);
                if (next) setMode(next);
              }}
            >
              {modes.map((m) => (
                <option key={m} value={m}>
                  {MODE_LABELS[m]}
                </option>
              ))}
            </select>
          </div>
          <div className="button-row">
            <button className="btn btn-primary" onClick={() => void handleImport()} disabled={importing}>
              {importing ? 'Importing...' : `Import ${parsed.records.length} row(s)`}
            </button>
            <button className="btn btn-ghost" onClick={resetState} disabled={importing}>
              Cancel
            </button>
          </div>
        </div>
      )}

      {result && (
        <p className="status-line success" role="status">
          Imported {result.imported} subscription(s), {result.total} in total
        </p>
      )}
      {error && (
        <div className="status-line error" role="alert">
          <p>{error}</p>
          {details.length > 0 && (
            <ul>
              {details.map((d) => (
                <li key={d}>{d}</li>
              ))}
            </ul>
          )}
        </div>
      )}
    </section>
  );
}
