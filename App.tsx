import React, { useState, useMemo, useRef } from 'react';
import type {
  ApplyResponse,
  ApplyResult,
  DraftCustomerRow,
  PanoramaConfig,
  RawCustomerRow,
  RejectionReason,
  ServerInfo,
  ValidationResponse,
} from './types';
import { parseCustomerCsv, toSubnetMaskValue } from './server/customerImport';
import { CustomerRow, type RowStatus } from './components/CustomerRow';

let rowCounter = 0;
const withId = (row: RawCustomerRow): DraftCustomerRow => ({ ...row, id: `row-${++rowCounter}` });

const EMPTY_ENTRY: RawCustomerRow = { name: '', ipAddress: '', subnetMask: '', serviceCode: '' };

const REASON_TEXT: Record<RejectionReason, string> = {
  invalid_ip: 'Invalid IP address',
  invalid_mask: 'Invalid subnet mask',
  unknown_service_code: 'Unknown service code',
  invalid_name: 'Invalid customer name',
  duplicate_object_name: 'Duplicate object name',
};

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : 'Unknown error');

const App: React.FC = () => {
  const [config, setConfig] = useState<PanoramaConfig>({
    url: '',
    username: '',
    password: '',
    deviceGroup: '',
  });
  const [serverInfo, setServerInfo] = useState<ServerInfo | null>(null);

  React.useEffect(() => {
    fetch('/api/config')
      .then(res => res.json())
      .then((data: ServerInfo) => {
        setServerInfo(data);
        setConfig(prev => ({
          ...prev,
          url: data.panoramaUrl || prev.url,
          deviceGroup: data.deviceGroup || prev.deviceGroup,
        }));
      })
      .catch(err => console.log('Could not load server config:', err));
  }, []);

  const [rows, setRows] = useState<DraftCustomerRow[]>([]);
  const [entry, setEntry] = useState<RawCustomerRow>(EMPTY_ENTRY);
  const [lastDeleted, setLastDeleted] = useState<{ row: DraftCustomerRow; index: number } | null>(null);
  const [validation, setValidation] = useState<ValidationResponse | null>(null);
  const [applyResult, setApplyResult] = useState<ApplyResult | null>(null);
  const [isValidating, setIsValidating] = useState(false);
  const [isApplying, setIsApplying] = useState(false);
  const [isProductionMode, setIsProductionMode] = useState(false);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const serviceCodes = useMemo(() => Object.keys(serverInfo?.serviceCodes ?? {}).sort(), [serverInfo]);

  // Accepted records come back in input order, so they line up with the rows that were not rejected.
  const rowStatuses = useMemo(() => {
    const statuses: Array<RowStatus | undefined> = rows.map(() => undefined);
    if (!validation) return statuses;
    const rejectedByIndex = new Map(validation.rejected.map(r => [r.index, r]));
    let acceptedIndex = 0;
    rows.forEach((_, index) => {
      const rejection = rejectedByIndex.get(index);
      if (rejection) {
        statuses[index] = { kind: 'rejected', rejection };
      } else if (acceptedIndex < validation.accepted.length) {
        statuses[index] = { kind: 'accepted', record: validation.accepted[acceptedIndex++] };
      }
    });
    return statuses;
  }, [rows, validation]);

  const updateRows = (next: DraftCustomerRow[]) => {
    setRows(next);
    setValidation(null);
    setApplyResult(null);
  };

  const toBatch = () => rows.map(r => [r.name, r.ipAddress, r.subnetMask, r.serviceCode]);

  const handleFileUpload = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;

    const reader = new FileReader();
    reader.onload = (event) => {
      const content = event.target?.result;
      if (typeof content !== 'string') return;
      try {
        const parsed = parseCustomerCsv(content);
        updateRows([...rows, ...parsed.map(withId)]);
      } catch (error) {
        console.error('CSV import failed:', error);
        alert(`Failed to import ${file.name}: ${errorMessage(error)}`);
      }
    };
    reader.readAsText(file);
    e.target.value = '';
  };

  const handleAddEntry = (e: React.FormEvent) => {
    e.preventDefault();
    updateRows([...rows, withId({ ...entry, subnetMask: toSubnetMaskValue(entry.subnetMask) })]);
    setEntry({ ...EMPTY_ENTRY, serviceCode: entry.serviceCode });
  };

  const handleDelete = (index: number) => {
    setLastDeleted({ row: rows[index], index });
    updateRows(rows.filter((_, i) => i !== index));
  };

  const handleUndoDelete = () => {
    if (!lastDeleted) return;
    const next = [...rows];
    next.splice(Math.min(lastDeleted.index, next.length), 0, lastDeleted.row);
    updateRows(next);
    setLastDeleted(null);
  };

  const handleValidate = async () => {
    setIsValidating(true);
    setApplyResult(null);
    try {
      const response = await fetch('/api/customers/validate', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ rows: toBatch() })
      });
      const data = await response.json();
      if (!response.ok) {
        throw new Error(data.error || `API error: ${response.statusText}`);
      }
      setValidation(data);
    } catch (error) {
      console.error('Validation failed:', error);
      alert(`Failed to validate customers: ${errorMessage(error)}`);
    } finally {
      setIsValidating(false);
    }
  };

  const handleDownloadYaml = async () => {
    try {
      const response = await fetch('/api/customers/export', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ rows: toBatch() })
      });
      if (!response.ok) {
        const errorData = await response.json();
        throw new Error(errorData.error || `API error: ${response.statusText}`);
      }
      const blob = await response.blob();
      const link = document.createElement('a');
      link.href = URL.createObjectURL(blob);
      link.download = 'customers.yml';
      link.click();
      URL.revokeObjectURL(link.href);
    } catch (error) {
      console.error('Export failed:', error);
      alert(`Failed to export customers.yml: ${errorMessage(error)}`);
    }
  };

  const handleExportPDF = async () => {
    if (!validation) return;
    try {
      const { jsPDF } = await import('jspdf');
      const doc = new jsPDF();

      const margin = 20;
      const pageHeight = doc.internal.pageSize.getHeight();
      let yPos = margin;
      const line = (text: string, step = 7) => {
        if (yPos > pageHeight - 20) {
          doc.addPage();
          yPos = margin;
        }
        doc.text(text, margin, yPos);
        yPos += step;
      };

      doc.setFontSize(18);
      line('Customer Onboarding - Validation Report', 15);
      doc.setFontSize(12);
      line(`Generated: ${new Date().toLocaleString()}`, 10);
      if (config.url) line(`Panorama URL: ${config.url}`, 10);

      doc.setFontSize(14);
      line('Summary', 10);
      doc.setFontSize(11);
      line(`Total rows: ${validation.summary.total}`);
      doc.setTextColor(40, 167, 69);
      line(`Accepted: ${validation.summary.accepted}`);
      doc.setTextColor(220, 53, 69);
      line(`Rejected: ${validation.summary.rejected}`);
      doc.setTextColor(0, 0, 0);
      Object.entries(validation.summary.byReason).forEach(([reason, count]) => {
        line(`  ${reason}: ${count}`);
      });
      yPos += 5;

      if (validation.rejected.length > 0) {
        doc.setFontSize(14);
        line('Rejected Rows', 10);
        doc.setFontSize(10);
        validation.rejected.forEach(r => {
          line(`Row ${r.index + 1} (${r.row.name || 'no name'}): ${r.message}`);
        });
        yPos += 5;
      }

      if (validation.accepted.length > 0) {
        doc.setFontSize(14);
        line('Address Objects', 10);
        doc.setFontSize(10);
        validation.accepted.forEach(record => {
          line(`${record.objectName}  ${record.ipAddress}/${record.subnetMask}  [${record.tags.join(', ')}]`);
        });
      }

      doc.save(`customer-validation-${new Date().toISOString().split('T')[0]}.pdf`);
    } catch (error) {
      console.error('Export failed:', error);
      alert(`Failed to export PDF: ${errorMessage(error)}`);
    }
  };

  const handleApply = async () => {
    if (!isProductionMode) {
      alert('Production mode must be enabled to apply changes to Panorama');
      return;
    }
    if (!validation || validation.accepted.length === 0) {
      alert('No valid customers to apply');
      return;
    }
    if (!confirm(`Create ${validation.accepted.length} address object(s), commit, and push to "${config.deviceGroup}"?`)) {
      return;
    }

    setIsApplying(true);
    try {
      const response = await fetch('/api/customers/apply', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          rows: toBatch(),
          url: config.url,
          username: config.username || undefined,
          password: config.password || undefined,
          deviceGroup: config.deviceGroup,
        })
      });
      const data = await response.json();
      if (!data.result) {
        throw new Error(data.error || `API error: ${response.statusText}`);
      }
      const applied: ApplyResponse = data;
      setApplyResult(applied.result);
      if (response.ok) {
        alert(`Successfully pushed ${applied.result.objectsConfigured} address objects to "${config.deviceGroup}".`);
      }
    } catch (error) {
      console.error('Apply failed:', error);
      alert(`Failed to apply customers: ${errorMessage(error)}`);
    } finally {
      setIsApplying(false);
    }
  };

  const fieldClass = 'w-full px-4 py-2 bg-slate-50 border border-slate-200 rounded-lg focus:ring-2 focus:ring-blue-500 focus:outline-none transition-all';

  return (
    <div className="min-h-screen pb-20">
      {/* Header */}
      <header className="bg-slate-900 text-white py-6 shadow-xl sticky top-0 z-50">
        <div className="container mx-auto px-4 flex justify-between items-center">
          <div className="flex items-center gap-3">
            <div className="bg-blue-500 p-2 rounded-lg">
              <svg className="w-6 h-6 text-white" fill="none" stroke="currentColor" viewBox="0 0 24 24">
                <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M17 20h5v-2a3 3 0 00-5.356-1.857M17 20H7m10 0v-2c0-.656-.126-1.283-.356-1.857M7 20H2v-2a3 3 0 015.356-1.857M7 20v-2c0-.656.126-1.283.356-1.857m0 0a5.002 5.002 0 019.288 0M15 7a3 3 0 11-6 0 3 3 0 016 0z" />
              </svg>
            </div>
            <h1 className="text-xl font-bold tracking-tight">Panorama Customer Onboarding</h1>
          </div>
          <div className="text-xs text-slate-400 font-mono hidden md:block">
            {serverInfo?.mockMode ? 'mock panorama' : config.url}
          </div>
        </div>
      </header>

      <main className="container mx-auto px-4 mt-8 max-w-6xl space-y-8">
        {/* Panorama Settings */}
        <section className="bg-white rounded-xl shadow-sm border border-slate-200 p-6">
          <h2 className="text-lg font-semibold text-slate-800 mb-4">Panorama Settings</h2>
          <div className="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-4 gap-6">
            <div className="space-y-1">
              <label className="text-sm font-medium text-slate-600">Panorama URL</label>
              <input type="text" value={config.url} onChange={e => setConfig({ ...config, url: e.target.value })} className={fieldClass} placeholder="https://your-panorama-ip" />
            </div>
            <div className="space-y-1">
              <label className="text-sm font-medium text-slate-600">Username</label>
              <input type="text" value={config.username} onChange={e => setConfig({ ...config, username: e.target.value })} className={fieldClass} placeholder={serverInfo?.hasStoredCredentials ? 'stored on server' : 'admin'} />
            </div>
            <div className="space-y-1">
              <label className="text-sm font-medium text-slate-600">Password</label>
              <input type="password" value={config.password} onChange={e => setConfig({ ...config, password: e.target.value })} className={fieldClass} placeholder="••••••••" />
            </div>
            <div className="space-y-1">
              <label className="text-sm font-medium text-slate-600">Device Group</label>
              <input type="text" value={config.deviceGroup} onChange={e => setConfig({ ...config, deviceGroup: e.target.value })} className={fieldClass} placeholder="Customers" />
            </div>
          </div>
          <label className="mt-4 text-sm font-medium text-slate-600 flex items-center gap-2">
            <input type="checkbox" checked={isProductionMode} onChange={e => setIsProductionMode(e.target.checked)} className="w-4 h-4 text-red-600 border-gray-300 rounded focus:ring-red-500" />
            <span className={isProductionMode ? 'text-red-600 font-semibold' : ''}>
              Production Mode {isProductionMode && '(⚠️ Will modify Panorama)'}
            </span>
          </label>
        </section>

        {/* Input */}
        <section className="bg-white rounded-xl shadow-sm border border-slate-200 p-6 space-y-6">
          <h2 className="text-lg font-semibold text-slate-800">Customer Records</h2>
          <div className="flex gap-2">
            <input type="file" ref={fileInputRef} onChange={handleFileUpload} className="hidden" accept=".csv,.txt" />
            <button type="button" onClick={() => fileInputRef.current?.click()} className="flex-1 px-4 py-2 bg-slate-50 border border-dashed border-slate-300 rounded-lg text-sm text-slate-500 hover:bg-slate-100 transition-all text-left">
              Upload CSV (CustomerName, CustomerIPAddress, IPSubnetMask, ServiceCode)
            </button>
          </div>

          <form onSubmit={handleAddEntry} className="grid grid-cols-1 md:grid-cols-5 gap-3 items-end">
            <input type="text" value={entry.name} onChange={e => setEntry({ ...entry, name: e.target.value })} className={fieldClass} placeholder="Customer name" required />
            <input type="text" value={entry.ipAddress} onChange={e => setEntry({ ...entry, ipAddress: e.target.value })} className={fieldClass} placeholder="192.168.1.1" required />
            <input type="text" value={String(entry.subnetMask)} onChange={e => setEntry({ ...entry, subnetMask: e.target.value })} className={fieldClass} placeholder="24" required />
            <select value={entry.serviceCode} onChange={e => setEntry({ ...entry, serviceCode: e.target.value })} className={fieldClass} required>
              <option value="">Service code</option>
              {serviceCodes.map(code => <option key={code} value={code}>{code}</option>)}
            </select>
            <button type="submit" className="bg-slate-800 hover:bg-slate-900 text-white font-semibold py-2 px-4 rounded-lg">Add Customer</button>
          </form>

          {lastDeleted && (
            <div className="text-sm text-slate-600 bg-amber-50 border border-amber-200 rounded-lg px-4 py-2 flex justify-between">
              <span>Deleted "{lastDeleted.row.name}".</span>
              <button type="button" onClick={handleUndoDelete} className="font-semibold text-amber-700 hover:text-amber-900">Undo</button>
            </div>
          )}

          <div className="overflow-x-auto border border-slate-200 rounded-xl">
            <table className="min-w-full">
              <thead className="bg-slate-50 text-left text-xs font-semibold text-slate-500 uppercase">
                <tr>
                  <th className="px-6 py-3">#</th>
                  <th className="px-6 py-3">Customer</th>
                  <th className="px-6 py-3">Address</th>
                  <th className="px-6 py-3">Service</th>
                  <th className="px-6 py-3 text-right">Status</th>
                </tr>
              </thead>
              <tbody>
                {rows.length > 0 ? rows.map((row, index) => (
                  <CustomerRow
                    key={row.id}
                    row={row}
                    position={index + 1}
                    status={rowStatuses[index]}
                    serviceCodes={serviceCodes}
                    onSave={updated => updateRows(rows.map(r => (r.id === updated.id ? updated : r)))}
                    onDelete={() => handleDelete(index)}
                  />
                )) : (
                  <tr><td colSpan={5} className="px-6 py-8 text-center text-sm text-slate-400 italic">No customers yet. Upload a CSV or add one above.</td></tr>
                )}
              </tbody>
            </table>
          </div>

          <button type="button" onClick={handleValidate} disabled={isValidating || rows.length === 0} className="w-full bg-blue-600 hover:bg-blue-700 disabled:bg-blue-300 text-white font-semibold py-3 px-6 rounded-lg shadow-md transition-all">
            {isValidating ? 'Validating...' : `Validate ${rows.length} Customer(s)`}
          </button>
        </section>

        {validation && (
          <section className="space-y-6">
            <div className="grid grid-cols-3 gap-4">
              <div className="bg-white p-4 rounded-xl border border-slate-200 shadow-sm">
                <p className="text-xs text-slate-500 uppercase font-bold mb-1">Total Rows</p>
                <p className="text-2xl font-bold text-slate-800">{validation.summary.total}</p>
              </div>
              <div className="bg-green-50 p-4 rounded-xl border border-green-100 shadow-sm">
                <p className="text-xs text-green-600 uppercase font-bold mb-1">Accepted</p>
                <p className="text-2xl font-bold text-green-700">{validation.summary.accepted}</p>
              </div>
              <div className="bg-red-50 p-4 rounded-xl border border-red-100 shadow-sm">
                <p className="text-xs text-red-600 uppercase font-bold mb-1">Rejected</p>
                <p className="text-2xl font-bold text-red-700">{validation.summary.rejected}</p>
              </div>
            </div>

            {validation.rejected.length > 0 && (
              <div className="bg-red-50 rounded-xl border border-red-200 p-4">
                <h3 className="text-sm font-semibold text-red-800 mb-2">Rejected Rows</h3>
                <ul className="text-sm text-red-700 space-y-1">
                  {validation.rejected.map(r => (
                    <li key={r.index}>Row {r.index + 1}: <span className="font-semibold">{REASON_TEXT[r.reason]}</span> - {r.message}</li>
                  ))}
                </ul>
              </div>
            )}

            <div className="flex flex-wrap gap-3">
              <button type="button" onClick={handleDownloadYaml} disabled={validation.accepted.length === 0} className="px-4 py-2 bg-white border border-slate-300 rounded-lg text-sm font-semibold text-slate-700 hover:bg-slate-50 disabled:opacity-50">Download customers.yml</button>
              <button type="button" onClick={handleExportPDF} className="px-4 py-2 bg-white border border-slate-300 rounded-lg text-sm font-semibold text-slate-700 hover:bg-slate-50">Export PDF Report</button>
              <button type="button" onClick={handleApply} disabled={isApplying || !isProductionMode || validation.accepted.length === 0} className="px-4 py-2 bg-red-600 hover:bg-red-700 disabled:bg-red-300 rounded-lg text-sm font-semibold text-white">
                {isApplying ? 'Applying to Panorama...' : 'Apply to Panorama'}
              </button>
            </div>
          </section>
        )}

        {applyResult && (
          <section className="bg-white rounded-xl shadow-sm border border-slate-200 p-6">
            <h2 className="text-lg font-semibold text-slate-800 mb-4">Panorama Result</h2>
            <ol className="space-y-2">
              {applyResult.steps.map(step => (
                <li key={step.step} className="flex items-center gap-3 text-sm">
                  <span className={`px-2 py-1 text-xs font-semibold rounded-full uppercase ${
                    step.status === 'success' ? 'bg-green-100 text-green-700' : step.status === 'failed' ? 'bg-red-100 text-red-700' : 'bg-gray-100 text-gray-500'
                  }`}>{step.status}</span>
                  <span className="font-medium text-slate-700">{step.step}</span>
                  {step.jobId !== undefined && <span className="text-xs text-slate-400">job {step.jobId}</span>}
                  <span className="text-slate-500">{step.message}</span>
                </li>
              ))}
            </ol>
          </section>
        )}
      </main>
    </div>
  );
};

export default App;
