import React, { useState } from 'react';
import type { CustomerRecord, DraftCustomerRow, RejectedRow, RejectionReason } from '../types';

export type RowStatus =
  | { kind: 'accepted'; record: CustomerRecord }
  | { kind: 'rejected'; rejection: RejectedRow };

interface CustomerRowProps {
  row: DraftCustomerRow;
  position: number;
  status?: RowStatus;
  serviceCodes: string[];
  onSave: (row: DraftCustomerRow) => void;
  onDelete: () => void;
}

const REASON_LABELS: Record<RejectionReason, string> = {
  invalid_ip: 'Invalid IP',
  invalid_mask: 'Invalid Mask',
  unknown_service_code: 'Unknown Service',
  invalid_name: 'Invalid Name',
  duplicate_object_name: 'Duplicate',
};

const inputClass = 'w-full px-2 py-1 text-sm bg-slate-50 border border-slate-200 rounded focus:ring-2 focus:ring-blue-500 focus:outline-none';

export const CustomerRow: React.FC<CustomerRowProps> = ({ row, position, status, serviceCodes, onSave, onDelete }) => {
  const [isEditing, setIsEditing] = useState(false);
  const [draft, setDraft] = useState<DraftCustomerRow>(row);

  const getStatusBadge = () => {
    if (!status) {
      return <span className="px-2 py-1 text-xs font-semibold rounded-full bg-gray-100 text-gray-500 uppercase">Pending</span>;
    }
    if (status.kind === 'accepted') {
      return <span className="px-2 py-1 text-xs font-semibold rounded-full bg-green-100 text-green-700 uppercase">Valid</span>;
    }
    return (
      <span
        className="px-2 py-1 text-xs font-semibold rounded-full bg-red-100 text-red-700 uppercase"
        title={status.rejection.message}
      >
        {REASON_LABELS[status.rejection.reason]}
      </span>
    );
  };

  if (isEditing) {
    return (
      <tr className="bg-blue-50 border-b border-gray-100">
        <td className="px-6 py-3 text-xs text-gray-400">{position}</td>
        <td className="px-6 py-3">
          <input aria-label="Customer name" className={inputClass} value={draft.name} onChange={e => setDraft({ ...draft, name: e.target.value })} />
        </td>
        <td className="px-6 py-3">
          <div className="flex gap-1 items-center">
            <input aria-label="IP address" className={inputClass} value={draft.ipAddress} onChange={e => setDraft({ ...draft, ipAddress: e.target.value })} />
            <span className="text-slate-400">/</span>
            <input aria-label="Subnet mask" className={`${inputClass} w-16`} value={String(draft.subnetMask)} onChange={e => setDraft({ ...draft, subnetMask: e.target.value })} />
          </div>
        </td>
        <td className="px-6 py-3">
          <select aria-label="Service code" className={inputClass} value={draft.serviceCode} onChange={e => setDraft({ ...draft, serviceCode: e.target.value })}>
            {!serviceCodes.includes(draft.serviceCode) && <option value={draft.serviceCode}>{draft.serviceCode || '(none)'}</option>}
            {serviceCodes.map(code => <option key={code} value={code}>{code}</option>)}
          </select>
        </td>
        <td className="px-6 py-3 whitespace-nowrap text-right space-x-2">
          <button
            type="button"
            onClick={() => {
              onSave(draft);
              setIsEditing(false);
            }}
            className="text-xs font-semibold text-blue-600 hover:text-blue-800"
          >
            Save
          </button>
          <button
            type="button"
            onClick={() => {
              setDraft(row);
              setIsEditing(false);
            }}
            className="text-xs text-slate-500 hover:text-slate-700"
          >
            Cancel
          </button>
        </td>
      </tr>
    );
  }

  return (
    <tr className="hover:bg-gray-50 border-b border-gray-100 transition-colors">
      <td className="px-6 py-4 text-xs text-gray-400">{position}</td>
      <td className="px-6 py-4 whitespace-nowrap">
        <div className="text-sm font-medium text-gray-900">{row.name || <span className="italic text-gray-400">No name</span>}</div>
        {status?.kind === 'accepted' && <div className="text-xs text-gray-500 font-mono">{status.record.objectName}</div>}
        {status?.kind === 'rejected' && <div className="text-xs text-red-500">{status.rejection.message}</div>}
      </td>
      <td className="px-6 py-4 whitespace-nowrap">
        <div className="text-sm text-gray-900 font-mono">{row.ipAddress}/{String(row.subnetMask)}</div>
      </td>
      <td className="px-6 py-4">
        <div className="text-sm text-gray-900">{row.serviceCode}</div>
        {status?.kind === 'accepted' && (
          <div className="flex flex-wrap gap-1 mt-1">
            {status.record.tags.map(tag => (
              <span key={tag} className="text-[10px] px-1.5 py-0.5 rounded border bg-blue-50 border-blue-200 text-blue-600">{tag}</span>
            ))}
          </div>
        )}
      </td>
      <td className="px-6 py-4 whitespace-nowrap text-right space-x-3">
        {getStatusBadge()}
        <button
          type="button"
          onClick={() => {
            setDraft(row);
            setIsEditing(true);
          }}
          className="text-xs text-blue-600 hover:text-blue-800"
        >
          Edit
        </button>
        <button type="button" onClick={onDelete} className="text-xs text-red-500 hover:text-red-700">
          Delete
        </button>
      </td>
    </tr>
  );
};
