// @vitest-environment jsdom
import { describe, it, expect, vi, afterEach } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import type { DraftCustomerRow } from '../types';
import { CustomerRow, type RowStatus } from './CustomerRow';

const row: DraftCustomerRow = {
  id: 'row-1',
  name: 'Family Mart',
  ipAddress: '192.168.1.1',
  subnetMask: 24,
  serviceCode: 'RETAIL',
};

function renderRow(status?: RowStatus, handlers: { onSave?: (row: DraftCustomerRow) => void; onDelete?: () => void } = {}) {
  return render(
    <table>
      <tbody>
        <CustomerRow
          row={row}
          position={1}
          status={status}
          serviceCodes={['RETAIL', 'WHOLESALE']}
          onSave={handlers.onSave ?? vi.fn()}
          onDelete={handlers.onDelete ?? vi.fn()}
        />
      </tbody>
    </table>
  );
}

describe('CustomerRow', () => {
  afterEach(() => {
    cleanup();
  });

  it('shows a pending row before validation', () => {
    renderRow();

    expect(screen.getByText('Pending')).toBeTruthy();
    expect(screen.getByText('192.168.1.1/24')).toBeTruthy();
  });

  it('shows the object name and tags of an accepted row', () => {
    renderRow({
      kind: 'accepted',
      record: {
        name: 'Family Mart',
        ipAddress: '192.168.1.1',
        subnetMask: 24,
        serviceCode: 'RETAIL',
        tags: ['Retail'],
        objectName: 'familymart_192.168.1.1_24',
      },
    });

    expect(screen.getByText('Valid')).toBeTruthy();
    expect(screen.getByText('familymart_192.168.1.1_24')).toBeTruthy();
    expect(screen.getByText('Retail')).toBeTruthy();
  });

  it('shows the reason of a rejected row', () => {
    renderRow({
      kind: 'rejected',
      rejection: {
        index: 0,
        row,
        reason: 'duplicate_object_name',
        message: 'Object name "familymart_192.168.1.1_24" already used earlier in this batch',
      },
    });

    expect(screen.getByText('Duplicate')).toBeTruthy();
    expect(screen.getByText('Object name "familymart_192.168.1.1_24" already used earlier in this batch')).toBeTruthy();
  });

  it('calls onDelete', () => {
    const onDelete = vi.fn();
    renderRow(undefined, { onDelete });

    fireEvent.click(screen.getByText('Delete'));

    expect(onDelete).toHaveBeenCalledTimes(1);
  });

  it('saves edited fields', () => {
    const onSave = vi.fn();
    renderRow(undefined, { onSave });

    fireEvent.click(screen.getByText('Edit'));
    fireEvent.change(screen.getByLabelText('Customer name'), { target: { value: 'Family Mart Express' } });
    fireEvent.change(screen.getByLabelText('Subnet mask'), { target: { value: '28' } });
    fireEvent.change(screen.getByLabelText('Service code'), { target: { value: 'WHOLESALE' } });
    fireEvent.click(screen.getByText('Save'));

    expect(onSave).toHaveBeenCalledWith({
      id: 'row-1',
      name: 'Family Mart Express',
      ipAddress: '192.168.1.1',
      subnetMask: '28',
      serviceCode: 'WHOLESALE',
    });
    expect(screen.getByText('Edit')).toBeTruthy();
  });

  it('discards edits on cancel', () => {
    const onSave = vi.fn();
    renderRow(undefined, { onSave });

    fireEvent.click(screen.getByText('Edit'));
    fireEvent.change(screen.getByLabelText('Customer name'), { target: { value: 'Other' } });
    fireEvent.click(screen.getByText('Cancel'));

    expect(onSave).not.toHaveBeenCalled();
    expect(screen.getByText('Family Mart')).toBeTruthy();
  });
});
