import { describe, expect, it } from 'vitest';
import { TabularSourceError } from '../inventory/errors';
import {
  canonicalColumns,
  canonicalToRow,
  findColumn,
  headerKey,
  rowsToCanonicalRecords,
  rowsToRoster,
  rowsToScanRecords,
} from './mapping';

describe('headerKey / findColumn', () => {
  it('folds case and punctuation', () => {
    expect(headerKey(' Workstation_Name ')).toBe('workstationname');
    expect(headerKey('workstationName')).toBe('workstationname');
    expect(headerKey('IP-Address')).toBe('ipaddress');
  });

  it('prefers aliases in order', () => {
    expect(findColumn(['Name', 'Computer Name'], ['computer name', 'name'])).toBe('Computer Name');
    expect(findColumn(['Asset Tag'], ['computer name', 'name'])).toBeNull();
  });
});

describe('rowsToScanRecords', () => {
  it('maps report headers to record fields and keeps extra columns', () => {
    const records = rowsToScanRecords([
      {
        'Workstation Name': 'LAB-01',
        'Last Hardware Scan': '1/5/2024 08:00',
        'Last Logged User ID': 'u1',
        'Primary User ID': 'p1',
        'IP Address': '10.0.0.5',
        Subnet: '10.0.0.0/24',
        Site: 'Annex',
      },
    ]);

    expect(records).toEqual([
      {
        workstationName: 'LAB-01',
        lastHardwareScan: '1/5/2024 08:00',
        lastLoggedUserId: 'u1',
        primaryUserId: 'p1',
        ipAddress: '10.0.0.5',
        subnet: '10.0.0.0/24',
        Site: 'Annex',
      },
    ]);
  });

  it('leaves fields without a column undefined', () => {
    const [record] = rowsToScanRecords([{ workstation_name: 'PC1' }]);
    expect(record).toEqual({ workstationName: 'PC1' });
    expect(record.lastHardwareScan).toBeUndefined();
  });

  it('rejects a report without a workstation column', () => {
    expect(() => rowsToScanRecords([{ Asset: 'x' }], 'scan.csv')).toThrow(TabularSourceError);
    expect(() => rowsToScanRecords([{ Asset: 'x' }], 'scan.csv')).toThrow(
      'scan.csv: no workstation name column found in scan report',
    );
  });

  it('accepts an empty table', () => {
    expect(rowsToScanRecords([])).toEqual([]);
  });
});

describe('rowsToRoster', () => {
  it('reads the PC name column verbatim', () => {
    expect(rowsToRoster([{ PC_Name: ' Lab-01 ', Owner: 'x' }, { PC_Name: '' }])).toEqual([
      { pcName: ' Lab-01 ' },
      { pcName: '' },
    ]);
  });

  it('falls back to a hostname column', () => {
    expect(rowsToRoster([{ Hostname: 'KIOSK-2' }])).toEqual([{ pcName: 'KIOSK-2' }]);
  });

  it('rejects a roster without a name column', () => {
    expect(() => rowsToRoster([{ Serial: '123' }], 'roster.xlsx')).toThrow(
      'roster.xlsx: no PC name column found in roster',
    );
  });
});

describe('canonical tables', () => {
  it('writes the canonical columns in order and reads them back', () => {
    const record = {
      workstationName: 'LAB-01',
      lastHardwareScan: '1/6/2024 08:00',
      lastLoggedUserId: 'u2',
      primaryUserId: 'p1',
      ipAddress: '10.0.0.6',
      subnet: '10.0.0.0/24',
    };

    expect(canonicalColumns()).toEqual([
      'Workstation Name',
      'Last Hardware Scan',
      'Last Logged User ID',
      'Primary User ID',
      'IP Address',
      'Subnet',
    ]);
    expect(rowsToCanonicalRecords([canonicalToRow(record)])).toEqual([record]);
  });
});
