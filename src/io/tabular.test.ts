import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Workbook } from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TabularSourceError } from '../inventory/errors';
import { cellText, formatCsvTable, formatForPath, parseCsvTable, readTable, writeTable } from './tabular';

describe('parseCsvTable', () => {
  it('uses the header row, strips a BOM and trims header names', () => {
    const rows = parseCsvTable('\uFEFF Workstation Name ,Last Hardware Scan\nLAB-01,1/5/2024 08:00\n\n lab-02 ,\n');
    expect(rows).toEqual([
      { 'Workstation Name': 'LAB-01', 'Last Hardware Scan': '1/5/2024 08:00' },
      { 'Workstation Name': ' lab-02 ', 'Last Hardware Scan': '' },
    ]);
  });

  it('tolerates short rows', () => {
    expect(parseCsvTable('PC Name,Owner\nKIOSK-1\n')).toEqual([{ 'PC Name': 'KIOSK-1' }]);
  });
});

describe('formatCsvTable', () => {
  it('writes the header and quotes values that need it', () => {
    const csv = formatCsvTable(['PC Name', 'Note'], [{ 'PC Name': 'LAB-03', Note: 'a, b' }, { 'PC Name': 'LAB-04' }]);
    expect(csv).toBe('PC Name,Note\nLAB-03,"a, b"\nLAB-04,\n');
  });
});

describe('formatForPath', () => {
  it('chooses the format from the extension', () => {
    expect(formatForPath('report.CSV')).toBe('csv');
    expect(formatForPath('/tmp/roster.xlsx')).toBe('xlsx');
    expect(() => formatForPath('roster.ods')).toThrow(TabularSourceError);
  });
});

describe('cellText', () => {
  it('renders date cells from their UTC parts', () => {
    expect(cellText(new Date(Date.UTC(2024, 0, 6, 8, 5)))).toBe('1/6/2024 8:05');
  });

  it('renders rich text, hyperlinks and formula results', () => {
    expect(cellText({ richText: [{ text: 'LAB' }, { text: '-01' }] })).toBe('LAB-01');
    expect(cellText({ text: 'KIOSK-1', hyperlink: 'https://inventory.example/kiosk-1' })).toBe('KIOSK-1');
    expect(cellText({ formula: 'A1', result: 42, date1904: false })).toBe('42');
    expect(cellText(null)).toBe('');
  });
});

describe('readTable / writeTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'inventory-tabular-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes a CSV table into a new directory and reads it back', async () => {
    const file = path.join(dir, 'out', 'unmatched.csv');
    await writeTable(file, ['PC Name'], [{ 'PC Name': 'LAB-03' }]);

    expect(await fs.readFile(file, 'utf8')).toBe('PC Name\nLAB-03\n');
    expect(await readTable(file)).toEqual([{ 'PC Name': 'LAB-03' }]);
  });

  it('reads the first worksheet of a workbook, including date cells', async () => {
    const file = path.join(dir, 'scan.xlsx');
    const workbook = new Workbook();
    const sheet = workbook.addWorksheet('Scan');
    sheet.addRow(['Workstation Name', 'Last Hardware Scan', 'IP Address']);
    sheet.addRow(['LAB-01', new Date(Date.UTC(2024, 0, 6, 8, 0)), '10.0.0.6']);
    sheet.getCell('B2').numFmt = 'm/d/yyyy h:mm';
    sheet.addRow([]);
    sheet.addRow(['lab-02', '', '']);
    workbook.addWorksheet('Ignored').addRow(['Workstation Name']);
    await workbook.xlsx.writeFile(file);

    expect(await readTable(file)).toEqual([
      { 'Workstation Name': 'LAB-01', 'Last Hardware Scan': '1/6/2024 8:00', 'IP Address': '10.0.0.6' },
      { 'Workstation Name': 'lab-02', 'Last Hardware Scan': '', 'IP Address': '' },
    ]);
  });

  it('writes a workbook with a header row', async () => {
    const file = path.join(dir, 'matched.xlsx');
    await writeTable(file, ['Workstation Name', 'Subnet'], [{ 'Workstation Name': 'LAB-01', Subnet: '10.0.0.0/24' }]);

    expect(await readTable(file)).toEqual([{ 'Workstation Name': 'LAB-01', Subnet: '10.0.0.0/24' }]);
  });
});
