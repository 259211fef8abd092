import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Knex } from 'knex';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDb, initDb } from './db';
import { MalformedTimestampError } from './inventory/errors';
import type { InventoryOptions } from './inventory/types';
import { runJob } from './jobs';
import { getRun, listRuns } from './runs';

const SCAN_REPORT = [
  'Workstation Name,Last Hardware Scan,Last Logged User ID,Primary User ID,IP Address,Subnet,Site',
  'LAB-01,1/5/2024 08:00,u1,p1,10.20.0.11,10.20.0.0/24,Annex',
  'LAB-01,1/6/2024 08:00,u2,p1,10.20.0.12,10.20.0.0/24,Annex',
  'lab-02,,,,,,Annex',
  ',1/7/2024 08:00,u9,,,,Annex',
  '',
].join('\n');

const ROSTER = ['PC Name', 'Lab-01', 'LAB-03', ''].join('\n');

const CANONICAL_HEADER =
  'Workstation Name,Last Hardware Scan,Last Logged User ID,Primary User ID,IP Address,Subnet';

const inventory: InventoryOptions = {
  timestampFormats: ['M/d/yyyy H:mm'],
  groupKeyPolicy: 'exact',
};

describe('runJob', () => {
  let dir: string;
  let db: Knex;
  const logger = pino({ level: 'silent' });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'inventory-job-'));
    db = createDb(':memory:');
    await initDb(db);
    await fs.writeFile(path.join(dir, 'scan.csv'), SCAN_REPORT, 'utf8');
    await fs.writeFile(path.join(dir, 'roster.csv'), ROSTER, 'utf8');
  });

  afterEach(async () => {
    await db.destroy();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const read = (name: string) => fs.readFile(path.join(dir, name), 'utf8');

  it('writes the latest record per workstation', async () => {
    const summary = await runJob(
      {
        mode: 'latest',
        scanReportPath: path.join(dir, 'scan.csv'),
        latestOutputPath: path.join(dir, 'latest.csv'),
      },
      { db, logger, inventory },
    );

    expect(summary).toMatchObject({
      mode: 'latest',
      inputCount: 4,
      canonicalCount: 2,
      matchedCount: null,
      unmatchedCount: null,
      skippedBlankNames: 1,
    });
    expect(await read('latest.csv')).toBe(
      [CANONICAL_HEADER, 'LAB-01,1/6/2024 08:00,u2,p1,10.20.0.12,10.20.0.0/24', 'lab-02,,,,,', ''].join('\n'),
    );
  });

  it('runs selection and reconciliation end to end and records the run', async () => {
    const summary = await runJob(
      {
        mode: 'full',
        scanReportPath: path.join(dir, 'scan.csv'),
        rosterPath: path.join(dir, 'roster.csv'),
        latestOutputPath: null,
        matchedOutputPath: path.join(dir, 'out', 'matched.csv'),
        unmatchedOutputPath: path.join(dir, 'out', 'unmatched.csv'),
      },
      { db, logger, inventory },
    );

    expect(summary.canonicalCount).toBe(2);
    expect(summary.matchedCount).toBe(1);
    expect(summary.unmatchedCount).toBe(1);
    expect(await read('out/matched.csv')).toBe(
      [CANONICAL_HEADER, 'LAB-01,1/6/2024 08:00,u2,p1,10.20.0.12,10.20.0.0/24', ''].join('\n'),
    );
    expect(await read('out/unmatched.csv')).toBe('PC Name\nLAB-03\n');
    await expect(fs.access(path.join(dir, 'latest.csv'))).rejects.toThrow();

    const run = await getRun(db, summary.runId);
    expect(run).toMatchObject({
      mode: 'full',
      source: 'batch',
      status: 'completed',
      input_count: 4,
      output_count: 2,
      matched_count: 1,
      unmatched_count: 1,
      skipped_blank_names: 1,
      last_error: null,
    });
  });

  it('reconciles a roster against an existing latest table', async () => {
    await fs.writeFile(
      path.join(dir, 'reference.csv'),
      [CANONICAL_HEADER, 'LAB-01,1/6/2024 08:00,u2,p1,10.20.0.12,10.20.0.0/24', 'lab-02,,,,,'].join('\n'),
      'utf8',
    );
    await fs.writeFile(path.join(dir, 'roster.csv'), 'PC Name\n LAB-02\nlab-01\nLAB-04\n', 'utf8');

    const summary = await runJob(
      {
        mode: 'reconcile',
        referencePath: path.join(dir, 'reference.csv'),
        rosterPath: path.join(dir, 'roster.csv'),
        matchedOutputPath: path.join(dir, 'matched.csv'),
        unmatchedOutputPath: path.join(dir, 'unmatched.csv'),
      },
      { db, logger, inventory },
    );

    expect(summary).toMatchObject({ inputCount: 3, canonicalCount: 2, matchedCount: 2, unmatchedCount: 1 });
    expect(await read('matched.csv')).toBe(
      [CANONICAL_HEADER, 'lab-02,,,,,', 'LAB-01,1/6/2024 08:00,u2,p1,10.20.0.12,10.20.0.0/24', ''].join('\n'),
    );
    expect(await read('unmatched.csv')).toBe('PC Name\nLAB-04\n');
  });

  it('records a failed run and rethrows on a malformed timestamp', async () => {
    await fs.writeFile(path.join(dir, 'scan.csv'), 'Workstation Name,Last Hardware Scan\nLAB-01,soon\n', 'utf8');

    await expect(
      runJob(
        {
          mode: 'latest',
          scanReportPath: path.join(dir, 'scan.csv'),
          latestOutputPath: path.join(dir, 'latest.csv'),
        },
        { db, logger, inventory },
      ),
    ).rejects.toBeInstanceOf(MalformedTimestampError);

    const [run] = await listRuns(db, 10);
    expect(run.status).toBe('failed');
    expect(run.mode).toBe('latest');
    expect(run.last_error).toBe("Malformed last hardware scan 'soon' for workstation 'LAB-01' (record 1).");
    await expect(fs.access(path.join(dir, 'latest.csv'))).rejects.toThrow();
  });
});
