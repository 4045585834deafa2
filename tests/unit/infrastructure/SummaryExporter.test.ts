import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  buildSummaryExport,
  formatActivityReport,
  writeSummaryFile,
} from '../../../src/infrastructure/export/SummaryExporter.js';
import type { ActivitySummary } from '../../../src/domain/entities/ActivitySummary.js';

const T0 = Date.UTC(2024, 2, 5, 9, 0, 0);

const summaries: ActivitySummary[] = [
  {
    applicationId: 'code',
    activityDetails: 'main.ts',
    totalDurationMs: 45 * 60_000,
    sessionCount: 3,
    firstSeen: T0,
    lastSeen: T0 + 90 * 60_000,
  },
  {
    applicationId: 'firefox',
    activityDetails: '',
    totalDurationMs: 15 * 60_000,
    sessionCount: 1,
    firstSeen: T0 + 60 * 60_000,
    lastSeen: T0 + 75 * 60_000,
  },
];

describe('SummaryExporter', () => {
  const tmpDir = path.join(os.tmpdir(), 'focustrack-export-' + Date.now());

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should build the saved summary document', () => {
    expect(buildSummaryExport(summaries.slice(0, 1), T0)).toEqual({
      timestamp: '2024-03-05T09:00:00.000Z',
      summaries: [{
        app_class: 'code',
        activity_details: 'main.ts',
        total_duration: '45m0s',
        session_count: 3,
        first_seen: '2024-03-05T09:00:00.000Z',
        last_seen: '2024-03-05T10:30:00.000Z',
      }],
    });
  });

  it('should write the JSON file', async () => {
    const file = path.join(tmpDir, 'out', 'summaries.json');
    await writeSummaryFile(file, summaries, T0);

    const saved = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(saved.summaries).toHaveLength(2);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  it('should render a report with percentages, longest first', () => {
    expect(formatActivityReport(summaries)).toBe([
      'Total tracked: 1h0m0s',
      '',
      'code: 45m0s (75.0%) - 3 sessions',
      '  └─ main.ts',
      'firefox: 15m0s (25.0%) - 1 session',
      '',
    ].join('\n'));
  });

  it('should say so when nothing was recorded', () => {
    expect(formatActivityReport([])).toBe('No activity recorded.\n');
  });
});
