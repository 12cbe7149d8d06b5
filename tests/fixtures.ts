import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { WEAPON_TABLE_HEADER } from '../server/lib/runParser.js';
import type { RunRecord } from '../shared/types.js';

// A null field leaves its line out of the export.
export interface RunCsvFields {
  score?: string | null;
  sensScale?: string | null;
  horizSens?: string | null;
  scenario?: string | null;
  shots?: string;
  hits?: string;
  includeWeaponTable?: boolean;
}

export function buildRunCsv(fields: RunCsvFields = {}): string {
  const score = fields.score === undefined ? '123.45' : fields.score;
  const sensScale = fields.sensScale === undefined ? 'Overwatch' : fields.sensScale;
  const horizSens = fields.horizSens === undefined ? '2.3456' : fields.horizSens;
  const scenario = fields.scenario === undefined ? '1w4ts' : fields.scenario;
  const shots = fields.shots ?? '100';
  const hits = fields.hits ?? '50';

  const lines = [
    'Kill #,Timestamp,Bot,Weapon,TTK,Shots,Hits,Accuracy,Damage Done,Damage Possible,Efficiency,Cheated,OverShots',
    '1,10:00:01.250,Target,Rifle,0.41s,2,1,0.5,1.0,1.0,1.0,false,0',
    ''
  ];
  if (fields.includeWeaponTable ?? true) {
    lines.push(WEAPON_TABLE_HEADER);
    lines.push(`Rifle,${shots},${hits},50.0,100.0,,Overwatch,2.3456,2.3456,103.0,false,default.png,1.0,FFFFFF,1.0,1.0,1.0,1.0`);
    lines.push('');
  }
  lines.push('Kills:,50', 'Deaths:,0', 'Fight Time:,60.0');
  if (score !== null) {
    lines.push(`Score:,${score}`);
  }
  if (scenario !== null) {
    lines.push(`Scenario:,${scenario}`);
  }
  lines.push('Game Version:,3.0.0');
  if (sensScale !== null) {
    lines.push(`Sens Scale:,${sensScale}`);
  }
  if (horizSens !== null) {
    lines.push(`Horiz Sens:,${horizSens}`);
  }
  lines.push('Vert Sens:,2.3456', 'FOV:,103.0', '');
  return lines.join('\n');
}

export function runFileName(scenario: string, stamp: string): string {
  return `${scenario} - Challenge - ${stamp} Stats.csv`;
}

export function makeTempDir(prefix = 'aim-stats-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeRunFile(dir: string, scenario: string, stamp: string, fields: RunCsvFields = {}): string {
  const filePath = path.join(dir, runFileName(scenario, stamp));
  fs.writeFileSync(filePath, buildRunCsv({ scenario, ...fields }), 'utf-8');
  return filePath;
}

export function makeRun(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    timestamp: '2025-01-01T10:00:00',
    score: 100,
    sensitivityScale: 'cm/360',
    horizontalSensitivity: 30,
    scenarioName: '1w4ts',
    accuracy: 0.5,
    ...overrides
  };
}
