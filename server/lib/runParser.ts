import fs from 'node:fs';
import path from 'node:path';
import type { RunRecord } from '../../shared/types';

export const RUN_FILE_EXTENSION = '.csv';
export const DEFAULT_SENS_ROUND_DECIMAL_PLACES = 2;

export const WEAPON_TABLE_HEADER =
  'Weapon,Shots,Hits,Damage Done,Damage Possible,,Sens Scale,Horiz Sens,Vert Sens,FOV,Hide Gun,Crosshair,' +
  'Crosshair Scale,Crosshair Color,ADS Sens,ADS Zoom Scale,Avg Target Scale,Avg Time Dilation';

const TIMESTAMP_PATTERN = /^(\d{4})\.(\d{2})\.(\d{2})-(\d{2})\.(\d{2})\.(\d{2})$/;

export type RunParseResult = { ok: true; run: RunRecord } | { ok: false; reason: string };

export interface RunParseOptions {
  sensRoundDecimalPlaces?: number;
}

interface ExtractedFields {
  score: number | null;
  sensitivityScale: string | null;
  horizontalSensitivity: number | null;
  scenarioName: string | null;
  accuracy: number | null;
}

class RunFieldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RunFieldError';
  }
}

// Rounds the decimal value the double actually holds; exact halves go to the even neighbour.
export function roundToDecimalPlaces(value: number, decimalPlaces: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const nearest = Number(value.toFixed(decimalPlaces));
  const [integerPart, fraction = ''] = Math.abs(value).toFixed(100).split('.');
  if (!/^50*$/.test(fraction.slice(decimalPlaces))) {
    return nearest;
  }

  const kept = fraction.slice(0, decimalPlaces);
  const lastDigit = Number.parseInt((integerPart + kept).slice(-1), 10);
  if (lastDigit % 2 === 1) {
    return nearest;
  }
  const truncated = Number(kept ? `${integerPart}.${kept}` : integerPart);
  return value < 0 ? -truncated : truncated;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// "<scenario> - <mode> - 2025.01.01-10.00.00 Stats.csv" -> "2025-01-01T10:00:00"
export function parseRunTimestamp(fileName: string): string | null {
  const stem = path.basename(fileName, path.extname(fileName));
  const beforeStats = stem.split(' Stats')[0];
  const segments = beforeStats.split(' - ');
  const match = TIMESTAMP_PATTERN.exec(segments[segments.length - 1].trim());
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map((part) => Number.parseInt(part, 10));
  const probe = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day ||
    probe.getUTCHours() !== hour ||
    probe.getUTCMinutes() !== minute ||
    probe.getUTCSeconds() !== second
  ) {
    return null;
  }

  return `${year}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

function secondToken(line: string): string {
  const token = line.split(',')[1];
  if (token === undefined) {
    throw new RunFieldError(`Missing value in line: ${line}`);
  }
  return token.trim();
}

function parseStrictFloat(token: string, label: string): number {
  const value = Number(token);
  if (!token || !Number.isFinite(value)) {
    throw new RunFieldError(`${label} is not numeric: ${token}`);
  }
  return value;
}

function parseStrictInteger(token: string | undefined, label: string): number {
  const trimmed = token?.trim() ?? '';
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new RunFieldError(`${label} is not an integer: ${trimmed}`);
  }
  return Number.parseInt(trimmed, 10);
}

function extractFields(lines: string[], sensRoundDecimalPlaces: number): ExtractedFields {
  const fields: ExtractedFields = {
    score: null,
    sensitivityScale: null,
    horizontalSensitivity: null,
    scenarioName: null,
    accuracy: null
  };

  let weaponRowNext = false;
  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (line === WEAPON_TABLE_HEADER) {
      weaponRowNext = true;
      continue;
    }

    if (weaponRowNext) {
      weaponRowNext = false;
      const tokens = line.split(',');
      const shots = parseStrictInteger(tokens[1], 'Shots');
      const hits = parseStrictInteger(tokens[2], 'Hits');
      if (shots === 0) {
        throw new RunFieldError('Shots is zero; accuracy is undefined.');
      }
      fields.accuracy = hits / shots;
      continue;
    }

    if (line.startsWith('Score:')) {
      fields.score = parseStrictFloat(secondToken(line), 'Score');
    } else if (line.startsWith('Sens Scale:')) {
      fields.sensitivityScale = secondToken(line);
    } else if (line.startsWith('Horiz Sens:')) {
      const horizontal = parseStrictFloat(secondToken(line), 'Horiz Sens');
      fields.horizontalSensitivity = roundToDecimalPlaces(horizontal, sensRoundDecimalPlaces);
    } else if (line.startsWith('Scenario:')) {
      fields.scenarioName = secondToken(line);
    }
  }

  return fields;
}

export function parseRunText(fileName: string, text: string, options: RunParseOptions = {}): RunParseResult {
  const sensRoundDecimalPlaces = options.sensRoundDecimalPlaces ?? DEFAULT_SENS_ROUND_DECIMAL_PLACES;
  const timestamp = parseRunTimestamp(fileName);
  if (!timestamp) {
    return { ok: false, reason: `File name has no run timestamp: ${path.basename(fileName)}` };
  }

  let fields: ExtractedFields;
  try {
    fields = extractFields(text.split(/\r?\n/), sensRoundDecimalPlaces);
  } catch (error) {
    if (error instanceof RunFieldError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }

  const { score, sensitivityScale, horizontalSensitivity, scenarioName, accuracy } = fields;
  const missing = [
    score === null ? 'Score' : null,
    sensitivityScale === null || sensitivityScale === '' ? 'Sens Scale' : null,
    horizontalSensitivity === null ? 'Horiz Sens' : null,
    scenarioName === null || scenarioName === '' ? 'Scenario' : null,
    accuracy === null ? 'Accuracy' : null
  ].filter((label): label is string => label !== null);

  if (
    missing.length > 0 ||
    score === null ||
    sensitivityScale === null ||
    horizontalSensitivity === null ||
    scenarioName === null ||
    accuracy === null
  ) {
    return { ok: false, reason: `Missing fields: ${missing.join(', ')}` };
  }

  return {
    ok: true,
    run: Object.freeze({
      timestamp,
      score,
      sensitivityScale,
      horizontalSensitivity,
      scenarioName,
      accuracy
    })
  };
}

export function parseRunFile(filePath: string, options: RunParseOptions = {}): RunParseResult {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    return { ok: false, reason: `Failed to read file: ${(error as Error).message}` };
  }
  return parseRunText(filePath, text, options);
}

export function isRunFileName(fileName: string): boolean {
  return fileName.endsWith(RUN_FILE_EXTENSION);
}
