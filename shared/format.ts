import type { NewResultNotification } from './types';

export function ordinal(value: number): string {
  const lastTwo = value % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return `${value}th`;
  }
  const suffixes = ['th', 'st', 'nd', 'rd', 'th'];
  return `${value}${suffixes[Math.min(value % 10, 4)]}`;
}

// 10 -> "10", 10.50 -> "10.5"
export function formatDecimal(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Number.parseFloat(value.toPrecision(15)));
}

export function formatSensitivityValue(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function buildSensitivityKey(horizontalSensitivity: number, sensitivityScale: string): string {
  return `${formatSensitivityValue(horizontalSensitivity)} ${sensitivityScale}`;
}

export function parseSensitivityKeyValue(sensitivityKey: string): number {
  const [leading] = sensitivityKey.trim().split(' ');
  return Number.parseFloat(leading);
}

export function compareSensitivityKeys(a: string, b: string): number {
  const av = parseSensitivityKeyValue(a);
  const bv = parseSensitivityKeyValue(b);
  const aValid = Number.isFinite(av);
  const bValid = Number.isFinite(bv);

  if (aValid && bValid && av !== bv) {
    return av - bv;
  }
  if (aValid !== bValid) {
    return aValid ? -1 : 1;
  }
  return a.localeCompare(b);
}

export function formatNotificationMessage(notification: NewResultNotification): string {
  return `${notification.sensitivityKey} has a new ${ordinal(notification.rankAmongPeers)} place score: ${notification.score.toFixed(2)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function toLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function toLocalTimestamp(date: Date): string {
  return `${toLocalDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatRunTimestamp(timestamp: string): string {
  const match = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2}):(\d{2})$/.exec(timestamp);
  if (!match) {
    return timestamp;
  }
  const hour = Number.parseInt(match[2], 10);
  const period = hour >= 12 ? 'PM' : 'AM';
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${match[1]} ${String(hour12).padStart(2, '0')}:${match[3]}:${match[4]} ${period}`;
}
