import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  buildSensitivityKey,
  compareSensitivityKeys,
  formatDecimal,
  formatNotificationMessage,
  formatRunTimestamp,
  ordinal,
  toLocalDate,
  toLocalTimestamp
} from '../shared/format.js';

test('ordinal suffixes', () => {
  assert.deepEqual(
    [1, 2, 3, 4, 11, 12, 13, 21, 22, 101, 111].map(ordinal),
    ['1st', '2nd', '3rd', '4th', '11th', '12th', '13th', '21st', '22nd', '101st', '111th']
  );
});

test('decimals drop trailing zeros and float noise', () => {
  assert.equal(formatDecimal(10), '10');
  assert.equal(formatDecimal(10.5), '10.5');
  assert.equal(formatDecimal(0.1 + 0.2), '0.3');
});

test('sensitivity keys keep one decimal for whole values', () => {
  assert.equal(buildSensitivityKey(5, 'cm/360'), '5.0 cm/360');
  assert.equal(buildSensitivityKey(2.35, 'Overwatch'), '2.35 Overwatch');
});

test('sensitivity keys sort by numeric value', () => {
  assert.deepEqual(
    ['25.0 cm/360', 'abc', '5.0 cm/360', '12.5 cm/360'].sort(compareSensitivityKeys),
    ['5.0 cm/360', '12.5 cm/360', '25.0 cm/360', 'abc']
  );
  assert.ok(compareSensitivityKeys('5.0 cm/360', '25.0 cm/360') < 0);
});

test('notification message names the sensitivity, place and score', () => {
  const message = formatNotificationMessage({
    createdAt: '2025-01-01T10:00:00.000Z',
    rankAmongPeers: 2,
    scenarioName: '1w4ts',
    score: 95,
    sensitivityKey: '30.0 cm/360'
  });
  assert.equal(message, '30.0 cm/360 has a new 2nd place score: 95.00');
});

test('run timestamps render on a 12-hour clock', () => {
  assert.equal(formatRunTimestamp('2025-01-01T00:05:09'), '2025-01-01 12:05:09 AM');
  assert.equal(formatRunTimestamp('2025-01-01T12:00:00'), '2025-01-01 12:00:00 PM');
  assert.equal(formatRunTimestamp('2025-01-01T17:30:00'), '2025-01-01 05:30:00 PM');
  assert.equal(formatRunTimestamp('not a timestamp'), 'not a timestamp');
});

test('local dates use the local calendar', () => {
  const date = new Date(2025, 0, 5, 7, 8, 9);
  assert.equal(toLocalDate(date), '2025-01-05');
  assert.equal(toLocalTimestamp(date), '2025-01-05T07:08:09');
});
