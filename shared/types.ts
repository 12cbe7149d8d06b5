export type RunTimestamp = string;

export interface RunRecord {
  timestamp: RunTimestamp;
  score: number;
  sensitivityScale: string;
  horizontalSensitivity: number;
  scenarioName: string;
  accuracy: number;
}

export interface ScenarioStats {
  lastPlayed: RunTimestamp;
  runCount: number;
}

export interface NewResultNotification {
  createdAt: string;
  rankAmongPeers: number;
  scenarioName: string;
  score: number;
  sensitivityKey: string;
  previousHighScore?: number;
}

export interface SensitivitySeries {
  sensitivityKey: string;
  runs: RunRecord[];
}

export interface DaySeries {
  date: string;
  runs: RunRecord[];
}

export type ScenarioViewAxis = 'sensitivity' | 'time';

export interface SensitivityViewPayload {
  scenario: string;
  topN: number;
  oldestDate: string;
  series: SensitivitySeries[];
}

export interface TimeViewPayload {
  scenario: string;
  topN: number;
  oldestDate: string;
  series: DaySeries[];
}

export interface ScenarioStatsPayload {
  scenario: string;
  stats: ScenarioStats;
  highScore: number;
}

export interface ScenariosPayload {
  scenarios: string[];
}

export interface NotificationsPayload {
  notifications: NewResultNotification[];
}

export interface DashboardConfig {
  statsDir: string;
  pollingIntervalMs: number;
  port: number;
  sensRoundDecimalPlaces: number;
  newFileDebounceMs: number;
  topNScores: number;
  withinNDays: number;
}

export interface ConfigUpdateResponse {
  config: DashboardConfig;
  restartRequired: boolean;
}

export interface BulkLoadSummary {
  directory: string;
  fileCount: number;
  loadedCount: number;
  failedCount: number;
  elapsedMs: number;
}

export interface HealthPayload {
  ok: boolean;
  watching: boolean;
  scenarioCount: number;
  pendingNotifications: number;
  bulkLoad: BulkLoadSummary | null;
}
