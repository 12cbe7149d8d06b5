import type {
  ConfigUpdateResponse,
  DashboardConfig,
  NewResultNotification,
  NotificationsPayload,
  ScenarioStatsPayload,
  ScenariosPayload,
  SensitivityViewPayload,
  TimeViewPayload
} from '../../shared/types';

export class ApiRequestError extends Error {
  retryable: boolean;
  status: number | null;

  constructor(message: string, retryable: boolean, status: number | null) {
    super(message);
    this.name = 'ApiRequestError';
    this.retryable = retryable;
    this.status = status;
  }
}

export const API_RETRY_DELAY_MS = 2000;

const apiBaseUrl = (import.meta.env.VITE_API_BASE_URL ?? '').trim().replace(/\/+$/, '');

function buildApiUrl(path: string): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return apiBaseUrl ? `${apiBaseUrl}${normalizedPath}` : normalizedPath;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

async function readErrorMessage(response: Response, fallbackMessage: string): Promise<string> {
  try {
    const payload = (await response.json()) as { error?: string; message?: string };
    if (payload.error) {
      return payload.error;
    }
    if (payload.message) {
      return payload.message;
    }
  } catch {
    return fallbackMessage;
  }
  return fallbackMessage;
}

async function requestJson<T>(url: string, fallbackMessage: string, init: RequestInit = {}): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch {
    throw new ApiRequestError(fallbackMessage, true, null);
  }

  if (!response.ok) {
    const message = await readErrorMessage(response, fallbackMessage);
    throw new ApiRequestError(message, isRetryableStatus(response.status), response.status);
  }

  return (await response.json()) as T;
}

export function isRetryableApiError(error: unknown): boolean {
  return error instanceof ApiRequestError && error.retryable;
}

export function isNotFoundApiError(error: unknown): boolean {
  return error instanceof ApiRequestError && error.status === 404;
}

export async function fetchConfig(): Promise<DashboardConfig> {
  return requestJson<DashboardConfig>(buildApiUrl('/api/config'), 'Failed to fetch configuration');
}

export async function updateConfig(payload: Partial<DashboardConfig>): Promise<ConfigUpdateResponse> {
  return requestJson<ConfigUpdateResponse>(buildApiUrl('/api/config'), 'Failed to save configuration', {
    method: 'PUT',
    headers: {
      'Content-Type': 'application/json'
    },
    body: JSON.stringify(payload)
  });
}

export async function fetchScenarios(): Promise<string[]> {
  const payload = await requestJson<ScenariosPayload>(buildApiUrl('/api/scenarios'), 'Failed to fetch scenarios');
  return payload.scenarios;
}

export async function fetchScenarioStats(scenario: string): Promise<ScenarioStatsPayload> {
  return requestJson<ScenarioStatsPayload>(
    buildApiUrl(`/api/scenarios/${encodeURIComponent(scenario)}/stats`),
    'Failed to fetch scenario stats'
  );
}

function viewParams(topN: number, oldestDate: string): string {
  return new URLSearchParams({ topN: String(topN), oldestDate }).toString();
}

export async function fetchSensitivityView(
  scenario: string,
  topN: number,
  oldestDate: string
): Promise<SensitivityViewPayload> {
  return requestJson<SensitivityViewPayload>(
    `${buildApiUrl(`/api/scenarios/${encodeURIComponent(scenario)}/sensitivity`)}?${viewParams(topN, oldestDate)}`,
    'Failed to fetch sensitivity view'
  );
}

export async function fetchTimeView(scenario: string, topN: number, oldestDate: string): Promise<TimeViewPayload> {
  return requestJson<TimeViewPayload>(
    `${buildApiUrl(`/api/scenarios/${encodeURIComponent(scenario)}/time`)}?${viewParams(topN, oldestDate)}`,
    'Failed to fetch time view'
  );
}

export async function fetchNotifications(): Promise<NewResultNotification[]> {
  const payload = await requestJson<NotificationsPayload>(buildApiUrl('/api/notifications'), 'Failed to fetch notifications');
  return payload.notifications;
}
