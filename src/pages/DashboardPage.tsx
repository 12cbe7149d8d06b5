import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { EChartsOption } from 'echarts';
import type { NotifyFn } from '../App';
import { formatDecimal, formatNotificationMessage, formatRunTimestamp, toLocalDate } from '../../shared/format';
import type { DashboardConfig, DaySeries, ScenarioStatsPayload, ScenarioViewAxis, SensitivitySeries } from '../../shared/types';
import { EChart } from '../components/EChart';
import { LoadingSkeleton } from '../components/LoadingSkeleton';
import {
  API_RETRY_DELAY_MS,
  fetchConfig,
  fetchNotifications,
  fetchScenarioStats,
  fetchScenarios,
  fetchSensitivityView,
  fetchTimeView,
  isNotFoundApiError,
  isRetryableApiError
} from '../lib/api';
import { sensitivityChartOption, timeChartOption, type ThemeMode } from '../lib/chartOptions';
import { decideNotificationAction } from '../lib/notifications';

const SCENARIO_STORAGE_KEY = 'dashboard.scenario';
const AXIS_STORAGE_KEY = 'dashboard.axis';
const MS_PER_DAY = 24 * 60 * 60 * 1000;

type ChartData =
  | { axis: 'sensitivity'; series: SensitivitySeries[] }
  | { axis: 'time'; series: DaySeries[] };

type LoadState = 'loading' | 'waiting' | 'ready' | 'error';

interface DashboardPageProps {
  theme: ThemeMode;
  notify: NotifyFn;
}

function readStored(key: string): string {
  try {
    return window.localStorage.getItem(key) ?? '';
  } catch {
    return '';
  }
}

function writeStored(key: string, value: string): void {
  try {
    window.localStorage.setItem(key, value);
  } catch {
    // persistence is best-effort
  }
}

function oldestDateFor(withinNDays: number): string {
  const now = new Date();
  return toLocalDate(new Date(now.getFullYear(), now.getMonth(), now.getDate() - withinNDays));
}

function daysSince(timestamp: string): number {
  const lastPlayed = new Date(timestamp);
  return Math.abs(Math.floor((Date.now() - lastPlayed.getTime()) / MS_PER_DAY));
}

export function DashboardPage({ theme, notify }: DashboardPageProps) {
  const [config, setConfig] = useState<DashboardConfig | null>(null);
  const [scenarios, setScenarios] = useState<string[]>([]);
  const [selectedScenario, setSelectedScenario] = useState<string>(() => readStored(SCENARIO_STORAGE_KEY));
  const [axis, setAxis] = useState<ScenarioViewAxis>(() =>
    readStored(AXIS_STORAGE_KEY) === 'time' ? 'time' : 'sensitivity'
  );
  const [topN, setTopN] = useState<number>(5);
  const [oldestDate, setOldestDate] = useState<string>('');
  const [stats, setStats] = useState<ScenarioStatsPayload | null>(null);
  const [chartData, setChartData] = useState<ChartData | null>(null);
  const [updatedAt, setUpdatedAt] = useState<Date>(() => new Date());
  const [loadState, setLoadState] = useState<LoadState>('loading');
  const [loadError, setLoadError] = useState<string>('');
  const [emptyMessage, setEmptyMessage] = useState<string>('');
  const refreshToken = useRef(0);

  useEffect(() => {
    let cancelled = false;
    let retryTimer: number | undefined;

    const load = async () => {
      setLoadState('loading');
      try {
        const [nextConfig, nextScenarios] = await Promise.all([fetchConfig(), fetchScenarios()]);
        if (cancelled) {
          return;
        }
        setConfig(nextConfig);
        setTopN(nextConfig.topNScores);
        setOldestDate(oldestDateFor(nextConfig.withinNDays));
        setScenarios(nextScenarios);
        setLoadState('ready');
      } catch (error) {
        if (cancelled) {
          return;
        }
        if (isRetryableApiError(error)) {
          setLoadState('waiting');
          retryTimer = window.setTimeout(() => void load(), API_RETRY_DELAY_MS);
          return;
        }
        setLoadState('error');
        setLoadError((error as Error).message);
      }
    };

    void load();
    return () => {
      cancelled = true;
      window.clearTimeout(retryTimer);
    };
  }, []);

  const refresh = useCallback(async (): Promise<boolean> => {
    const token = refreshToken.current + 1;
    refreshToken.current = token;

    if (!selectedScenario || !oldestDate || topN < 1) {
      setStats(null);
      setChartData(null);
      return false;
    }

    try {
      const nextStats = await fetchScenarioStats(selectedScenario);
      const nextChart: ChartData =
        axis === 'sensitivity'
          ? { axis: 'sensitivity', series: (await fetchSensitivityView(selectedScenario, topN, oldestDate)).series }
          : { axis: 'time', series: (await fetchTimeView(selectedScenario, topN, oldestDate)).series };
      if (token !== refreshToken.current) {
        return false;
      }
      setStats(nextStats);
      setChartData(nextChart);
      setUpdatedAt(new Date());
      setEmptyMessage(nextChart.series.length === 0 ? 'No scenario data for the given date range.' : '');
      return true;
    } catch (error) {
      if (token !== refreshToken.current) {
        return false;
      }
      setStats(null);
      setChartData(null);
      setEmptyMessage(isNotFoundApiError(error) ? 'No scenario data found.' : (error as Error).message);
      return false;
    }
  }, [axis, oldestDate, selectedScenario, topN]);

  useEffect(() => {
    if (loadState !== 'ready') {
      return;
    }
    void refresh();
  }, [loadState, refresh]);

  useEffect(() => {
    if (!config || loadState !== 'ready') {
      return;
    }

    let polling = false;
    const timer = window.setInterval(() => {
      if (polling) {
        return;
      }
      polling = true;
      void (async () => {
        try {
          const notifications = await fetchNotifications();
          const decision = decideNotificationAction(notifications, selectedScenario, topN);
          if (!decision.refresh) {
            return;
          }
          const refreshed = await refresh();
          if (!refreshed) {
            return;
          }
          if (decision.highlight) {
            notify('Notification', formatNotificationMessage(decision.highlight), 'success');
          } else {
            notify('Notification', 'Graph updated!', 'info');
          }
        } catch (error) {
          console.warn(`[dashboard] notification poll failed: ${(error as Error).message}`);
        } finally {
          polling = false;
        }
      })();
    }, config.pollingIntervalMs);

    return () => window.clearInterval(timer);
  }, [config, loadState, notify, refresh, selectedScenario, topN]);

  const option = useMemo<EChartsOption | null>(() => {
    if (!chartData || chartData.series.length === 0) {
      return null;
    }
    return chartData.axis === 'sensitivity'
      ? sensitivityChartOption(selectedScenario, chartData.series, theme, updatedAt)
      : timeChartOption(selectedScenario, chartData.series, theme, updatedAt);
  }, [chartData, selectedScenario, theme, updatedAt]);

  const handleScenarioChange = (scenario: string) => {
    setSelectedScenario(scenario);
    writeStored(SCENARIO_STORAGE_KEY, scenario);
  };

  const handleAxisChange = (nextAxis: ScenarioViewAxis) => {
    setAxis(nextAxis);
    writeStored(AXIS_STORAGE_KEY, nextAxis);
  };

  if (loadState === 'loading' || loadState === 'waiting') {
    return (
      <section className="dashboard">
        {loadState === 'waiting' && <p className="loading-banner">Waiting for the API to come online...</p>}
        <LoadingSkeleton className="chart-skeleton" ariaLabel="Loading dashboard" />
      </section>
    );
  }

  if (loadState === 'error') {
    return <p className="error-banner">{loadError}</p>;
  }

  return (
    <section className="dashboard">
      <div className="controls">
        <label className="field">
          <span>Scenario</span>
          <select value={selectedScenario} onChange={(event) => handleScenarioChange(event.target.value)}>
            <option value="">Select a scenario...</option>
            {scenarios.map((scenario) => (
              <option key={scenario} value={scenario}>
                {scenario}
              </option>
            ))}
          </select>
        </label>

        <label className="field field-narrow">
          <span>Top N scores</span>
          <input
            type="number"
            min={1}
            value={topN}
            onChange={(event) => setTopN(Number.parseInt(event.target.value, 10) || 0)}
          />
        </label>

        <label className="field field-narrow">
          <span>Oldest date</span>
          <input type="date" value={oldestDate} onChange={(event) => setOldestDate(event.target.value)} />
        </label>

        <fieldset className="axis-switch">
          <legend>X axis</legend>
          <label>
            <input
              type="radio"
              name="axis"
              checked={axis === 'sensitivity'}
              onChange={() => handleAxisChange('sensitivity')}
            />
            Score vs Sensitivity
          </label>
          <label>
            <input type="radio" name="axis" checked={axis === 'time'} onChange={() => handleAxisChange('time')} />
            Score vs Time
          </label>
        </fieldset>

        <dl className="scenario-stats">
          <div>
            <dt>Date last played</dt>
            <dd title={stats ? formatRunTimestamp(stats.stats.lastPlayed) : 'N/A'}>
              {stats ? `${daysSince(stats.stats.lastPlayed)} days ago` : 'N/A'}
            </dd>
          </div>
          <div>
            <dt>Number of runs</dt>
            <dd>{stats ? stats.stats.runCount : 0}</dd>
          </div>
          <div>
            <dt>High score</dt>
            <dd>{stats ? formatDecimal(stats.highScore) : 'N/A'}</dd>
          </div>
        </dl>
      </div>

      {option ? (
        <EChart option={option} theme={theme} className="chart chart-main" />
      ) : (
        <p className="empty-banner">{emptyMessage || 'Select a scenario to plot its runs.'}</p>
      )}
    </section>
  );
}
