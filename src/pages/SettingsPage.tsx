import { useEffect, useState, type FormEvent } from 'react';
import type { NotifyFn } from '../App';
import type { DashboardConfig } from '../../shared/types';
import { LoadingSkeleton } from '../components/LoadingSkeleton';
import { fetchConfig, updateConfig } from '../lib/api';

interface SettingsPageProps {
  notify: NotifyFn;
}

type NumericField = Exclude<keyof DashboardConfig, 'statsDir'>;

const NUMERIC_FIELDS: Array<{ field: NumericField; label: string; hint: string }> = [
  { field: 'pollingIntervalMs', label: 'Polling interval (ms)', hint: 'How often the page checks for new runs.' },
  { field: 'port', label: 'Port', hint: 'API port. Applied on restart.' },
  {
    field: 'sensRoundDecimalPlaces',
    label: 'Sensitivity decimal places',
    hint: 'Sensitivities are rounded to this many places before bucketing. Applied on restart.'
  },
  { field: 'newFileDebounceMs', label: 'New file delay (ms)', hint: 'Wait before reading a newly created run file.' },
  { field: 'topNScores', label: 'Default top N scores', hint: 'Initial top N on the dashboard.' },
  { field: 'withinNDays', label: 'Default date window (days)', hint: 'Initial oldest date on the dashboard.' }
];

export function SettingsPage({ notify }: SettingsPageProps) {
  const [draft, setDraft] = useState<DashboardConfig | null>(null);
  const [loadError, setLoadError] = useState<string>('');
  const [saving, setSaving] = useState(false);
  const [restartRequired, setRestartRequired] = useState(false);

  useEffect(() => {
    let cancelled = false;
    fetchConfig()
      .then((config) => {
        if (!cancelled) {
          setDraft(config);
        }
      })
      .catch((error: unknown) => {
        if (!cancelled) {
          setLoadError((error as Error).message);
        }
      });
    return () => {
      cancelled = true;
    };
  }, []);

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!draft) {
      return;
    }

    setSaving(true);
    try {
      const response = await updateConfig(draft);
      setDraft(response.config);
      setRestartRequired(response.restartRequired);
      notify('Settings', 'Configuration saved.', 'success');
    } catch (error) {
      notify('Settings', (error as Error).message, 'error');
    } finally {
      setSaving(false);
    }
  };

  if (loadError) {
    return <p className="error-banner">{loadError}</p>;
  }

  if (!draft) {
    return <LoadingSkeleton className="settings-skeleton" ariaLabel="Loading settings" />;
  }

  return (
    <form className="settings" onSubmit={(event) => void handleSubmit(event)}>
      <h2>Settings</h2>
      {restartRequired && (
        <p className="warning-banner">Restart the dashboard for the stats directory, port or rounding change to apply.</p>
      )}

      <label className="field">
        <span>Stats directory</span>
        <input
          type="text"
          value={draft.statsDir}
          onChange={(event) => setDraft({ ...draft, statsDir: event.target.value })}
        />
      </label>

      {NUMERIC_FIELDS.map(({ field, label, hint }) => (
        <label key={field} className="field">
          <span>{label}</span>
          <input
            type="number"
            value={draft[field]}
            onChange={(event) => setDraft({ ...draft, [field]: Number.parseInt(event.target.value, 10) || 0 })}
          />
          <small>{hint}</small>
        </label>
      ))}

      <button type="submit" className="primary-button" disabled={saving}>
        {saving ? 'Saving...' : 'Save'}
      </button>
    </form>
  );
}
