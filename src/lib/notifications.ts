import type { NewResultNotification } from '../../shared/types';

export interface NotificationDecision {
  refresh: boolean;
  highlight: NewResultNotification | null;
}

// Notifications for other scenarios are dropped; the best-ranked one for the selected scenario is surfaced.
export function decideNotificationAction(
  notifications: NewResultNotification[],
  selectedScenario: string,
  topN: number
): NotificationDecision {
  const relevant = notifications.filter((notification) => notification.scenarioName === selectedScenario);
  if (relevant.length === 0) {
    return { refresh: false, highlight: null };
  }

  let highlight: NewResultNotification | null = null;
  for (const notification of relevant) {
    if (notification.rankAmongPeers > topN) {
      continue;
    }
    if (!highlight || notification.rankAmongPeers < highlight.rankAmongPeers) {
      highlight = notification;
    }
  }
  return { refresh: true, highlight };
}
