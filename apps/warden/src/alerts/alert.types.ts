export type AlertSeverity = 'Informational' | 'Urgent';

/** What a component hands to the dispatcher. */
export interface AlertInput {
  subject: string;
  /** Slack-style mrkdwn (`*bold*`, `_italic_`) is allowed. */
  body: string;
  severity: AlertSeverity;
}

export interface AlertMessage extends AlertInput {
  timestamp: Date;
  host: string;
}

export type AlertDelivery = 'delivered' | 'fallback';
