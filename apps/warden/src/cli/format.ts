import type { HeartbeatClassification } from '@botkeeper/heartbeat';
import { formatTimestamp } from '../alerts/alert-format';
import type { SupervisorStatus } from '../supervisor/supervisor.service';

/** `42s`, `5m 3s`, `2h 7m`, `3d 4h`. */
export function formatDuration(totalSeconds: number): string {
  const s = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(s / 86_400);
  const hours = Math.floor((s % 86_400) / 3_600);
  const minutes = Math.floor((s % 3_600) / 60);
  const seconds = s % 60;
  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function formatStatus(status: SupervisorStatus, heartbeat: HeartbeatClassification, threshold: number): string[] {
  const uptime = status.uptimeSeconds === null ? '' : `, up ${formatDuration(status.uptimeSeconds)}`;
  const beat =
    heartbeat.ageSeconds === null
      ? heartbeat.status
      : `${heartbeat.status} (${formatDuration(heartbeat.ageSeconds)} old, threshold ${formatDuration(threshold)})`;
  const last = status.lastRestart
    ? `${formatTimestamp(new Date(status.lastRestart.lastRestartAt))} (${status.lastRestart.reason})`
    : 'never';
  const cooldown = status.cooldownRemainingMs > 0 ? `${formatDuration(status.cooldownRemainingMs / 1000)} remaining` : 'none';
  return [
    `Bot:          ${status.state} (${status.target})${uptime}`,
    `Heartbeat:    ${beat}`,
    `Last restart: ${last}`,
    `Cool-down:    ${cooldown}`,
  ];
}
