export type BackupEventKind = 'backup.succeeded' | 'backup.failed';

export interface BackupEvent {
  kind: BackupEventKind;
  agent_id: string;
  display_name: string;
  stack: string;
  site: string;
  error?: string;
  duration_ms?: number;
}

/** Outbound operator notification (chat, mail, ...). Implementations may throw; callers treat delivery as best-effort. */
export interface Notifier {
  notify(event: BackupEvent): Promise<void>;
}

export function formatBackupEvent(event: BackupEvent): string {
  const target = `${event.stack}/${event.site} on ${event.display_name} (${event.agent_id})`;
  if (event.kind === 'backup.succeeded') {
    const seconds = typeof event.duration_ms === 'number' ? ` in ${(event.duration_ms / 1000).toFixed(1)}s` : '';
    return `Backup succeeded: ${target}${seconds}`;
  }
  return `Backup failed: ${target}: ${event.error ?? 'unknown error'}`;
}

export const logNotifier: Notifier = {
  async notify(event) {
    const line = formatBackupEvent(event);
    if (event.kind === 'backup.failed') {
      console.error(`[notify] ${line}`);
    } else {
      console.log(`[notify] ${line}`);
    }
  },
};
