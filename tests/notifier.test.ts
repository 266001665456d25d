import { describe, expect, it } from 'vitest';
import { formatBackupEvent } from '../src/notifier.js';

const base = { agent_id: 'A1', display_name: 'web-1', stack: 'main', site: 'example.com' };

describe('formatBackupEvent', () => {
  it('formats success with the duration', () => {
    expect(formatBackupEvent({ ...base, kind: 'backup.succeeded', duration_ms: 12_340 }))
      .toBe('Backup succeeded: main/example.com on web-1 (A1) in 12.3s');
  });

  it('formats failure with the error code', () => {
    expect(formatBackupEvent({ ...base, kind: 'backup.failed', error: 'agent_unreachable' }))
      .toBe('Backup failed: main/example.com on web-1 (A1): agent_unreachable');
  });
});
