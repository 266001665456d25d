import type { BackupOrchestrator } from '../orchestrator.js';
import type { ControllerStore } from '../types.js';
import { errorMessage, toUnixSeconds, type Clock } from '../utils.js';

export interface OperatorContext {
  store: ControllerStore;
  orchestrator: BackupOrchestrator;
  clock: Clock;
  backupsRoot: string;
}

export type ToolFailure = { success: false; error_code: string; error: string };

export function toolError(errorCode: string, error: string): ToolFailure {
  return { success: false, error_code: errorCode, error };
}

/** Audits an operator mutation. Audit trouble is logged and never fails the tool call. */
export function recordOperatorAction(
  ctx: OperatorContext,
  action: string,
  target: string,
  ok: boolean,
  detail: Record<string, unknown> = {},
): void {
  try {
    const id = ctx.store.openAudit({ ts: toUnixSeconds(ctx.clock()), actor: 'operator', action, target, detail });
    if (!ok) ctx.store.finishAudit(id, false, detail);
  } catch (error) {
    console.error('[operator] audit error', errorMessage(error));
  }
}
