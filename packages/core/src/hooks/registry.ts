import { withTimeout } from '../utils/timeout.ts';

export type HookCallback<T> = (payload: Readonly<T>) => void | Promise<void>;

export interface HookRegistryOptions {
  /** Per-callback deadline. Default: 200ms */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 200;

/**
 * Observer registry keyed by event name. Callbacks run in registration order;
 * a callback that throws, rejects or overruns its deadline is logged and skipped.
 */
export class HookRegistry<TEvents extends object> {
  private hooks: { [K in keyof TEvents]?: Array<HookCallback<TEvents[K]>> } = {};
  readonly timeoutMs: number;

  constructor(options: HookRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  register<K extends keyof TEvents>(event: K, callback: HookCallback<TEvents[K]>): void {
    const callbacks = this.hooks[event] ?? [];
    callbacks.push(callback);
    this.hooks[event] = callbacks;
  }

  unregister<K extends keyof TEvents>(event: K, callback: HookCallback<TEvents[K]>): boolean {
    const callbacks = this.hooks[event];
    if (!callbacks) return false;
    const idx = callbacks.indexOf(callback);
    if (idx === -1) return false;
    callbacks.splice(idx, 1);
    return true;
  }

  count<K extends keyof TEvents>(event: K): number {
    return this.hooks[event]?.length ?? 0;
  }

  clear(): void {
    this.hooks = {};
  }

  /** Never rejects. */
  async trigger<K extends keyof TEvents>(event: K, payload: TEvents[K]): Promise<void> {
    const callbacks = this.hooks[event];
    if (!callbacks || callbacks.length === 0) return;

    const frozen = Object.freeze({ ...payload });
    // Snapshot so a callback registering another one does not extend this pass.
    for (const callback of [...callbacks]) {
      try {
        await withTimeout(() => callback(frozen), this.timeoutMs);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`[HookRegistry] Hook '${String(event)}' failed: ${reason}`);
      }
    }
  }
}
