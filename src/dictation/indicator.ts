import { log } from '../log';

export type IndicatorState =
  | { kind: 'idle' }
  | { kind: 'recording' }
  | { kind: 'warning' }
  | { kind: 'processing' }
  | { kind: 'success' }
  | { kind: 'error'; message: string }
  | { kind: 'no_speech' }
  | { kind: 'permission_required' };

export type IndicatorStateKind = IndicatorState['kind'];

export type IndicatorListener = (state: IndicatorState, previous: IndicatorState) => void;

const DEFAULT_TRANSIENT_MS = 2500;

export function isTransientState(state: IndicatorState): boolean {
  return state.kind === 'success' || state.kind === 'error' || state.kind === 'no_speech';
}

export function isPersistentState(state: IndicatorState): boolean {
  return state.kind === 'permission_required';
}

/**
 * Holds the status shown to the user. Success, error and no-speech are
 * transient and fall back to idle after `transientMs`; permission-required
 * stays until cleared.
 */
export class IndicatorStateManager {
  private current: IndicatorState = { kind: 'idle' };
  private hideTimer: NodeJS.Timeout | null = null;
  private readonly listeners = new Set<IndicatorListener>();

  constructor(private readonly transientMs = DEFAULT_TRANSIENT_MS) {}

  public get state(): IndicatorState {
    return this.current;
  }

  public onChange(listener: IndicatorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public setState(next: IndicatorState): void {
    const previous = this.current;
    this.current = next;
    // Errors always notify; the message may differ.
    if (previous.kind === next.kind && next.kind !== 'error') return;
    log.debug({ event: 'indicator_state', from: previous.kind, to: next.kind }, 'indicator state changed');
    for (const listener of this.listeners) listener(next, previous);
  }

  public showSuccess(): void {
    this.setState({ kind: 'success' });
    this.scheduleHide();
  }

  public showError(message: string): void {
    this.setState({ kind: 'error', message });
    this.scheduleHide();
  }

  public showNoSpeech(): void {
    this.setState({ kind: 'no_speech' });
    this.scheduleHide();
  }

  public showPermissionRequired(): void {
    this.cancelHide();
    this.setState({ kind: 'permission_required' });
  }

  public clearPermissionRequired(): void {
    if (this.current.kind === 'permission_required') {
      this.setState({ kind: 'idle' });
    }
  }

  public dispose(): void {
    this.cancelHide();
    this.listeners.clear();
  }

  private scheduleHide(): void {
    this.cancelHide();
    this.hideTimer = setTimeout(() => {
      this.hideTimer = null;
      if (!isPersistentState(this.current)) {
        this.setState({ kind: 'idle' });
      }
    }, this.transientMs);
    this.hideTimer.unref();
  }

  private cancelHide(): void {
    if (this.hideTimer) clearTimeout(this.hideTimer);
    this.hideTimer = null;
  }
}
