import type { LauncherState } from '@shared/contracts';

const TRANSITIONS: Record<LauncherState, readonly LauncherState[]> = {
  idle: ['checking'],
  checking: ['up-to-date', 'update-available', 'check-failed'],
  'up-to-date': ['launching'],
  'check-failed': ['launching'],
  'update-available': ['prompting', 'accepted', 'declined'],
  prompting: ['accepted', 'declined'],
  declined: ['launching'],
  accepted: ['downloading', 'promoting', 'launching'],
  downloading: ['verifying', 'launching'],
  verifying: ['installing', 'launching'],
  installing: ['promoting', 'launching'],
  promoting: ['cleaning', 'launching'],
  cleaning: ['launching'],
  launching: ['running', 'launch-failed'],
  running: [],
  'launch-failed': []
};

export type StateListener = (from: LauncherState, to: LauncherState, detail?: string) => void;

export class LauncherStateMachine {
  private current: LauncherState = 'idle';
  private readonly trail: LauncherState[] = ['idle'];

  constructor(private readonly listener?: StateListener) {}

  get state(): LauncherState {
    return this.current;
  }

  get history(): LauncherState[] {
    return this.trail.slice();
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: LauncherState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: LauncherState, detail?: string): LauncherState {
    if (!this.canTransition(to)) {
      throw new Error(`Transicao invalida: ${this.current} -> ${to}`);
    }

    const from = this.current;
    this.current = to;
    this.trail.push(to);
    this.listener?.(from, to, detail);
    return to;
  }
}
