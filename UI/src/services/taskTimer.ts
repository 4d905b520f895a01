import { TaskLabel } from '../types/usability';

/** Per-session task timer: Idle -> Running -> Stopped(duration), advanced by `taskTimerReducer` */
export type TaskTimerState =
  | { status: 'idle'; task: TaskLabel | null }
  | { status: 'running'; task: TaskLabel; startedAtMs: number }
  | { status: 'stopped'; task: TaskLabel; durationSeconds: number };

export type TaskTimerAction =
  | { type: 'select'; task: TaskLabel | null }
  | { type: 'start'; nowMs: number }
  | { type: 'stop'; nowMs: number }
  | { type: 'reset' };

export const INITIAL_TASK_TIMER: TaskTimerState = { status: 'idle', task: null };

export function roundSeconds(ms: number): number {
  return Math.round(Math.max(0, ms) / 10) / 100;
}

export function taskTimerReducer(state: TaskTimerState, action: TaskTimerAction): TaskTimerState {
  switch (action.type) {
    case 'select':
      // Re-selecting the current task keeps whatever timing is in progress
      if (action.task === state.task) return state;
      return { status: 'idle', task: action.task };
    case 'start':
      if (state.task === null) return state;
      return { status: 'running', task: state.task, startedAtMs: action.nowMs };
    case 'stop':
      if (state.status !== 'running') return state;
      return {
        status: 'stopped',
        task: state.task,
        durationSeconds: roundSeconds(action.nowMs - state.startedAtMs),
      };
    case 'reset':
      return { status: 'idle', task: state.task };
  }
}

/** Duration to save for `task`, or null when no completed timing exists for it */
export function recordedDuration(state: TaskTimerState, task: TaskLabel): number | null {
  if (state.status === 'stopped' && state.task === task) {
    return state.durationSeconds;
  }
  return null;
}
