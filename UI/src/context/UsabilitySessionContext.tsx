import React, { createContext, useContext, useMemo, useReducer } from 'react';
import {
  INITIAL_TASK_TIMER,
  TaskTimerAction,
  TaskTimerState,
  taskTimerReducer,
} from '../services/taskTimer';
import { UsabilityStore } from '../services/usabilityStore';

export interface UsabilitySession {
  /** Identifies this page load; timer state never outlives it */
  sessionId: string;
  store: UsabilityStore;
  timer: TaskTimerState;
  dispatchTimer: React.Dispatch<TaskTimerAction>;
}

const UsabilitySessionContext = createContext<UsabilitySession | null>(null);

export function createSessionId(now: number = Date.now()): string {
  return `session_${now}_${Math.random().toString(36).slice(2, 8)}`;
}

interface UsabilitySessionProviderProps {
  /** Created once by the caller, outside render */
  store: UsabilityStore;
  children: React.ReactNode;
}

export const UsabilitySessionProvider: React.FC<UsabilitySessionProviderProps> = ({ store, children }) => {
  const sessionId = useMemo(() => createSessionId(), []);
  const [timer, dispatchTimer] = useReducer(taskTimerReducer, INITIAL_TASK_TIMER);

  const value = useMemo<UsabilitySession>(
    () => ({ sessionId, store, timer, dispatchTimer }),
    [sessionId, store, timer]
  );

  return <UsabilitySessionContext.Provider value={value}>{children}</UsabilitySessionContext.Provider>;
};

export function useUsabilitySession(): UsabilitySession {
  const session = useContext(UsabilitySessionContext);
  if (!session) {
    throw new Error('useUsabilitySession must be used inside UsabilitySessionProvider');
  }
  return session;
}
