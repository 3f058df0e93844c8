import { useSyncExternalStore } from 'react';
import type { ProjectSession, SessionState } from '../utils/projectSession';

/** Re-renders whenever the session publishes a new state. */
export const useProjectSession = (session: ProjectSession): SessionState =>
  useSyncExternalStore(session.subscribe, session.snapshot);
