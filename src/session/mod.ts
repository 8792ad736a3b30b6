export { loadSession, parseSession, saveSession, serializeSession, sessionFileName } from './store.ts';
export type { SessionFile, SessionState } from './types.ts';
