/**
 * Session Module
 * Driver loop over a shared module
 */

export { createSession, type Session, type SessionOptions } from './session.js';
export { runSource, type SessionReport } from './driver.js';
export {
  defaultCallbacks,
  type DefinitionEvent,
  type ExternEvent,
  type SessionCallbacks,
  type TopLevelEvent,
} from './callbacks.js';
