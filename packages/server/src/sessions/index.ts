export { SessionStore, type Transition, type UpdateOptions, type SessionStoreOptions } from './session-store.js';
export {
  SessionStateMachine,
  type SessionStateMachineOptions,
  type SessionEvent,
  type DocumentEvent,
  type CommandEvent,
  type Effect,
  type Outcome,
} from './state-machine.js';
export { UserLock } from './user-lock.js';
export { newSession, toSnapshot, DEFAULT_DECK_NAME, type Session, type SessionBase, type SessionId } from './types.js';
export { MAIN_MENU, EDIT_MENU, MESSAGES, EDIT_PROMPTS, menuFor, templateMenu, errorText } from './replies.js';
