/**
 * PresentationAssistant: the surface a chat transport talks to.
 *
 * Each operation feeds one event to the session state machine and returns
 * the reply to send, plus a typed result for the operations that produce
 * one. Nothing here throws for a user-caused failure.
 */

import type { Readable } from 'stream';
import {
  parseCallbackData,
  parseCommand,
  type BoundaryResult,
  type EditCommand,
  type MenuResponse,
  type SavedDeckSummary,
  type SessionSnapshot,
  type SlideCountSummary,
  type TemplateSummary,
  type UploadSummary,
} from '@deckhand/shared';
import type { AppConfig } from './config.js';
import { SlideAssembler, TemplateCatalog } from './slides/index.js';
import { UploadIngestor } from './storage/upload-ingestor.js';
import {
  MESSAGES,
  newSession,
  SessionStateMachine,
  SessionStore,
  toSnapshot,
  type Effect,
  type Outcome,
  type SessionEvent,
  type SessionStoreOptions,
} from './sessions/index.js';

type EffectOf<K extends Effect['kind']> = Extract<Effect, { kind: K }>;

/**
 * Turn an outcome into a result when it carries the expected effect.
 */
function toResult<K extends Effect['kind'], T>(
  outcome: Outcome,
  kind: K,
  pick: (effect: EffectOf<K>) => T,
): BoundaryResult<T> {
  const { reply, effect } = outcome;
  if (effect.kind === 'failed') {
    return { ok: false, error: effect.error, reply };
  }
  if (isKind(effect, kind)) {
    return { ok: true, value: pick(effect), reply };
  }
  return { ok: false, error: { code: 'InvalidCommand', message: MESSAGES.invalidCommand }, reply };
}

function isKind<K extends Effect['kind']>(effect: Effect, kind: K): effect is EffectOf<K> {
  return effect.kind === kind;
}

export interface PresentationAssistantDeps {
  store: SessionStore;
  machine: SessionStateMachine;
  catalog: TemplateCatalog;
}

export class PresentationAssistant {
  readonly store: SessionStore;
  private readonly machine: SessionStateMachine;
  private readonly catalog: TemplateCatalog;

  constructor(deps: PresentationAssistantDeps) {
    this.store = deps.store;
    this.machine = deps.machine;
    this.catalog = deps.catalog;
  }

  async onStart(userId: string): Promise<MenuResponse> {
    const { reply } = await this.machine.dispatch(userId, { type: 'start' });
    return { reply };
  }

  async onDocumentUpload(
    userId: string,
    filename: string,
    declaredSize: number,
    stream: Readable,
  ): Promise<BoundaryResult<UploadSummary>> {
    const outcome = await this.machine.dispatch(userId, { type: 'document', filename, declaredSize, stream });
    if (outcome.effect.kind === 'image_stored') {
      return { ok: true, value: { kind: 'image', name: outcome.effect.name }, reply: outcome.reply };
    }
    return toResult(outcome, 'deck_ready', (e): UploadSummary => ({ kind: 'deck', slideCount: e.slideCount }));
  }

  async onTemplateChoice(userId: string, name: string): Promise<BoundaryResult<SlideCountSummary>> {
    const outcome = await this.machine.dispatch(userId, { type: 'template', name });
    return toResult(outcome, 'deck_ready', (e) => ({ slideCount: e.slideCount }));
  }

  async onEditRequest(userId: string): Promise<MenuResponse> {
    const { reply } = await this.machine.dispatch(userId, { type: 'edit' });
    return { reply };
  }

  async onEditCommand(userId: string, command: EditCommand): Promise<BoundaryResult<SlideCountSummary>> {
    const outcome = await this.machine.dispatch(userId, { type: 'command', command });
    return toResult(outcome, 'slide_added', (e) => ({ slideCount: e.slideCount }));
  }

  async onSave(userId: string): Promise<BoundaryResult<SavedDeckSummary>> {
    const outcome = await this.machine.dispatch(userId, { type: 'save' });
    return toResult(outcome, 'saved', (e) => ({ path: e.path, slideCount: e.slideCount }));
  }

  /**
   * Handle a button press. Returns the full outcome since a callback can
   * lead to any transition.
   */
  async onCallback(userId: string, data: string): Promise<Outcome> {
    return this.dispatch(userId, parseCallbackData(data));
  }

  /** Handle a typed slash command such as `/start` or `/save`. */
  async onMessage(userId: string, text: string): Promise<Outcome> {
    return this.dispatch(userId, parseCommand(text));
  }

  dispatch(userId: string, event: SessionEvent): Promise<Outcome> {
    return this.machine.dispatch(userId, event);
  }

  listTemplates(): Promise<TemplateSummary[]> {
    return this.catalog.list();
  }

  /** Snapshot of the user's session; a user never seen reads as idle and is not stored. */
  getSession(userId: string): SessionSnapshot {
    return toSnapshot(this.store.peek(userId) ?? newSession(userId));
  }
}

/**
 * Wire the assistant and everything beneath it from configuration.
 */
export function createAssistant(
  config: AppConfig,
  storeOptions: Partial<SessionStoreOptions> = {},
): PresentationAssistant {
  const catalog = new TemplateCatalog(config.templatesDir);
  const assembler = new SlideAssembler(catalog);
  const ingestor = new UploadIngestor(assembler, {
    uploadDir: config.uploadDir,
    maxUploadBytes: config.maxUploadBytes,
    uploadTimeoutMs: config.uploadTimeoutMs,
  });
  const store = new SessionStore({ maxQueuedEvents: config.maxQueuedEvents, ...storeOptions });
  const machine = new SessionStateMachine({
    store,
    assembler,
    ingestor,
    catalog,
    uploadDir: config.uploadDir,
    outputDir: config.outputDir,
    maxUploadBytes: config.maxUploadBytes,
  });
  return new PresentationAssistant({ store, machine, catalog });
}
