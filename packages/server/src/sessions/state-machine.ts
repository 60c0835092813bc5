/**
 * SessionStateMachine: per-user control logic.
 *
 * Given the current session and one event, decides the next state, which
 * assembler or ingestor operation to run, and what to reply. Core failures
 * (DeckError) become replies and leave the session in its last well-defined
 * state; anything else is logged and reported as a generic error.
 */

import { basename, extname, join } from 'path';
import type { Readable } from 'stream';
import type {
  BoundaryError,
  ControlEvent,
  Deck,
  DeckState,
  EditCommand,
  EditKind,
  MenuChoice,
  Reply,
  SessionState,
} from '@deckhand/shared';
import { DeckError, ResourceNotFoundError } from '../errors.js';
import type { SlideAssembler } from '../slides/assembler.js';
import type { TemplateCatalog } from '../slides/template-catalog.js';
import { publishFile } from '../storage/atomic-file.js';
import { ownerSegment, safeFileName, safePath } from '../storage/paths.js';
import { isImageUpload, type UploadIngestor } from '../storage/upload-ingestor.js';
import {
  EDIT_MENU,
  EDIT_PROMPTS,
  MAIN_MENU,
  MESSAGES,
  errorText,
  menuFor,
  templateMenu,
} from './replies.js';
import type { SessionStore, Transition } from './session-store.js';
import { DEFAULT_DECK_NAME, newSession, type Session, type SessionBase } from './types.js';

// ============ Events ============

export interface DocumentEvent {
  type: 'document';
  filename: string;
  declaredSize: number;
  stream: Readable;
}

export interface CommandEvent {
  type: 'command';
  command: EditCommand;
}

export type SessionEvent = ControlEvent | DocumentEvent | CommandEvent;

// ============ Outcomes ============

export type Effect =
  | { kind: 'none' }
  | { kind: 'deck_ready'; slideCount: number }
  | { kind: 'slide_added'; slideCount: number }
  | { kind: 'image_stored'; name: string }
  | { kind: 'saved'; path: string; slideCount: number }
  | { kind: 'failed'; error: BoundaryError };

export interface Outcome {
  reply: Reply;
  effect: Effect;
}

function done(reply: Reply, effect: Effect = { kind: 'none' }): Outcome {
  return { reply, effect };
}

function failed(error: BoundaryError, state: SessionState, text: string): Outcome {
  return {
    reply: { text, buttons: menuFor(state), state },
    effect: { kind: 'failed', error },
  };
}

function fromDeckError(err: DeckError, state: SessionState): Outcome {
  return failed({ code: err.code, message: err.message }, state, errorText(err.code, err.message));
}

function invalidCommand(state: SessionState): Outcome {
  return failed({ code: 'InvalidCommand', message: MESSAGES.invalidCommand }, state, MESSAGES.invalidCommand);
}

// ============ Session helpers ============

type EntrySession = Session & { state: 'idle' | 'awaiting_upload' };
type DeckSession = Session & { state: 'deck_loaded' | 'editing' };

function isEntry(session: Session): session is EntrySession {
  return session.state === 'idle' || session.state === 'awaiting_upload';
}

function isEditable(session: Session): session is DeckSession {
  return session.state === 'deck_loaded' || session.state === 'editing';
}

function baseOf(session: Session): SessionBase {
  const { userId, sessionId, deckName, sourcePath, savedPath, lastActivity } = session;
  return { userId, sessionId, deckName, sourcePath, savedPath, lastActivity };
}

function withDeck(session: Session, state: DeckState, deck: Deck, patch: Partial<SessionBase> = {}): Session {
  return { ...baseOf(session), ...patch, state, deck };
}

function withoutDeck(session: Session, state: 'idle' | 'awaiting_upload'): Session {
  return { ...baseOf(session), state, deck: null };
}

function deckNameFrom(filename: string): string {
  return safeFileName(basename(filename, extname(filename))) || DEFAULT_DECK_NAME;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled session event: ${JSON.stringify(value)}`);
}

// ============ State machine ============

export interface SessionStateMachineOptions {
  store: SessionStore;
  assembler: SlideAssembler;
  ingestor: UploadIngestor;
  catalog: TemplateCatalog;
  uploadDir: string;
  outputDir: string;
  maxUploadBytes: number;
}

export class SessionStateMachine {
  constructor(private readonly options: SessionStateMachineOptions) {}

  /**
   * Handle one event for a user. Never throws: every failure is turned
   * into an outcome with a reply.
   */
  async dispatch(userId: string, event: SessionEvent): Promise<Outcome> {
    const { store } = this.options;
    try {
      return await store.update(
        userId,
        (current) => this.transition(current, event),
        { rejectIfBusy: event.type === 'document' },
      );
    } catch (err) {
      const state = store.peek(userId)?.state ?? 'idle';
      if (err instanceof DeckError) {
        return fromDeckError(err, state);
      }
      console.error(`[SessionStateMachine] Unexpected failure handling "${event.type}" for ${userId}:`, err);
      return failed({ code: 'Internal', message: MESSAGES.internal }, state, MESSAGES.internal);
    }
  }

  private async transition(current: Session, event: SessionEvent): Promise<Transition<Outcome>> {
    const session = this.recycle(current, event);
    try {
      return await this.handle(session, event);
    } catch (err) {
      if (err instanceof DeckError) {
        return { session, value: fromDeckError(err, session.state) };
      }
      throw err;
    }
  }

  /**
   * A saved session starts over on the next meaningful event.
   * `start`, help and unrecognised input are handled as they are.
   */
  private recycle(session: Session, event: SessionEvent): Session {
    if (session.state !== 'saved') return session;
    if (event.type === 'start' || event.type === 'unknown') return session;
    if (event.type === 'menu' && event.choice === 'help') return session;
    return newSession(session.userId);
  }

  private async handle(session: Session, event: SessionEvent): Promise<Transition<Outcome>> {
    switch (event.type) {
      case 'start': {
        const next = newSession(session.userId);
        return { session: next, value: done({ text: MESSAGES.welcome, buttons: MAIN_MENU, state: next.state }) };
      }

      case 'menu':
        return this.handleMenu(session, event.choice);

      case 'document':
        if (isImageUpload(event.filename)) {
          return this.handleImage(session, event);
        }
        if (!isEntry(session)) break;
        return this.handleDocument(session, event);

      case 'template':
        if (!isEntry(session)) break;
        return this.handleTemplate(session, event.name);

      case 'edit':
        if (!isEditable(session)) break;
        return this.enterEditing(session, MESSAGES.editMenu);

      case 'edit_prompt':
        if (!isEditable(session)) break;
        return this.enterEditing(session, this.promptFor(event.kind));

      case 'command':
        if (!isEditable(session)) break;
        return this.handleCommand(session, event.command);

      case 'save':
        if (!isEditable(session)) break;
        return this.handleSave(session);

      case 'unknown':
        break;

      default:
        return assertNever(event);
    }

    return { session, value: invalidCommand(session.state) };
  }

  private async handleMenu(session: Session, choice: MenuChoice): Promise<Transition<Outcome>> {
    if (choice === 'help') {
      return {
        session,
        value: done({ text: MESSAGES.help, buttons: menuFor(session.state), state: session.state }),
      };
    }
    if (!isEntry(session)) {
      return { session, value: invalidCommand(session.state) };
    }

    switch (choice) {
      case 'upload': {
        const next = withoutDeck(session, 'awaiting_upload');
        const text = MESSAGES.awaitingUpload(this.options.maxUploadBytes);
        return { session: next, value: done({ text, state: next.state }) };
      }

      case 'choose_template': {
        const templates = await this.options.catalog.list();
        const reply: Reply = templates.length > 0
          ? { text: MESSAGES.chooseTemplate, buttons: templateMenu(templates), state: session.state }
          : { text: MESSAGES.noTemplates, buttons: MAIN_MENU, state: session.state };
        return { session, value: done(reply) };
      }

      case 'create_new': {
        const deck = await this.options.assembler.create();
        const next = withDeck(session, 'deck_loaded', deck, { deckName: DEFAULT_DECK_NAME, sourcePath: null });
        return {
          session: next,
          value: done(
            { text: MESSAGES.createdBlank, buttons: EDIT_MENU, state: next.state },
            { kind: 'deck_ready', slideCount: 0 },
          ),
        };
      }
    }
  }

  private async handleDocument(session: EntrySession, event: DocumentEvent): Promise<Transition<Outcome>> {
    const result = await this.options.ingestor.ingest({
      ownerId: session.userId,
      declaredName: event.filename,
      declaredSize: event.declaredSize,
      stream: event.stream,
    });

    const next = withDeck(session, 'deck_loaded', result.deck, {
      deckName: deckNameFrom(event.filename),
      sourcePath: result.artifact.storedPath,
      savedPath: null,
    });
    return {
      session: next,
      value: done(
        { text: MESSAGES.uploaded(result.slideCount), buttons: EDIT_MENU, state: next.state },
        { kind: 'deck_ready', slideCount: result.slideCount },
      ),
    };
  }

  /**
   * Images are kept for later image slides; the session state is unchanged.
   */
  private async handleImage(session: Session, event: DocumentEvent): Promise<Transition<Outcome>> {
    await this.options.ingestor.ingestImage({
      ownerId: session.userId,
      declaredName: event.filename,
      declaredSize: event.declaredSize,
      stream: event.stream,
    });
    return {
      session,
      value: done(
        { text: MESSAGES.imageStored(event.filename), buttons: menuFor(session.state), state: session.state },
        { kind: 'image_stored', name: event.filename },
      ),
    };
  }

  private async handleTemplate(session: EntrySession, name: string): Promise<Transition<Outcome>> {
    const deck = await this.options.assembler.create(name);
    const next = withDeck(session, 'deck_loaded', deck, { deckName: name, sourcePath: null, savedPath: null });
    const slideCount = deck.slides.length;
    return {
      session: next,
      value: done(
        { text: MESSAGES.templateSelected(name, slideCount), buttons: EDIT_MENU, state: next.state },
        { kind: 'deck_ready', slideCount },
      ),
    };
  }

  private enterEditing(session: DeckSession, text: string): Transition<Outcome> {
    const next = withDeck(session, 'editing', session.deck);
    return { session: next, value: done({ text, buttons: EDIT_MENU, state: next.state }) };
  }

  private promptFor(kind: EditKind): string {
    return EDIT_PROMPTS[kind];
  }

  private async handleCommand(session: DeckSession, command: EditCommand): Promise<Transition<Outcome>> {
    const deck = await this.applyCommand(session, command);
    const next = withDeck(session, 'editing', deck);
    const slideCount = deck.slides.length;
    return {
      session: next,
      value: done(
        { text: MESSAGES.slideAdded(slideCount), buttons: EDIT_MENU, state: next.state },
        { kind: 'slide_added', slideCount },
      ),
    };
  }

  private async applyCommand(session: DeckSession, command: EditCommand): Promise<Deck> {
    const { assembler } = this.options;
    switch (command.kind) {
      case 'add_title':
        return assembler.addTitleSlide(session.deck, command.title, command.subtitle ?? '');
      case 'add_content':
        return assembler.addContentSlide(session.deck, command.title, command.bullets);
      case 'add_image':
        return assembler.addImageSlide(
          session.deck,
          command.title,
          this.resolveImage(session.userId, command.imagePath),
          command.imagePath,
        );
    }
  }

  /**
   * An image is named as it was uploaded and looked up where the ingestor
   * stored it. Names that would leave the user's upload folder are refused.
   */
  private resolveImage(userId: string, imagePath: string): string {
    const userDir = join(this.options.uploadDir, ownerSegment(userId));
    if (!safePath(userDir, imagePath)) {
      throw new ResourceNotFoundError(imagePath, 'is outside your upload folder');
    }
    return this.options.ingestor.destinationFor(userId, imagePath);
  }

  private async handleSave(session: DeckSession): Promise<Transition<Outcome>> {
    const bytes = await this.options.assembler.serialize(session.deck);
    const fileName = `${session.deckName}-${session.sessionId}.pptx`;
    const path = join(this.options.outputDir, ownerSegment(session.userId), fileName);
    await publishFile(path, bytes);
    console.log(`[SessionStateMachine] Saved ${path} for ${session.userId}`);

    const slideCount = session.deck.slides.length;
    const next = withDeck(session, 'saved', session.deck, { savedPath: path });
    return {
      session: next,
      value: done(
        { text: MESSAGES.saved(fileName, slideCount), buttons: MAIN_MENU, state: next.state },
        { kind: 'saved', path, slideCount },
      ),
    };
  }
}
