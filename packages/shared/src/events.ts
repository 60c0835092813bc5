/**
 * Conversation events a chat transport delivers to a presentation session.
 *
 * Button presses and slash commands arrive as free-form strings. They are
 * parsed once, here, into a closed union so the session logic can match on
 * it exhaustively.
 */

// ============ Session States ============

export const SESSION_STATES = ['idle', 'awaiting_upload', 'deck_loaded', 'editing', 'saved'] as const;

export type SessionState = (typeof SESSION_STATES)[number];

/** States in which the session owns a deck. */
export type DeckState = 'deck_loaded' | 'editing' | 'saved';

// ============ Callback Data ============

/** Callback data carried by the buttons the assistant renders. */
export const CallbackData = {
  UPLOAD_PRESENTATION: 'upload_presentation',
  CHOOSE_TEMPLATE: 'choose_template',
  CREATE_NEW: 'create_new',
  HELP: 'help',
  EDIT: 'edit',
  ADD_TITLE: 'add_title',
  ADD_CONTENT: 'add_content',
  ADD_IMAGE: 'add_image',
  SAVE: 'save',
} as const;

export const TEMPLATE_CALLBACK_PREFIX = 'template_';

export function templateCallbackData(name: string): string {
  return `${TEMPLATE_CALLBACK_PREFIX}${name}`;
}

// ============ Events ============

export type MenuChoice = 'upload' | 'choose_template' | 'create_new' | 'help';

export type EditKind = 'add_title' | 'add_content' | 'add_image';

export interface StartEvent {
  type: 'start';
}

export interface MenuEvent {
  type: 'menu';
  choice: MenuChoice;
}

export interface TemplateEvent {
  type: 'template';
  name: string;
}

export interface EditRequestEvent {
  type: 'edit';
}

/** A button asking how to send one of the edit commands. */
export interface EditPromptEvent {
  type: 'edit_prompt';
  kind: EditKind;
}

export interface SaveEvent {
  type: 'save';
}

export interface UnknownEvent {
  type: 'unknown';
  raw: string;
}

/** Events that can be expressed as a button press or a bare command. */
export type ControlEvent =
  | StartEvent
  | MenuEvent
  | TemplateEvent
  | EditRequestEvent
  | EditPromptEvent
  | SaveEvent
  | UnknownEvent;

export interface AddTitleCommand {
  kind: 'add_title';
  title: string;
  subtitle?: string;
}

export interface AddContentCommand {
  kind: 'add_content';
  title: string;
  bullets: string[];
}

export interface AddImageCommand {
  kind: 'add_image';
  title: string;
  /** Path relative to the user's upload directory */
  imagePath: string;
}

export type EditCommand = AddTitleCommand | AddContentCommand | AddImageCommand;

// ============ Parsing ============

const MENU_CHOICES: Record<string, MenuChoice> = {
  [CallbackData.UPLOAD_PRESENTATION]: 'upload',
  [CallbackData.CHOOSE_TEMPLATE]: 'choose_template',
  [CallbackData.CREATE_NEW]: 'create_new',
  [CallbackData.HELP]: 'help',
};

const EDIT_PROMPTS: Record<string, EditKind> = {
  [CallbackData.ADD_TITLE]: 'add_title',
  [CallbackData.ADD_CONTENT]: 'add_content',
  [CallbackData.ADD_IMAGE]: 'add_image',
};

/**
 * Parse button callback data into an event.
 * Anything unrecognised becomes an `unknown` event carrying the raw string.
 */
export function parseCallbackData(data: string): ControlEvent {
  const menuChoice = MENU_CHOICES[data];
  if (menuChoice) return { type: 'menu', choice: menuChoice };

  const editKind = EDIT_PROMPTS[data];
  if (editKind) return { type: 'edit_prompt', kind: editKind };

  if (data === CallbackData.EDIT) return { type: 'edit' };
  if (data === CallbackData.SAVE) return { type: 'save' };

  if (data.startsWith(TEMPLATE_CALLBACK_PREFIX)) {
    const name = data.slice(TEMPLATE_CALLBACK_PREFIX.length);
    if (name.length > 0) return { type: 'template', name };
  }

  return { type: 'unknown', raw: data };
}

/**
 * Parse a slash command (`/start`, `/help`, `/edit`, `/save`).
 * Bot-name suffixes such as `/start@deck_bot` are ignored.
 */
export function parseCommand(text: string): ControlEvent {
  const match = text.trim().match(/^\/([a-z_]+)(?:@\S+)?$/i);
  if (!match) return { type: 'unknown', raw: text };

  switch (match[1].toLowerCase()) {
    case 'start':
      return { type: 'start' };
    case 'help':
      return { type: 'menu', choice: 'help' };
    case 'templates':
      return { type: 'menu', choice: 'choose_template' };
    case 'new':
      return { type: 'menu', choice: 'create_new' };
    case 'edit':
      return { type: 'edit' };
    case 'save':
      return { type: 'save' };
    default:
      return { type: 'unknown', raw: text };
  }
}
