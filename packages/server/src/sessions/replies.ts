/**
 * Texts and keyboards the assistant sends back.
 */

import {
  CallbackData,
  templateCallbackData,
  type ChatButton,
  type EditKind,
  type ErrorCode,
  type SessionState,
  type TemplateSummary,
} from '@deckhand/shared';

export const MAIN_MENU: ChatButton[][] = [
  [{ text: '📤 Upload presentation', data: CallbackData.UPLOAD_PRESENTATION }],
  [{ text: '🎨 Choose template', data: CallbackData.CHOOSE_TEMPLATE }],
  [{ text: '✍️ Create from scratch', data: CallbackData.CREATE_NEW }],
  [{ text: '❓ Help', data: CallbackData.HELP }],
];

export const EDIT_MENU: ChatButton[][] = [
  [{ text: '➕ Title slide', data: CallbackData.ADD_TITLE }],
  [{ text: '📝 Content slide', data: CallbackData.ADD_CONTENT }],
  [{ text: '🖼 Image slide', data: CallbackData.ADD_IMAGE }],
  [{ text: '💾 Save', data: CallbackData.SAVE }],
];

export function templateMenu(templates: TemplateSummary[]): ChatButton[][] {
  return templates.map((t) => [
    { text: `${t.title} (${t.slideCount} slides)`, data: templateCallbackData(t.name) },
  ]);
}

/** Menu that fits the state: the edit menu once a deck is loaded. */
export function menuFor(state: SessionState): ChatButton[][] {
  return state === 'deck_loaded' || state === 'editing' ? EDIT_MENU : MAIN_MENU;
}

export const MESSAGES = {
  welcome:
    '👋 Welcome to the presentation assistant!\n\n' +
    'I can help you create or edit a presentation. Choose an action:',
  help:
    'This assistant builds and edits presentations.\n\n' +
    '• Upload a .pptx file, pick a template, or start from scratch\n' +
    '• Add title, content and image slides\n' +
    '• Send an image file first to use it on an image slide\n' +
    '• Save to get the finished file\n\n' +
    'Send /start at any time to begin again.',
  awaitingUpload: (maxBytes: number) =>
    `Please upload your presentation (.pptx, up to ${Math.floor(maxBytes / (1024 * 1024))} MB).`,
  chooseTemplate: 'Choose a template for your presentation:',
  noTemplates: 'No templates are available right now.',
  createdBlank: '✅ New presentation created. What would you like to add?',
  uploaded: (slideCount: number) =>
    `✅ Presentation uploaded!\n📊 Slides: ${slideCount}\n\nChoose an action:`,
  templateSelected: (name: string, slideCount: number) =>
    `✅ Template "${name}" selected (${slideCount} slides). Now you can:\n` +
    '1. Add content\n' +
    '2. Save the presentation',
  editMenu: 'What would you like to do with the presentation?',
  slideAdded: (slideCount: number) =>
    `✅ Slide added. The presentation now has ${slideCount} slide${slideCount === 1 ? '' : 's'}.`,
  imageStored: (name: string) =>
    `🖼 Image "${name}" received. Use this name when adding an image slide.`,
  saved: (fileName: string, slideCount: number) =>
    `💾 Presentation saved as ${fileName} (${slideCount} slides).`,
  invalidCommand: 'Invalid command. Please try again.',
  internal: '❌ An error occurred. Please try again.',
} as const;

export const EDIT_PROMPTS: Record<EditKind, string> = {
  add_title: 'Send the slide title and, optionally, a subtitle.',
  add_content: 'Send the slide title followed by one bullet point per line.',
  add_image: 'Upload the image first, then send the slide title and the image file name.',
};

/** User-facing text for a failed core operation. */
export function errorText(code: ErrorCode, message: string): string {
  return code === 'TooLarge' || code === 'Busy' ? `⚠️ ${message}` : `❌ ${message}`;
}
