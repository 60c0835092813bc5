/**
 * SlideAssembler: operations on the in-memory deck.
 *
 * Every append validates all of its inputs before building the new slide and
 * returns a new deck; the deck passed in is never modified.
 */

import {
  DEFAULT_BULLET_FONT_SIZE,
  emptyDeck,
  type Deck,
  type Slide,
} from '@deckhand/shared';
import { ValidationError } from '../errors.js';
import { loadImage } from './image.js';
import { readPptx } from './pptx-reader.js';
import { writePptx } from './pptx-writer.js';
import type { TemplateCatalog } from './template-catalog.js';

/**
 * Titles and subtitles may span lines. Each line becomes its own paragraph
 * in the file, so blank lines are dropped and `\r\n` becomes `\n`.
 */
function normalizeLines(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .filter((line) => line.trim().length > 0)
    .join('\n');
}

function requireTitle(title: string): string {
  if (typeof title !== 'string' || title.trim().length === 0) {
    throw new ValidationError('Slide title must not be empty.');
  }
  return normalizeLines(title);
}

function append(deck: Deck, slide: Slide): Deck {
  return { ...deck, slides: [...deck.slides, slide] };
}

export class SlideAssembler {
  constructor(private readonly catalog: TemplateCatalog) {}

  /**
   * A blank deck, or a fresh copy of the named template.
   */
  async create(templateName?: string): Promise<Deck> {
    if (templateName === undefined) return emptyDeck();
    return this.catalog.get(templateName);
  }

  addTitleSlide(deck: Deck, title: string, subtitle = ''): Deck {
    const heading = requireTitle(title);
    if (typeof subtitle !== 'string') {
      throw new ValidationError('Subtitle must be text.');
    }
    return append(deck, { layout: 'title', title: heading, subtitle: normalizeLines(subtitle) });
  }

  /**
   * One paragraph per bullet at the default size. An empty list gives a
   * slide with only a title. A bullet is a single line.
   */
  addContentSlide(deck: Deck, title: string, bullets: readonly string[]): Deck {
    const heading = requireTitle(title);
    if (!Array.isArray(bullets)) {
      throw new ValidationError('Bullets must be a list of text lines.');
    }
    bullets.forEach((bullet, i) => {
      if (typeof bullet !== 'string' || bullet.trim().length === 0) {
        throw new ValidationError(`Bullet ${i + 1} is empty.`);
      }
      if (/[\r\n]/.test(bullet)) {
        throw new ValidationError(`Bullet ${i + 1} must be a single line.`);
      }
    });

    return append(deck, {
      layout: 'content',
      title: heading,
      bullets: bullets.map((text) => ({ text, fontSize: DEFAULT_BULLET_FONT_SIZE })),
    });
  }

  /**
   * Place the image at the default offset under the title.
   * Throws ResourceNotFoundError if the file is missing or not an image;
   * errors name the image by `label`.
   */
  async addImageSlide(deck: Deck, title: string, imagePath: string, label = imagePath): Promise<Deck> {
    const heading = requireTitle(title);
    const image = await loadImage(imagePath, label);
    return append(deck, { layout: 'image', title: heading, image });
  }

  serialize(deck: Deck): Promise<Buffer> {
    return writePptx(deck);
  }

  /**
   * Throws CorruptDocumentError when the bytes are not a presentation.
   */
  load(bytes: Uint8Array): Promise<Deck> {
    return readPptx(bytes);
  }
}
