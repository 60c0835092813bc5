/**
 * Deck model - the slide collection a session assembles.
 *
 * Decks are plain values. Every edit produces a new deck; slides are never
 * changed once appended.
 */

// ============ Slides ============

/** Point size given to bullets added through the assembler. */
export const DEFAULT_BULLET_FONT_SIZE = 18;

export interface Bullet {
  text: string;
  fontSize: number;
}

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif';

export interface SlideImage {
  data: Uint8Array;
  mimeType: ImageMimeType;
  /** Placed width in inches */
  width: number;
  /** Placed height in inches */
  height: number;
}

export interface TitleSlide {
  layout: 'title';
  title: string;
  subtitle: string;
}

export interface ContentSlide {
  layout: 'content';
  title: string;
  bullets: Bullet[];
}

export interface ImageSlide {
  layout: 'image';
  title: string;
  image: SlideImage;
}

export type Slide = TitleSlide | ContentSlide | ImageSlide;

export interface Deck {
  slides: Slide[];
}

// ============ Helpers ============

export function emptyDeck(): Deck {
  return { slides: [] };
}

export function slideTitles(deck: Deck): string[] {
  return deck.slides.map((slide) => slide.title);
}

/**
 * Deep copy of a deck. Image bytes are copied too, so the result shares no
 * mutable state with the source.
 */
export function cloneDeck(deck: Deck): Deck {
  return {
    slides: deck.slides.map((slide): Slide => {
      switch (slide.layout) {
        case 'title':
          return { ...slide };
        case 'content':
          return { ...slide, bullets: slide.bullets.map((b) => ({ ...b })) };
        case 'image':
          return { ...slide, image: { ...slide.image, data: Uint8Array.from(slide.image.data) } };
      }
    }),
  };
}
