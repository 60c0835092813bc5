/**
 * Deck → .pptx bytes.
 *
 * Shapes are given stable names (Title, Subtitle, Body, Picture) so the
 * reader can recover each slide's layout from the file.
 */

import PptxGenJS from 'pptxgenjs';
import type { ContentSlide, Deck, ImageSlide, TitleSlide } from '@deckhand/shared';
import { IMAGE_OFFSET } from './image.js';

export const SHAPE_NAMES = {
  title: 'Title',
  subtitle: 'Subtitle',
  body: 'Body',
  picture: 'Picture',
} as const;

const FONT_FACE = 'Calibri';

function addTitleSlide(pptx: PptxGenJS, slide: TitleSlide): void {
  const target = pptx.addSlide();
  target.addText(slide.title, {
    objectName: SHAPE_NAMES.title,
    x: 0.5, y: 1.6, w: 9, h: 1.3,
    fontFace: FONT_FACE, fontSize: 40, bold: true, align: 'center', valign: 'middle',
  });
  // Always written, even when empty: its presence marks the title layout.
  target.addText(slide.subtitle || ' ', {
    objectName: SHAPE_NAMES.subtitle,
    x: 1, y: 3.0, w: 8, h: 0.9,
    fontFace: FONT_FACE, fontSize: 20, color: '595959', align: 'center', valign: 'top',
  });
}

function addHeading(target: PptxGenJS.Slide, title: string): void {
  target.addText(title, {
    objectName: SHAPE_NAMES.title,
    x: 0.5, y: 0.25, w: 9, h: 0.8,
    fontFace: FONT_FACE, fontSize: 28, bold: true, valign: 'middle',
  });
}

function addContentSlide(pptx: PptxGenJS, slide: ContentSlide): void {
  const target = pptx.addSlide();
  addHeading(target, slide.title);
  if (slide.bullets.length === 0) return;

  target.addText(
    slide.bullets.map((bullet) => ({
      text: bullet.text,
      options: { bullet: true, fontSize: bullet.fontSize, breakLine: true },
    })),
    {
      objectName: SHAPE_NAMES.body,
      x: 0.5, y: 1.2, w: 9, h: 4.1,
      fontFace: FONT_FACE, valign: 'top',
    },
  );
}

function addImageSlide(pptx: PptxGenJS, slide: ImageSlide): void {
  const target = pptx.addSlide();
  addHeading(target, slide.title);
  const { image } = slide;
  target.addImage({
    objectName: SHAPE_NAMES.picture,
    data: `${image.mimeType};base64,${Buffer.from(image.data).toString('base64')}`,
    x: IMAGE_OFFSET.x,
    y: IMAGE_OFFSET.y,
    w: image.width,
    h: image.height,
  });
}

/**
 * Serialize a deck as a 16:9 .pptx document.
 * Output depends only on the deck, apart from the timestamps the format embeds.
 */
export async function writePptx(deck: Deck): Promise<Buffer> {
  const pptx = new PptxGenJS();
  pptx.layout = 'LAYOUT_16x9';
  pptx.title = deck.slides[0]?.title ?? 'Presentation';

  for (const slide of deck.slides) {
    switch (slide.layout) {
      case 'title':
        addTitleSlide(pptx, slide);
        break;
      case 'content':
        addContentSlide(pptx, slide);
        break;
      case 'image':
        addImageSlide(pptx, slide);
        break;
    }
  }

  const output = await pptx.write({ outputType: 'nodebuffer' });
  if (output instanceof Uint8Array) return Buffer.from(output);
  if (output instanceof ArrayBuffer) return Buffer.from(output);
  throw new Error(`Unexpected pptx output type: ${typeof output}`);
}
