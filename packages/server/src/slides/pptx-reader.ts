/**
 * .pptx bytes → Deck.
 *
 * A .pptx file is a zip archive of XML parts:
 * - `ppt/presentation.xml` + its rels - slide order
 * - `ppt/slides/slideN.xml` - shapes (`p:sp`) and pictures (`p:pic`)
 * - `ppt/slides/_rels/slideN.xml.rels` - picture targets under `ppt/media/`
 *
 * Layout is recovered from placeholder types (files authored in PowerPoint)
 * or from the shape names the writer assigns.
 */

import JSZip from 'jszip';
import { DOMParser } from '@xmldom/xmldom';
import { posix } from 'path';
import {
  DEFAULT_BULLET_FONT_SIZE,
  type Bullet,
  type Deck,
  type ImageMimeType,
  type Slide,
  type SlideImage,
} from '@deckhand/shared';
import { CorruptDocumentError } from '../errors.js';

const PRESENTATION_PART = 'ppt/presentation.xml';
const EMU_PER_INCH = 914400;

const REL_NS = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

const MEDIA_TYPES: Record<string, ImageMimeType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
};

function parseXml(xml: string, part: string): Document {
  const fail = (msg: string): never => {
    throw new CorruptDocumentError(`${part} is not well-formed XML (${msg.trim()})`);
  };
  const doc = new DOMParser({
    errorHandler: { warning: () => undefined, error: fail, fatalError: fail },
  }).parseFromString(xml, 'application/xml');
  if (!doc.documentElement) fail('empty document');
  return doc;
}

async function readPart(zip: JSZip, part: string): Promise<Document> {
  const file = zip.file(part);
  if (!file) throw new CorruptDocumentError(`missing ${part}`);
  return parseXml(await file.async('string'), part);
}

function elements(root: Document | Element, tagName: string): Element[] {
  return Array.from(root.getElementsByTagName(tagName));
}

function firstElement(root: Document | Element, tagName: string): Element | null {
  return root.getElementsByTagName(tagName)[0] ?? null;
}

function relsPathFor(part: string): string {
  return posix.join(posix.dirname(part), '_rels', `${posix.basename(part)}.rels`);
}

/**
 * Read a part's relationships as id → absolute part path.
 * A missing rels file yields an empty map.
 */
async function readRelationships(zip: JSZip, part: string): Promise<Map<string, string>> {
  const relsPath = relsPathFor(part);
  const rels = new Map<string, string>();
  if (!zip.file(relsPath)) return rels;

  const doc = await readPart(zip, relsPath);
  for (const rel of elements(doc, 'Relationship')) {
    const id = rel.getAttribute('Id');
    const target = rel.getAttribute('Target');
    if (!id || !target || rel.getAttribute('TargetMode') === 'External') continue;
    const resolved = target.startsWith('/')
      ? target.slice(1)
      : posix.normalize(posix.join(posix.dirname(part), target));
    rels.set(id, resolved);
  }
  return rels;
}

function relationshipId(el: Element, localName: string): string | null {
  return el.getAttributeNS(REL_NS, localName) || el.getAttribute(`r:${localName}`) || null;
}

// ── Slide order ──────────────────────────────────────────────────────────

async function slideParts(zip: JSZip): Promise<string[]> {
  const presentation = await readPart(zip, PRESENTATION_PART);
  const rels = await readRelationships(zip, PRESENTATION_PART);

  const parts: string[] = [];
  for (const sldId of elements(presentation, 'p:sldId')) {
    const relId = relationshipId(sldId, 'id');
    const target = relId ? rels.get(relId) : undefined;
    if (!target) throw new CorruptDocumentError(`slide reference ${relId ?? '(none)'} is dangling`);
    parts.push(target);
  }
  return parts;
}

// ── Shapes ───────────────────────────────────────────────────────────────

type ShapeRole = 'title' | 'subtitle' | 'body' | 'ignored';

/** Master placeholders that repeat on every slide rather than carry content. */
const IGNORED_PLACEHOLDERS = new Set(['ftr', 'dt', 'sldNum', 'hdr']);

function shapeRole(sp: Element): ShapeRole {
  const ph = firstElement(sp, 'p:ph');
  const phType = ph?.getAttribute('type') ?? '';
  if (IGNORED_PLACEHOLDERS.has(phType)) return 'ignored';
  if (phType === 'title' || phType === 'ctrTitle') return 'title';
  if (phType === 'subTitle') return 'subtitle';

  const name = firstElement(sp, 'p:cNvPr')?.getAttribute('name') ?? '';
  if (/^title\b/i.test(name)) return 'title';
  if (/^subtitle\b/i.test(name)) return 'subtitle';
  return 'body';
}

function paragraphText(p: Element): string {
  let text = '';
  for (const el of elements(p, '*')) {
    if (el.nodeName === 'a:t') text += el.textContent ?? '';
    else if (el.nodeName === 'a:br') text += '\n';
  }
  return text;
}

function paragraphFontSize(p: Element): number {
  const size = firstElement(p, 'a:rPr')?.getAttribute('sz');
  const hundredths = size ? parseInt(size, 10) : NaN;
  return Number.isFinite(hundredths) && hundredths > 0 ? hundredths / 100 : DEFAULT_BULLET_FONT_SIZE;
}

function shapeParagraphs(sp: Element): Element[] {
  const body = firstElement(sp, 'p:txBody');
  return body ? elements(body, 'a:p') : [];
}

/**
 * Paragraphs joined by `\n`. Blank paragraphs at either end are dropped;
 * blank lines between text are kept.
 */
function shapeText(sp: Element): string {
  const lines = shapeParagraphs(sp).map(paragraphText);
  const isBlank = (line: string) => line.trim().length === 0;
  const start = lines.findIndex((line) => !isBlank(line));
  if (start === -1) return '';
  let end = lines.length;
  while (isBlank(lines[end - 1])) end--;
  return lines.slice(start, end).join('\n');
}

// ── Pictures ─────────────────────────────────────────────────────────────

async function readPicture(
  zip: JSZip,
  pic: Element,
  rels: Map<string, string>,
): Promise<SlideImage | null> {
  const blip = firstElement(pic, 'a:blip');
  const relId = blip ? relationshipId(blip, 'embed') : null;
  const target = relId ? rels.get(relId) : undefined;
  if (!target) return null;

  const mimeType = MEDIA_TYPES[posix.extname(target).toLowerCase()];
  const file = zip.file(target);
  if (!mimeType || !file) return null;

  const ext = firstElement(pic, 'a:ext');
  const cx = parseInt(ext?.getAttribute('cx') ?? '', 10);
  const cy = parseInt(ext?.getAttribute('cy') ?? '', 10);

  return {
    data: await file.async('uint8array'),
    mimeType,
    width: Number.isFinite(cx) ? cx / EMU_PER_INCH : 0,
    height: Number.isFinite(cy) ? cy / EMU_PER_INCH : 0,
  };
}

// ── Slides ───────────────────────────────────────────────────────────────

async function readSlide(zip: JSZip, part: string): Promise<Slide> {
  const doc = await readPart(zip, part);
  const rels = await readRelationships(zip, part);

  let title: string | null = null;
  let subtitle: string | null = null;
  const bullets: Bullet[] = [];

  for (const sp of elements(doc, 'p:sp')) {
    const role = shapeRole(sp);
    if (role === 'ignored') continue;
    if (role === 'title' && title === null) {
      title = shapeText(sp);
    } else if (role === 'subtitle' && subtitle === null) {
      subtitle = shapeText(sp);
    } else {
      for (const p of shapeParagraphs(sp)) {
        const text = paragraphText(p);
        if (text.trim().length === 0) continue;
        bullets.push({ text, fontSize: paragraphFontSize(p) });
      }
    }
  }

  for (const pic of elements(doc, 'p:pic')) {
    const image = await readPicture(zip, pic, rels);
    if (image) return { layout: 'image', title: title ?? '', image };
  }

  if (subtitle !== null) {
    return { layout: 'title', title: title ?? '', subtitle };
  }

  // No title shape: promote the first text paragraph.
  if (title === null && bullets.length > 0) {
    const first = bullets.shift();
    title = first ? first.text : '';
  }
  return { layout: 'content', title: title ?? '', bullets };
}

/**
 * Parse a .pptx document. Anything that is not a readable presentation
 * raises CorruptDocumentError.
 */
export async function readPptx(bytes: Uint8Array): Promise<Deck> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (err) {
    throw new CorruptDocumentError('not a zip archive', { cause: err });
  }

  try {
    const parts = await slideParts(zip);
    const slides: Slide[] = [];
    for (const part of parts) {
      slides.push(await readSlide(zip, part));
    }
    return { slides };
  } catch (err) {
    if (err instanceof CorruptDocumentError) throw err;
    throw new CorruptDocumentError('unreadable presentation part', { cause: err });
  }
}
