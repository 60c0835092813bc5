/**
 * Template catalog: read-only starter decks selectable by name.
 *
 * A template `<name>` is either `<name>.yaml` (a slide descriptor) or
 * `<name>.pptx` (an existing presentation). Parsed entries are cached;
 * callers always receive a deep copy.
 */

import { readdir, readFile } from 'fs/promises';
import { join, extname, basename } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  cloneDeck,
  DEFAULT_BULLET_FONT_SIZE,
  type Deck,
  type Slide,
  type TemplateSummary,
} from '@deckhand/shared';
import { TemplateNotFoundError } from '../errors.js';
import { safePath } from '../storage/paths.js';
import { loadImage } from './image.js';
import { readPptx } from './pptx-reader.js';

export const TEMPLATE_NAME_RE = /^[A-Za-z0-9_-]{1,64}$/;

const DESCRIPTOR_EXTENSIONS = ['.yaml', '.yml'] as const;
const TEMPLATE_EXTENSIONS = [...DESCRIPTOR_EXTENSIONS, '.pptx'] as const;

const slideSchema = z.discriminatedUnion('layout', [
  z.object({
    layout: z.literal('title'),
    title: z.string().min(1),
    subtitle: z.string().default(''),
  }),
  z.object({
    layout: z.literal('content'),
    title: z.string().min(1),
    bullets: z.array(z.string().min(1)).default([]),
  }),
  z.object({
    layout: z.literal('image'),
    title: z.string().min(1),
    /** Path relative to the catalog root */
    image: z.string().min(1),
  }),
]);

const descriptorSchema = z.object({
  title: z.string().optional(),
  description: z.string().default(''),
  slides: z.array(slideSchema),
});

type SlideDescriptor = z.infer<typeof slideSchema>;

interface CatalogEntry {
  summary: TemplateSummary;
  deck: Deck;
}

export class TemplateCatalog {
  private readonly entries = new Map<string, CatalogEntry>();

  constructor(readonly rootDir: string) {}

  /**
   * A fresh copy of the named template.
   * Throws TemplateNotFoundError when no such template exists.
   */
  async get(name: string): Promise<Deck> {
    const entry = await this.load(name);
    return cloneDeck(entry.deck);
  }

  /**
   * All templates in the catalog, sorted by name.
   * Entries that fail to parse are skipped with a warning.
   */
  async list(): Promise<TemplateSummary[]> {
    let files: string[];
    try {
      files = await readdir(this.rootDir);
    } catch {
      return [];
    }

    const names = new Set<string>();
    for (const file of files) {
      const ext = extname(file).toLowerCase();
      const name = basename(file, extname(file));
      if ((TEMPLATE_EXTENSIONS as readonly string[]).includes(ext) && TEMPLATE_NAME_RE.test(name)) {
        names.add(name);
      }
    }

    const summaries: TemplateSummary[] = [];
    for (const name of [...names].sort()) {
      try {
        summaries.push((await this.load(name)).summary);
      } catch (err) {
        console.warn(`[TemplateCatalog] Skipping template "${name}":`, err);
      }
    }
    return summaries;
  }

  private async load(name: string): Promise<CatalogEntry> {
    if (!TEMPLATE_NAME_RE.test(name)) {
      throw new TemplateNotFoundError(name);
    }

    const cached = this.entries.get(name);
    if (cached) return cached;

    for (const ext of TEMPLATE_EXTENSIONS) {
      const file = join(this.rootDir, `${name}${ext}`);
      let raw: Buffer;
      try {
        raw = await readFile(file);
      } catch {
        continue;
      }

      const entry = ext === '.pptx'
        ? await this.fromPresentation(name, raw)
        : await this.fromDescriptor(name, file, raw.toString('utf-8'));
      this.entries.set(name, entry);
      return entry;
    }

    throw new TemplateNotFoundError(name);
  }

  private async fromPresentation(name: string, raw: Buffer): Promise<CatalogEntry> {
    const deck = await readPptx(raw);
    return {
      summary: {
        name,
        title: deck.slides[0]?.title || name,
        description: '',
        slideCount: deck.slides.length,
      },
      deck,
    };
  }

  private async fromDescriptor(name: string, file: string, source: string): Promise<CatalogEntry> {
    const parsed = descriptorSchema.safeParse(parseYaml(source));
    if (!parsed.success) {
      throw new Error(`Invalid template descriptor ${file}: ${parsed.error.message}`);
    }

    const slides: Slide[] = [];
    for (const slide of parsed.data.slides) {
      slides.push(await this.buildSlide(slide));
    }

    return {
      summary: {
        name,
        title: parsed.data.title ?? name,
        description: parsed.data.description,
        slideCount: slides.length,
      },
      deck: { slides },
    };
  }

  private async buildSlide(slide: SlideDescriptor): Promise<Slide> {
    switch (slide.layout) {
      case 'title':
        return { layout: 'title', title: slide.title, subtitle: slide.subtitle };
      case 'content':
        return {
          layout: 'content',
          title: slide.title,
          bullets: slide.bullets.map((text) => ({ text, fontSize: DEFAULT_BULLET_FONT_SIZE })),
        };
      case 'image': {
        const imagePath = safePath(this.rootDir, slide.image);
        if (!imagePath) {
          throw new Error(`Template image escapes the catalog: ${slide.image}`);
        }
        return { layout: 'image', title: slide.title, image: await loadImage(imagePath) };
      }
    }
  }
}
