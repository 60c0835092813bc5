/**
 * UploadIngestor: accepts an untrusted upload, stores it atomically at a
 * deterministic per-user path, then checks that it is a presentation (or,
 * for image uploads, a decodable image).
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { Readable } from 'stream';
import type { Deck } from '@deckhand/shared';
import {
  CorruptDocumentError,
  IOFailureError,
  TooLargeError,
  UnreadableImageError,
  ValidationError,
} from '../errors.js';
import type { SlideAssembler } from '../slides/assembler.js';
import { imageFromBytes } from '../slides/image.js';
import { publishStream } from './atomic-file.js';
import { artifactPath, safeFileName } from './paths.js';

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.gif', '.webp', '.tif', '.tiff', '.avif']);

/** Whether an upload is named like an image rather than a presentation. */
export function isImageUpload(declaredName: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(declaredName).toLowerCase());
}

export interface UploadRequest {
  ownerId: string;
  declaredName: string;
  /** Size announced by the transport; advisory apart from the ceiling check */
  declaredSize: number;
  stream: Readable;
}

export interface UploadedArtifact {
  ownerId: string;
  declaredName: string;
  declaredSize: number;
  storedPath: string;
  bytesWritten: number;
}

export interface IngestResult {
  artifact: UploadedArtifact;
  deck: Deck;
  slideCount: number;
}

export interface UploadIngestorOptions {
  uploadDir: string;
  maxUploadBytes: number;
  /** 0 disables the stream timeout */
  uploadTimeoutMs: number;
}

export class UploadIngestor {
  constructor(
    private readonly assembler: SlideAssembler,
    private readonly options: UploadIngestorOptions,
  ) {}

  /** Where an upload of `declaredName` by `ownerId` is stored. */
  destinationFor(ownerId: string, declaredName: string): string {
    return artifactPath(this.options.uploadDir, ownerId, declaredName);
  }

  /**
   * Store and validate an upload.
   *
   * Throws TooLargeError before reading anything when the declared size is
   * over the ceiling. A CorruptDocumentError leaves the stored file in place
   * for diagnostics.
   */
  async ingest(request: UploadRequest): Promise<IngestResult> {
    const artifact = await this.receive(request);
    const bytes = await this.readBack(artifact.storedPath);

    try {
      const deck = await this.assembler.load(bytes);
      return { artifact, deck, slideCount: deck.slides.length };
    } catch (err) {
      if (err instanceof CorruptDocumentError) {
        console.warn(`[UploadIngestor] ${artifact.storedPath} is not a valid presentation; kept for diagnostics`);
      }
      throw err;
    }
  }

  /**
   * Store an image for later image slides. It is found again through
   * `destinationFor(ownerId, declaredName)`.
   */
  async ingestImage(request: UploadRequest): Promise<UploadedArtifact> {
    const artifact = await this.receive(request);
    const bytes = await this.readBack(artifact.storedPath);

    try {
      await imageFromBytes(bytes, request.declaredName);
    } catch (err) {
      console.warn(`[UploadIngestor] ${artifact.storedPath} is not a readable image`);
      throw new UnreadableImageError(request.declaredName, { cause: err });
    }
    return artifact;
  }

  private async receive(request: UploadRequest): Promise<UploadedArtifact> {
    const { ownerId, declaredName, declaredSize, stream } = request;
    const { maxUploadBytes, uploadTimeoutMs } = this.options;

    const refuse = (err: Error): never => {
      stream.destroy();
      throw err;
    };

    if (declaredSize > maxUploadBytes) {
      console.log(`[UploadIngestor] Rejected ${declaredName} from ${ownerId}: ${declaredSize} bytes over limit`);
      refuse(new TooLargeError(declaredSize, maxUploadBytes));
    }
    if (!Number.isFinite(declaredSize) || declaredSize < 0) {
      refuse(new ValidationError('File size is missing or invalid.'));
    }
    if (safeFileName(declaredName).length === 0) {
      refuse(new ValidationError('File name is missing or invalid.'));
    }

    const storedPath = this.destinationFor(ownerId, declaredName);
    console.log(`[UploadIngestor] Receiving ${declaredName} from ${ownerId} (${declaredSize} bytes)`);

    const bytesWritten = await publishStream(storedPath, stream, {
      maxBytes: maxUploadBytes,
      timeoutMs: uploadTimeoutMs,
    });
    console.log(`[UploadIngestor] Stored ${storedPath} (${bytesWritten} bytes)`);

    return { ownerId, declaredName, declaredSize, storedPath, bytesWritten };
  }

  private async readBack(storedPath: string): Promise<Buffer> {
    try {
      return await readFile(storedPath);
    } catch (err) {
      throw new IOFailureError(`Could not read back ${storedPath}`, { cause: err });
    }
  }
}
