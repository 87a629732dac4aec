// services/imageBinderService.ts
import { NS, descendants, hasAncestor } from './ooxmlHelpers';
import { relationshipIdOf } from './docxPackageService';
import { parseLeadingNumber } from './fieldSplitterService';
import type { ExtractionContext } from './extractionContext';
import { ExtractionLogger } from '../utils/extractionLogger';

// ============================================================
// COLLECT
// ============================================================

/**
 * Relationship ids of the pictures in a paragraph, in document order:
 * DrawingML (w:drawing//a:blip/@r:embed) and VML (w:pict//v:imagedata/@r:id).
 * The VML preview inside a w:object belongs to an equation, not an image.
 */
export function collectImageReferences(paragraph: Element): string[] {
  const rIds: string[] = [];

  for (const drawing of descendants(paragraph, NS.w, 'drawing')) {
    for (const blip of descendants(drawing, NS.a, 'blip')) {
      const embed = relationshipIdOf(blip, 'embed');
      if (embed && !rIds.includes(embed)) rIds.push(embed);
    }
  }

  for (const pict of descendants(paragraph, NS.w, 'pict')) {
    if (hasAncestor(pict, paragraph, NS.w, 'object')) continue;
    for (const imageData of descendants(pict, NS.v, 'imagedata')) {
      const rid = relationshipIdOf(imageData, 'id');
      if (rid && !rIds.includes(rid)) rIds.push(rid);
    }
  }

  return rIds;
}

// ============================================================
// BIND
// ============================================================

export function imageExtension(target: string, fallback: string): string {
  const filename = target.split('/').pop() || '';
  const dot = filename.lastIndexOf('.');
  if (dot <= 0 || dot === filename.length - 1) return fallback;
  return filename.slice(dot + 1).toLowerCase();
}

/** Number of the question currently being accumulated, from its first chunk. */
function openQuestionNumber(context: ExtractionContext): number | null {
  const first = context.buffer.chunks[0];
  return first === undefined ? null : parseLeadingNumber(first);
}

/**
 * Register one picture against the open question. Returns the marker to put
 * in the question text, or null when the reference can't be resolved.
 */
export function bindImage(relId: string, context: ExtractionContext): string | null {
  const partPath = context.pkg.resolveTarget(relId);
  if (!partPath) {
    ExtractionLogger.warn(`Image ${relId} has no relationship target, skipped`);
    return null;
  }

  const bytes = context.pkg.readPart(partPath);
  if (!bytes) {
    ExtractionLogger.warn(`Image part ${partPath} is missing, skipped`);
    return null;
  }

  const number = openQuestionNumber(context);
  if (number === null) return '<img>';

  context.imageCounter += 1;
  const filename = `image_${context.imageCounter}.${imageExtension(partPath, context.defaultImageExtension)}`;

  let images = context.pendingImages.get(number);
  if (!images) {
    images = new Map();
    context.pendingImages.set(number, images);
  }
  images.set(filename, bytes);

  ExtractionLogger.debug('Bound image', { question: number, filename, source: partPath });
  return `<img src="${filename}">`;
}

/** Images registered for a question; removed from the side-table. */
export function takeBoundImages(context: ExtractionContext, number: number | null): Map<string, Uint8Array> {
  if (number === null) return new Map();
  const images = context.pendingImages.get(number) ?? new Map<string, Uint8Array>();
  context.pendingImages.delete(number);
  return images;
}
