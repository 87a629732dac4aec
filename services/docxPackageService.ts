// services/docxPackageService.ts
import path from 'path';
import JSZip from 'jszip';
import type { DocxPackage, Relationship } from '../types';
import { NS, attr, descendants, parseXml } from './ooxmlHelpers';
import { ExtractionLogger } from '../utils/extractionLogger';

export const DOCUMENT_PART = 'word/document.xml';
export const DOCUMENT_RELS_PART = 'word/_rels/document.xml.rels';

export class DocxExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocxExtractionError';
  }
}

export type DocxInput = Buffer | Uint8Array | ArrayBuffer;

// ============================================================
// LOAD
// ============================================================

/**
 * Read every file of a .docx archive into memory so the paragraph scan can
 * look parts up synchronously.
 */
export const loadDocxPackage = async (data: DocxInput): Promise<DocxPackage> => {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (err) {
    throw new DocxExtractionError('Input is not a readable .docx (zip) archive', { cause: err });
  }

  const parts = new Map<string, Uint8Array>();
  for (const [partPath, entry] of Object.entries(zip.files)) {
    if (entry.dir) continue;
    parts.set(partPath, await entry.async('uint8array'));
  }

  const documentBytes = parts.get(DOCUMENT_PART);
  const relsBytes = parts.get(DOCUMENT_RELS_PART);

  const documentXml = documentBytes ? decodeUtf8(documentBytes) : null;
  const relationships = relsBytes ? parseRelationships(decodeUtf8(relsBytes)) : null;

  ExtractionLogger.debug('Loaded docx package', {
    parts: parts.size,
    relationships: relationships?.size ?? 0
  });

  return createDocxPackage(documentXml, relationships, parts);
};

export function createDocxPackage(
  documentXml: string | null,
  relationships: Map<string, Relationship> | null,
  parts: Map<string, Uint8Array>
): DocxPackage {
  return {
    documentXml,
    relationships,
    readPart: (partPath) => parts.get(partPath) ?? null,
    resolveTarget: (relId) => {
      const rel = relationships?.get(relId);
      if (!rel || rel.external) return null;
      return resolvePartPath(rel.target);
    }
  };
}

// ============================================================
// RELATIONSHIPS
// ============================================================

export function parseRelationships(relsXml: string): Map<string, Relationship> {
  const relationships = new Map<string, Relationship>();
  const doc = parseXml(relsXml);

  for (const rel of descendants(doc, NS.pkgRels, 'Relationship')) {
    const id = rel.getAttribute('Id');
    const target = rel.getAttribute('Target');
    if (!id || !target) continue;

    relationships.set(id, {
      id,
      target,
      type: rel.getAttribute('Type') || '',
      external: rel.getAttribute('TargetMode') === 'External'
    });
  }

  return relationships;
}

/** Targets are relative to word/; a leading slash means the archive root. */
export function resolvePartPath(target: string): string {
  if (target.startsWith('/')) return path.posix.normalize(target.slice(1));
  return path.posix.normalize(path.posix.join('word', target));
}

export function relationshipIdOf(element: Element, localName: 'embed' | 'id'): string | null {
  return attr(element, NS.r, localName);
}

function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8').decode(bytes);
}
