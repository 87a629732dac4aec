// services/testUtils/docxFixture.ts
import JSZip from 'jszip';
import { NS, descendants, parseXml } from '../ooxmlHelpers';
import { DOCUMENT_PART, DOCUMENT_RELS_PART } from '../docxPackageService';

/**
 * Builders for small in-memory .docx archives used by the tests.
 */

const NAMESPACE_DECLS = [
  `xmlns:w="${NS.w}"`,
  `xmlns:m="${NS.m}"`,
  `xmlns:o="${NS.o}"`,
  `xmlns:v="${NS.v}"`,
  `xmlns:a="${NS.a}"`,
  `xmlns:r="${NS.r}"`,
  `xmlns:mc="${NS.mc}"`,
  'xmlns:wp="http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing"',
  'xmlns:pic="http://schemas.openxmlformats.org/drawingml/2006/picture"'
].join(' ');

const IMAGE_REL_TYPE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/image';

// ============================================================
// XML SNIPPETS
// ============================================================

export const documentXml = (body: string): string =>
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
  `<w:document ${NAMESPACE_DECLS}><w:body>${body}<w:sectPr/></w:body></w:document>`;

export const run = (text: string, vertAlign?: 'superscript' | 'subscript'): string => {
  const rPr = vertAlign ? `<w:rPr><w:vertAlign w:val="${vertAlign}"/></w:rPr>` : '';
  return `<w:r>${rPr}<w:t xml:space="preserve">${text}</w:t></w:r>`;
};

export const sym = (char: string, font = 'Symbol'): string =>
  `<w:r><w:sym w:font="${font}" w:char="${char}"/></w:r>`;

export const paragraph = (...content: string[]): string => `<w:p>${content.join('')}</w:p>`;

export const drawing = (rId: string): string =>
  `<w:r><w:drawing><wp:inline><a:graphic><a:graphicData><pic:pic><pic:blipFill>` +
  `<a:blip r:embed="${rId}"/>` +
  `</pic:blipFill></pic:pic></a:graphicData></a:graphic></wp:inline></w:drawing></w:r>`;

export const vmlPicture = (rId: string): string =>
  `<w:r><w:pict><v:shape><v:imagedata r:id="${rId}"/></v:shape></w:pict></w:r>`;

export const oleObject = (rId: string, progId = 'Equation.DSMT4'): string =>
  `<w:r><w:object><v:shape id="_x0000_i1025"><v:imagedata r:id="rIdPreview" o:title=""/></v:shape>` +
  `<o:OLEObject Type="Embed" ProgID="${progId}" ShapeID="_x0000_i1025" r:id="${rId}"/></w:object></w:r>`;

export const mathRun = (text: string): string => `<m:r><m:t>${text}</m:t></m:r>`;

export const officeMath = (...children: string[]): string => `<m:oMath>${children.join('')}</m:oMath>`;

export const mathSub = (base: string, sub: string): string =>
  `<m:sSub><m:e>${mathRun(base)}</m:e><m:sub>${mathRun(sub)}</m:sub></m:sSub>`;

export const mathSup = (base: string, sup: string): string =>
  `<m:sSup><m:e>${mathRun(base)}</m:e><m:sup>${mathRun(sup)}</m:sup></m:sSup>`;

export const mathFraction = (num: string, den: string): string =>
  `<m:f><m:num>${num}</m:num><m:den>${den}</m:den></m:f>`;

// ============================================================
// PARSED ELEMENTS
// ============================================================

export function parseParagraph(xml: string): Element {
  const p = descendants(parseXml(documentXml(xml)), NS.w, 'p')[0];
  if (!p) throw new Error('fixture has no w:p');
  return p;
}

export function parseOfficeMath(xml: string): Element {
  const math = descendants(parseXml(documentXml(paragraph(xml))), NS.m, 'oMath')[0];
  if (!math) throw new Error('fixture has no m:oMath');
  return math;
}

// ============================================================
// ARCHIVES
// ============================================================

export interface FixtureRelationship {
  id: string;
  target: string;
  type?: string;
  external?: boolean;
}

export const relationshipsXml = (rels: FixtureRelationship[]): string =>
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
  `<Relationships xmlns="${NS.pkgRels}">` +
  rels
    .map(
      (rel) =>
        `<Relationship Id="${rel.id}" Type="${rel.type ?? IMAGE_REL_TYPE}" Target="${rel.target}"` +
        `${rel.external ? ' TargetMode="External"' : ''}/>`
    )
    .join('') +
  `</Relationships>`;

export interface DocxFixture {
  body?: string;
  relationships?: FixtureRelationship[];
  parts?: Record<string, Uint8Array | string>;
  omitDocument?: boolean;
  omitRelationships?: boolean;
}

export const buildDocx = async (fixture: DocxFixture): Promise<Buffer> => {
  const zip = new JSZip();
  zip.file('[Content_Types].xml', '<?xml version="1.0" encoding="UTF-8"?><Types/>');

  if (!fixture.omitDocument) zip.file(DOCUMENT_PART, documentXml(fixture.body ?? ''));
  if (!fixture.omitRelationships) zip.file(DOCUMENT_RELS_PART, relationshipsXml(fixture.relationships ?? []));

  for (const [partPath, content] of Object.entries(fixture.parts ?? {})) {
    zip.file(partPath, content);
  }

  return zip.generateAsync({ type: 'nodebuffer' });
};
