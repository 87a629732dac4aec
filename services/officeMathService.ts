// services/officeMathService.ts
import { NS, childElements, escapeXml, firstChild, isNamed, mathText } from './ooxmlHelpers';

/**
 * Office Math (m:oMath) -> MathML.
 *
 * Only the direct children of the math node are visited, in document order:
 * OMML is mixed content, so the order of m:r / m:sSub / m:f siblings carries
 * meaning. Unsupported constructs (radicals, n-ary operators, delimiters...)
 * are skipped.
 */

const OPERATORS = new Map<string, string>([
  ['=', '='],
  ['×', '×'],
  ['*', '×'],
  ['+', '+'],
  ['-', '-']
]);

const NUMBER_PATTERN = /^\d+(?:\.\d+)?$/;

/** <mi> for identifiers, <mn> for plain decimal numbers. */
export function mathToken(text: string): string {
  const escaped = escapeXml(text);
  return NUMBER_PATTERN.test(text) ? `<mn>${escaped}</mn>` : `<mi>${escaped}</mi>`;
}

function convertRun(run: Element): string {
  const text = mathText(run).trim();
  if (!text) return '';

  const operator = OPERATORS.get(text);
  if (operator) return `<mo>${operator}</mo>`;
  return mathToken(text);
}

function convertScript(node: Element, tag: 'msub' | 'msup', scriptName: 'sub' | 'sup'): string {
  const baseNode = firstChild(node, NS.m, 'e');
  const scriptNode = firstChild(node, NS.m, scriptName);
  if (!baseNode || !scriptNode) return '';

  const base = mathText(baseNode).trim();
  const script = mathText(scriptNode).trim();
  if (!base || !script) return '';

  return `<${tag}>${mathToken(base)}${mathToken(script)}</${tag}>`;
}

/** Numerator/denominator content: only subscripts and plain runs are kept. */
function convertFractionPart(part: Element): string {
  return childElements(part)
    .map((child) => {
      if (isNamed(child, NS.m, 'sSub')) return convertScript(child, 'msub', 'sub');
      if (isNamed(child, NS.m, 'r')) return convertRun(child);
      return '';
    })
    .join('');
}

function convertFraction(node: Element): string {
  const num = firstChild(node, NS.m, 'num');
  const den = firstChild(node, NS.m, 'den');
  if (!num || !den) return '';

  const numerator = convertFractionPart(num);
  const denominator = convertFractionPart(den);
  if (!numerator || !denominator) return '';

  return `<mfrac><mrow>${numerator}</mrow><mrow>${denominator}</mrow></mfrac>`;
}

function convertChild(child: Element): string {
  if (isNamed(child, NS.m, 'sSub')) return convertScript(child, 'msub', 'sub');
  if (isNamed(child, NS.m, 'sSup')) return convertScript(child, 'msup', 'sup');
  if (isNamed(child, NS.m, 'f')) return convertFraction(child);
  if (isNamed(child, NS.m, 'r')) return convertRun(child);
  return '';
}

/**
 * MathML for one m:oMath element; an empty string when nothing convertible
 * was found (the paragraph is then treated as having no math).
 */
export function convertOfficeMathToMathML(mathNode: Element): string {
  const elements = childElements(mathNode)
    .map(convertChild)
    .filter((markup) => markup.length > 0);

  if (elements.length === 0) return '';
  return `<math><mrow>${elements.join('')}</mrow></math>`;
}
