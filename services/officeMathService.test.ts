import { describe, expect, it } from 'vitest';
import { convertOfficeMathToMathML, mathToken } from './officeMathService';
import { mathFraction, mathRun, mathSub, mathSup, officeMath, parseOfficeMath } from './testUtils/docxFixture';

const convert = (...children: string[]): string => convertOfficeMathToMathML(parseOfficeMath(officeMath(...children)));

describe('officeMathService', () => {
  it('converts subscripts', () => {
    expect(convert(mathSub('v', '0'))).toBe('<math><mrow><msub><mi>v</mi><mn>0</mn></msub></mrow></math>');
  });

  it('converts superscripts', () => {
    expect(convert(mathSup('x', '2'))).toBe('<math><mrow><msup><mi>x</mi><mn>2</mn></msup></mrow></math>');
  });

  it('keeps mixed children in document order', () => {
    expect(convert(mathRun('F'), mathRun('='), mathRun('m'), mathRun('*'), mathRun('a'))).toBe(
      '<math><mrow><mi>F</mi><mo>=</mo><mi>m</mi><mo>×</mo><mi>a</mi></mrow></math>'
    );
    expect(convert(mathSub('v', '1'), mathRun('+'), mathSub('v', '2'), mathRun('-'), mathRun('3'))).toBe(
      '<math><mrow><msub><mi>v</mi><mn>1</mn></msub><mo>+</mo><msub><mi>v</mi><mn>2</mn></msub><mo>-</mo><mn>3</mn></mrow></math>'
    );
  });

  it('converts fractions with subscript and run children', () => {
    expect(convert(mathFraction(mathRun('1'), mathSub('m', 'e')))).toBe(
      '<math><mrow><mfrac><mrow><mn>1</mn></mrow><mrow><msub><mi>m</mi><mi>e</mi></msub></mrow></mfrac></mrow></math>'
    );
  });

  it('drops other children inside a fraction', () => {
    expect(convert(mathFraction(mathSup('x', '2') + mathRun('2'), mathRun('y')))).toBe(
      '<math><mrow><mfrac><mrow><mn>2</mn></mrow><mrow><mi>y</mi></mrow></mfrac></mrow></math>'
    );
  });

  it('skips unsupported constructs', () => {
    const radical = '<m:rad><m:deg/><m:e>' + mathRun('x') + '</m:e></m:rad>';
    expect(convert(radical, mathRun('y'))).toBe('<math><mrow><mi>y</mi></mrow></math>');
  });

  it('returns an empty string when nothing is convertible', () => {
    expect(convert('<m:rad><m:deg/><m:e>' + mathRun('x') + '</m:e></m:rad>')).toBe('');
    expect(convert(mathRun('  '))).toBe('');
    expect(convert()).toBe('');
  });

  it('escapes markup characters in tokens', () => {
    expect(convert(mathRun('a'), mathRun('&lt;'), mathRun('b'))).toBe(
      '<math><mrow><mi>a</mi><mi>&lt;</mi><mi>b</mi></mrow></math>'
    );
    expect(mathToken('3.5')).toBe('<mn>3.5</mn>');
    expect(mathToken('x1')).toBe('<mi>x1</mi>');
  });
});
