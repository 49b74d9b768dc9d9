import { XMLValidator } from 'fast-xml-parser';
import { escapeXml, hasControlOrNonXmlChars, toElementName } from './xml';

test('escapes the five special characters', () => {
  expect(escapeXml(`a & b < c > d " e ' f`)).toBe('a &amp; b &lt; c &gt; d &quot; e &apos; f');
});

test('already escaped text is escaped again', () => {
  expect(escapeXml('&amp;')).toBe('&amp;amp;');
});

test('removes characters xml cannot represent', () => {
  expect(escapeXml('bell\u0007\ttab\u0000')).toBe('bell\ttab');
  expect(escapeXml('lone \uD800 surrogate')).toBe('lone  surrogate');
});

test('keeps non-ascii text', () => {
  expect(escapeXml('caf\u00e9 \u{1F600}')).toBe('caf\u00e9 \u{1F600}');
});

test('valid element names are unchanged', () => {
  expect(toElementName('type')).toBe('type');
  expect(toElementName('modelNumber')).toBe('modelNumber');
  expect(toElementName('_private.v-2')).toBe('_private.v-2');
  expect(toElementName('caf\u00e9')).toBe('caf\u00e9');
});

test('invalid characters become underscores', () => {
  expect(toElementName('in stock')).toBe('in_stock');
  expect(toElementName('a:b')).toBe('a_b');
  expect(toElementName('price ($)')).toBe('price____');
});

test('invalid starts are prefixed', () => {
  expect(toElementName('2nd')).toBe('_2nd');
  expect(toElementName('-x')).toBe('_-x');
  expect(toElementName('.hidden')).toBe('_.hidden');
  expect(toElementName('xmlThing')).toBe('_xmlThing');
  expect(toElementName('XML data')).toBe('_XML_data');
});

test('letters and digits outside the xml name productions are replaced', () => {
  expect(toElementName('area_m\u00B2')).toBe('area_m_');
  expect(toElementName('\u00B5m')).toBe('_m');
  expect(toElementName('n\u00BA')).toBe('n_');
  expect(toElementName('rank\u2460')).toBe('rank_');
  expect(toElementName('\u00BDprice')).toBe('_price');
});

test('sanitized names are well-formed element names', () => {
  for (const field of ['area_m\u00B2', '\u00B5m', 'n\u00BA', 'rank\u2460', 'caf\u00E9', '2nd']) {
    const name = toElementName(field);
    expect(XMLValidator.validate(`<${name}>x</${name}>`)).toBe(true);
  }
});

test('control characters and line breaks are detected', () => {
  expect(hasControlOrNonXmlChars('https://example.com/a')).toBe(false);
  expect(hasControlOrNonXmlChars('https://example.com/caf\u00E9')).toBe(false);
  expect(hasControlOrNonXmlChars('https://example.com/a\u0001b')).toBe(true);
  expect(hasControlOrNonXmlChars('https://exa\tmple.com/x')).toBe(true);
  expect(hasControlOrNonXmlChars('a\nb')).toBe(true);
  expect(hasControlOrNonXmlChars('\uFFFE')).toBe(true);
});
