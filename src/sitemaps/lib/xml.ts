export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';
export const METADATA_NAMESPACE = 'https://www.coveo.com/en/company/about-us';
export const METADATA_PREFIX = 'coveo';

const XML_ENTITIES: { [char: string]: string } = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

// Anything outside the XML 1.0 Char production; lone surrogates included
const NOT_XML_CHAR = /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;

/**
 * Escapes the given text for use as element content or within a double or
 * single quoted attribute. Characters which cannot appear in an XML 1.0
 * document at all, like most control characters, are removed.
 */
export const escapeXml = (text: string): string => {
  return text.replace(NOT_XML_CHAR, '').replace(/[&<>"']/g, (c) => XML_ENTITIES[c]);
};

const NOT_XML_CHAR_OR_LINE_BREAK = /[^\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/u;

/**
 * Checks if the given text contains a tab, a line break, or a character
 * escapeXml would remove.
 */
export const hasControlOrNonXmlChars = (text: string): boolean =>
  NOT_XML_CHAR_OR_LINE_BREAK.test(text);

// The NameStartChar and NameChar productions of XML 1.0 (fifth edition), without ':'
const NAME_START_CHARS =
  'A-Za-z_\\u00C0-\\u00D6\\u00D8-\\u00F6\\u00F8-\\u02FF\\u0370-\\u037D\\u037F-\\u1FFF' +
  '\\u200C-\\u200D\\u2070-\\u218F\\u2C00-\\u2FEF\\u3001-\\uD7FF\\uF900-\\uFDCF\\uFDF0-\\uFFFD' +
  '\\u{10000}-\\u{EFFFF}';
const NAME_CHARS = `${NAME_START_CHARS}\\-.0-9\\u00B7\\u0300-\\u036F\\u203F-\\u2040`;

const VALID_ELEMENT_NAME = new RegExp(`^[${NAME_START_CHARS}][${NAME_CHARS}]*$`, 'u');
const VALID_NAME_START = new RegExp(`^[${NAME_START_CHARS}]`, 'u');
const INVALID_NAME_CHARS = new RegExp(`[^${NAME_CHARS}]`, 'gu');

/**
 * Converts a metadata field name into an element name which is valid XML
 * without namespace prefixes. Names which are already valid are returned
 * unchanged. Otherwise every character outside the XML NameChar production
 * (and `:`) becomes `_`, and the result is prefixed with `_` if it would not
 * start with a NameStartChar, or if it starts with the reserved `xml`.
 *
 * Distinct field names may map to the same element name, e.g., `in stock` and
 * `in_stock`.
 */
export const toElementName = (fieldName: string): string => {
  if (VALID_ELEMENT_NAME.test(fieldName) && !/^xml/i.test(fieldName)) {
    return fieldName;
  }

  const replaced = fieldName.replace(INVALID_NAME_CHARS, '_');
  if (!VALID_NAME_START.test(replaced) || /^xml/i.test(replaced)) {
    return `_${replaced}`;
  }
  return replaced;
};
