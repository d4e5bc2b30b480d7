/**
 * Attribute list parsing (`KEY=VALUE,KEY="quoted, value"`)
 */

import { PlaylistParseError } from '@llhls-edge/common';

const ATTRIBUTE_NAME = /^[A-Z0-9-]+$/;
const DECIMAL = /^\d+(\.\d*)?$/;
const INTEGER = /^\d+$/;

/** One attribute as written in the source */
export interface Attribute {
  key: string;
  /** Value without surrounding quotes */
  value: string;
  quoted: boolean;
}

/** Attributes in source order, unknown keys included */
export type AttributeList = readonly Attribute[];

/**
 * Parse the value part of an attribute-list tag.
 * @param input - Text after the tag's colon
 * @param line - Source line number, for errors
 */
export function parseAttributeList(input: string, line: number): AttributeList {
  const attributes: Attribute[] = [];
  let position = 0;

  while (position < input.length) {
    const equals = input.indexOf('=', position);
    if (equals === -1) {
      throw new PlaylistParseError('AttributeSyntax', `Attribute without value: ${input.slice(position)}`, line);
    }

    const key = input.slice(position, equals);
    if (!ATTRIBUTE_NAME.test(key)) {
      throw new PlaylistParseError('AttributeSyntax', `Invalid attribute name "${key}"`, line);
    }

    let end: number;
    if (input[equals + 1] === '"') {
      const close = input.indexOf('"', equals + 2);
      if (close === -1) {
        throw new PlaylistParseError('AttributeSyntax', `Unterminated quoted string for ${key}`, line);
      }
      end = close + 1;
      if (end < input.length && input[end] !== ',') {
        throw new PlaylistParseError('AttributeSyntax', `Expected comma after ${key}`, line);
      }
      attributes.push({ key, value: input.slice(equals + 2, close), quoted: true });
    } else {
      const comma = input.indexOf(',', equals + 1);
      end = comma === -1 ? input.length : comma;
      const value = input.slice(equals + 1, end);
      if (value.includes('"')) {
        throw new PlaylistParseError('AttributeSyntax', `Stray quote in value of ${key}`, line);
      }
      attributes.push({ key, value, quoted: false });
    }

    // skip the separating comma; a trailing comma ends the list
    position = end + 1;
  }

  return attributes;
}

/** First value for a key, or null */
export function getAttribute(attributes: AttributeList, key: string): string | null {
  return attributes.find((attribute) => attribute.key === key)?.value ?? null;
}

/** Enumerated-string YES check */
export function getFlag(attributes: AttributeList, key: string): boolean {
  return getAttribute(attributes, key) === 'YES';
}

/** Decimal attribute, null when absent; malformed values throw */
export function getDecimal(attributes: AttributeList, key: string, line: number): number | null {
  const value = getAttribute(attributes, key);
  return value === null ? null : parseDecimal(value, key, line);
}

/** Parse a non-negative decimal-floating-point value */
export function parseDecimal(value: string, what: string, line: number): number {
  if (!DECIMAL.test(value)) {
    throw new PlaylistParseError('MalformedTag', `Invalid number for ${what}: "${value}"`, line);
  }
  return Number(value);
}

/** Parse a decimal-integer value */
export function parseInteger(value: string, what: string, line: number): number {
  if (!INTEGER.test(value)) {
    throw new PlaylistParseError('MalformedTag', `Invalid integer for ${what}: "${value}"`, line);
  }
  return Number(value);
}
