// SPDX-License-Identifier: Apache-2.0

import {UnsupportedOperationError} from '../../core/errors/unsupported-operation-error.js';
import {MalformedMultiValueError} from './malformed-multi-value-error.js';

enum ParserState {
  FIELD_START,
  UNQUOTED,
  QUOTED,
  AFTER_QUOTE,
}

const SEPARATOR: string = ',';
const QUOTE: string = '"';
const BLANK: RegExp = /\s/;

/**
 * Splits the string form of a multi-valued property into its fields.
 *
 * <p>
 * Fields are separated by commas. Unquoted fields are trimmed, quoted fields are kept verbatim and may contain
 * commas, blanks and doubled quotes (`""`) standing for a single quote. The empty string holds no field at all.
 */
export class MultiValueParser {
  private constructor() {
    throw new UnsupportedOperationError('utility classes and cannot be instantiated');
  }

  /**
   * Parses the value of a multi-valued property.
   *
   * @param key - the property the value belongs to, reported when the value is malformed.
   * @param value - the raw property value.
   * @returns the fields of the value, in order.
   * @throws MalformedMultiValueError if a quoted field is not closed or is followed by anything but a comma.
   */
  public static parse(key: string, value: string): string[] {
    if (value.length === 0) {
      return [];
    }

    const fields: string[] = [];
    let state: ParserState = ParserState.FIELD_START;
    let field: string = '';

    for (let index: number = 0; index < value.length; index++) {
      const character: string = value.charAt(index);

      switch (state) {
        case ParserState.FIELD_START: {
          if (character === QUOTE) {
            field = '';
            state = ParserState.QUOTED;
          } else if (character === SEPARATOR) {
            fields.push(field.trim());
            field = '';
          } else {
            field += character;
            if (!BLANK.test(character)) {
              state = ParserState.UNQUOTED;
            }
          }
          break;
        }
        case ParserState.UNQUOTED: {
          if (character === SEPARATOR) {
            fields.push(field.trim());
            field = '';
            state = ParserState.FIELD_START;
          } else {
            field += character;
          }
          break;
        }
        case ParserState.QUOTED: {
          if (character !== QUOTE) {
            field += character;
          } else if (value.charAt(index + 1) === QUOTE) {
            field += QUOTE;
            index++;
          } else {
            state = ParserState.AFTER_QUOTE;
          }
          break;
        }
        case ParserState.AFTER_QUOTE: {
          if (character === SEPARATOR) {
            fields.push(field);
            field = '';
            state = ParserState.FIELD_START;
          } else if (!BLANK.test(character)) {
            throw new MalformedMultiValueError(key, value);
          }
          break;
        }
      }
    }

    switch (state) {
      case ParserState.QUOTED:
        throw new MalformedMultiValueError(key, value);
      case ParserState.AFTER_QUOTE:
        fields.push(field);
        break;
      default:
        fields.push(field.trim());
    }

    return fields;
  }
}
