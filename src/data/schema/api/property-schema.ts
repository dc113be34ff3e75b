// SPDX-License-Identifier: Apache-2.0

import {type PropertyDeclaration} from './property-declaration.js';

/**
 * Read-only catalog of the declared configuration properties.
 */
export interface PropertySchema {
  /**
   * Looks up the declaration of a property. Keys are matched exactly, without any normalization.
   *
   * @param key - the property key.
   * @returns the declaration, or null if the property is not declared.
   */
  declaration(key: string): PropertyDeclaration | null;

  /**
   * Determines whether the property is declared.
   */
  has(key: string): boolean;

  /**
   * Enumerates the declared property keys in declaration order.
   */
  keys(): string[];
}
