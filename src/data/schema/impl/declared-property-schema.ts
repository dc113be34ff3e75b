// SPDX-License-Identifier: Apache-2.0

import {type PropertySchema} from '../api/property-schema.js';
import {type PropertyDeclaration} from '../api/property-declaration.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

export class DeclaredPropertySchema implements PropertySchema {
  private readonly declarations: ReadonlyMap<string, PropertyDeclaration>;

  public constructor(declarations: Iterable<PropertyDeclaration> = []) {
    const map: Map<string, PropertyDeclaration> = new Map<string, PropertyDeclaration>();
    for (const declaration of declarations) {
      if (map.has(declaration.key)) {
        throw new IllegalArgumentError(`property '${declaration.key}' is declared more than once`, declaration.key);
      }
      map.set(declaration.key, declaration);
    }
    this.declarations = map;
  }

  public declaration(key: string): PropertyDeclaration | null {
    return this.declarations.get(key) ?? null;
  }

  public has(key: string): boolean {
    return this.declarations.has(key);
  }

  public keys(): string[] {
    return [...this.declarations.keys()];
  }
}
