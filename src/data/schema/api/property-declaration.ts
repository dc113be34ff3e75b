// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * Describes the shape of a configuration property: whether it holds a list of values and which value it takes when
 * none has been set.
 */
export class PropertyDeclaration {
  public constructor(
    public readonly key: string,
    public readonly multiValued: boolean,
    public readonly defaultValue: string | null,
  ) {
    Object.freeze(this);
  }

  public static builder(key: string): PropertyDeclarationBuilder {
    return new PropertyDeclarationBuilder(key);
  }
}

/**
 * Fluent builder for creating a PropertyDeclaration instance.
 */
export class PropertyDeclarationBuilder {
  private _multiValued: boolean = false;
  private _defaultValue: string | null = null;

  public constructor(private readonly key: string) {
    if (!key) {
      throw new IllegalArgumentError('key must not be null or empty', key);
    }
  }

  public multiValued(multiValued: boolean = true): PropertyDeclarationBuilder {
    this._multiValued = multiValued;
    return this;
  }

  public defaultValue(defaultValue: string | null): PropertyDeclarationBuilder {
    this._defaultValue = defaultValue;
    return this;
  }

  public build(): PropertyDeclaration {
    return new PropertyDeclaration(this.key, this._multiValued, this._defaultValue);
  }
}
