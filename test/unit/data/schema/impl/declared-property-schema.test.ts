// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {PropertyDeclaration} from '../../../../../src/data/schema/api/property-declaration.js';
import {DeclaredPropertySchema} from '../../../../../src/data/schema/impl/declared-property-schema.js';
import {IllegalArgumentError} from '../../../../../src/core/errors/illegal-argument-error.js';

describe('DeclaredPropertySchema', () => {
  const single: PropertyDeclaration = PropertyDeclaration.builder('single').defaultValue('default').build();
  const multi: PropertyDeclaration = PropertyDeclaration.builder('multi').multiValued().build();

  describe('PropertyDeclarationBuilder', () => {
    it('should declare single-valued properties without default by default', () => {
      const declaration: PropertyDeclaration = PropertyDeclaration.builder('plain').build();
      expect(declaration.key).to.equal('plain');
      expect(declaration.multiValued).to.be.false;
      expect(declaration.defaultValue).to.be.null;
    });

    it('should build immutable declarations', () => {
      expect(multi.multiValued).to.be.true;
      expect(Object.isFrozen(multi)).to.be.true;
    });

    it('should reject an empty key', () => {
      expect(() => PropertyDeclaration.builder('')).to.throw(IllegalArgumentError, 'key must not be null or empty');
    });
  });

  it('should look up declarations by exact key', () => {
    const schema: DeclaredPropertySchema = new DeclaredPropertySchema([single, multi]);
    expect(schema.declaration('single')).to.equal(single);
    expect(schema.declaration('multi')).to.equal(multi);
    expect(schema.declaration('SINGLE')).to.be.null;
    expect(schema.declaration(' single')).to.be.null;
    expect(schema.declaration('undeclared')).to.be.null;
  });

  it('should list declared keys in declaration order', () => {
    const schema: DeclaredPropertySchema = new DeclaredPropertySchema([multi, single]);
    expect(schema.keys()).to.deep.equal(['multi', 'single']);
    expect(schema.has('multi')).to.be.true;
    expect(schema.has('other')).to.be.false;
  });

  it('should be empty when built without declarations', () => {
    const schema: DeclaredPropertySchema = new DeclaredPropertySchema();
    expect(schema.keys()).to.be.empty;
    expect(schema.declaration('single')).to.be.null;
  });

  it('should reject a key declared twice', () => {
    const duplicate: PropertyDeclaration = PropertyDeclaration.builder('single').multiValued().build();
    expect(() => new DeclaredPropertySchema([single, duplicate])).to.throw(
      IllegalArgumentError,
      "property 'single' is declared more than once",
    );
  });
});
