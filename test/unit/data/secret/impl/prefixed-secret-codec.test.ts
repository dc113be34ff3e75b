// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {PrefixedSecretCodec} from '../../../../../src/data/secret/impl/prefixed-secret-codec.js';
import {Base64Cipher} from '../../../../../src/data/secret/impl/base64-cipher.js';
import {IllegalArgumentError} from '../../../../../src/core/errors/illegal-argument-error.js';

describe('PrefixedSecretCodec', () => {
  let codec: PrefixedSecretCodec;

  beforeEach(() => {
    codec = new PrefixedSecretCodec(new Base64Cipher());
  });

  it('should only consider values prefixed by a registered algorithm as encrypted', () => {
    expect(codec.isEncrypted('{b64}dGVzdA==')).to.be.true;
    expect(codec.isEncrypted('{aes}dGVzdA==')).to.be.false;
    expect(codec.isEncrypted('dGVzdA==')).to.be.false;
    expect(codec.isEncrypted('{}dGVzdA==')).to.be.false;
    expect(codec.isEncrypted(' {b64}dGVzdA==')).to.be.false;
  });

  it('should consider nothing encrypted without ciphers', () => {
    expect(new PrefixedSecretCodec().isEncrypted('{b64}dGVzdA==')).to.be.false;
  });

  it('should encrypt with the algorithm prefix', () => {
    expect(codec.encrypt('b64', 'test-secret')).to.equal('{b64}dGVzdC1zZWNyZXQ=');
  });

  it('should decrypt prefixed values', () => {
    expect(codec.decrypt('{b64}dGVzdC1zZWNyZXQ=')).to.equal('test-secret');
    expect(codec.decrypt(codec.encrypt('b64', 'a, "b,c"'))).to.equal('a, "b,c"');
  });

  it('should return values of unknown algorithms unchanged', () => {
    expect(codec.decrypt('{aes}dGVzdA==')).to.equal('{aes}dGVzdA==');
    expect(codec.decrypt('plain')).to.equal('plain');
  });

  it('should refuse to encrypt with an unknown algorithm', () => {
    expect(() => codec.encrypt('aes', 'test-secret')).to.throw(
      IllegalArgumentError,
      "no cipher registered for algorithm 'aes'",
    );
  });

  it('should fail to decrypt a malformed base64 payload', () => {
    expect(() => codec.decrypt('{b64}!!!')).to.throw(IllegalArgumentError, 'value is not base64 encoded');
  });
});
