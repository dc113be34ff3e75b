// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {container} from 'tsyringe-neo';
import {
  Base64Cipher,
  type Configuration,
  type ConfigurationProvider,
  InjectTokens,
  MalformedMultiValueError,
  PrefixedSecretCodec,
  PropertyDeclaration,
} from '../../src/index.js';

describe('settings-resolver', () => {
  it('should resolve settings through the public entry point', () => {
    const codec: PrefixedSecretCodec = new PrefixedSecretCodec(new Base64Cipher());
    const config: Configuration = container
      .resolve<ConfigurationProvider>(InjectTokens.ConfigurationProvider)
      .builder()
      .withDeclarations(
        PropertyDeclaration.builder('exclusions').multiValued().defaultValue('**/*.gen.ts').build(),
        PropertyDeclaration.builder('inclusions').multiValued().build(),
        PropertyDeclaration.builder('login').build(),
      )
      .withProperties({inclusions: 'src/**, "docs/a,b.md"', login: codec.encrypt('b64', 'test-secret'), broken: '"x'})
      .withSecretCodec(codec)
      .build();

    expect(config.getStringArray('exclusions')).to.deep.equal(['**/*.gen.ts']);
    expect(config.getStringArray('inclusions')).to.deep.equal(['src/**', 'docs/a,b.md']);
    expect(config.get('login')).to.equal('test-secret');
    expect(() => config.getStringArray('broken')).to.throw(MalformedMultiValueError);
  });
});
