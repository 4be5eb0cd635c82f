// test/unit/utils/naming.test.ts
import { describe, it, expect } from 'vitest';
import { camelCase, kebabCase, pascalCase, uniqueName, words } from '../../../src/utils/naming';

describe('words', () => {
  it('splits camel, kebab and free text', () => {
    expect(words('userMenu-toggle now')).toEqual(['user', 'menu', 'toggle', 'now']);
  });
});

describe('casing', () => {
  it('builds identifiers from free text', () => {
    expect(camelCase('Sign in')).toBe('signIn');
    expect(pascalCase('remember me')).toBe('RememberMe');
    expect(kebabCase('Submit Order')).toBe('submit-order');
  });

  it('prefixes identifiers that would start with a digit', () => {
    expect(camelCase('2fa code')).toBe('n2faCode');
  });

  it('returns an empty string for text without words', () => {
    expect(pascalCase('!!')).toBe('');
  });
});

describe('uniqueName', () => {
  it('suffixes taken names from 2', () => {
    const taken = new Set<string>();
    expect(uniqueName('save', taken)).toBe('save');
    expect(uniqueName('save', taken)).toBe('save2');
    expect(uniqueName('save', taken)).toBe('save3');
  });
});
