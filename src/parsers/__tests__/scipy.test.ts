import { ScipyCommitParser, ScipyParserOptionsSchema } from '../scipy';

const SHA = 'c'.repeat(40);

describe('ScipyCommitParser', () => {
  const parser = new ScipyCommitParser(ScipyParserOptionsSchema.parse({}));

  test.each([
    ['API: change the signature', 'major', 'Breaking'],
    ['DEP: deprecate old solver', 'major', 'Deprecation'],
    ['ENH: add some more text', 'minor', 'Feature'],
    ['FEAT: add a flag', 'minor', 'Feature'],
    ['MAINT: add some more text', 'patch', 'Fix'],
    ['BUG: fix overflow', 'patch', 'Fix'],
    ['BLD: fix wheels', 'patch', 'Build'],
    ['DOC: typo', 'none', 'Documentation'],
    ['TST: more cases', 'none', 'None'],
    ['Initial commit', 'none', 'None'],
    ['XYZ: unknown tag', 'none', 'None'],
  ])('classifies "%s"', (message, bump, category) => {
    const token = parser.parse({ sha: SHA, message });
    expect(token.bump).toBe(bump);
    expect(token.category).toBe(category);
  });

  test('extracts the scope and the subject', () => {
    const token = parser.parse({ sha: SHA, message: 'ENH(linalg): faster solve' });
    expect(token.scope).toBe('linalg');
    expect(token.descriptions).toEqual(['faster solve']);
  });

  test('treats a breaking footer as a major bump', () => {
    const token = parser.parse({
      sha: SHA,
      message: 'MAINT: clean up\n\nBREAKING CHANGE: removed "tol"',
    });
    expect(token.bump).toBe('major');
    expect(token.breaking).toBe(true);
    expect(token.breakingDescriptions).toEqual(['removed "tol"']);
  });
});
