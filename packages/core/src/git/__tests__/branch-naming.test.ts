import { describe, it, expect, vi } from 'vitest';
import {
  generateUniqueBranchName,
  slugifyBranchBase,
  validateBranchName,
} from '../branch-naming.js';
import { NameGenerationExhaustedError } from '../../reliability/errors.js';

describe('slugifyBranchBase', () => {
  it('should collapse non-alphanumeric runs into single hyphens', () => {
    expect(slugifyBranchBase('Add hello.py printing Hello World')).toBe('add-hello-py-printing-hello-world');
  });

  it('should strip accents', () => {
    expect(slugifyBranchBase('Ça va très bien')).toBe('ca-va-tres-bien');
  });

  it('should bound the length without a trailing hyphen', () => {
    const slug = slugifyBranchBase('refactor the authentication module and update every test file', 40);
    expect(slug).toBe('refactor-the-authentication-module-and-u');
    expect(slugifyBranchBase('abc def', 4)).toBe('abc');
  });

  it('should fall back when nothing usable remains', () => {
    expect(slugifyBranchBase('  !!! ')).toBe('change');
    expect(slugifyBranchBase('日本語')).toBe('change');
  });
});

describe('validateBranchName', () => {
  it.each([
    ['', 'empty'],
    ['x'.repeat(251), 'too-long'],
    ['has space', 'whitespace-or-control'],
    ['tab\there', 'whitespace-or-control'],
    ['a~b', 'forbidden-character'],
    ['a:b', 'forbidden-character'],
    ['a..b', 'double-dot'],
    ['a@{b', 'at-brace'],
    ['@', 'lone-at'],
    ['/lead', 'leading-slash'],
    ['trail/', 'trailing-slash'],
    ['a//b', 'double-slash'],
    ['.hidden', 'leading-dot'],
    ['end.', 'trailing-dot'],
    ['feature/.x', 'component-leading-dot'],
    ['x.lock', 'lock-suffix'],
    ['-x', 'leading-dash'],
  ])('should reject %j with rule %s', (name, rule) => {
    const result = validateBranchName(name);
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.rule).toBe(rule);
    }
  });

  it.each(['main', 'feature/login-form', 'autopr/add-hello-py-lx2k9-1a2b', 'release/1.2.3'])(
    'should accept %s',
    (name) => {
      expect(validateBranchName(name)).toEqual({ valid: true });
    }
  );
});

describe('generateUniqueBranchName', () => {
  it('should return the first free candidate', async () => {
    const isTaken = vi.fn(async (_name: string) => false);

    const name = await generateUniqueBranchName('Add hello.py', isTaken, { suffix: () => 'abc123' });

    expect(name).toBe('autopr/add-hello-py-abc123');
    expect(isTaken).toHaveBeenCalledTimes(1);
  });

  it('should regenerate on collision', async () => {
    const suffixes = ['s1', 's2', 's3'];
    const isTaken = vi.fn(async (name: string) => !name.endsWith('-s3'));

    const name = await generateUniqueBranchName('Fix bug', isTaken, {
      suffix: () => suffixes.shift() ?? 'none',
    });

    expect(name).toBe('autopr/fix-bug-s3');
    expect(isTaken).toHaveBeenCalledTimes(3);
  });

  it('should fail with NameGenerationExhausted after the bounded attempts', async () => {
    let counter = 0;
    const promise = generateUniqueBranchName('Fix bug', async () => true, {
      maxAttempts: 3,
      suffix: () => `n${++counter}`,
    });

    await expect(promise).rejects.toBeInstanceOf(NameGenerationExhaustedError);
    await promise.catch((error: unknown) => {
      if (error instanceof NameGenerationExhaustedError) {
        expect(error.candidates).toEqual(['autopr/fix-bug-n1', 'autopr/fix-bug-n2', 'autopr/fix-bug-n3']);
      }
    });
  });

  it('should always produce names that pass validation', async () => {
    const inputs = [
      'Add hello.py printing Hello World',
      '   ',
      '..//..\\~^:?*[',
      'Ünïcödé çhâràctérs everywhere',
      '🚀 launch the rocket 🚀',
      '-leading dash and trailing dot.',
      'x'.repeat(500),
      'feature/.lock @{upstream}',
      'line one\nline two\ttabbed',
    ];

    for (const input of inputs) {
      const name = await generateUniqueBranchName(input, async () => false);
      expect(validateBranchName(name)).toEqual({ valid: true });
    }
  });
});
