import { describe, test, expect } from 'vitest';
import { sanitizeBranchName } from './name.js';

describe('sanitizeBranchName', () => {
  test('given spaces, should convert to hyphens', () => {
    expect(sanitizeBranchName('Add Auth Flow')).toBe('add-auth-flow');
  });

  test('given underscores and slashes, should flatten to hyphens', () => {
    expect(sanitizeBranchName('feature/auth_flow')).toBe('feature-auth-flow');
  });

  test('given surrounding whitespace, should trim it', () => {
    expect(sanitizeBranchName('  feature-x \n')).toBe('feature-x');
  });

  test('given git-invalid and shell-special chars, should replace with hyphens', () => {
    expect(sanitizeBranchName('feat~1')).toBe('feat-1');
    expect(sanitizeBranchName('fix^2')).toBe('fix-2');
    expect(sanitizeBranchName('a:b')).toBe('a-b');
    expect(sanitizeBranchName('glob*')).toBe('glob');
    expect(sanitizeBranchName('a$b')).toBe('a-b');
    expect(sanitizeBranchName("it's")).toBe('it-s');
  });

  test('given control characters, should strip them', () => {
    expect(sanitizeBranchName('test\x01name')).toBe('testname');
  });

  test('given double dots, should collapse to single dot', () => {
    expect(sanitizeBranchName('a..b')).toBe('a.b');
  });

  test('given .lock suffix, should strip it', () => {
    expect(sanitizeBranchName('branch.lock')).toBe('branch');
    expect(sanitizeBranchName('test.lock.lock')).toBe('test');
    expect(sanitizeBranchName('test.lock-')).toBe('test');
  });

  test('given leading and trailing hyphens or dots, should strip them', () => {
    expect(sanitizeBranchName('--double--')).toBe('double');
    expect(sanitizeBranchName('.hidden.')).toBe('hidden');
  });

  test('given only invalid chars, should return empty string', () => {
    expect(sanitizeBranchName('~^:?*')).toBe('');
    expect(sanitizeBranchName('   ')).toBe('');
  });

  test('given a very long name, should truncate to 60 chars without a trailing hyphen', () => {
    const raw = `${'a'.repeat(59)} bcd`;
    const actual = sanitizeBranchName(raw);
    expect(actual).toBe('a'.repeat(59));
  });

  test('given an already valid name, should pass through', () => {
    expect(sanitizeBranchName('feature-x')).toBe('feature-x');
  });
});
