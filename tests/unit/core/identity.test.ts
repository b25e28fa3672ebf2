import { describe, it, expect } from 'vitest';
import { identityFromUrl, isRemoteUrl, isSafeIdentity, resolveIdentity } from '../../../src/core/identity.js';
import { group, identifier, plugin } from '../../../src/types/spec.js';

describe('resolveIdentity', () => {
  it('takes the path after the host', () => {
    expect(resolveIdentity('https://github.com/owner/repo')).toBe('owner/repo');
  });

  it('strips .git and trailing slashes', () => {
    expect(resolveIdentity('https://github.com/owner/repo.git')).toBe('owner/repo');
    expect(resolveIdentity('https://github.com/owner/repo/')).toBe('owner/repo');
    expect(resolveIdentity('https://github.com/owner/repo.git/')).toBe('owner/repo');
  });

  it('handles scp-like sources', () => {
    expect(resolveIdentity('git@github.com:owner/repo.git')).toBe('owner/repo');
  });

  it('accepts shorthand as-is', () => {
    expect(resolveIdentity('owner/repo')).toBe('owner/repo');
  });

  it('reads descriptors and specs', () => {
    expect(resolveIdentity({ source: 'https://example.com/team/tool', options: {} })).toBe('team/tool');
    expect(resolveIdentity(identifier('https://github.com/a/b'))).toBe('a/b');
    expect(resolveIdentity(plugin('c/d'))).toBe('c/d');
    expect(resolveIdentity(group(identifier('e/f'), identifier('g/h')))).toBe('e/f');
  });

  it('uses the first element of an array', () => {
    expect(resolveIdentity(['https://github.com/x/y', 'z/w'])).toBe('x/y');
  });

  it('returns undefined when no source can be found', () => {
    expect(resolveIdentity(undefined)).toBeUndefined();
    expect(resolveIdentity([])).toBeUndefined();
    expect(resolveIdentity(group())).toBeUndefined();
    expect(resolveIdentity('')).toBeUndefined();
    expect(resolveIdentity('https://github.com/')).toBeUndefined();
  });

  it('rejects paths that would leave the install directory', () => {
    expect(resolveIdentity('owner/../../x')).toBeUndefined();
    expect(resolveIdentity('https://github.com/../../x')).toBeUndefined();
    expect(resolveIdentity('owner//repo')).toBeUndefined();
    expect(resolveIdentity('./repo')).toBeUndefined();
    expect(resolveIdentity('owner\\..\\repo')).toBeUndefined();
  });

  it('strips any URL scheme', () => {
    expect(resolveIdentity('git+ssh://git@example.com/o/r.git')).toBe('o/r');
  });
});

describe('identityFromUrl', () => {
  it('keeps nested paths', () => {
    expect(identityFromUrl('https://git.example.com/group/sub/tool.git')).toBe('group/sub/tool');
  });
});

describe('isSafeIdentity', () => {
  it('accepts plain and nested paths', () => {
    expect(isSafeIdentity('owner/repo')).toBe(true);
    expect(isSafeIdentity('group/sub/tool')).toBe(true);
    expect(isSafeIdentity('owner/repo.nvim')).toBe(true);
  });

  it('refuses relative and empty segments', () => {
    expect(isSafeIdentity('../repo')).toBe(false);
    expect(isSafeIdentity('owner/.')).toBe(false);
    expect(isSafeIdentity('/owner/repo')).toBe(false);
  });
});

describe('isRemoteUrl', () => {
  it('recognises every scheme and scp-like sources', () => {
    expect(isRemoteUrl('git+ssh://host/o/r')).toBe(true);
    expect(isRemoteUrl('file:///srv/repos/tool')).toBe(true);
    expect(isRemoteUrl('git@host:o/r')).toBe(true);
    expect(isRemoteUrl('owner/repo')).toBe(false);
  });
});
