import { describe, it, expect } from '@jest/globals';
import { parseGitHubRemote } from '../../../core/publisher/remote-url.js';

describe('parseGitHubRemote', () => {
  const expected = {
    owner: 'test-owner',
    repo: 'test-repo',
    pagesUrl: 'https://test-owner.github.io/test-repo/',
  };

  it.each([
    'https://github.com/test-owner/test-repo',
    'https://github.com/test-owner/test-repo.git',
    'https://github.com/test-owner/test-repo/',
    'https://token@github.com/test-owner/test-repo.git',
    'git@github.com:test-owner/test-repo.git',
    'ssh://git@github.com/test-owner/test-repo.git',
    '  git@github.com:test-owner/test-repo\n',
  ])('should parse %s', (url) => {
    expect(parseGitHubRemote(url)).toEqual(expected);
  });

  it.each([
    'https://gitlab.com/test-owner/test-repo.git',
    'git@bitbucket.org:test-owner/test-repo.git',
    'https://github.com/test-owner',
    '/srv/git/test-repo.git',
    '',
  ])('should reject %s', (url) => {
    expect(parseGitHubRemote(url)).toBeNull();
  });
});
