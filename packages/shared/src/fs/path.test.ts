import { join, normalizePath, resolve, resolvePosix, isWithinRoot, basename } from './path';

describe('path', () => {
  describe('normalizePath', () => {
    it('should replace backslashes with forward slashes', () => {
      expect(normalizePath('foo\\bar')).toBe('foo/bar');
    });

    it('should not alter paths with forward slashes', () => {
      expect(normalizePath('foo/bar')).toBe('foo/bar');
    });
  });

  describe('join', () => {
    it('should join paths and normalize', () => {
      expect(join('foo', 'bar', '..', 'baz')).toBe('foo/baz');
    });
  });

  describe('resolve', () => {
    it('should resolve paths with forward slashes', () => {
      const result = resolve('/home', 'user', 'project');
      expect(result).toBe('/home/user/project');
      expect(result).not.toContain('\\');
    });
  });

  describe('resolvePosix', () => {
    it('collapses traversal against the root', () => {
      expect(resolvePosix('/home/proj', '../../../etc/malicious')).toBe('/etc/malicious');
    });

    it('keeps absolute targets as they are', () => {
      expect(resolvePosix('/home/proj', '/etc/passwd')).toBe('/etc/passwd');
    });

    it('resolves relative targets inside the root', () => {
      expect(resolvePosix('/home/proj', 'src/../README.md')).toBe('/home/proj/README.md');
    });
  });

  describe('isWithinRoot', () => {
    it('accepts the root itself and its descendants', () => {
      expect(isWithinRoot('/home/proj', '/home/proj')).toBe(true);
      expect(isWithinRoot('/home/proj', '/home/proj/src/index.ts')).toBe(true);
    });

    it('rejects siblings that share a prefix', () => {
      expect(isWithinRoot('/home/proj', '/home/proj2/file')).toBe(false);
    });

    it('rejects parents', () => {
      expect(isWithinRoot('/home/proj', '/home')).toBe(false);
    });

    it('treats the filesystem root as containing everything', () => {
      expect(isWithinRoot('/', '/etc/passwd')).toBe(true);
    });
  });

  describe('basename', () => {
    it('strips directory qualification', () => {
      expect(basename('/usr/bin/git')).toBe('git');
      expect(basename('./init.sh')).toBe('init.sh');
      expect(basename('ls')).toBe('ls');
    });
  });
});
