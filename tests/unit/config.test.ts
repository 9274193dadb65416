import { resolveConfig, resolveOwnerRepo, MissingOwnerError, DEFAULT_ISSUES_FOLDER } from '../../src/lib/config';

describe('config', () => {
  describe('resolveConfig', () => {
    it('should apply defaults for an empty environment', () => {
      expect(resolveConfig({})).toEqual({
        owner: '',
        repo: '',
        folder: DEFAULT_ISSUES_FOLDER,
        logLevel: 'info',
        logJson: false,
      });
    });

    it('should read every setting', () => {
      expect(
        resolveConfig({
          GITHUB_OWNER: 'acme',
          GITHUB_REPO: 'widgets',
          ISSUES_FOLDER: 'docs/issues',
          LOG_LEVEL: 'DEBUG',
          LOG_JSON: 'true',
        })
      ).toEqual({ owner: 'acme', repo: 'widgets', folder: 'docs/issues', logLevel: 'debug', logJson: true });
    });

    it('should split owner/repo in GITHUB_REPO', () => {
      expect(resolveConfig({ GITHUB_REPO: 'acme/widgets' })).toMatchObject({ owner: 'acme', repo: 'widgets' });
    });

    it('should keep an explicit GITHUB_OWNER over the one in GITHUB_REPO', () => {
      expect(resolveConfig({ GITHUB_OWNER: 'other', GITHUB_REPO: 'acme/widgets' })).toMatchObject({
        owner: 'other',
        repo: 'widgets',
      });
    });

    it('should fall back to info for unknown log levels', () => {
      expect(resolveConfig({ LOG_LEVEL: 'verbose', LOG_JSON: '1' })).toMatchObject({
        logLevel: 'info',
        logJson: true,
      });
    });
  });

  describe('resolveOwnerRepo', () => {
    const empty = { owner: '', repo: '' };

    it('should prefer flags over config without inferring', () => {
      const infer = jest.fn();

      const result = resolveOwnerRepo({ owner: 'flag-owner', repo: 'flag-repo' }, { owner: 'o', repo: 'r' }, '/work', infer);

      expect(result).toEqual({ owner: 'flag-owner', repo: 'flag-repo' });
      expect(infer).not.toHaveBeenCalled();
    });

    it('should prefer config over git inference', () => {
      const infer = jest.fn().mockReturnValue({ owner: 'git-owner', repo: 'git-repo' });

      const result = resolveOwnerRepo({}, { owner: 'cfg-owner', repo: '' }, '/work', infer);

      expect(result).toEqual({ owner: 'cfg-owner', repo: 'git-repo' });
    });

    it('should fall back to the working directory name for the repo', () => {
      const result = resolveOwnerRepo({ owner: 'acme' }, empty, '/work/widgets', () => null);

      expect(result).toEqual({ owner: 'acme', repo: 'widgets' });
    });

    it('should throw when no owner can be found', () => {
      expect(() => resolveOwnerRepo({}, empty, '/work/widgets', () => null)).toThrow(MissingOwnerError);
    });
  });
});
