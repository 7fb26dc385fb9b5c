import { expect } from 'chai';
import { describe, it } from 'mocha';
import { CliUsageError, describeCredential, parseCliArgs } from '../../src/cli.js';

describe('cli', () => {
  describe('parseCliArgs', () => {
    it('should read config, strategy and flags', () => {
      expect(parseCliArgs(['--config', './oauth.json', '-s', 'proxied', '--print-tokens'])).to.deep.equal({
        configPath: './oauth.json',
        strategy: 'proxied',
        printTokens: true,
        help: false
      });
    });

    it('should default to no config and masked output', () => {
      expect(parseCliArgs([])).to.deep.equal({ printTokens: false, help: false });
    });

    it('should reject a missing config path, a bad strategy and unknown flags', () => {
      expect(() => parseCliArgs(['--config'])).to.throw(CliUsageError, '--config requires a file path');
      expect(() => parseCliArgs(['--strategy', 'implicit'])).to.throw(CliUsageError);
      expect(() => parseCliArgs(['--verbose'])).to.throw(CliUsageError, 'Unknown argument: --verbose');
    });
  });

  describe('describeCredential', () => {
    it('should mask provider tokens by default', () => {
      const summary = describeCredential({
        kind: 'provider_tokens',
        tokens: { access_token: 'ya29.test-access-token', refresh_token: 'RT1', token_type: 'Bearer', expires_at: 0 }
      }, false);

      expect(summary).to.deep.equal({
        kind: 'provider_tokens',
        customToken: undefined,
        accessToken: 'ya29.t...',
        idToken: 'none',
        refreshToken: 'present',
        expiresAt: undefined,
        user: undefined
      });
    });

    it('should mask the custom token and keep the user', () => {
      const summary = describeCredential({
        kind: 'custom_token',
        customToken: 'custom-token-value',
        user: { uid: 'u1', email: 'user@example.com' }
      }, false);

      expect(summary.customToken).to.equal('custom...');
      expect(summary.accessToken).to.equal('none');
      expect(summary.user).to.deep.equal({ uid: 'u1', email: 'user@example.com' });
    });

    it('should print everything when asked', () => {
      const credential = { kind: 'custom_token' as const, customToken: 'CT1' };
      expect(describeCredential(credential, true)).to.deep.equal({ kind: 'custom_token', customToken: 'CT1' });
    });
  });
});
