import { expect } from 'chai';
import { describe, it } from 'mocha';
import { PKCEGenerator } from '../../../src/auth/pkce.js';

describe('PKCEGenerator', () => {
  describe('generateCodeVerifier', () => {
    it('should produce a 128 character verifier from the unreserved set', () => {
      const verifier = PKCEGenerator.generateCodeVerifier();
      expect(verifier).to.have.length(128);
      expect(verifier).to.match(/^[A-Za-z0-9\-._~]+$/);
      expect(PKCEGenerator.isValidCodeVerifier(verifier)).to.be.true;
    });

    it('should not repeat across calls', () => {
      const verifiers = new Set(Array.from({ length: 20 }, () => PKCEGenerator.generateCodeVerifier()));
      expect(verifiers.size).to.equal(20);
    });
  });

  describe('generateCodeChallenge', () => {
    it('should match the RFC 7636 appendix B vector', () => {
      const challenge = PKCEGenerator.generateCodeChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk');
      expect(challenge).to.equal('E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM');
    });

    it('should be deterministic and unpadded', () => {
      const verifier = PKCEGenerator.generateCodeVerifier();
      const challenge = PKCEGenerator.generateCodeChallenge(verifier);
      expect(PKCEGenerator.generateCodeChallenge(verifier)).to.equal(challenge);
      expect(challenge).to.have.length(43);
      expect(challenge).to.not.include('=');
    });
  });

  describe('generateChallenge', () => {
    it('should pair a verifier with its S256 challenge', () => {
      const pair = PKCEGenerator.generateChallenge();
      expect(pair.codeChallengeMethod).to.equal('S256');
      expect(pair.codeChallenge).to.equal(PKCEGenerator.generateCodeChallenge(pair.codeVerifier));
    });
  });

  describe('generateState', () => {
    it('should produce 43 url-safe characters', () => {
      const state = PKCEGenerator.generateState();
      expect(state).to.have.length(43);
      expect(state).to.match(/^[A-Za-z0-9_-]+$/);
    });

    it('should differ between calls', () => {
      expect(PKCEGenerator.generateState()).to.not.equal(PKCEGenerator.generateState());
    });
  });

  describe('statesMatch', () => {
    it('should accept an identical state', () => {
      expect(PKCEGenerator.statesMatch('abc', 'abc')).to.be.true;
    });

    it('should reject a different or differently sized state', () => {
      expect(PKCEGenerator.statesMatch('abc', 'abd')).to.be.false;
      expect(PKCEGenerator.statesMatch('abc', 'abcd')).to.be.false;
    });

    it('should reject missing values', () => {
      expect(PKCEGenerator.statesMatch('abc', undefined)).to.be.false;
      expect(PKCEGenerator.statesMatch('abc', null)).to.be.false;
      expect(PKCEGenerator.statesMatch('', '')).to.be.false;
    });
  });

  describe('isValidCodeVerifier', () => {
    it('should enforce the 43-128 length bounds', () => {
      expect(PKCEGenerator.isValidCodeVerifier('a'.repeat(42))).to.be.false;
      expect(PKCEGenerator.isValidCodeVerifier('a'.repeat(43))).to.be.true;
      expect(PKCEGenerator.isValidCodeVerifier('a'.repeat(128))).to.be.true;
      expect(PKCEGenerator.isValidCodeVerifier('a'.repeat(129))).to.be.false;
    });

    it('should reject characters outside the unreserved set', () => {
      expect(PKCEGenerator.isValidCodeVerifier(`${'a'.repeat(42)}+`)).to.be.false;
      expect(PKCEGenerator.isValidCodeVerifier(`${'a'.repeat(42)}~`)).to.be.true;
    });
  });
});
