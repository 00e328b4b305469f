import { Logger } from '@nestjs/common';
import { isValidDomain, isValidHostName, validateTokenSecret } from '../config.validators';

describe('isValidDomain', () => {
  it('should accept domains with a TLD', () => {
    expect(isValidDomain('example.com')).toBe(true);
    expect(isValidDomain('mail.example.org')).toBe(true);
  });

  it('should reject single labels and malformed domains', () => {
    expect(isValidDomain('localhost')).toBe(false);
    expect(isValidDomain('-bad.example.com')).toBe(false);
    expect(isValidDomain('example..com')).toBe(false);
    expect(isValidDomain('example.c')).toBe(false);
  });
});

describe('isValidHostName', () => {
  it('should accept localhost and dotted domains', () => {
    expect(isValidHostName('localhost')).toBe(true);
    expect(isValidHostName('postline.test')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isValidHostName('postline')).toBe(false);
    expect(isValidHostName('')).toBe(false);
  });
});

describe('validateTokenSecret', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('should warn about a short secret', () => {
    validateTokenSecret('test-secret');
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should stay quiet for a long secret', () => {
    validateTokenSecret('test-secret-with-enough-length');
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
