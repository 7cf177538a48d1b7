import { describe, it, expect } from 'vitest';
import { isUrl } from '../url-utils.js';

describe('isUrl', () => {
  it('should accept absolute URLs', () => {
    expect(isUrl('http://example.com/health')).toBe(true);
    expect(isUrl('https://example.com:8443/status?full=true')).toBe(true);
    expect(isUrl('http://x')).toBe(true);
  });

  it('should reject relative and malformed values', () => {
    expect(isUrl('not a url')).toBe(false);
    expect(isUrl('/health')).toBe(false);
    expect(isUrl('example.com')).toBe(false);
  });

  it('should accept ftp and file URLs', () => {
    expect(isUrl('ftp://files.example.com/archive')).toBe(true);
    expect(isUrl('file:///var/log/app.log')).toBe(true);
  });

  it('should reject host-and-port values without a scheme', () => {
    expect(isUrl('localhost:8080')).toBe(false);
    expect(isUrl('localhost:8080/health')).toBe(false);
  });

  it('should reject unsupported schemes', () => {
    expect(isUrl('foo:bar')).toBe(false);
    expect(isUrl('mailto:ops@example.com')).toBe(false);
  });

  it('should reject blank values', () => {
    expect(isUrl('')).toBe(false);
    expect(isUrl('   ')).toBe(false);
  });
});
