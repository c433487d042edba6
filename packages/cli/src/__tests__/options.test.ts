import { describe, it, expect } from 'vitest';
import { ConfigError } from '@gitbrief/core';
import { parseFormats, parseList, parseWindow } from '../options.js';

describe('parseList', () => {
  it('splits, trims and drops empty items', () => {
    expect(parseList(' a@example.com, b@example.com,,')).toEqual(['a@example.com', 'b@example.com']);
  });

  it('leaves an absent option undefined', () => {
    expect(parseList(undefined)).toBeUndefined();
    expect(parseList('')).toEqual([]);
  });
});

describe('parseFormats', () => {
  it('accepts short aliases and removes duplicates', () => {
    expect(parseFormats('html,md,markdown,TXT')).toEqual(['html', 'markdown', 'text']);
  });

  it('rejects an unknown format', () => {
    expect(() => parseFormats('html,pdf')).toThrow(ConfigError);
    expect(() => parseFormats('pdf')).toThrow('Unknown report format "pdf". Use one of: html, markdown, text');
  });
});

describe('parseWindow', () => {
  it('builds a time window from --since', () => {
    expect(parseWindow({ since: '2 days ago' })).toEqual({ kind: 'since', since: '2 days ago' });
  });

  it('builds a count window from -n', () => {
    expect(parseWindow({ count: '25' })).toEqual({ kind: 'count', count: 25 });
  });

  it('returns undefined when neither is given', () => {
    expect(parseWindow({})).toBeUndefined();
  });

  it('rejects both options together and invalid counts', () => {
    expect(() => parseWindow({ since: '1 day ago', count: '5' })).toThrow(ConfigError);
    expect(() => parseWindow({ count: '0' })).toThrow('Invalid commit count "0"');
    expect(() => parseWindow({ count: '3.5' })).toThrow('Invalid commit count "3.5"');
  });
});
