import { describe, it, expect } from 'vitest';
import { describeProgress, formatBytes, formatEta, renderBar } from '../src/progress.js';

describe('formatBytes', () => {
  it('keeps small sizes in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('switches to binary units', () => {
    expect(formatBytes(1024)).toBe('1.00 KiB');
    expect(formatBytes(20000)).toBe('19.53 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MiB');
  });
});

describe('renderBar', () => {
  it('shows the cursor at the start', () => {
    expect(renderBar(0, 100, 10)).toBe('>---------');
  });

  it('fills proportionally', () => {
    expect(renderBar(50, 100, 10)).toBe('#####>----');
  });

  it('is full when done or when the total is zero', () => {
    expect(renderBar(100, 100, 10)).toBe('##########');
    expect(renderBar(0, 0, 10)).toBe('##########');
  });
});

describe('formatEta', () => {
  it('formats seconds, minutes and hours', () => {
    expect(formatEta(4.2)).toBe('5s');
    expect(formatEta(65)).toBe('1m5s');
    expect(formatEta(3700)).toBe('1h1m');
  });

  it('shows -- when unknown', () => {
    expect(formatEta(Infinity)).toBe('--');
    expect(formatEta(-1)).toBe('--');
  });
});

describe('describeProgress', () => {
  it('combines bar, byte counts and eta', () => {
    const text = describeProgress({ transferred: 512, total: 1024, percent: 50 }, 1000);

    expect(text).toBe(`[${'#'.repeat(20)}>${'-'.repeat(19)}] 512 B/1.00 KiB (1s)`);
  });

  it('has no eta before any time has elapsed', () => {
    const text = describeProgress({ transferred: 0, total: 1024, percent: 0 }, 0);

    expect(text).toBe(`[>${'-'.repeat(39)}] 0 B/1.00 KiB (--)`);
  });
});
