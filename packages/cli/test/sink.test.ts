import { describe, it, expect } from 'vitest';
import { BufferedSink, formatSeparator } from '../src/sink.js';

describe('formatSeparator', () => {
  it('should center the title in an 80 column rule', () => {
    const line = formatSeparator('Allure upload');
    expect(line).toBe(`${'='.repeat(32)} Allure upload ${'='.repeat(33)}`);
    expect(line).toHaveLength(80);
  });

  it('should keep at least three fill characters for long titles', () => {
    expect(formatSeparator('x'.repeat(100), 20)).toBe(`=== ${'x'.repeat(100)} ===`);
  });
});

describe('BufferedSink', () => {
  it('should record lines and separators in order', () => {
    const sink = new BufferedSink();
    sink.writeSeparator('T');
    sink.writeLine('body');

    expect(sink.lines).toEqual([formatSeparator('T'), 'body']);
    expect(sink.toString()).toBe(`${formatSeparator('T')}\nbody`);
  });
});
